import { round } from "../utils.js";

export type DirectionalCall = {
  ts: string;
  referencePrice: number;
  meanForecast: number;
  call: "up" | "not-up";
};

export type CallEvaluation = DirectionalCall & {
  evaluatedAt: string;
  realizedPrice: number;
  hit: boolean;
};

export type CallAccuracy = {
  hits: number;
  total: number;
  hitRate: number;
};

export function makeDirectionalCall(params: {
  ts: string;
  meanForecast: number;
  referencePrice: number;
}): DirectionalCall {
  return {
    ts: params.ts,
    referencePrice: params.referencePrice,
    meanForecast: params.meanForecast,
    call: params.meanForecast > params.referencePrice ? "up" : "not-up",
  };
}

/** A call is a hit when "up" matches a strictly higher realized price. */
export function evaluateDirectionalCall(params: {
  call: DirectionalCall;
  realizedPrice: number;
  evaluatedAt: string;
}): CallEvaluation {
  const rose = params.realizedPrice > params.call.referencePrice;
  return {
    ...params.call,
    evaluatedAt: params.evaluatedAt,
    realizedPrice: params.realizedPrice,
    hit: rose === (params.call.call === "up"),
  };
}

export function accuracyFromCounts(hits: number, total: number): CallAccuracy {
  if (total <= 0) {
    return { hits: 0, total: 0, hitRate: 0 };
  }
  return { hits, total, hitRate: round((hits / total) * 100, 4) };
}

export function summarizeCallAccuracy(evaluations: readonly CallEvaluation[]): CallAccuracy {
  const hits = evaluations.filter((entry) => entry.hit).length;
  return accuracyFromCounts(hits, evaluations.length);
}
