import { describe, expect, it } from "vitest";
import {
  accuracyFromCounts,
  evaluateDirectionalCall,
  makeDirectionalCall,
  summarizeCallAccuracy,
} from "./accuracy.js";

describe("directional call accuracy", () => {
  it("calls up only when the mean forecast is above the reference", () => {
    expect(makeDirectionalCall({ ts: "t0", meanForecast: 101, referencePrice: 100 }).call).toBe("up");
    expect(makeDirectionalCall({ ts: "t0", meanForecast: 100, referencePrice: 100 }).call).toBe(
      "not-up",
    );
  });

  it("scores calls against the realized price", () => {
    const up = makeDirectionalCall({ ts: "t0", meanForecast: 105, referencePrice: 100 });
    const notUp = makeDirectionalCall({ ts: "t0", meanForecast: 95, referencePrice: 100 });
    expect(evaluateDirectionalCall({ call: up, realizedPrice: 102, evaluatedAt: "t1" }).hit).toBe(true);
    expect(evaluateDirectionalCall({ call: up, realizedPrice: 100, evaluatedAt: "t1" }).hit).toBe(false);
    expect(evaluateDirectionalCall({ call: notUp, realizedPrice: 100, evaluatedAt: "t1" }).hit).toBe(
      true,
    );
    expect(evaluateDirectionalCall({ call: notUp, realizedPrice: 103, evaluatedAt: "t1" })).toEqual({
      ts: "t0",
      referencePrice: 100,
      meanForecast: 95,
      call: "not-up",
      evaluatedAt: "t1",
      realizedPrice: 103,
      hit: false,
    });
  });

  it("summarizes the hit rate in percent", () => {
    const call = makeDirectionalCall({ ts: "t0", meanForecast: 105, referencePrice: 100 });
    const results = [101, 99, 104].map((realizedPrice) =>
      evaluateDirectionalCall({ call, realizedPrice, evaluatedAt: "t1" }),
    );
    expect(summarizeCallAccuracy(results)).toEqual({ hits: 2, total: 3, hitRate: 66.6667 });
    expect(summarizeCallAccuracy([])).toEqual({ hits: 0, total: 0, hitRate: 0 });
    expect(accuracyFromCounts(1, 4)).toEqual({ hits: 1, total: 4, hitRate: 25 });
  });
});
