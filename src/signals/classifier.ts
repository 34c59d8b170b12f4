import { z } from "zod";
import type {
  ClassifierThresholds,
  ProbabilitySummary,
  SideThresholds,
  Signal,
} from "./types.js";
import { InvalidInputError } from "../errors.js";
import { clamp } from "../utils.js";
import { DEFAULT_CLASSIFIER_THRESHOLDS } from "./types.js";

type SideProbabilities = {
  directional: number;
  moderateOrMore: number;
};

type SideSignals = {
  strong: Signal;
  moderate: Signal;
  weak: Signal;
};

const BULLISH: SideSignals = {
  strong: "strong_bullish",
  moderate: "moderate_bullish",
  weak: "weak_bullish",
};

const BEARISH: SideSignals = {
  strong: "strong_bearish",
  moderate: "moderate_bearish",
  weak: "weak_bearish",
};

function matchSide(
  probabilities: SideProbabilities,
  thresholds: SideThresholds,
  signals: SideSignals,
): Signal | null {
  if (
    probabilities.directional >= thresholds.strong.minDirectional &&
    probabilities.moderateOrMore >= thresholds.strong.minModerateOrMore
  ) {
    return signals.strong;
  }
  if (
    probabilities.directional >= thresholds.moderate.minDirectional &&
    probabilities.moderateOrMore >= thresholds.moderate.minModerateOrMore
  ) {
    return signals.moderate;
  }
  if (probabilities.directional >= thresholds.weak.minDirectional) {
    return signals.weak;
  }
  return null;
}

/**
 * Maps a probability summary to a signal. Rules run from the most extreme
 * bullish tier down to weak bearish; the first match wins, so bullish rules
 * take precedence over bearish ones.
 */
export function classifySignal(
  summary: ProbabilitySummary,
  thresholds: ClassifierThresholds = DEFAULT_CLASSIFIER_THRESHOLDS,
): Signal {
  const bullish = matchSide(
    { directional: summary.pUp, moderateOrMore: summary.pUpModerateOrMore },
    thresholds.bullish,
    BULLISH,
  );
  if (bullish) {
    return bullish;
  }
  const bearish = matchSide(
    { directional: summary.pDown, moderateOrMore: summary.pDownModerateOrMore },
    thresholds.bearish,
    BEARISH,
  );
  return bearish ?? "neutral";
}

const RawProbabilitySummarySchema = z.object({
  pUp: z.number().finite(),
  pUpModerateOrMore: z.number().finite(),
  pDown: z.number().finite(),
  pDownModerateOrMore: z.number().finite(),
});

/**
 * Boundary check for summaries supplied by an external forecaster. Values are
 * clamped into [0, 1] and each moderate-or-more figure is capped at its
 * directional probability.
 */
export function validateProbabilitySummary(raw: unknown): ProbabilitySummary {
  const parsed = RawProbabilitySummarySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "summary";
    throw new InvalidInputError(
      `invalid probability summary at ${where}: ${issue?.message ?? "unknown"}`,
    );
  }
  const pUp = clamp(parsed.data.pUp, 0, 1);
  const pDown = clamp(parsed.data.pDown, 0, 1);
  if (pUp + pDown > 1 + 1e-9) {
    throw new InvalidInputError(
      `pUp + pDown must not exceed 1 (got ${(pUp + pDown).toFixed(4)})`,
    );
  }
  return {
    pUp,
    pUpModerateOrMore: Math.min(clamp(parsed.data.pUpModerateOrMore, 0, 1), pUp),
    pDown,
    pDownModerateOrMore: Math.min(clamp(parsed.data.pDownModerateOrMore, 0, 1), pDown),
  };
}

export function validateClassifierThresholds(thresholds: ClassifierThresholds): string[] {
  const issues: string[] = [];
  for (const side of ["bullish", "bearish"] as const) {
    const tiers = thresholds[side];
    if (tiers.strong.minDirectional < tiers.moderate.minDirectional) {
      issues.push(`${side}.strong.minDirectional is below ${side}.moderate.minDirectional`);
    }
    if (tiers.moderate.minDirectional < tiers.weak.minDirectional) {
      issues.push(`${side}.moderate.minDirectional is below ${side}.weak.minDirectional`);
    }
    if (tiers.strong.minModerateOrMore < tiers.moderate.minModerateOrMore) {
      issues.push(`${side}.strong.minModerateOrMore is below ${side}.moderate.minModerateOrMore`);
    }
  }
  // With pUp + pDown <= 1 a bullish and a bearish rule can only both match
  // when the two weakest directional thresholds sum to 1 or less.
  const weakest = thresholds.bullish.weak.minDirectional + thresholds.bearish.weak.minDirectional;
  if (weakest <= 1) {
    issues.push(
      `bullish and bearish weak thresholds overlap (sum ${weakest.toFixed(4)} must exceed 1)`,
    );
  }
  return issues;
}
