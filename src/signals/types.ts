export const SIGNALS = [
  "strong_bullish",
  "moderate_bullish",
  "weak_bullish",
  "neutral",
  "weak_bearish",
  "moderate_bearish",
  "strong_bearish",
] as const;

export type Signal = (typeof SIGNALS)[number];

export type SignalDirection = "bullish" | "bearish" | "neutral";
export type SignalStrength = "strong" | "moderate" | "weak" | "none";

export type ProbabilitySummary = Readonly<{
  pUp: number;
  pUpModerateOrMore: number;
  pDown: number;
  pDownModerateOrMore: number;
}>;

export type TierThresholds = Readonly<{
  minDirectional: number;
  minModerateOrMore: number;
}>;

export type SideThresholds = Readonly<{
  strong: TierThresholds;
  moderate: TierThresholds;
  weak: Readonly<{ minDirectional: number }>;
}>;

export type ClassifierThresholds = Readonly<{
  bullish: SideThresholds;
  bearish: SideThresholds;
}>;

export type DistributionBins = Readonly<{
  smallPct: number;
  moderatePct: number;
}>;

export type DistributionBinCounts = {
  largeDecline: number;
  moderateDecline: number;
  smallDecline: number;
  flat: number;
  smallRise: number;
  moderateRise: number;
  largeRise: number;
};

export type DistributionSummary = {
  sampleCount: number;
  referencePrice: number;
  meanPrice: number;
  expectedChangePct: number;
  counts: DistributionBinCounts;
  probabilities: ProbabilitySummary;
};

export const DEFAULT_CLASSIFIER_THRESHOLDS: ClassifierThresholds = {
  bullish: {
    strong: { minDirectional: 0.75, minModerateOrMore: 0.35 },
    moderate: { minDirectional: 0.65, minModerateOrMore: 0.2 },
    weak: { minDirectional: 0.55 },
  },
  bearish: {
    strong: { minDirectional: 0.75, minModerateOrMore: 0.35 },
    moderate: { minDirectional: 0.65, minModerateOrMore: 0.2 },
    weak: { minDirectional: 0.55 },
  },
};

export const DEFAULT_DISTRIBUTION_BINS: DistributionBins = {
  smallPct: 0.005,
  moderatePct: 0.015,
};

export function signalDirection(signal: Signal): SignalDirection {
  if (signal.endsWith("_bullish")) {
    return "bullish";
  }
  if (signal.endsWith("_bearish")) {
    return "bearish";
  }
  return "neutral";
}

export function signalStrength(signal: Signal): SignalStrength {
  if (signal.startsWith("strong_")) {
    return "strong";
  }
  if (signal.startsWith("moderate_")) {
    return "moderate";
  }
  if (signal.startsWith("weak_")) {
    return "weak";
  }
  return "none";
}

export function isSignal(value: unknown): value is Signal {
  return typeof value === "string" && (SIGNALS as readonly string[]).includes(value);
}
