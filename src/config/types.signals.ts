export type SignalTierThresholds = {
  /** Minimum directional probability. */
  minDirectional?: number;
  /** Minimum moderate-or-more probability; omitted for the weak tier. */
  minModerateOrMore?: number;
};

export type SignalSideThresholds = {
  strong?: SignalTierThresholds;
  moderate?: SignalTierThresholds;
  weak?: { minDirectional?: number };
};

export type SignalThresholdsConfig = {
  bullish?: SignalSideThresholds;
  bearish?: SignalSideThresholds;
};

export type DistributionBinsConfig = {
  /** Fractional offset separating small from moderate moves, e.g. 0.005. */
  smallPct?: number;
  /** Fractional offset separating moderate from large moves, e.g. 0.015. */
  moderatePct?: number;
};

export type SamplingConfig = {
  samples?: number;
  volatilityPct?: number;
  seed?: number;
};

export type SignalsConfig = {
  thresholds?: SignalThresholdsConfig;
  bins?: DistributionBinsConfig;
  sampling?: SamplingConfig;
};
