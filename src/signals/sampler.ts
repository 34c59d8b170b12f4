import { InvalidInputError } from "../errors.js";

/** Uniform source in [0, 1). */
export type RandomSource = () => number;

export const DEFAULT_ENSEMBLE_SIZE = 200;
export const DEFAULT_ENSEMBLE_VOLATILITY_PCT = 0.02;

// mulberry32
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Standard normal draw via Box-Muller. */
export function gaussian(random: RandomSource): number {
  let u = 0;
  while (u === 0) {
    u = random();
  }
  const v = random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * Builds an ensemble of future prices around a point forecast by adding
 * normal noise scaled to the reference price.
 */
export function sampleForecastEnsemble(params: {
  pointForecast: number;
  referencePrice: number;
  random: RandomSource;
  count?: number;
  volatilityPct?: number;
}): number[] {
  const count = params.count ?? DEFAULT_ENSEMBLE_SIZE;
  const volatilityPct = params.volatilityPct ?? DEFAULT_ENSEMBLE_VOLATILITY_PCT;
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidInputError(`ensemble size must be a positive integer (got ${count})`);
  }
  if (!Number.isFinite(params.pointForecast)) {
    throw new InvalidInputError("point forecast must be a finite number");
  }
  if (!Number.isFinite(params.referencePrice) || params.referencePrice <= 0) {
    throw new InvalidInputError("reference price must be a positive finite number");
  }
  const sigma = Math.max(0, volatilityPct) * params.referencePrice;
  const samples: number[] = [];
  for (let i = 0; i < count; i += 1) {
    samples.push(params.pointForecast + gaussian(params.random) * sigma);
  }
  return samples;
}
