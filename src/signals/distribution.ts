import type {
  DistributionBinCounts,
  DistributionBins,
  DistributionSummary,
  ProbabilitySummary,
} from "./types.js";
import { InvalidInputError } from "../errors.js";
import { round } from "../utils.js";
import { DEFAULT_DISTRIBUTION_BINS } from "./types.js";

export type DistributionBin = keyof DistributionBinCounts;

function emptyCounts(): DistributionBinCounts {
  return {
    largeDecline: 0,
    moderateDecline: 0,
    smallDecline: 0,
    flat: 0,
    smallRise: 0,
    moderateRise: 0,
    largeRise: 0,
  };
}

export function validateDistributionBins(bins: DistributionBins): string[] {
  const issues: string[] = [];
  if (!Number.isFinite(bins.smallPct) || bins.smallPct <= 0) {
    issues.push("bins.smallPct must be a positive number");
  }
  if (!Number.isFinite(bins.moderatePct) || bins.moderatePct <= 0) {
    issues.push("bins.moderatePct must be a positive number");
  }
  if (issues.length === 0 && bins.moderatePct <= bins.smallPct) {
    issues.push("bins.moderatePct must be greater than bins.smallPct");
  }
  return issues;
}

/**
 * Places a fractional change into one of the ordered bins. A change of exactly
 * zero is neither a rise nor a decline.
 */
export function classifyChange(change: number, bins: DistributionBins): DistributionBin {
  if (change > 0) {
    if (change <= bins.smallPct) {
      return "smallRise";
    }
    return change <= bins.moderatePct ? "moderateRise" : "largeRise";
  }
  if (change < 0) {
    if (change >= -bins.smallPct) {
      return "smallDecline";
    }
    return change >= -bins.moderatePct ? "moderateDecline" : "largeDecline";
  }
  return "flat";
}

export function countDistributionBins(
  samples: readonly number[],
  referencePrice: number,
  bins: DistributionBins,
): DistributionBinCounts {
  const counts = emptyCounts();
  for (const sample of samples) {
    counts[classifyChange((sample - referencePrice) / referencePrice, bins)] += 1;
  }
  return counts;
}

export function probabilitiesFromCounts(
  counts: DistributionBinCounts,
  total: number,
): ProbabilitySummary {
  if (total <= 0) {
    return { pUp: 0, pUpModerateOrMore: 0, pDown: 0, pDownModerateOrMore: 0 };
  }
  const upModerate = counts.moderateRise + counts.largeRise;
  const downModerate = counts.moderateDecline + counts.largeDecline;
  return {
    pUp: (counts.smallRise + upModerate) / total,
    pUpModerateOrMore: upModerate / total,
    pDown: (counts.smallDecline + downModerate) / total,
    pDownModerateOrMore: downModerate / total,
  };
}

export function summarizeDistribution(params: {
  samples: readonly number[];
  referencePrice: number;
  bins?: DistributionBins;
}): DistributionSummary {
  const bins = params.bins ?? DEFAULT_DISTRIBUTION_BINS;
  const binIssues = validateDistributionBins(bins);
  if (binIssues.length > 0) {
    throw new InvalidInputError(binIssues.join("; "));
  }
  if (!Number.isFinite(params.referencePrice) || params.referencePrice <= 0) {
    throw new InvalidInputError(
      `reference price must be a positive finite number (got ${String(params.referencePrice)})`,
    );
  }
  if (params.samples.length === 0) {
    throw new InvalidInputError("sample set is empty");
  }
  const badIndex = params.samples.findIndex((sample) => !Number.isFinite(sample));
  if (badIndex !== -1) {
    throw new InvalidInputError(`sample ${badIndex} is not a finite number`);
  }

  const counts = countDistributionBins(params.samples, params.referencePrice, bins);
  const total = params.samples.length;
  const meanPrice = params.samples.reduce((acc, value) => acc + value, 0) / total;
  return {
    sampleCount: total,
    referencePrice: params.referencePrice,
    meanPrice: round(meanPrice, 6),
    expectedChangePct: round(((meanPrice - params.referencePrice) / params.referencePrice) * 100, 4),
    counts,
    probabilities: probabilitiesFromCounts(counts, total),
  };
}
