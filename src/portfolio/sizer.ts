import type { PositionSizer, SizingInput, SizingSteps } from "./types.js";
import { signalDirection, signalStrength } from "../signals/types.js";
import { DEFAULT_SIZING_STEPS, UNIT_EPSILON } from "./types.js";

export function requestedStep(signal: SizingInput["signal"], steps: SizingSteps): number {
  const strength = signalStrength(signal);
  if (strength === "none") {
    return 0;
  }
  return Math.max(0, steps[strength]);
}

/**
 * Signed unit delta for a signal. Buys are clamped to the remaining unit
 * capacity and to the units the available cash pays for; sells are clamped to
 * the units held. Neutral always holds.
 */
export function computeUnitDelta(
  input: SizingInput,
  steps: SizingSteps = DEFAULT_SIZING_STEPS,
): number {
  const direction = signalDirection(input.signal);
  const step = requestedStep(input.signal, steps);
  if (direction === "neutral" || step <= 0) {
    return 0;
  }
  if (direction === "bullish") {
    const capacity = Math.max(0, input.config.maxUnits - input.unitsHeld);
    const affordable = Math.max(0, input.cash / input.config.unitSize);
    const units = Math.min(step, capacity, affordable);
    return units > UNIT_EPSILON ? units : 0;
  }
  const units = Math.min(step, Math.max(0, input.unitsHeld));
  return units > UNIT_EPSILON ? -units : 0;
}

export function createPositionSizer(steps: SizingSteps = DEFAULT_SIZING_STEPS): PositionSizer {
  return (input) => computeUnitDelta(input, steps);
}

export function validateSizingSteps(steps: SizingSteps): string[] {
  const issues: string[] = [];
  for (const tier of ["strong", "moderate", "weak"] as const) {
    if (!Number.isFinite(steps[tier]) || steps[tier] < 0) {
      issues.push(`sizing.${tier}Step must be a non-negative number`);
    }
  }
  return issues;
}
