import { z } from "zod";

const ProbabilitySchema = z.number().min(0).max(1);

const TierSchema = z
  .object({
    minDirectional: ProbabilitySchema.optional(),
    minModerateOrMore: ProbabilitySchema.optional(),
  })
  .strict();

const SideSchema = z
  .object({
    strong: TierSchema.optional(),
    moderate: TierSchema.optional(),
    weak: z.object({ minDirectional: ProbabilitySchema.optional() }).strict().optional(),
  })
  .strict();

export const SignalsSchema = z
  .object({
    thresholds: z
      .object({
        bullish: SideSchema.optional(),
        bearish: SideSchema.optional(),
      })
      .strict()
      .optional(),
    bins: z
      .object({
        smallPct: z.number().positive().optional(),
        moderatePct: z.number().positive().optional(),
      })
      .strict()
      .optional(),
    sampling: z
      .object({
        samples: z.number().int().positive().optional(),
        volatilityPct: z.number().nonnegative().optional(),
        seed: z.number().int().optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .optional();
