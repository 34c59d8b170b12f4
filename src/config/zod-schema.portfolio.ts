import { z } from "zod";

export const PortfolioSchema = z
  .object({
    initialCapital: z.number().positive().optional(),
    unitSize: z.number().positive().optional(),
    maxUnits: z.number().positive().optional(),
  })
  .strict()
  .optional();

export const SizingSchema = z
  .object({
    strongStep: z.number().nonnegative().optional(),
    moderateStep: z.number().nonnegative().optional(),
    weakStep: z.number().nonnegative().optional(),
  })
  .strict()
  .optional();
