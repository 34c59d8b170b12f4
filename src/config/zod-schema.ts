import { z } from "zod";
import { PortfolioSchema, SizingSchema } from "./zod-schema.portfolio.js";
import { SignalsSchema } from "./zod-schema.signals.js";

const LogLevelSchema = z.union([
  z.literal("debug"),
  z.literal("info"),
  z.literal("warn"),
  z.literal("error"),
]);

export const ProbtradeSchema = z
  .object({
    portfolio: PortfolioSchema,
    sizing: SizingSchema,
    signals: SignalsSchema,
    session: z
      .object({
        symbol: z.string().min(1).optional(),
        tickIntervalMinutes: z.number().positive().optional(),
        maxTicksPerRun: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
