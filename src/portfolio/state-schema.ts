import { z } from "zod";
import type { PortfolioState } from "./types.js";

const TradeRecordSchema = z.object({
  tradeId: z.string().min(1),
  entryTime: z.string(),
  entryPrice: z.number().positive(),
  units: z.number().nonnegative(),
  quantity: z.number().nonnegative(),
  remainingUnits: z.number().nonnegative(),
  closedUnits: z.number().nonnegative(),
  exitTime: z.string().nullable(),
  exitPrice: z.number().nullable(),
  realizedPnl: z.number().nullable(),
  returnPct: z.number().nullable(),
  holdingHours: z.number().nullable(),
  status: z.union([z.literal("open"), z.literal("closed")]),
});

const EquityPointSchema = z.object({
  timestamp: z.string(),
  price: z.number(),
  cash: z.number(),
  unitsHeld: z.number(),
  positionValue: z.number(),
  unrealizedPnl: z.number(),
  portfolioValue: z.number(),
});

export const PortfolioStateSchema = z.object({
  version: z.literal(1),
  config: z.object({
    initialCapital: z.number().positive(),
    unitSize: z.number().positive(),
    maxUnits: z.number().positive(),
  }),
  cash: z.number(),
  realizedPnl: z.number(),
  lastTimestamp: z.string().nullable(),
  lastPrice: z.number().nullable(),
  nextTradeSeq: z.number().int().positive(),
  trades: z.array(TradeRecordSchema),
  equityCurve: z.array(EquityPointSchema),
}) satisfies z.ZodType<PortfolioState>;
