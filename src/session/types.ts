import { z } from "zod";
import type { CallAccuracy, CallEvaluation, DirectionalCall } from "../forecasts/accuracy.js";
import type { LedgerStep, PortfolioState } from "../portfolio/types.js";
import type { PortfolioSummary } from "../portfolio/report.js";
import type { DistributionBinCounts, ProbabilitySummary, Signal } from "../signals/types.js";

/**
 * One tick from the external driver. Exactly one forecast form is expected:
 * raw ensemble `samples`, a precomputed `summary`, or a `pointForecast` the
 * session expands into an ensemble with its seeded random source.
 */
export const TickInputSchema = z
  .object({
    timestamp: z.string().min(1),
    price: z.number(),
    volume: z.number().nonnegative().optional(),
    samples: z.array(z.number()).optional(),
    summary: z
      .object({
        pUp: z.number(),
        pUpModerateOrMore: z.number(),
        pDown: z.number(),
        pDownModerateOrMore: z.number(),
      })
      .optional(),
    pointForecast: z.number().optional(),
  })
  .strict();

export type TickInput = z.infer<typeof TickInputSchema>;

export type ForecastTracking = {
  pendingCall: DirectionalCall | null;
  hits: number;
  total: number;
};

export type SessionState = {
  version: 1;
  sessionId: string;
  createdAt: string;
  symbol: string;
  configHash: string | null;
  inboxLinesConsumed: number;
  ticksProcessed: number;
  ticksRejected: number;
  forecast: ForecastTracking;
  portfolio: PortfolioState;
};

export type SessionStepRecord = {
  sessionId: string;
  seq: number;
  timestamp: string;
  price: number;
  volume: number | null;
  signal: Signal;
  probabilities: ProbabilitySummary;
  distribution: DistributionBinCounts | null;
  meanForecast: number | null;
  ledger: LedgerStep;
  callEvaluation: CallEvaluation | null;
};

export type SessionRejectionRecord = {
  sessionId: string;
  rejectedAt: string;
  tickTimestamp: string | null;
  reason: string;
  message: string;
};

export type TickResult =
  | { ok: true; step: SessionStepRecord }
  | { ok: false; reason: string; message: string };

export type SessionSnapshot = {
  sessionId: string;
  symbol: string;
  ticksProcessed: number;
  ticksRejected: number;
  portfolio: Readonly<PortfolioState>;
  summary: PortfolioSummary;
  forecastAccuracy: CallAccuracy;
};

/** Where a session writes its state; the file store is the default. */
export type SessionPersistence = {
  saveState: (state: SessionState) => Promise<void>;
  appendStep: (record: SessionStepRecord) => Promise<void>;
  appendRejection: (record: SessionRejectionRecord) => Promise<void>;
};
