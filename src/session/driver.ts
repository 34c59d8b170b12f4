import crypto from "node:crypto";
import type { EngineConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import type { PreparedSignal } from "../portfolio/ledger.js";
import type { PositionSizer } from "../portfolio/types.js";
import type { RandomSource } from "../signals/sampler.js";
import type { DistributionBinCounts, ProbabilitySummary } from "../signals/types.js";
import type {
  SessionPersistence,
  SessionRejectionRecord,
  SessionSnapshot,
  SessionState,
  SessionStepRecord,
  TickInput,
  TickResult,
} from "./types.js";
import { InvalidInputError, InvalidPriceError, ProbtradeError, describeError } from "../errors.js";
import {
  accuracyFromCounts,
  evaluateDirectionalCall,
  makeDirectionalCall,
} from "../forecasts/accuracy.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { PortfolioLedger } from "../portfolio/ledger.js";
import { buildPortfolioSummary } from "../portfolio/report.js";
import { classifySignal, validateProbabilitySummary } from "../signals/classifier.js";
import { summarizeDistribution } from "../signals/distribution.js";
import { createSeededRandom, sampleForecastEnsemble } from "../signals/sampler.js";
import { deepFreeze, parseIsoDate } from "../utils.js";
import { TickInputSchema } from "./types.js";

type ResolvedForecast = {
  probabilities: ProbabilitySummary;
  distribution: DistributionBinCounts | null;
  meanForecast: number | null;
};

type SessionMeta = Omit<SessionState, "portfolio">;

export type TradingSessionOptions = {
  engine: EngineConfig;
  /** Omit to keep the session in memory only. */
  persistence?: SessionPersistence;
  /** Overrides the per-tick seeded source used to expand point forecasts. */
  random?: RandomSource;
  sizer?: PositionSizer;
  logger?: Logger;
  now?: () => Date;
};

export function seedFromSessionId(sessionId: string): number {
  return crypto.createHash("sha256").update(sessionId).digest().readUInt32BE(0);
}

function parseTick(raw: unknown): TickInput {
  const parsed = TickInputSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "tick";
    throw new InvalidInputError(`malformed tick at ${where}: ${issue?.message ?? "unknown"}`);
  }
  return parsed.data;
}

function assertTickUsable(tick: TickInput): void {
  if (!Number.isFinite(tick.price) || tick.price <= 0) {
    throw new InvalidPriceError(tick.price);
  }
  const forms = [tick.samples, tick.summary, tick.pointForecast].filter(
    (form) => form !== undefined,
  ).length;
  if (forms !== 1) {
    throw new InvalidInputError(
      `tick must carry exactly one of samples, summary or pointForecast (got ${forms})`,
    );
  }
}

/**
 * Drives one paper-trading session. Ticks are processed strictly one after
 * another through an internal queue; `snapshot()` always sees either the
 * state before a tick or after it.
 */
export class TradingSession {
  private readonly engine: EngineConfig;
  private readonly ledger: PortfolioLedger;
  private readonly persistence: SessionPersistence | null;
  private readonly random: RandomSource | null;
  private readonly baseSeed: number;
  private readonly log: Logger;
  private readonly now: () => Date;
  private meta: SessionMeta;
  private queue: Promise<void> = Promise.resolve();

  private constructor(meta: SessionMeta, ledger: PortfolioLedger, options: TradingSessionOptions) {
    this.meta = meta;
    this.ledger = ledger;
    this.engine = options.engine;
    this.persistence = options.persistence ?? null;
    this.random = options.random ?? null;
    this.baseSeed = options.engine.sampling.seed ?? seedFromSessionId(meta.sessionId);
    this.log = options.logger ?? createSubsystemLogger("session");
    this.now = options.now ?? (() => new Date());
  }

  static create(
    params: { sessionId: string; configHash?: string | null },
    options: TradingSessionOptions,
  ): TradingSession {
    const ledger = new PortfolioLedger({
      config: options.engine.portfolio,
      sizing: options.engine.sizing,
      sizer: options.sizer,
    });
    const createdAt = (options.now ?? (() => new Date()))().toISOString();
    return new TradingSession(
      {
        version: 1,
        sessionId: params.sessionId,
        createdAt,
        symbol: options.engine.session.symbol,
        configHash: params.configHash ?? null,
        inboxLinesConsumed: 0,
        ticksProcessed: 0,
        ticksRejected: 0,
        forecast: { pendingCall: null, hits: 0, total: 0 },
      },
      ledger,
      options,
    );
  }

  /**
   * Resumes from persisted state. The portfolio keeps the capital settings it
   * was created with; sizing and thresholds come from the current engine.
   */
  static restore(state: SessionState, options: TradingSessionOptions): TradingSession {
    const { portfolio, ...meta } = state;
    const ledger = PortfolioLedger.restore(portfolio, {
      sizing: options.engine.sizing,
      sizer: options.sizer,
    });
    return new TradingSession(structuredClone(meta), ledger, options);
  }

  get sessionId(): string {
    return this.meta.sessionId;
  }

  get inboxLinesConsumed(): number {
    return this.meta.inboxLinesConsumed;
  }

  /**
   * Queues one tick. Input, price and ledger errors resolve as `{ ok: false }`
   * and leave the portfolio unchanged; persistence failures reject and leave
   * the session as it was before the tick. `inboxLine` is saved as the inbox
   * cursor in the same write as the tick's effect.
   */
  advance(raw: unknown, position: { inboxLine?: number } = {}): Promise<TickResult> {
    return this.enqueue(async () => await this.processTick(raw, position.inboxLine));
  }

  /** Records how far the inbox has been read and saves the state. */
  markInboxConsumed(lineNumber: number): Promise<void> {
    return this.enqueue(async () => {
      if (lineNumber <= this.meta.inboxLinesConsumed) {
        return;
      }
      const meta = { ...this.meta, inboxLinesConsumed: lineNumber };
      await this.persistence?.saveState({ ...meta, portfolio: this.ledger.snapshot() });
      this.meta = meta;
    });
  }

  snapshot(): SessionSnapshot {
    const portfolio = this.ledger.snapshot();
    return deepFreeze({
      sessionId: this.meta.sessionId,
      symbol: this.meta.symbol,
      ticksProcessed: this.meta.ticksProcessed,
      ticksRejected: this.meta.ticksRejected,
      portfolio,
      summary: buildPortfolioSummary(portfolio),
      forecastAccuracy: accuracyFromCounts(this.meta.forecast.hits, this.meta.forecast.total),
    });
  }

  toState(): SessionState {
    return { ...structuredClone(this.meta), portfolio: structuredClone(this.ledger.snapshot()) };
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // keep the chain alive after a failed task; the caller still sees the rejection
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private randomForTick(seq: number): RandomSource {
    if (this.random) {
      return this.random;
    }
    return createSeededRandom((this.baseSeed + Math.imul(seq, 0x9e3779b9)) >>> 0);
  }

  private resolveForecast(tick: TickInput, seq: number): ResolvedForecast {
    if (tick.summary) {
      return {
        probabilities: validateProbabilitySummary(tick.summary),
        distribution: null,
        meanForecast: null,
      };
    }
    const samples =
      tick.samples ??
      sampleForecastEnsemble({
        pointForecast: tick.pointForecast ?? tick.price,
        referencePrice: tick.price,
        random: this.randomForTick(seq),
        count: this.engine.sampling.samples,
        volatilityPct: this.engine.sampling.volatilityPct,
      });
    const summary = summarizeDistribution({
      samples,
      referencePrice: tick.price,
      bins: this.engine.bins,
    });
    return {
      probabilities: summary.probabilities,
      distribution: summary.counts,
      meanForecast: summary.meanPrice,
    };
  }

  private cursorAfter(inboxLine: number | undefined): number {
    return Math.max(this.meta.inboxLinesConsumed, inboxLine ?? 0);
  }

  private noteTickGap(previous: string | null, current: string): void {
    const previousMs = parseIsoDate(previous);
    const currentMs = parseIsoDate(current);
    if (previousMs === null || currentMs === null) {
      return;
    }
    const intervalMs = this.engine.session.tickIntervalMinutes * 60_000;
    const missed = Math.round((currentMs - previousMs) / intervalMs) - 1;
    if (missed > 0) {
      this.log.warn("ticks missing before this one", {
        sessionId: this.meta.sessionId,
        previous,
        current,
        missed,
      });
    }
  }

  private async processTick(raw: unknown, inboxLine: number | undefined): Promise<TickResult> {
    let tick: TickInput | null = null;
    const seq = this.meta.ticksProcessed + 1;
    let prepared: PreparedSignal;
    let meta: SessionMeta;
    let record: SessionStepRecord;
    try {
      tick = parseTick(raw);
      assertTickUsable(tick);
      const forecast = this.resolveForecast(tick, seq);
      const signal = classifySignal(forecast.probabilities, this.engine.thresholds);
      prepared = this.ledger.prepareSignal({
        timestamp: tick.timestamp,
        price: tick.price,
        signal,
      });
      const step = prepared.step;

      const forecastState = this.meta.forecast;
      const callEvaluation = forecastState.pendingCall
        ? evaluateDirectionalCall({
            call: forecastState.pendingCall,
            realizedPrice: step.price,
            evaluatedAt: step.timestamp,
          })
        : null;
      meta = {
        ...this.meta,
        inboxLinesConsumed: this.cursorAfter(inboxLine),
        ticksProcessed: seq,
        forecast: {
          pendingCall:
            forecast.meanForecast === null
              ? null
              : makeDirectionalCall({
                  ts: step.timestamp,
                  meanForecast: forecast.meanForecast,
                  referencePrice: step.price,
                }),
          hits: forecastState.hits + (callEvaluation?.hit ? 1 : 0),
          total: forecastState.total + (callEvaluation ? 1 : 0),
        },
      };

      record = {
        sessionId: this.meta.sessionId,
        seq,
        timestamp: step.timestamp,
        price: step.price,
        volume: tick.volume ?? null,
        signal,
        probabilities: forecast.probabilities,
        distribution: forecast.distribution,
        meanForecast: forecast.meanForecast,
        ledger: step,
        callEvaluation,
      };
    } catch (err) {
      if (!(err instanceof ProbtradeError)) {
        throw err;
      }
      return await this.reject(tick, err, inboxLine);
    }

    // ticks.ndjson is written ahead of state.json: a record whose state write
    // failed is superseded by the next record with the same seq
    if (this.persistence) {
      await this.persistence.appendStep(record);
      await this.persistence.saveState({ ...meta, portfolio: this.ledger.preview(prepared) });
    }
    const previousTimestamp = prepared.base.lastTimestamp;
    record = { ...record, ledger: this.ledger.commit(prepared) };
    this.meta = meta;

    this.noteTickGap(previousTimestamp, record.timestamp);
    this.log.debug("tick applied", {
      seq,
      signal: record.signal,
      action: record.ledger.action,
      unitDelta: record.ledger.unitDelta,
      portfolioValue: record.ledger.equity.portfolioValue,
    });
    return { ok: true, step: record };
  }

  private async reject(
    tick: TickInput | null,
    err: ProbtradeError,
    inboxLine: number | undefined,
  ): Promise<TickResult> {
    const { reason, message } = describeError(err);
    const meta: SessionMeta = {
      ...this.meta,
      inboxLinesConsumed: this.cursorAfter(inboxLine),
      ticksRejected: this.meta.ticksRejected + 1,
    };
    this.log.warn("tick rejected", {
      sessionId: this.meta.sessionId,
      reason,
      message,
      timestamp: tick?.timestamp ?? null,
    });
    const rejection: SessionRejectionRecord = {
      sessionId: this.meta.sessionId,
      rejectedAt: this.now().toISOString(),
      tickTimestamp: tick?.timestamp ?? null,
      reason,
      message,
    };
    if (this.persistence) {
      await this.persistence.appendRejection(rejection);
      await this.persistence.saveState({ ...meta, portfolio: this.ledger.snapshot() });
    }
    this.meta = meta;
    return { ok: false, reason, message };
  }
}
