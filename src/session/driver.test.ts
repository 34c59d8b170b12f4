import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type {
  SessionPersistence,
  SessionRejectionRecord,
  SessionState,
  SessionStepRecord,
} from "./types.js";
import { resolveEngineConfig } from "../config/config.js";
import { setLogSink } from "../logging/logger.js";
import { createSeededRandom } from "../signals/sampler.js";
import { TradingSession } from "./driver.js";

function hour(h: number): string {
  return new Date(Date.UTC(2024, 0, 1, h)).toISOString();
}

function memoryPersistence() {
  const saved: SessionState[] = [];
  const steps: SessionStepRecord[] = [];
  const rejections: SessionRejectionRecord[] = [];
  const persistence: SessionPersistence = {
    saveState: async (state) => {
      saved.push(structuredClone(state));
    },
    appendStep: async (record) => {
      steps.push(record);
    },
    appendRejection: async (record) => {
      rejections.push(record);
    },
  };
  return { saved, steps, rejections, persistence };
}

const engine = resolveEngineConfig({});
const now = () => new Date("2024-02-01T00:00:00.000Z");

const bullishSummary = { pUp: 0.8, pUpModerateOrMore: 0.4, pDown: 0.1, pDownModerateOrMore: 0 };
const bearishSummary = { pUp: 0.05, pUpModerateOrMore: 0, pDown: 0.9, pDownModerateOrMore: 0.5 };

describe("trading session", () => {
  beforeEach(() => {
    setLogSink(() => undefined);
  });

  afterEach(() => {
    setLogSink(null);
  });

  it("runs summarize, classify and ledger for each tick", async () => {
    const store = memoryPersistence();
    const session = TradingSession.create(
      { sessionId: "session-a" },
      { engine, persistence: store.persistence, now },
    );

    const first = await session.advance({ timestamp: hour(0), price: 2000, summary: bullishSummary });
    expect(first.ok).toBe(true);
    if (first.ok) {
      expect(first.step.signal).toBe("strong_bullish");
      expect(first.step.ledger.action).toBe("buy");
      expect(first.step.distribution).toBeNull();
      expect(first.step.seq).toBe(1);
    }

    const second = await session.advance({
      timestamp: hour(1),
      price: 2100,
      volume: 12.5,
      samples: [2100, 2100, 2100],
    });
    expect(second.ok && second.step.signal).toBe("neutral");
    expect(second.ok && second.step.volume).toBe(12.5);
    expect(second.ok && second.step.meanForecast).toBe(2100);

    const third = await session.advance({ timestamp: hour(2), price: 1900, summary: bearishSummary });
    expect(third.ok && third.step.ledger.realizedPnl).toBe(-250);
    expect(third.ok && third.step.callEvaluation).toEqual({
      ts: hour(1),
      referencePrice: 2100,
      meanForecast: 2100,
      call: "not-up",
      evaluatedAt: hour(2),
      realizedPrice: 1900,
      hit: true,
    });

    const snapshot = session.snapshot();
    expect(snapshot.ticksProcessed).toBe(3);
    expect(snapshot.summary.cash).toBe(19_750);
    expect(snapshot.summary.unitsHeld).toBe(0);
    expect(snapshot.forecastAccuracy).toEqual({ hits: 1, total: 1, hitRate: 100 });
    expect(snapshot.symbol).toBe("ETH/USD");
    expect(Object.isFrozen(snapshot.portfolio.trades)).toBe(true);

    expect(store.steps.map((step) => step.seq)).toEqual([1, 2, 3]);
    expect(store.saved).toHaveLength(3);
    expect(store.saved.at(-1)?.portfolio.cash).toBe(19_750);
    expect(store.saved.at(-1)?.createdAt).toBe("2024-02-01T00:00:00.000Z");
  });

  it("rejects bad ticks without changing the portfolio", async () => {
    const store = memoryPersistence();
    const session = TradingSession.create(
      { sessionId: "session-b" },
      { engine, persistence: store.persistence, now },
    );
    await session.advance({ timestamp: hour(5), price: 2000, summary: bullishSummary });
    const before = session.snapshot().portfolio;

    const results = [
      await session.advance({ timestamp: hour(6), price: -1, summary: bullishSummary }),
      await session.advance({ timestamp: hour(6), price: 2000 }),
      await session.advance({ timestamp: hour(6), price: 2000, samples: [1], pointForecast: 2 }),
      await session.advance({ timestamp: hour(4), price: 2000, summary: bullishSummary }),
      await session.advance({ timestamp: hour(6), price: 2000, summary: { ...bullishSummary, pDown: 0.5 } }),
      await session.advance("not a tick"),
    ];
    expect(results.map((result) => (result.ok ? "ok" : result.reason))).toEqual([
      "invalid-price",
      "invalid-input",
      "invalid-input",
      "invalid-input",
      "invalid-input",
      "invalid-input",
    ]);
    expect(session.snapshot().portfolio).toEqual(before);
    expect(session.snapshot().ticksRejected).toBe(6);
    expect(store.rejections).toHaveLength(6);
    expect(store.rejections[0]).toEqual({
      sessionId: "session-b",
      rejectedAt: "2024-02-01T00:00:00.000Z",
      tickTimestamp: hour(6),
      reason: "invalid-price",
      message: "price must be a positive finite number (got -1)",
    });
    expect(store.rejections[5]?.tickTimestamp).toBeNull();

    const after = await session.advance({ timestamp: hour(6), price: 2000, summary: bearishSummary });
    expect(after.ok).toBe(true);
  });

  it("processes queued ticks in submission order", async () => {
    const session = TradingSession.create({ sessionId: "session-c" }, { engine, now });
    const results = await Promise.all([
      session.advance({ timestamp: hour(0), price: 2000, summary: bullishSummary }),
      session.advance({ timestamp: hour(1), price: 2050, summary: bullishSummary }),
      session.advance({ timestamp: hour(2), price: 2100, summary: bullishSummary }),
    ]);
    expect(results.map((result) => (result.ok ? result.step.ledger.unitDelta : null))).toEqual([
      2, 2, 1,
    ]);
    expect(session.snapshot().portfolio.trades.map((trade) => trade.tradeId)).toEqual([
      "lot-0001",
      "lot-0002",
      "lot-0003",
    ]);
  });

  it("leaves the session untouched when a save fails", async () => {
    let failNext = true;
    const steps: number[] = [];
    const persistence: SessionPersistence = {
      saveState: async () => {
        if (failNext) {
          failNext = false;
          throw new Error("disk full");
        }
      },
      appendStep: async (record) => {
        steps.push(record.seq);
      },
      appendRejection: async () => undefined,
    };
    const session = TradingSession.create({ sessionId: "session-d" }, { engine, persistence, now });
    const tick = { timestamp: hour(0), price: 2000, summary: bullishSummary };
    await expect(session.advance(tick, { inboxLine: 1 })).rejects.toThrow("disk full");
    expect(session.snapshot().summary.unitsHeld).toBe(0);
    expect(session.snapshot().summary.cash).toBe(20_000);
    expect(session.snapshot().ticksProcessed).toBe(0);
    expect(session.snapshot().portfolio.equityCurve).toEqual([]);
    expect(session.inboxLinesConsumed).toBe(0);

    const retry = await session.advance(tick, { inboxLine: 1 });
    expect(retry.ok && retry.step.seq).toBe(1);
    expect(session.snapshot().summary.unitsHeld).toBe(2);
    expect(session.snapshot().summary.cash).toBe(15_000);
    expect(session.inboxLinesConsumed).toBe(1);
    expect(steps).toEqual([1, 1]);

    const next = await session.advance({ timestamp: hour(1), price: 2000, summary: bearishSummary });
    expect(next.ok).toBe(true);
  });

  it("saves the inbox cursor with each tick", async () => {
    const store = memoryPersistence();
    const session = TradingSession.create(
      { sessionId: "session-h" },
      { engine, persistence: store.persistence, now },
    );
    await session.advance({ timestamp: hour(0), price: 2000, summary: bullishSummary }, { inboxLine: 2 });
    await session.advance({ timestamp: hour(1), price: -5, summary: bullishSummary }, { inboxLine: 4 });

    expect(store.saved.map((state) => state.inboxLinesConsumed)).toEqual([2, 4]);
    expect(store.saved[0]?.ticksProcessed).toBe(1);
    expect(store.saved[0]?.portfolio.cash).toBe(15_000);
    expect(store.saved[0]?.portfolio.equityCurve).toHaveLength(1);
    expect(store.saved[1]?.ticksRejected).toBe(1);
    expect(session.inboxLinesConsumed).toBe(4);
  });

  it("warns about ticks missing from the nominal cadence", async () => {
    const lines: string[] = [];
    setLogSink((level, line) => {
      if (level === "warn") {
        lines.push(line);
      }
    });
    const session = TradingSession.create({ sessionId: "session-i" }, { engine, now });
    await session.advance({ timestamp: hour(0), price: 2000, summary: bullishSummary });
    await session.advance({ timestamp: hour(1), price: 2000, summary: bullishSummary });
    expect(lines).toEqual([]);

    await session.advance({ timestamp: hour(4), price: 2000, summary: bullishSummary });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[session] ticks missing before this one");
    expect(lines[0]).toContain(
      `{"sessionId":"session-i","previous":"${hour(1)}","current":"${hour(4)}","missed":2}`,
    );
  });

  it("expands point forecasts with a seeded ensemble", async () => {
    const run = async (sessionId: string) => {
      const session = TradingSession.create({ sessionId }, { engine, now });
      return await session.advance({ timestamp: hour(0), price: 2000, pointForecast: 2100 });
    };
    const a = await run("session-e");
    const b = await run("session-e");
    expect(a).toEqual(b);
    expect(a.ok && a.step.signal).toBe("strong_bullish");
    expect(a.ok && a.step.distribution?.largeRise).toBeGreaterThan(150);
    const mean = a.ok ? a.step.meanForecast : null;
    expect(Math.abs((mean ?? 0) - 2100)).toBeLessThan(15);

    const injected = TradingSession.create(
      { sessionId: "session-f" },
      { engine, now, random: createSeededRandom(11) },
    );
    const result = await injected.advance({ timestamp: hour(0), price: 2000, pointForecast: 1900 });
    expect(result.ok && result.step.signal).toBe("strong_bearish");
  });

  it("restores from saved state and keeps scoring calls", async () => {
    const store = memoryPersistence();
    const session = TradingSession.create(
      { sessionId: "session-g", configHash: "abc123" },
      { engine, persistence: store.persistence, now },
    );
    await session.advance({ timestamp: hour(0), price: 2000, samples: [2010, 2020, 2030] });
    await session.markInboxConsumed(4);

    const saved = store.saved.at(-1);
    expect(saved?.inboxLinesConsumed).toBe(4);
    expect(saved?.configHash).toBe("abc123");
    expect(saved?.forecast.pendingCall?.call).toBe("up");

    const restored = TradingSession.restore(structuredClone(session.toState()), { engine, now });
    expect(restored.inboxLinesConsumed).toBe(4);
    const result = await restored.advance({ timestamp: hour(1), price: 2050, summary: bullishSummary });
    expect(result.ok && result.step.callEvaluation?.hit).toBe(true);
    expect(restored.snapshot().forecastAccuracy).toEqual({ hits: 1, total: 1, hitRate: 100 });
    expect(restored.snapshot().ticksProcessed).toBe(2);
  });
});
