import { describe, expect, it } from "vitest";
import type { EquityPoint, TradeRecord } from "./types.js";
import {
  computeDrawdownSeries,
  computeMaxDrawdown,
  computePerformance,
  computeTotalReturnRate,
  computeWinRate,
} from "./performance.js";

function point(timestamp: string, portfolioValue: number): EquityPoint {
  return {
    timestamp,
    price: 1,
    cash: portfolioValue,
    unitsHeld: 0,
    positionValue: 0,
    unrealizedPnl: 0,
    portfolioValue,
  };
}

function closedTrade(tradeId: string, realizedPnl: number, holdingHours: number): TradeRecord {
  return {
    tradeId,
    entryTime: "2024-01-01T00:00:00.000Z",
    entryPrice: 100,
    units: 1,
    quantity: 25,
    remainingUnits: 0,
    closedUnits: 1,
    exitTime: "2024-01-01T05:00:00.000Z",
    exitPrice: 110,
    realizedPnl,
    returnPct: 10,
    holdingHours,
    status: "closed",
  };
}

describe("performance tracker", () => {
  it("tracks a non-decreasing max drawdown from the initial capital", () => {
    const curve = [
      point("t1", 900),
      point("t2", 1200),
      point("t3", 900),
      point("t4", 1100),
    ];
    const series = computeDrawdownSeries(curve, 1000);
    const expected = [10, 0, 25, 8.3333];
    series.forEach((entry, index) => {
      expect(entry.drawdownPct).toBeCloseTo(expected[index] ?? Number.NaN, 4);
    });
    const maxima = series.map((entry) => entry.maxDrawdownPct);
    expect(maxima[0]).toBeCloseTo(10, 9);
    expect(maxima[1]).toBe(maxima[0]);
    expect(maxima.slice(2)).toEqual([25, 25]);
    expect(series.map((entry) => entry.peakValue)).toEqual([1000, 1200, 1200, 1200]);
    expect(computeMaxDrawdown(curve, 1000)).toBe(25);
  });

  it("reports zero drawdown and win rate for an empty session", () => {
    expect(computeMaxDrawdown([], 1000)).toBe(0);
    expect(computeWinRate([])).toEqual({ closedTrades: 0, profitableTrades: 0, winRate: 0 });
    const stats = computePerformance({ initialCapital: 1000, equityCurve: [], trades: [] });
    expect(stats.latestValue).toBe(1000);
    expect(stats.totalReturnRate).toBe(0);
    expect(stats.bestTradePnl).toBeNull();
  });

  it("computes return, win rate and trade statistics", () => {
    const trades = [
      closedTrade("lot-0001", 250, 4),
      closedTrade("lot-0002", -100, 2),
      closedTrade("lot-0003", 50, 3),
      { ...closedTrade("lot-0004", 0, 0), status: "open" as const, realizedPnl: null },
    ];
    const stats = computePerformance({
      initialCapital: 1000,
      equityCurve: [point("t1", 1000), point("t2", 1200)],
      trades,
    });
    expect(stats.totalReturnRate).toBeCloseTo(20, 9);
    expect(stats.closedTrades).toBe(3);
    expect(stats.profitableTrades).toBe(2);
    expect(stats.winRate).toBeCloseTo(66.6667, 4);
    expect(stats.realizedPnl).toBe(200);
    expect(stats.averageHoldingHours).toBe(3);
    expect(stats.bestTradePnl).toBe(250);
    expect(stats.worstTradePnl).toBe(-100);
    expect(computeTotalReturnRate(500, 0)).toBe(0);
  });
});
