import type { EquityPoint, TradeRecord } from "./types.js";

export type DrawdownPoint = {
  timestamp: string;
  peakValue: number;
  drawdownPct: number;
  maxDrawdownPct: number;
};

export type PerformanceStats = {
  initialCapital: number;
  latestValue: number;
  totalReturnRate: number;
  maxDrawdown: number;
  currentDrawdown: number;
  closedTrades: number;
  profitableTrades: number;
  winRate: number;
  realizedPnl: number;
  averageHoldingHours: number;
  bestTradePnl: number | null;
  worstTradePnl: number | null;
};

export function computeTotalReturnRate(latestValue: number, initialCapital: number): number {
  if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
    return 0;
  }
  return (latestValue / initialCapital - 1) * 100;
}

/**
 * Running drawdown in percent. The peak starts at the initial capital, so a
 * session that loses from its first tick shows that loss as drawdown.
 */
export function computeDrawdownSeries(
  equityCurve: readonly EquityPoint[],
  initialCapital: number,
): DrawdownPoint[] {
  let peak = initialCapital;
  let maxDrawdownPct = 0;
  return equityCurve.map((point) => {
    peak = Math.max(peak, point.portfolioValue);
    const drawdownPct = peak > 0 ? ((peak - point.portfolioValue) / peak) * 100 : 0;
    maxDrawdownPct = Math.max(maxDrawdownPct, drawdownPct);
    return { timestamp: point.timestamp, peakValue: peak, drawdownPct, maxDrawdownPct };
  });
}

export function computeMaxDrawdown(
  equityCurve: readonly EquityPoint[],
  initialCapital: number,
): number {
  return computeDrawdownSeries(equityCurve, initialCapital).at(-1)?.maxDrawdownPct ?? 0;
}

export function computeWinRate(trades: readonly TradeRecord[]): {
  closedTrades: number;
  profitableTrades: number;
  winRate: number;
} {
  const closed = trades.filter((trade) => trade.status === "closed");
  if (closed.length === 0) {
    return { closedTrades: 0, profitableTrades: 0, winRate: 0 };
  }
  const profitable = closed.filter((trade) => (trade.realizedPnl ?? 0) > 0).length;
  return {
    closedTrades: closed.length,
    profitableTrades: profitable,
    winRate: (profitable / closed.length) * 100,
  };
}

export function computePerformance(params: {
  initialCapital: number;
  equityCurve: readonly EquityPoint[];
  trades: readonly TradeRecord[];
}): PerformanceStats {
  const drawdowns = computeDrawdownSeries(params.equityCurve, params.initialCapital);
  const latestValue = params.equityCurve.at(-1)?.portfolioValue ?? params.initialCapital;
  const wins = computeWinRate(params.trades);
  const closed = params.trades.filter((trade) => trade.status === "closed");
  const realized = params.trades
    .map((trade) => trade.realizedPnl)
    .filter((pnl): pnl is number => pnl !== null);
  const holding = closed.map((trade) => trade.holdingHours ?? 0);
  const closedPnls = closed.map((trade) => trade.realizedPnl ?? 0);
  return {
    initialCapital: params.initialCapital,
    latestValue,
    totalReturnRate: computeTotalReturnRate(latestValue, params.initialCapital),
    maxDrawdown: drawdowns.at(-1)?.maxDrawdownPct ?? 0,
    currentDrawdown: drawdowns.at(-1)?.drawdownPct ?? 0,
    closedTrades: wins.closedTrades,
    profitableTrades: wins.profitableTrades,
    winRate: wins.winRate,
    realizedPnl: realized.reduce((acc, pnl) => acc + pnl, 0),
    averageHoldingHours:
      holding.length > 0 ? holding.reduce((acc, hours) => acc + hours, 0) / holding.length : 0,
    bestTradePnl: closedPnls.length > 0 ? Math.max(...closedPnls) : null,
    worstTradePnl: closedPnls.length > 0 ? Math.min(...closedPnls) : null,
  };
}
