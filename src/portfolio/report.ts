import type { PortfolioState, TradeRecord, TradeStatus } from "./types.js";
import { round } from "../utils.js";
import { computePosition } from "./ledger.js";
import {
  computeDrawdownSeries,
  computePerformance,
  computeTotalReturnRate,
} from "./performance.js";

export type PortfolioSummary = {
  asOf: string | null;
  price: number | null;
  portfolioValue: number;
  cash: number;
  unitsHeld: number;
  averageEntryPrice: number | null;
  positionValue: number;
  unrealizedPnl: number;
  realizedPnl: number;
  totalReturnRate: number;
  maxDrawdown: number;
  winRate: number;
  closedTrades: number;
  openTrades: number;
};

export type EquitySeries = {
  timestamps: string[];
  prices: number[];
  cash: number[];
  positionValue: number[];
  unrealizedPnl: number[];
  portfolioValue: number[];
  drawdownPct: number[];
};

export function buildPortfolioSummary(
  state: Readonly<PortfolioState>,
  price: number | null = state.lastPrice,
): PortfolioSummary {
  const position = computePosition(state, price ?? 0);
  const performance = computePerformance({
    initialCapital: state.config.initialCapital,
    equityCurve: state.equityCurve,
    trades: state.trades,
  });
  const portfolioValue = state.cash + position.marketValue;
  return {
    asOf: state.lastTimestamp,
    price,
    portfolioValue: round(portfolioValue, 2),
    cash: round(state.cash, 2),
    unitsHeld: round(position.unitsHeld, 6),
    averageEntryPrice:
      position.averageEntryPrice === null ? null : round(position.averageEntryPrice, 6),
    positionValue: round(position.marketValue, 2),
    unrealizedPnl: round(position.unrealizedPnl, 2),
    realizedPnl: round(state.realizedPnl, 2),
    totalReturnRate: round(computeTotalReturnRate(portfolioValue, state.config.initialCapital), 4),
    maxDrawdown: round(performance.maxDrawdown, 4),
    winRate: round(performance.winRate, 4),
    closedTrades: performance.closedTrades,
    openTrades: state.trades.filter((trade) => trade.status === "open").length,
  };
}

export function buildEquitySeries(state: Readonly<PortfolioState>): EquitySeries {
  const drawdowns = computeDrawdownSeries(state.equityCurve, state.config.initialCapital);
  return {
    timestamps: state.equityCurve.map((point) => point.timestamp),
    prices: state.equityCurve.map((point) => point.price),
    cash: state.equityCurve.map((point) => point.cash),
    positionValue: state.equityCurve.map((point) => point.positionValue),
    unrealizedPnl: state.equityCurve.map((point) => point.unrealizedPnl),
    portfolioValue: state.equityCurve.map((point) => point.portfolioValue),
    drawdownPct: drawdowns.map((point) => point.drawdownPct),
  };
}

export function listTrades(
  state: Readonly<PortfolioState>,
  filter: { status?: TradeStatus } = {},
): TradeRecord[] {
  const trades = filter.status
    ? state.trades.filter((trade) => trade.status === filter.status)
    : state.trades;
  return trades.map((trade) => ({ ...trade }));
}
