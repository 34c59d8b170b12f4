import type { PortfolioState, TradeStatus } from "../portfolio/types.js";
import type { SessionState } from "./types.js";
import { accuracyFromCounts } from "../forecasts/accuracy.js";
import { buildEquitySeries, buildPortfolioSummary, listTrades } from "../portfolio/report.js";

/** Plain-text report lines for a persisted session. */
export function formatSessionReport(
  state: SessionState,
  opts: { equityTail: number; trades?: TradeStatus | "all" },
): string[] {
  const portfolio: PortfolioState = state.portfolio;
  const summary = buildPortfolioSummary(portfolio);
  const accuracy = accuracyFromCounts(state.forecast.hits, state.forecast.total);
  const lines = [
    `session ${state.sessionId} (${state.symbol}) created ${state.createdAt}`,
    `ticks processed=${state.ticksProcessed} rejected=${state.ticksRejected} asOf=${summary.asOf ?? "-"}`,
    `portfolio value=${summary.portfolioValue.toFixed(2)} cash=${summary.cash.toFixed(2)} ` +
      `units=${summary.unitsHeld} avgEntry=${summary.averageEntryPrice ?? "-"}`,
    `pnl unrealized=${summary.unrealizedPnl.toFixed(2)} realized=${summary.realizedPnl.toFixed(2)} ` +
      `return=${summary.totalReturnRate}%`,
    `risk maxDrawdown=${summary.maxDrawdown}% winRate=${summary.winRate}% ` +
      `closed=${summary.closedTrades} open=${summary.openTrades}`,
    `forecast calls=${accuracy.total} hits=${accuracy.hits} hitRate=${accuracy.hitRate}%`,
  ];

  if (opts.equityTail > 0) {
    const series = buildEquitySeries(portfolio);
    const start = Math.max(0, series.timestamps.length - opts.equityTail);
    lines.push("equity:");
    for (let i = start; i < series.timestamps.length; i += 1) {
      lines.push(
        `  ${series.timestamps[i]} price=${series.prices[i]} value=${series.portfolioValue[i]?.toFixed(2)} ` +
          `drawdown=${series.drawdownPct[i]?.toFixed(4)}%`,
      );
    }
  }

  if (opts.trades) {
    const trades = listTrades(portfolio, opts.trades === "all" ? {} : { status: opts.trades });
    lines.push(`trades (${opts.trades}):`);
    for (const trade of trades) {
      const exit =
        trade.exitPrice === null
          ? ""
          : ` exit=${trade.exitPrice} pnl=${(trade.realizedPnl ?? 0).toFixed(2)} held=${trade.holdingHours ?? 0}h`;
      lines.push(
        `  ${trade.tradeId} ${trade.status} entry=${trade.entryPrice}@${trade.entryTime} ` +
          `units=${trade.units} remaining=${trade.remainingUnits}${exit}`,
      );
    }
  }
  return lines;
}
