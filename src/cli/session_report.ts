#!/usr/bin/env node
import { Command } from "commander";
import type { TradeStatus } from "../portfolio/types.js";
import { formatSessionReport } from "../session/report.js";
import { listSessions, readSessionState } from "../session/store.js";

function parseTradesFilter(value: string | undefined): TradeStatus | "all" | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === "open" || value === "closed" || value === "all") {
    return value;
  }
  throw new Error(`--trades must be open, closed or all (got ${value})`);
}

async function main() {
  const program = new Command();
  program
    .name("session_report")
    .option("--session <id>", "Session id (defaults to the most recent session)")
    .option("--list", "List known sessions and exit")
    .option("--equity-tail <n>", "Print the last n equity points", "5")
    .option("--trades <status>", "Print trades: open, closed or all");

  program.parse(process.argv);
  const opts = program.opts<{
    session?: string;
    list?: boolean;
    equityTail: string;
    trades?: string;
  }>();

  const sessions = await listSessions();
  if (opts.list) {
    for (const sessionId of sessions) {
      console.log(sessionId);
    }
    return;
  }
  const sessionId = opts.session?.trim() || sessions.at(-1);
  if (!sessionId) {
    throw new Error("no sessions found; run the paper session tool first");
  }
  const state = await readSessionState(sessionId);
  if (!state) {
    throw new Error(`session ${sessionId} has no saved state`);
  }
  const equityTail = Number.parseInt(opts.equityTail, 10);
  if (!Number.isFinite(equityTail) || equityTail < 0) {
    throw new Error(`--equity-tail must be a non-negative integer (got ${opts.equityTail})`);
  }
  for (const line of formatSessionReport(state, {
    equityTail,
    trades: parseTradesFilter(opts.trades),
  })) {
    console.log(line);
  }
}

main().catch((err) => {
  console.error(String(err));
  process.exitCode = 1;
});
