import crypto from "node:crypto";
import {
  readConfigFileSnapshot,
  resolveConfigSnapshotHash,
  resolveEngineConfig,
} from "../src/config/config.js";
import { setLogLevel } from "../src/logging/logger.js";
import { appendRunRecord, buildRunRecord } from "../src/ops/runs.js";
import { runSessionFromInbox } from "../src/session/runner.js";
import { createSessionId } from "../src/session/store.js";

const snapshot = await readConfigFileSnapshot();
const engine = resolveEngineConfig(snapshot.config);
setLogLevel(engine.logLevel);
const configHash = resolveConfigSnapshotHash(snapshot);

const sessionId = process.env.PROBTRADE_SESSION_ID?.trim() || createSessionId();
const runId = `paper-session-${crypto.randomUUID()}`;
const startedAt = new Date().toISOString();

const result = await runSessionFromInbox({
  sessionId,
  engine,
  configHash,
});

const finishedAt = new Date().toISOString();
await appendRunRecord(
  buildRunRecord({
    runId,
    job: "paper_session",
    startedAt,
    finishedAt,
    sessionId,
    configHash,
    counts: {
      applied: result.applied,
      rejected: result.rejected,
      invalidLines: result.invalidLines,
      ticksProcessed: result.snapshot.ticksProcessed,
    },
  }),
);

const summary = result.snapshot.summary;
console.log(
  `session=${sessionId} created=${result.created} applied=${result.applied} rejected=${result.rejected} ` +
    `invalid=${result.invalidLines}`,
);
console.log(
  `value=${summary.portfolioValue.toFixed(2)} cash=${summary.cash.toFixed(2)} units=${summary.unitsHeld} ` +
    `return=${summary.totalReturnRate}% maxDrawdown=${summary.maxDrawdown}% winRate=${summary.winRate}%`,
);
