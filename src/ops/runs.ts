import os from "node:os";
import path from "node:path";
import { resolveStateDir } from "../config/paths.js";
import { appendNdjson } from "../session/ndjson.js";
import { VERSION } from "../version.js";

export type RunRecord = {
  runId: string;
  job: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  sessionId?: string;
  configHash?: string | null;
  counts?: Record<string, number>;
  provenance: { runId: string; agent: string; version: string };
};

export const OPS_RUNS_PATH = path.join("ops", "runs.ndjson");

export function resolveOpsRunsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env, os.homedir), OPS_RUNS_PATH);
}

export async function appendRunRecord(
  record: RunRecord,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  await appendNdjson(resolveOpsRunsPath(env), [record]);
}

export function buildRunRecord(params: {
  runId: string;
  job: string;
  startedAt: string;
  finishedAt: string;
  sessionId?: string;
  configHash?: string | null;
  counts?: Record<string, number>;
}): RunRecord {
  const durationMs = new Date(params.finishedAt).getTime() - new Date(params.startedAt).getTime();
  return {
    runId: params.runId,
    job: params.job,
    startedAt: params.startedAt,
    finishedAt: params.finishedAt,
    durationMs: Math.max(0, durationMs),
    sessionId: params.sessionId,
    configHash: params.configHash,
    counts: params.counts,
    provenance: {
      runId: params.runId,
      agent: params.job,
      version: VERSION,
    },
  };
}
