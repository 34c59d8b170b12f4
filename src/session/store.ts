import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import lockfile from "proper-lockfile";
import { z } from "zod";
import type {
  SessionPersistence,
  SessionRejectionRecord,
  SessionState,
  TickInput,
} from "./types.js";
import type { NdjsonInvalidLine, NdjsonLine } from "./ndjson.js";
import { resolveStateDir } from "../config/paths.js";
import { InvalidInputError } from "../errors.js";
import { PortfolioStateSchema } from "../portfolio/state-schema.js";
import { appendNdjson, readNdjsonFile } from "./ndjson.js";
import { TickInputSchema } from "./types.js";

const SESSION_ID_RE = /^[a-zA-Z0-9._-]+$/;

const STATE_FILE = "state.json";
const TICKS_FILE = "ticks.ndjson";
const REJECTIONS_FILE = "rejections.ndjson";
const INBOX_FILE = "inbox.ndjson";

const SESSION_LOCK_OPTIONS = {
  retries: {
    retries: 8,
    factor: 2,
    minTimeout: 50,
    maxTimeout: 5000,
    randomize: true,
  },
  stale: 30_000,
} as const;

const SessionStateSchema = z.object({
  version: z.literal(1),
  sessionId: z.string().regex(SESSION_ID_RE),
  createdAt: z.string(),
  symbol: z.string(),
  configHash: z.string().nullable(),
  inboxLinesConsumed: z.number().int().nonnegative(),
  ticksProcessed: z.number().int().nonnegative(),
  ticksRejected: z.number().int().nonnegative(),
  forecast: z.object({
    pendingCall: z
      .object({
        ts: z.string(),
        referencePrice: z.number(),
        meanForecast: z.number(),
        call: z.union([z.literal("up"), z.literal("not-up")]),
      })
      .nullable(),
    hits: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
  }),
  portfolio: PortfolioStateSchema,
}) satisfies z.ZodType<SessionState>;

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_RE.test(sessionId);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** `session-YYYYMMDD-HHMMSS-xxxx`, UTC. */
export function createSessionId(now: Date = new Date()): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const suffix = crypto.randomBytes(2).toString("hex");
  return `session-${date}-${time}-${suffix}`;
}

export function resolveSessionsDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env, os.homedir), "sessions");
}

export function resolveSessionDir(sessionId: string, env: NodeJS.ProcessEnv = process.env): string {
  if (!isValidSessionId(sessionId)) {
    throw new InvalidInputError(`invalid session id ${JSON.stringify(sessionId)}`);
  }
  return path.join(resolveSessionsDir(env), sessionId);
}

export function resolveSessionFile(
  sessionId: string,
  file: "state" | "ticks" | "rejections" | "inbox",
  env: NodeJS.ProcessEnv = process.env,
): string {
  const name =
    file === "state"
      ? STATE_FILE
      : file === "ticks"
        ? TICKS_FILE
        : file === "rejections"
          ? REJECTIONS_FILE
          : INBOX_FILE;
  return path.join(resolveSessionDir(sessionId, env), name);
}

async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true, mode: 0o700 });
  const tmp = path.join(dir, `${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  await fs.promises.writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, {
    encoding: "utf-8",
  });
  await fs.promises.chmod(tmp, 0o600);
  await fs.promises.rename(tmp, filePath);
}

export async function readSessionState(
  sessionId: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<SessionState | null> {
  const filePath = resolveSessionFile(sessionId, "state", env);
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return null;
    }
    throw err;
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new InvalidInputError(`session state ${filePath} is not valid JSON: ${String(err)}`);
  }
  const parsed = SessionStateSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidInputError(
      `session state ${filePath} is malformed at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}`,
    );
  }
  if (parsed.data.sessionId !== sessionId) {
    throw new InvalidInputError(
      `session state ${filePath} belongs to ${parsed.data.sessionId}, not ${sessionId}`,
    );
  }
  return parsed.data;
}

export async function writeSessionState(
  state: SessionState,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  await writeJsonAtomic(resolveSessionFile(state.sessionId, "state", env), state);
}

/**
 * Holds the session directory lock for the duration of `fn`, so at most one
 * process drives a given session at a time.
 */
export async function withSessionLock<T>(
  sessionId: string,
  fn: () => Promise<T>,
  env: NodeJS.ProcessEnv = process.env,
): Promise<T> {
  const dir = resolveSessionDir(sessionId, env);
  await fs.promises.mkdir(dir, { recursive: true, mode: 0o700 });
  const release = await lockfile.lock(dir, SESSION_LOCK_OPTIONS);
  try {
    return await fn();
  } finally {
    await release();
  }
}

export async function listSessions(env: NodeJS.ProcessEnv = process.env): Promise<string[]> {
  const dir = resolveSessionsDir(env);
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return [];
    }
    throw err;
  }
  return entries
    // proper-lockfile keeps its lock as a sibling `<dir>.lock` directory
    .filter(
      (entry) =>
        entry.isDirectory() && isValidSessionId(entry.name) && !entry.name.endsWith(".lock"),
    )
    .map((entry) => entry.name)
    .sort();
}

export async function appendInboxTicks(
  sessionId: string,
  ticks: TickInput[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  await appendNdjson(resolveSessionFile(sessionId, "inbox", env), ticks);
}

/**
 * Inbox ticks after the first `skipLines` lines. Lines that do not match the
 * tick shape are returned through `onInvalid` with their line numbers.
 */
export async function readInboxTicks(params: {
  sessionId: string;
  skipLines: number;
  env?: NodeJS.ProcessEnv;
  onInvalid?: (line: NdjsonInvalidLine) => void;
}): Promise<{ ticks: Array<NdjsonLine<TickInput>>; lastLine: number }> {
  const filePath = resolveSessionFile(params.sessionId, "inbox", params.env);
  let lastLine = params.skipLines;
  const ticks = await readNdjsonFile(
    filePath,
    (value) => {
      const parsed = TickInputSchema.safeParse(value);
      return parsed.success ? parsed.data : null;
    },
    (line) => {
      if (line.lineNumber > params.skipLines) {
        lastLine = Math.max(lastLine, line.lineNumber);
        params.onInvalid?.(line);
      }
    },
  );
  const pending = ticks.filter((entry) => entry.lineNumber > params.skipLines);
  for (const entry of pending) {
    lastLine = Math.max(lastLine, entry.lineNumber);
  }
  return { ticks: pending, lastLine };
}

export function createFileSessionPersistence(
  sessionId: string,
  env: NodeJS.ProcessEnv = process.env,
): SessionPersistence {
  return {
    saveState: async (state) => await writeSessionState(state, env),
    appendStep: async (record) =>
      await appendNdjson(resolveSessionFile(sessionId, "ticks", env), [record]),
    appendRejection: async (record: SessionRejectionRecord) =>
      await appendNdjson(resolveSessionFile(sessionId, "rejections", env), [record]),
  };
}
