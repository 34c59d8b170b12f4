import type { EngineConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import type { SessionSnapshot } from "./types.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { TradingSession } from "./driver.js";
import {
  createFileSessionPersistence,
  readInboxTicks,
  readSessionState,
  withSessionLock,
} from "./store.js";

export type InboxRunResult = {
  sessionId: string;
  created: boolean;
  applied: number;
  rejected: number;
  invalidLines: number;
  inboxLinesConsumed: number;
  snapshot: SessionSnapshot;
};

/**
 * Feeds the pending inbox lines of a session through a `TradingSession`
 * under the session lock, creating the session on first use.
 */
export async function runSessionFromInbox(params: {
  sessionId: string;
  engine: EngineConfig;
  configHash?: string | null;
  maxTicks?: number;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  now?: () => Date;
}): Promise<InboxRunResult> {
  const env = params.env ?? process.env;
  const log = params.logger ?? createSubsystemLogger("session-runner");
  const maxTicks = params.maxTicks ?? params.engine.session.maxTicksPerRun;

  return await withSessionLock(
    params.sessionId,
    async () => {
      const persistence = createFileSessionPersistence(params.sessionId, env);
      const existing = await readSessionState(params.sessionId, env);
      const options = {
        engine: params.engine,
        persistence,
        logger: params.logger,
        now: params.now,
      };
      const session = existing
        ? TradingSession.restore(existing, options)
        : TradingSession.create(
            { sessionId: params.sessionId, configHash: params.configHash ?? null },
            options,
          );
      if (existing && params.configHash && existing.configHash !== params.configHash) {
        log.warn("config changed since the session was created", {
          sessionId: params.sessionId,
          created: existing.configHash,
          current: params.configHash,
        });
      }
      if (!existing) {
        await persistence.saveState(session.toState());
      }

      let invalidLines = 0;
      let lastInvalidLine = session.inboxLinesConsumed;
      const inbox = await readInboxTicks({
        sessionId: params.sessionId,
        skipLines: session.inboxLinesConsumed,
        env,
        onInvalid: (line) => {
          invalidLines += 1;
          lastInvalidLine = Math.max(lastInvalidLine, line.lineNumber);
          log.warn("skipping malformed inbox line", {
            sessionId: params.sessionId,
            line: line.lineNumber,
            reason: line.reason,
          });
        },
      });

      let applied = 0;
      let rejected = 0;
      let consumed = session.inboxLinesConsumed;
      const batch = inbox.ticks.slice(0, maxTicks);
      for (const entry of batch) {
        const result = await session.advance(entry.value, { inboxLine: entry.lineNumber });
        if (result.ok) {
          applied += 1;
        } else {
          rejected += 1;
        }
        consumed = entry.lineNumber;
      }
      if (batch.length === inbox.ticks.length) {
        // nothing left behind, so trailing malformed lines are consumed too
        consumed = Math.max(consumed, inbox.lastLine, lastInvalidLine);
      }
      await session.markInboxConsumed(consumed);

      log.info("inbox run finished", {
        sessionId: params.sessionId,
        applied,
        rejected,
        invalidLines,
        pending: inbox.ticks.length - batch.length,
      });
      return {
        sessionId: params.sessionId,
        created: !existing,
        applied,
        rejected,
        invalidLines,
        inboxLinesConsumed: session.inboxLinesConsumed,
        snapshot: session.snapshot(),
      };
    },
    env,
  );
}
