import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveEngineConfig } from "../config/config.js";
import { InvalidInputError } from "../errors.js";
import { setLogSink } from "../logging/logger.js";
import { TradingSession } from "./driver.js";
import {
  createFileSessionPersistence,
  createSessionId,
  isValidSessionId,
  listSessions,
  readInboxTicks,
  readSessionState,
  resolveSessionDir,
  resolveSessionFile,
  withSessionLock,
  writeSessionState,
} from "./store.js";

describe("session store", () => {
  const originalStateDir = process.env.PROBTRADE_STATE_DIR;
  let tempDir: string | null = null;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "probtrade-state-"));
    process.env.PROBTRADE_STATE_DIR = tempDir;
    setLogSink(() => undefined);
  });

  afterEach(async () => {
    setLogSink(null);
    if (tempDir) {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
    if (originalStateDir) {
      process.env.PROBTRADE_STATE_DIR = originalStateDir;
    } else {
      delete process.env.PROBTRADE_STATE_DIR;
    }
  });

  it("names sessions by UTC start time", () => {
    const sessionId = createSessionId(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));
    expect(sessionId).toMatch(/^session-20240102-030405-[0-9a-f]{4}$/);
    expect(isValidSessionId(sessionId)).toBe(true);
  });

  it("keeps every session inside its own directory", () => {
    expect(isValidSessionId("../escape")).toBe(false);
    expect(() => resolveSessionDir("../escape")).toThrow(InvalidInputError);
    expect(resolveSessionFile("alpha", "state")).toBe(
      path.join(tempDir ?? "", "sessions", "alpha", "state.json"),
    );
    expect(resolveSessionFile("beta", "inbox")).toBe(
      path.join(tempDir ?? "", "sessions", "beta", "inbox.ndjson"),
    );
  });

  it("round-trips session state", async () => {
    expect(await readSessionState("alpha")).toBeNull();

    const session = TradingSession.create({ sessionId: "alpha" }, { engine: resolveEngineConfig({}) });
    await session.advance({
      timestamp: "2024-01-01T00:00:00.000Z",
      price: 2000,
      summary: { pUp: 0.8, pUpModerateOrMore: 0.4, pDown: 0.1, pDownModerateOrMore: 0 },
    });
    const state = session.toState();
    await writeSessionState(state);

    const loaded = await readSessionState("alpha");
    expect(loaded).toEqual(state);
    expect(loaded?.portfolio.cash).toBe(15_000);
    expect(await listSessions()).toEqual(["alpha"]);
  });

  it("rejects corrupt or foreign state files", async () => {
    const filePath = resolveSessionFile("alpha", "state");
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

    await fs.promises.writeFile(filePath, "{", "utf-8");
    await expect(readSessionState("alpha")).rejects.toThrow("is not valid JSON");

    await fs.promises.writeFile(filePath, JSON.stringify({ version: 2 }), "utf-8");
    await expect(readSessionState("alpha")).rejects.toThrow("is malformed at version");

    const session = TradingSession.create({ sessionId: "beta" }, { engine: resolveEngineConfig({}) });
    await fs.promises.writeFile(filePath, JSON.stringify(session.toState()), "utf-8");
    await expect(readSessionState("alpha")).rejects.toThrow("belongs to beta, not alpha");
  });

  it("reads inbox ticks after the consumed lines", async () => {
    const inboxPath = resolveSessionFile("alpha", "inbox");
    await fs.promises.mkdir(path.dirname(inboxPath), { recursive: true });
    const valid = { timestamp: "2024-01-01T00:00:00.000Z", price: 2000, samples: [2001] };
    await fs.promises.writeFile(
      inboxPath,
      [
        JSON.stringify(valid),
        "",
        "{not json",
        JSON.stringify({ timestamp: "2024-01-01T01:00:00.000Z" }),
        JSON.stringify({ ...valid, price: 2010 }),
      ].join("\n") + "\n",
      "utf-8",
    );

    const invalid: number[] = [];
    const all = await readInboxTicks({
      sessionId: "alpha",
      skipLines: 0,
      onInvalid: (line) => invalid.push(line.lineNumber),
    });
    expect(all.ticks.map((entry) => entry.lineNumber)).toEqual([1, 5]);
    expect(all.ticks[1]?.value.price).toBe(2010);
    expect(all.lastLine).toBe(5);
    expect(invalid).toEqual([3, 4]);

    const laterInvalid: number[] = [];
    const rest = await readInboxTicks({
      sessionId: "alpha",
      skipLines: 3,
      onInvalid: (line) => laterInvalid.push(line.lineNumber),
    });
    expect(rest.ticks.map((entry) => entry.lineNumber)).toEqual([5]);
    expect(laterInvalid).toEqual([4]);
  });

  it("appends steps and rejections through the file persistence", async () => {
    const persistence = createFileSessionPersistence("alpha");
    const session = TradingSession.create(
      { sessionId: "alpha" },
      { engine: resolveEngineConfig({}), persistence },
    );
    await session.advance({ timestamp: "2024-01-01T00:00:00.000Z", price: 2000, samples: [2000] });
    await session.advance({ timestamp: "2024-01-01T01:00:00.000Z", price: 0, samples: [2000] });

    const ticks = await fs.promises.readFile(resolveSessionFile("alpha", "ticks"), "utf-8");
    const rejections = await fs.promises.readFile(resolveSessionFile("alpha", "rejections"), "utf-8");
    expect(ticks.trim().split("\n")).toHaveLength(1);
    expect(JSON.parse(rejections.trim())).toMatchObject({
      sessionId: "alpha",
      reason: "invalid-price",
      tickTimestamp: "2024-01-01T01:00:00.000Z",
    });
    expect((await readSessionState("alpha"))?.ticksRejected).toBe(1);
  });

  it("releases the session lock after each holder", async () => {
    expect(await withSessionLock("alpha", async () => "first")).toBe("first");
    expect(await withSessionLock("alpha", async () => "second")).toBe("second");
    await expect(
      withSessionLock("alpha", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await withSessionLock("alpha", async () => "after")).toBe("after");
  });
});
