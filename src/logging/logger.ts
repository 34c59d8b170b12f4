import type { LogLevel } from "../config/types.session.js";

export const LOG_LEVEL_ENV = "PROBTRADE_LOG_LEVEL";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogMeta = Record<string, unknown>;

export type Logger = {
  subsystem: string;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

export type LogSink = (level: LogLevel, line: string) => void;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

const envLevel = process.env[LOG_LEVEL_ENV];
let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let activeSink: LogSink = consoleSink;

/** An explicit env override wins over the configured level. */
export function setLogLevel(level: LogLevel, env: NodeJS.ProcessEnv = process.env): void {
  const override = env[LOG_LEVEL_ENV];
  activeLevel = isLogLevel(override) ? override : level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export function setLogSink(sink: LogSink | null): void {
  activeSink = sink ?? consoleSink;
}

export function formatLogLine(params: {
  level: LogLevel;
  subsystem: string;
  message: string;
  meta?: LogMeta;
  now?: Date;
}): string {
  const ts = (params.now ?? new Date()).toISOString();
  const tag = params.level.toUpperCase().padEnd(5);
  const metaStr = params.meta ? ` ${JSON.stringify(params.meta)}` : "";
  return `[${ts}] ${tag} [${params.subsystem}] ${params.message}${metaStr}`;
}

export function createSubsystemLogger(subsystem: string): Logger {
  const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) {
      return;
    }
    activeSink(level, formatLogLine({ level, subsystem, message, meta }));
  };
  return {
    subsystem,
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}
