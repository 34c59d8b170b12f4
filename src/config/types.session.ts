export type LogLevel = "debug" | "info" | "warn" | "error";

export type SessionConfig = {
  /** Asset symbol the session tracks, e.g. "ETH/USD". */
  symbol?: string;
  /** Nominal tick cadence; ticks may arrive late or skip. */
  tickIntervalMinutes?: number;
  /** Maximum inbox ticks processed per tool run. */
  maxTicksPerRun?: number;
};

export type LoggingConfig = {
  level?: LogLevel;
};
