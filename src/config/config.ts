import crypto from "node:crypto";
import fs from "node:fs";
import type { ClassifierThresholds, DistributionBins } from "../signals/types.js";
import type { LedgerConfig, SizingSteps } from "../portfolio/types.js";
import type { PortfolioConfig, SizingConfig } from "./types.portfolio.js";
import type { LoggingConfig, LogLevel, SessionConfig } from "./types.session.js";
import type { SignalsConfig, SignalSideThresholds } from "./types.signals.js";
import { ConfigurationError } from "../errors.js";
import { validateLedgerConfig } from "../portfolio/ledger.js";
import { DEFAULT_LEDGER_CONFIG, DEFAULT_SIZING_STEPS } from "../portfolio/types.js";
import { validateSizingSteps } from "../portfolio/sizer.js";
import { validateClassifierThresholds } from "../signals/classifier.js";
import { validateDistributionBins } from "../signals/distribution.js";
import {
  DEFAULT_ENSEMBLE_SIZE,
  DEFAULT_ENSEMBLE_VOLATILITY_PCT,
} from "../signals/sampler.js";
import { DEFAULT_CLASSIFIER_THRESHOLDS, DEFAULT_DISTRIBUTION_BINS } from "../signals/types.js";
import { deepFreeze, normalizeSymbol } from "../utils.js";
import { resolveConfigPath } from "./paths.js";
import { ProbtradeSchema } from "./zod-schema.js";

export type ProbtradeConfig = {
  portfolio?: PortfolioConfig;
  sizing?: SizingConfig;
  signals?: SignalsConfig;
  session?: SessionConfig;
  logging?: LoggingConfig;
};

export type EngineConfig = Readonly<{
  portfolio: LedgerConfig;
  sizing: SizingSteps;
  thresholds: ClassifierThresholds;
  bins: DistributionBins;
  sampling: Readonly<{ samples: number; volatilityPct: number; seed: number | null }>;
  session: Readonly<{ symbol: string; tickIntervalMinutes: number; maxTicksPerRun: number }>;
  logLevel: LogLevel;
}>;

export type ConfigFileSnapshot = {
  path: string;
  exists: boolean;
  raw: string | null;
  config: ProbtradeConfig;
};

export function parseConfig(value: unknown): ProbtradeConfig {
  const parsed = ProbtradeSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      "invalid configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function parseConfigRaw(raw: string, filePath: string): ProbtradeConfig {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`config file ${filePath} is not valid JSON`, [String(err)]);
  }
  return parseConfig(value);
}

export async function readConfigFileSnapshot(
  env: NodeJS.ProcessEnv = process.env,
): Promise<ConfigFileSnapshot> {
  const filePath = resolveConfigPath(env);
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return { path: filePath, exists: false, raw: null, config: {} };
    }
    throw err;
  }
  return { path: filePath, exists: true, raw, config: parseConfigRaw(raw, filePath) };
}

export function resolveConfigSnapshotHash(snapshot: ConfigFileSnapshot): string | null {
  if (!snapshot.exists || snapshot.raw === null) {
    return null;
  }
  return crypto.createHash("sha256").update(snapshot.raw).digest("hex").slice(0, 16);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProbtradeConfig {
  const filePath = resolveConfigPath(env);
  if (!fs.existsSync(filePath)) {
    return {};
  }
  return parseConfigRaw(fs.readFileSync(filePath, "utf-8"), filePath);
}

function resolveSide(
  side: SignalSideThresholds | undefined,
  defaults: ClassifierThresholds["bullish"],
): ClassifierThresholds["bullish"] {
  return {
    strong: {
      minDirectional: side?.strong?.minDirectional ?? defaults.strong.minDirectional,
      minModerateOrMore: side?.strong?.minModerateOrMore ?? defaults.strong.minModerateOrMore,
    },
    moderate: {
      minDirectional: side?.moderate?.minDirectional ?? defaults.moderate.minDirectional,
      minModerateOrMore: side?.moderate?.minModerateOrMore ?? defaults.moderate.minModerateOrMore,
    },
    weak: {
      minDirectional: side?.weak?.minDirectional ?? defaults.weak.minDirectional,
    },
  };
}

/**
 * Merges defaults into a parsed config and validates the result. The returned
 * value is frozen and is what the ledger, sizer and classifier are built from.
 */
export function resolveEngineConfig(cfg: ProbtradeConfig = {}): EngineConfig {
  const portfolio: LedgerConfig = {
    initialCapital: cfg.portfolio?.initialCapital ?? DEFAULT_LEDGER_CONFIG.initialCapital,
    unitSize: cfg.portfolio?.unitSize ?? DEFAULT_LEDGER_CONFIG.unitSize,
    maxUnits: cfg.portfolio?.maxUnits ?? DEFAULT_LEDGER_CONFIG.maxUnits,
  };
  const sizing: SizingSteps = {
    strong: cfg.sizing?.strongStep ?? DEFAULT_SIZING_STEPS.strong,
    moderate: cfg.sizing?.moderateStep ?? DEFAULT_SIZING_STEPS.moderate,
    weak: cfg.sizing?.weakStep ?? DEFAULT_SIZING_STEPS.weak,
  };
  const thresholds: ClassifierThresholds = {
    bullish: resolveSide(cfg.signals?.thresholds?.bullish, DEFAULT_CLASSIFIER_THRESHOLDS.bullish),
    bearish: resolveSide(cfg.signals?.thresholds?.bearish, DEFAULT_CLASSIFIER_THRESHOLDS.bearish),
  };
  const bins: DistributionBins = {
    smallPct: cfg.signals?.bins?.smallPct ?? DEFAULT_DISTRIBUTION_BINS.smallPct,
    moderatePct: cfg.signals?.bins?.moderatePct ?? DEFAULT_DISTRIBUTION_BINS.moderatePct,
  };

  const issues = [
    ...validateLedgerConfig(portfolio),
    ...validateSizingSteps(sizing),
    ...validateClassifierThresholds(thresholds),
    ...validateDistributionBins(bins),
  ];
  if (issues.length > 0) {
    throw new ConfigurationError("invalid engine configuration", issues);
  }

  return deepFreeze({
    portfolio,
    sizing,
    thresholds,
    bins,
    sampling: {
      samples: cfg.signals?.sampling?.samples ?? DEFAULT_ENSEMBLE_SIZE,
      volatilityPct: cfg.signals?.sampling?.volatilityPct ?? DEFAULT_ENSEMBLE_VOLATILITY_PCT,
      seed: cfg.signals?.sampling?.seed ?? null,
    },
    session: {
      symbol: normalizeSymbol(cfg.session?.symbol ?? "ETH"),
      tickIntervalMinutes: cfg.session?.tickIntervalMinutes ?? 60,
      maxTicksPerRun: cfg.session?.maxTicksPerRun ?? 500,
    },
    logLevel: cfg.logging?.level ?? "info",
  });
}
