import type {
  EquityPoint,
  LedgerAction,
  LedgerConfig,
  LedgerStep,
  LedgerTick,
  PortfolioState,
  PositionSizer,
  PositionView,
  SizingSteps,
  TradeRecord,
} from "./types.js";
import {
  ConfigurationError,
  InsufficientCapitalError,
  InvalidInputError,
  InvalidPriceError,
} from "../errors.js";
import { isSignal } from "../signals/types.js";
import { deepFreeze, parseIsoDate } from "../utils.js";
import { createPositionSizer } from "./sizer.js";
import { UNIT_EPSILON } from "./types.js";

const HOUR_MS = 60 * 60 * 1000;

export function validateLedgerConfig(config: LedgerConfig): string[] {
  const issues: string[] = [];
  if (!Number.isFinite(config.initialCapital) || config.initialCapital <= 0) {
    issues.push("portfolio.initialCapital must be positive");
  }
  if (!Number.isFinite(config.unitSize) || config.unitSize <= 0) {
    issues.push("portfolio.unitSize must be positive");
  }
  if (!Number.isFinite(config.maxUnits) || config.maxUnits <= 0) {
    issues.push("portfolio.maxUnits must be positive");
  }
  return issues;
}

export function createPortfolioState(config: LedgerConfig): PortfolioState {
  return {
    version: 1,
    config: { ...config },
    cash: config.initialCapital,
    realizedPnl: 0,
    lastTimestamp: null,
    lastPrice: null,
    nextTradeSeq: 1,
    trades: [],
    equityCurve: [],
  };
}

function openLots(state: PortfolioState): TradeRecord[] {
  return state.trades.filter((trade) => trade.status === "open");
}

function lotRemainingQuantity(lot: TradeRecord, unitSize: number): number {
  return (lot.remainingUnits * unitSize) / lot.entryPrice;
}

export function computePosition(state: PortfolioState, price: number): PositionView {
  const unitSize = state.config.unitSize;
  let unitsHeld = 0;
  let quantity = 0;
  for (const lot of openLots(state)) {
    unitsHeld += lot.remainingUnits;
    quantity += lotRemainingQuantity(lot, unitSize);
  }
  const costBasis = unitsHeld * unitSize;
  const marketValue = quantity * price;
  return {
    unitsHeld,
    quantity,
    costBasis,
    averageEntryPrice: quantity > 0 ? costBasis / quantity : null,
    marketValue,
    unrealizedPnl: marketValue - costBasis,
  };
}

function buildEquityPoint(
  state: PortfolioState,
  timestamp: string,
  price: number,
  position: PositionView,
): EquityPoint {
  return {
    timestamp,
    price,
    cash: state.cash,
    unitsHeld: position.unitsHeld,
    positionValue: position.marketValue,
    unrealizedPnl: position.unrealizedPnl,
    portfolioValue: state.cash + position.marketValue,
  };
}

function normalizeTimestamp(value: string | Date): { iso: string; ms: number } {
  const ms = value instanceof Date ? value.getTime() : parseIsoDate(value);
  if (ms === null || !Number.isFinite(ms)) {
    throw new InvalidInputError(`tick timestamp is not a valid date (got ${String(value)})`);
  }
  return { iso: new Date(ms).toISOString(), ms };
}

function formatTradeId(seq: number): string {
  return `lot-${String(seq).padStart(4, "0")}`;
}

function buyUnits(
  draft: PortfolioState,
  units: number,
  price: number,
  timestamp: string,
): { tradeId: string; cashChange: number } {
  const unitSize = draft.config.unitSize;
  const cost = units * unitSize;
  if (cost > draft.cash + UNIT_EPSILON) {
    throw new InsufficientCapitalError(cost, draft.cash);
  }
  draft.cash = Math.max(0, draft.cash - cost);
  const quantity = cost / price;

  const newest = draft.trades.at(-1);
  const mergeable =
    newest?.status === "open" && newest.entryPrice === price && newest.closedUnits === 0;
  if (newest && mergeable) {
    newest.units += units;
    newest.remainingUnits += units;
    newest.quantity += quantity;
    return { tradeId: newest.tradeId, cashChange: -cost };
  }

  const tradeId = formatTradeId(draft.nextTradeSeq);
  draft.nextTradeSeq += 1;
  draft.trades.push({
    tradeId,
    entryTime: timestamp,
    entryPrice: price,
    units,
    quantity,
    remainingUnits: units,
    closedUnits: 0,
    exitTime: null,
    exitPrice: null,
    realizedPnl: null,
    returnPct: null,
    holdingHours: null,
    status: "open",
  });
  return { tradeId, cashChange: -cost };
}

function sellUnits(
  draft: PortfolioState,
  units: number,
  price: number,
  timestamp: string,
  timestampMs: number,
): { closedTradeIds: string[]; realizedPnl: number; cashChange: number } {
  const unitSize = draft.config.unitSize;
  const closedTradeIds: string[] = [];
  let remaining = units;
  let realizedPnl = 0;
  let cashChange = 0;

  for (const lot of openLots(draft)) {
    if (remaining <= UNIT_EPSILON) {
      break;
    }
    const portion = Math.min(remaining, lot.remainingUnits);
    const cost = portion * unitSize;
    const pnl = (cost * (price - lot.entryPrice)) / lot.entryPrice;
    const soldQuantity = cost / lot.entryPrice;
    const priorQuantity = (lot.closedUnits * unitSize) / lot.entryPrice;

    lot.exitPrice =
      lot.exitPrice === null
        ? price
        : (lot.exitPrice * priorQuantity + price * soldQuantity) / (priorQuantity + soldQuantity);
    lot.exitTime = timestamp;
    lot.closedUnits += portion;
    lot.remainingUnits -= portion;
    lot.realizedPnl = (lot.realizedPnl ?? 0) + pnl;
    lot.returnPct = ((lot.exitPrice - lot.entryPrice) / lot.entryPrice) * 100;
    lot.holdingHours = Math.floor((timestampMs - new Date(lot.entryTime).getTime()) / HOUR_MS);
    if (lot.remainingUnits <= UNIT_EPSILON) {
      lot.remainingUnits = 0;
      lot.status = "closed";
      closedTradeIds.push(lot.tradeId);
    }

    realizedPnl += pnl;
    cashChange += cost + pnl;
    remaining -= portion;
  }

  draft.cash += cashChange;
  draft.realizedPnl += realizedPnl;
  return { closedTradeIds, realizedPnl, cashChange };
}

export type PortfolioLedgerOptions = {
  config: LedgerConfig;
  sizing?: SizingSteps;
  /** Replaces the default sizer; its deltas are still bounds-checked. */
  sizer?: PositionSizer;
};

/** A tick worked out against the current state but not yet committed. */
export type PreparedSignal = {
  readonly step: LedgerStep;
  readonly base: PortfolioState;
  readonly next: PortfolioState;
};

function sameLedgerConfig(a: LedgerConfig, b: LedgerConfig): boolean {
  return (
    a.initialCapital === b.initialCapital && a.unitSize === b.unitSize && a.maxUnits === b.maxUnits
  );
}

/**
 * Open lots and scalars are copied; closed lots and the equity curve are
 * shared with `state` and must not be mutated through the draft.
 */
function draftFrom(state: PortfolioState): PortfolioState {
  return {
    ...state,
    trades: state.trades.map((trade) => (trade.status === "open" ? { ...trade } : trade)),
  };
}

/**
 * Owns the simulated portfolio. A tick is first prepared on a draft and only
 * committed when every step succeeds, so a rejected tick leaves the state
 * untouched.
 */
export class PortfolioLedger {
  readonly config: LedgerConfig;
  private readonly sizer: PositionSizer;
  private state: PortfolioState;

  constructor(options: PortfolioLedgerOptions, state?: PortfolioState) {
    const issues = validateLedgerConfig(options.config);
    if (state && !sameLedgerConfig(state.config, options.config)) {
      issues.push("state was created with a different portfolio configuration");
    }
    if (issues.length > 0) {
      throw new ConfigurationError("invalid portfolio configuration", issues);
    }
    this.config = Object.freeze({ ...options.config });
    this.sizer = options.sizer ?? createPositionSizer(options.sizing);
    this.state = state ? structuredClone(state) : createPortfolioState(this.config);
  }

  static restore(
    state: PortfolioState,
    options: Omit<PortfolioLedgerOptions, "config"> = {},
  ): PortfolioLedger {
    const units = openLots(state).reduce((acc, lot) => acc + lot.remainingUnits, 0);
    if (units < -UNIT_EPSILON || units > state.config.maxUnits + UNIT_EPSILON) {
      throw new InvalidInputError(
        `persisted state holds ${units} units, outside [0, ${state.config.maxUnits}]`,
      );
    }
    if (state.cash < -UNIT_EPSILON) {
      throw new InvalidInputError("persisted state has negative cash");
    }
    return new PortfolioLedger({ ...options, config: state.config }, state);
  }

  get unitsHeld(): number {
    return openLots(this.state).reduce((acc, lot) => acc + lot.remainingUnits, 0);
  }

  get cash(): number {
    return this.state.cash;
  }

  position(price: number | null = this.state.lastPrice): PositionView {
    return computePosition(this.state, price ?? 0);
  }

  snapshot(): Readonly<PortfolioState> {
    return deepFreeze(structuredClone(this.state));
  }

  applySignal(tick: LedgerTick): LedgerStep {
    return this.commit(this.prepareSignal(tick));
  }

  /**
   * Works out the effect of a tick without touching the committed state.
   * Throws the same errors `applySignal` does.
   */
  prepareSignal(tick: LedgerTick): PreparedSignal {
    if (!Number.isFinite(tick.price) || tick.price <= 0) {
      throw new InvalidPriceError(tick.price);
    }
    if (!isSignal(tick.signal)) {
      throw new InvalidInputError(`unknown signal ${String(tick.signal)}`);
    }
    const { iso: timestamp, ms: timestampMs } = normalizeTimestamp(tick.timestamp);
    const lastMs = parseIsoDate(this.state.lastTimestamp);
    if (lastMs !== null && timestampMs < lastMs) {
      throw new InvalidInputError(
        `tick ${timestamp} is older than the last applied tick ${this.state.lastTimestamp ?? ""}`,
      );
    }

    const draft = draftFrom(this.state);
    const unitsHeld = openLots(draft).reduce((acc, lot) => acc + lot.remainingUnits, 0);
    const delta = this.sizer({
      signal: tick.signal,
      unitsHeld,
      cash: draft.cash,
      config: this.config,
    });
    if (!Number.isFinite(delta)) {
      throw new InvalidInputError(`sizer returned a non-finite delta (${String(delta)})`);
    }
    if (unitsHeld + delta > this.config.maxUnits + UNIT_EPSILON) {
      throw new InvalidInputError(
        `unit delta ${delta} would exceed maxUnits ${this.config.maxUnits}`,
      );
    }
    if (unitsHeld + delta < -UNIT_EPSILON) {
      throw new InvalidInputError(`unit delta ${delta} would sell more than the ${unitsHeld} held`);
    }

    let action: LedgerAction = "hold";
    let openedTradeId: string | null = null;
    let closedTradeIds: string[] = [];
    let realizedPnl = 0;
    let cashChange = 0;
    if (delta > UNIT_EPSILON) {
      const bought = buyUnits(draft, delta, tick.price, timestamp);
      action = "buy";
      openedTradeId = bought.tradeId;
      cashChange = bought.cashChange;
    } else if (delta < -UNIT_EPSILON) {
      const sold = sellUnits(draft, -delta, tick.price, timestamp, timestampMs);
      action = "sell";
      closedTradeIds = sold.closedTradeIds;
      realizedPnl = sold.realizedPnl;
      cashChange = sold.cashChange;
    }

    const position = computePosition(draft, tick.price);
    const equity = buildEquityPoint(draft, timestamp, tick.price, position);
    draft.lastTimestamp = timestamp;
    draft.lastPrice = tick.price;

    return {
      base: this.state,
      next: draft,
      step: {
        timestamp,
        price: tick.price,
        signal: tick.signal,
        action,
        unitDelta: action === "hold" ? 0 : delta,
        cashChange,
        realizedPnl,
        openedTradeId,
        closedTradeIds,
        position,
        equity,
      },
    };
  }

  /**
   * The state a prepared tick would leave behind, for writing out before the
   * commit. Shares structure with the live state; serialize it, don't keep it.
   */
  preview(prepared: PreparedSignal): PortfolioState {
    return {
      ...prepared.next,
      equityCurve: [...prepared.base.equityCurve, prepared.step.equity],
    };
  }

  commit(prepared: PreparedSignal): LedgerStep {
    if (prepared.base !== this.state) {
      throw new Error("prepared tick is stale: the ledger changed since it was prepared");
    }
    const { next, step } = prepared;
    next.equityCurve.push({ ...step.equity });
    this.state = next;
    return { ...step, equity: { ...step.equity } };
  }
}
