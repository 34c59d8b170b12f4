import type { Signal } from "../signals/types.js";

export type LedgerConfig = Readonly<{
  initialCapital: number;
  unitSize: number;
  maxUnits: number;
}>;

export type SizingSteps = Readonly<{
  strong: number;
  moderate: number;
  weak: number;
}>;

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  initialCapital: 20_000,
  unitSize: 2_500,
  maxUnits: 5,
};

export const DEFAULT_SIZING_STEPS: SizingSteps = {
  strong: 2,
  moderate: 1,
  weak: 0.5,
};

/** Unit amounts below this are treated as zero. */
export const UNIT_EPSILON = 1e-9;

export type TradeStatus = "open" | "closed";

/**
 * One lot. Units are cost-denominated: a lot of `units` cost
 * `units * unitSize` at `entryPrice`, which buys `quantity` of the asset.
 */
export type TradeRecord = {
  tradeId: string;
  entryTime: string;
  entryPrice: number;
  units: number;
  quantity: number;
  remainingUnits: number;
  closedUnits: number;
  exitTime: string | null;
  /** Quantity-weighted average of all exits so far. */
  exitPrice: number | null;
  realizedPnl: number | null;
  returnPct: number | null;
  holdingHours: number | null;
  status: TradeStatus;
};

export type EquityPoint = {
  timestamp: string;
  price: number;
  cash: number;
  unitsHeld: number;
  positionValue: number;
  unrealizedPnl: number;
  portfolioValue: number;
};

export type PortfolioState = {
  version: 1;
  config: LedgerConfig;
  cash: number;
  realizedPnl: number;
  lastTimestamp: string | null;
  lastPrice: number | null;
  nextTradeSeq: number;
  trades: TradeRecord[];
  equityCurve: EquityPoint[];
};

export type PositionView = {
  unitsHeld: number;
  quantity: number;
  costBasis: number;
  averageEntryPrice: number | null;
  marketValue: number;
  unrealizedPnl: number;
};

export type LedgerTick = {
  timestamp: string | Date;
  price: number;
  signal: Signal;
};

export type LedgerAction = "buy" | "sell" | "hold";

export type LedgerStep = {
  timestamp: string;
  price: number;
  signal: Signal;
  action: LedgerAction;
  unitDelta: number;
  cashChange: number;
  realizedPnl: number;
  openedTradeId: string | null;
  closedTradeIds: string[];
  position: PositionView;
  equity: EquityPoint;
};

export type SizingInput = {
  signal: Signal;
  unitsHeld: number;
  cash: number;
  config: LedgerConfig;
};

export type PositionSizer = (input: SizingInput) => number;
