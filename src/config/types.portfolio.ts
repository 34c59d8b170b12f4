export type PortfolioConfig = {
  /** Starting cash of a session, in quote currency. */
  initialCapital?: number;
  /** Cost basis of one unit, the atomic step of position changes. */
  unitSize?: number;
  /** Upper bound on units held at any time. */
  maxUnits?: number;
};

export type SizingConfig = {
  /** Units requested by strong_* signals. */
  strongStep?: number;
  /** Units requested by moderate_* signals. */
  moderateStep?: number;
  /** Units requested by weak_* signals. */
  weakStep?: number;
};
