export type ProbtradeErrorCode =
  | "invalid-input"
  | "invalid-price"
  | "insufficient-capital"
  | "configuration";

export class ProbtradeError extends Error {
  readonly code: ProbtradeErrorCode;

  constructor(code: ProbtradeErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed tick, sample set or probability input, rejected at the boundary. */
export class InvalidInputError extends ProbtradeError {
  constructor(message: string, code: ProbtradeErrorCode = "invalid-input") {
    super(code, message);
  }
}

export class InvalidPriceError extends InvalidInputError {
  readonly price: number;

  constructor(price: number) {
    super(`price must be a positive finite number (got ${String(price)})`, "invalid-price");
    this.price = price;
  }
}

/** Only reachable when a buy bypasses the sizer's cash clamp. */
export class InsufficientCapitalError extends ProbtradeError {
  readonly requiredCash: number;
  readonly availableCash: number;

  constructor(requiredCash: number, availableCash: number) {
    super(
      "insufficient-capital",
      `buy needs ${requiredCash.toFixed(2)} but only ${availableCash.toFixed(2)} cash is available`,
    );
    this.requiredCash = requiredCash;
    this.availableCash = availableCash;
  }
}

export class ConfigurationError extends ProbtradeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("configuration", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export function describeError(err: unknown): { reason: string; message: string } {
  if (err instanceof ProbtradeError) {
    return { reason: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { reason: "unexpected", message: err.message };
  }
  return { reason: "unexpected", message: String(err) };
}
