export type SettlementErrorKind =
  | "validation"
  | "timing"
  | "economic"
  | "authorization"
  | "reentrancy"
  | "transfer"
  | "not_found";

/**
 * Base class for every rejection raised by the settlement engine.
 * `statusCode` is the HTTP status the error maps to.
 */
export class SettlementError extends Error {
  constructor(
    public readonly kind: SettlementErrorKind,
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = "SettlementError";
  }
}

export class MarketValidationError extends SettlementError {
  constructor(message: string) {
    super("validation", 400, message);
    this.name = "MarketValidationError";
  }
}

export class LifecycleError extends SettlementError {
  constructor(message: string) {
    super("timing", 409, message);
    this.name = "LifecycleError";
  }
}

export class EconomicError extends SettlementError {
  constructor(message: string) {
    super("economic", 422, message);
    this.name = "EconomicError";
  }
}

export class InsufficientBalanceError extends EconomicError {
  constructor(public readonly account: string) {
    super("Insufficient balance");
    this.name = "InsufficientBalanceError";
  }
}

export class UnauthorizedError extends SettlementError {
  constructor(message: string = "Caller is not the market authority") {
    super("authorization", 403, message);
    this.name = "UnauthorizedError";
  }
}

export class ReentrancyError extends SettlementError {
  constructor() {
    super("reentrancy", 409, "Reentrant call");
    this.name = "ReentrancyError";
  }
}

export class TransferFailedError extends SettlementError {
  constructor(public readonly account: string, cause: unknown) {
    super(
      "transfer",
      502,
      `Transfer to ${account} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`
    );
    this.name = "TransferFailedError";
  }
}

export class MarketNotFoundError extends SettlementError {
  constructor(marketId: string) {
    super("not_found", 404, `Market ${marketId} not found`);
    this.name = "MarketNotFoundError";
  }
}

export class DivisionByZeroError extends Error {
  constructor() {
    super("Division by zero");
    this.name = "DivisionByZeroError";
  }
}
