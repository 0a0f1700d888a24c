/**
 * Engine error types.
 *
 * Every rejected engine operation throws a {@link PerpsError}. Trade
 * projections report the same codes as statuses without throwing.
 *
 * @see {@link ../../adrs/0001-engine-architecture.md ADR-0001: Engine Architecture}
 */

export type PerpsErrorCode =
  | "INVALID_PRICE"
  | "SYSTEM_SUSPENDED"
  | "MARKET_SUSPENDED"
  | "INSUFFICIENT_MARGIN"
  | "MAX_LEVERAGE_EXCEEDED"
  | "MAX_MARKET_SIZE_EXCEEDED"
  | "NIL_ORDER"
  | "NO_POSITION_OPEN"
  | "POSITION_NOT_LIQUIDATABLE"
  | "ZERO_SIZE_POSITION"
  | "CAN_LIQUIDATE"
  | "INVALID_PARAMETER"
  | "MARGIN_BELOW_KEEPER_FEE"
  | "MARKET_NOT_FOUND"
  | "MARKET_EXISTS"
  | "REENTRANT_MUTATION"
  | "SETTLEMENT_FAILED";

export const PERPS_ERROR_MESSAGES: Record<PerpsErrorCode, string> = {
  INVALID_PRICE: "Invalid price",
  SYSTEM_SUSPENDED: "System is suspended",
  MARKET_SUSPENDED: "Market is suspended",
  INSUFFICIENT_MARGIN: "Insufficient margin",
  MAX_LEVERAGE_EXCEEDED: "Max leverage exceeded",
  MAX_MARKET_SIZE_EXCEEDED: "Max market size exceeded",
  NIL_ORDER: "Cannot submit empty order",
  NO_POSITION_OPEN: "No position open",
  POSITION_NOT_LIQUIDATABLE: "Position cannot be liquidated",
  ZERO_SIZE_POSITION: "Position has zero size",
  CAN_LIQUIDATE: "Position can be liquidated",
  INVALID_PARAMETER: "Invalid parameter",
  MARGIN_BELOW_KEEPER_FEE: "Minimum initial margin must exceed the minimum keeper fee",
  MARKET_NOT_FOUND: "Market not found",
  MARKET_EXISTS: "Market already exists",
  REENTRANT_MUTATION: "Market is already being mutated",
  SETTLEMENT_FAILED: "Treasury settlement failed",
};

export class PerpsError extends Error {
  public override readonly name = "PerpsError";

  constructor(
    message: string,
    public readonly code: PerpsErrorCode,
    public readonly marketKey?: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export const createPerpsError = (
  code: PerpsErrorCode,
  marketKey?: string,
  detail?: string,
): PerpsError => {
  const base = PERPS_ERROR_MESSAGES[code];
  return new PerpsError(detail ? `${base}: ${detail}` : base, code, marketKey);
};

export const isPerpsError = (error: unknown): error is PerpsError => error instanceof PerpsError;

/**
 * Price and suspension failures clear on their own; callers may retry later.
 * Everything else needs a different request.
 */
export const isRetryableError = (error: unknown): boolean =>
  isPerpsError(error) &&
  (error.code === "INVALID_PRICE" ||
    error.code === "SYSTEM_SUSPENDED" ||
    error.code === "MARKET_SUSPENDED" ||
    error.code === "REENTRANT_MUTATION");
