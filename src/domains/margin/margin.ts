/**
 * Margin accounting for a single position.
 *
 * All functions are pure. Callers supply a {@link Valuation}: the current
 * price and the funding per unit accrued since the position's
 * `lastFundingIndex`.
 */

import { abs, divideDecimal, max, multiplyDecimal, toUnit } from "@/lib/decimal";

import type { Position } from "../ledger";
import { accruedFunding } from "../funding";

/** Keeps a withdrawal strictly inside the leverage and margin limits. */
export const MARGIN_TOLERANCE = toUnit("0.001");

export interface Valuation {
  price: bigint;
  fundingPerUnit: bigint;
}

export const notionalValue = (size: bigint, price: bigint): bigint => multiplyDecimal(size, price);

export const profitLoss = (position: Position, price: bigint): bigint =>
  multiplyDecimal(position.size, price - position.lastPrice);

/**
 * Margin plus unrealized PnL and funding. Negative when the position owes more
 * than its margin.
 */
export const rawRemainingMargin = (position: Position, valuation: Valuation): bigint =>
  position.margin +
  profitLoss(position, valuation.price) +
  accruedFunding(position.size, valuation.fundingPerUnit);

export const remainingMargin = (position: Position, valuation: Valuation): bigint =>
  max(0n, rawRemainingMargin(position, valuation));

export const currentLeverage = (position: Position, valuation: Valuation): bigint => {
  const remaining = remainingMargin(position, valuation);
  if (remaining === 0n) {
    return 0n;
  }
  return divideDecimal(notionalValue(position.size, valuation.price), remaining);
};

export interface MarginLimits {
  maxLeverage: bigint;
  minInitialMargin: bigint;
  /** Liquidation margin of the position at the current price; 0 when closed. */
  liquidationMargin: bigint;
}

/**
 * Margin that can be withdrawn without breaching leverage, minimum margin or
 * liquidation limits. Locked margin is never accessible.
 */
export const accessibleMargin = (
  position: Position,
  valuation: Valuation,
  limits: MarginLimits,
): bigint => {
  const notional = abs(notionalValue(position.size, valuation.price));
  let inaccessible = divideDecimal(notional, limits.maxLeverage - MARGIN_TOLERANCE);

  if (inaccessible > 0n) {
    inaccessible = max(max(inaccessible, limits.minInitialMargin), limits.liquidationMargin);
    inaccessible += MARGIN_TOLERANCE;
  }
  inaccessible += position.lockedMargin;

  return max(0n, remainingMargin(position, valuation) - inaccessible);
};

export type MarginTransferStatus =
  | "OK"
  | "INSUFFICIENT_MARGIN"
  | "CAN_LIQUIDATE"
  | "MAX_LEVERAGE_EXCEEDED";

/**
 * Checks the margin a position would hold after a transfer. Deposits only
 * need a non-negative result; withdrawals from an open position must also
 * stay above the minimum margin and the liquidation margin and within max
 * leverage.
 */
export const checkMarginTransfer = (
  position: Position,
  newMargin: bigint,
  marginDelta: bigint,
  price: bigint,
  limits: MarginLimits,
): MarginTransferStatus => {
  if (newMargin < 0n || newMargin < position.lockedMargin) {
    return "INSUFFICIENT_MARGIN";
  }
  if (marginDelta >= 0n || position.size === 0n) {
    return "OK";
  }
  if (newMargin < limits.minInitialMargin) {
    return "INSUFFICIENT_MARGIN";
  }
  if (newMargin <= limits.liquidationMargin) {
    return "CAN_LIQUIDATE";
  }
  const leverage = abs(divideDecimal(notionalValue(position.size, price), newMargin));
  if (leverage > limits.maxLeverage) {
    return "MAX_LEVERAGE_EXCEEDED";
  }
  return "OK";
};

/**
 * Per-position term of the market debt identity. Summed over all positions
 * and added to `skew * (price + nextFundingEntry)`, it yields the total raw
 * remaining margin of the market.
 */
export const positionDebtCorrection = (position: Position, fundingAtLastIndex: bigint): bigint =>
  position.margin - multiplyDecimal(position.size, position.lastPrice + fundingAtLastIndex);
