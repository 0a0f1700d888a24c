/**
 * Liquidation thresholds and keeper compensation.
 *
 * A position can be liquidated once its remaining margin no longer covers the
 * keeper's fee plus a buffer proportional to its notional value.
 */

import { abs, divideDecimal, max, multiplyDecimal } from "@/lib/decimal";

import { createPerpsError } from "../errors";
import type { Position } from "../ledger";
import { type Valuation, remainingMargin } from "../margin";
import type { GlobalParameters } from "../parameters";

type LiquidationParameters = Pick<
  GlobalParameters,
  "minKeeperFee" | "liquidationFeeRatio" | "liquidationBufferRatio"
>;

export const liquidationFee = (
  size: bigint,
  price: bigint,
  parameters: LiquidationParameters,
): bigint => {
  const proportionalFee = multiplyDecimal(
    multiplyDecimal(abs(size), price),
    parameters.liquidationFeeRatio,
  );
  return max(parameters.minKeeperFee, proportionalFee);
};

/**
 * Remaining margin at or below which a position of `size` can be liquidated.
 */
export const liquidationMargin = (
  size: bigint,
  price: bigint,
  parameters: LiquidationParameters,
): bigint => {
  if (size === 0n) {
    throw createPerpsError("ZERO_SIZE_POSITION");
  }
  const buffer = multiplyDecimal(multiplyDecimal(abs(size), price), parameters.liquidationBufferRatio);
  return liquidationFee(size, price, parameters) + buffer;
};

export const canLiquidate = (
  position: Position,
  valuation: Valuation,
  parameters: LiquidationParameters,
): boolean =>
  position.size !== 0n &&
  remainingMargin(position, valuation) <= liquidationMargin(position.size, valuation.price, parameters);

/**
 * Price at which the position's remaining margin meets its liquidation
 * margin, with the margin terms taken at the current price. Exact only when
 * the liquidation margin does not itself depend on price (for instance when
 * the keeper fee floor dominates and there is no buffer).
 */
export const approxLiquidationPrice = (
  position: Position,
  valuation: Valuation,
  parameters: LiquidationParameters,
): bigint => {
  if (position.size === 0n) {
    return 0n;
  }
  const requiredMargin = liquidationMargin(position.size, valuation.price, parameters);
  const priceMove = divideDecimal(requiredMargin - position.margin, position.size);
  return max(0n, position.lastPrice + priceMove - valuation.fundingPerUnit);
};

export const approxLiquidationFee = (
  position: Position,
  valuation: Valuation,
  parameters: LiquidationParameters,
): bigint => {
  const price = approxLiquidationPrice(position, valuation, parameters);
  if (price === 0n) {
    return 0n;
  }
  return liquidationFee(position.size, price, parameters);
};

export interface LiquidationPayout {
  /** Paid to the liquidating keeper. */
  keeperFee: bigint;
  /** Remainder of the position's margin, paid to the fee pool. */
  poolFee: bigint;
}

/**
 * Splits a liquidated position's remaining margin between keeper and fee
 * pool. The keeper never receives more than the position has left.
 */
export const liquidationPayout = (remaining: bigint, fee: bigint): LiquidationPayout => {
  const keeperFee = remaining < fee ? remaining : fee;
  return { keeperFee, poolFee: max(0n, remaining - keeperFee) };
};
