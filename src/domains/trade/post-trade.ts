/**
 * Post-trade projection.
 *
 * Computes what a position would look like after a trade and whether the
 * trade is allowed. The same projection backs both the read-only preview and
 * the committed trade, so a preview reporting `OK` commits identically.
 *
 * @see {@link ../../../adrs/0001-engine-architecture.md ADR-0001: Engine Architecture}
 */

import { abs, divideDecimal, multiplyDecimal, sameSide, toUnit } from "@/lib/decimal";

import type { Position } from "../ledger";
import { canLiquidate, liquidationMargin } from "../liquidation";
import { type Valuation, rawRemainingMargin } from "../margin";
import type { GlobalParameters, MarketParameters } from "../parameters";

import { orderFee } from "./fees";

/** Slack above max leverage so a max-leverage order survives fee rounding. */
export const LEVERAGE_TOLERANCE = toUnit("0.01");

/** Slack above the one-sided open interest cap, in USD. */
export const MARKET_VALUE_TOLERANCE = toUnit(100);

export type TradeStatus =
  | "OK"
  | "NIL_ORDER"
  | "INVALID_PRICE"
  | "CAN_LIQUIDATE"
  | "INSUFFICIENT_MARGIN"
  | "MAX_LEVERAGE_EXCEEDED"
  | "MAX_MARKET_SIZE_EXCEEDED";

export type TradeRejection = Exclude<TradeStatus, "OK">;

export interface TradeInput {
  position: Position;
  sizeDelta: bigint;
  valuation: Valuation;
  priceInvalid: boolean;
  feeRate: bigint;
  latestFundingIndex: number;
  market: { marketSize: bigint; marketSkew: bigint };
  parameters: Pick<MarketParameters, "maxLeverage" | "maxSingleSideValueUSD">;
  globals: GlobalParameters;
}

export interface TradeProjection {
  /** The resulting position, or the unchanged position when rejected. */
  position: Position;
  margin: bigint;
  size: bigint;
  fee: bigint;
  status: TradeStatus;
}

const reject = (position: Position, status: TradeRejection): TradeProjection => ({
  position,
  margin: position.margin,
  size: position.size,
  fee: 0n,
  status,
});

/**
 * Whether the trade pushes one side's open interest past `maxSize`. Trades
 * that shrink a position are never too large.
 */
export const orderSizeTooLarge = (
  maxSize: bigint,
  oldSize: bigint,
  newSize: bigint,
  market: { marketSize: bigint; marketSkew: bigint },
): boolean => {
  if (abs(newSize) < abs(oldSize) || (sameSide(oldSize, newSize) && abs(newSize) <= abs(oldSize))) {
    return false;
  }
  const newSkew = market.marketSkew - oldSize + newSize;
  const newMarketSize = market.marketSize - abs(oldSize) + abs(newSize);
  // Twice the new size of the side the position ends up on
  const doubledSideSize = newSize > 0n ? newMarketSize + newSkew : newMarketSize - newSkew;
  return doubledSideSize > maxSize * 2n;
};

export const postTradeDetails = (input: TradeInput): TradeProjection => {
  const { position, sizeDelta, valuation, globals, parameters } = input;
  const { price } = valuation;

  if (sizeDelta === 0n) {
    return reject(position, "NIL_ORDER");
  }
  if (input.priceInvalid) {
    return reject(position, "INVALID_PRICE");
  }
  if (canLiquidate(position, valuation, globals)) {
    return reject(position, "CAN_LIQUIDATE");
  }

  const fee = orderFee(sizeDelta, price, input.feeRate);
  const newSize = position.size + sizeDelta;
  const newMargin = rawRemainingMargin(position, valuation) - fee;
  if (newMargin < 0n || newMargin < position.lockedMargin) {
    return reject(position, "INSUFFICIENT_MARGIN");
  }

  const reducingExposure = abs(newSize) < abs(position.size);
  if (!reducingExposure && newMargin + fee < globals.minInitialMargin) {
    return reject(position, "INSUFFICIENT_MARGIN");
  }

  if (newSize !== 0n && newMargin <= liquidationMargin(newSize, price, globals)) {
    return reject(position, "CAN_LIQUIDATE");
  }

  if (newSize !== 0n) {
    const marginBeforeFee = newMargin + fee;
    const leverage =
      marginBeforeFee === 0n
        ? undefined
        : abs(divideDecimal(multiplyDecimal(newSize, price), marginBeforeFee));
    if (leverage === undefined || leverage > parameters.maxLeverage + LEVERAGE_TOLERANCE) {
      return reject(position, "MAX_LEVERAGE_EXCEEDED");
    }
  }

  const maxSize = divideDecimal(parameters.maxSingleSideValueUSD + MARKET_VALUE_TOLERANCE, price);
  if (orderSizeTooLarge(maxSize, position.size, newSize, input.market)) {
    return reject(position, "MAX_MARKET_SIZE_EXCEEDED");
  }

  const next: Position = {
    id: position.id,
    lastFundingIndex: input.latestFundingIndex,
    margin: newMargin,
    lockedMargin: position.lockedMargin,
    lastPrice: price,
    size: newSize,
  };
  return { position: next, margin: newMargin, size: newSize, fee, status: "OK" };
};
