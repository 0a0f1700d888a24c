/**
 * Skew-based funding.
 *
 * The funding rate pushes traders toward a balanced market: when longs
 * outweigh shorts the rate is negative and longs pay shorts. Funding accrues
 * continuously per unit of size, valued at the current price, and is recorded
 * into the market's cumulative funding sequence whenever the market is
 * touched.
 *
 * @see {@link ../../../adrs/0003-funding-and-debt.md ADR-0003: Funding and Market Debt}
 */

import { UNIT, clamp, divideDecimal, multiplyDecimal } from "@/lib/decimal";

export const SECONDS_PER_DAY = 86_400n;

export interface FundingRateInput {
  marketSkew: bigint;
  price: bigint;
  skewScaleUSD: bigint;
  maxFundingRate: bigint;
}

/**
 * Skew value relative to the skew scale, clamped to [-1, 1].
 */
export const proportionalSkew = (marketSkew: bigint, price: bigint, skewScaleUSD: bigint): bigint => {
  const skewValue = multiplyDecimal(marketSkew, price);
  return clamp(divideDecimal(skewValue, skewScaleUSD), -UNIT, UNIT);
};

/**
 * Daily funding rate. Saturates at ±maxFundingRate once the skew value reaches
 * the skew scale.
 */
export const currentFundingRate = (input: FundingRateInput): bigint =>
  multiplyDecimal(
    -proportionalSkew(input.marketSkew, input.price, input.skewScaleUSD),
    input.maxFundingRate,
  );

/**
 * Funding per unit of size accrued since the last recorded entry.
 */
export const unrecordedFunding = (
  fundingRate: bigint,
  price: bigint,
  elapsedSeconds: number,
): bigint => {
  if (elapsedSeconds <= 0) {
    return 0n;
  }
  return (multiplyDecimal(fundingRate, price) * BigInt(elapsedSeconds)) / SECONDS_PER_DAY;
};

export interface NextFundingInput extends FundingRateInput {
  lastFunding: bigint;
  lastTimestamp: number;
  now: number;
}

export const nextFundingEntry = (input: NextFundingInput): bigint =>
  input.lastFunding +
  unrecordedFunding(currentFundingRate(input), input.price, input.now - input.lastTimestamp);

/**
 * Funding owed by (negative) or to (positive) a position of `size` given the
 * per-unit funding accrued since it was last modified.
 */
export const accruedFunding = (size: bigint, fundingPerUnit: bigint): bigint =>
  size === 0n ? 0n : multiplyDecimal(size, fundingPerUnit);
