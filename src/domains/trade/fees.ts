import { abs, divideDecimal, min, multiplyDecimal } from "@/lib/decimal";

import type { MarketParameters } from "../parameters";

export interface FeeContext {
  sizeDelta: bigint;
  /** Market skew before the trade. */
  marketSkew: bigint;
  parameters: Pick<MarketParameters, "baseFee" | "makerFee" | "takerFee">;
}

/** Picks the fee rate charged on a trade. */
export type FeePolicy = (context: FeeContext) => bigint;

export const baseFeePolicy: FeePolicy = ({ parameters }) => parameters.baseFee;

/**
 * Charges `makerFee` on the part of the trade that moves skew toward zero and
 * `takerFee` on the remainder, blended into a single rate. Markets without
 * both rates configured pay `baseFee`.
 */
export const skewFeePolicy: FeePolicy = (context) => {
  const { sizeDelta, marketSkew, parameters } = context;
  const { makerFee, takerFee } = parameters;
  if (makerFee === undefined || takerFee === undefined || sizeDelta === 0n) {
    return parameters.baseFee;
  }

  const opposesSkew = (sizeDelta > 0n && marketSkew < 0n) || (sizeDelta < 0n && marketSkew > 0n);
  const tradeSize = abs(sizeDelta);
  const reducing = opposesSkew ? min(tradeSize, abs(marketSkew)) : 0n;

  if (reducing === 0n) {
    return takerFee;
  }
  if (reducing === tradeSize) {
    return makerFee;
  }
  const blended =
    multiplyDecimal(makerFee, reducing) + multiplyDecimal(takerFee, tradeSize - reducing);
  return divideDecimal(blended, tradeSize);
};

export const orderFee = (sizeDelta: bigint, price: bigint, feeRate: bigint): bigint =>
  multiplyDecimal(abs(multiplyDecimal(sizeDelta, price)), feeRate);
