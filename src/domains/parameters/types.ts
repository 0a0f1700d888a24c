/**
 * Market and global parameter types.
 *
 * All values are 18-decimal fixed-point. Fee and funding rates are fractions
 * (0.003 = 30 bps); `maxFundingRate` is per day.
 */

import * as v from "valibot";

import { UNIT } from "@/lib/decimal";

const amountSchema = v.pipe(v.bigint(), v.minValue(0n, "must not be negative"));

export const MarketParametersSchema = v.object({
  baseFee: amountSchema,
  /** Charged on the part of a trade that moves skew toward zero. Falls back to `baseFee`. */
  makerFee: v.optional(amountSchema),
  /** Charged on the part of a trade that grows skew. Falls back to `baseFee`. */
  takerFee: v.optional(amountSchema),
  maxLeverage: v.pipe(v.bigint(), v.minValue(UNIT, "must be at least 1x")),
  maxSingleSideValueUSD: amountSchema,
  maxFundingRate: amountSchema,
  skewScaleUSD: v.pipe(v.bigint(), v.minValue(1n, "must be positive")),
});

export type MarketParameters = v.InferOutput<typeof MarketParametersSchema>;

export const GlobalParametersSchema = v.object({
  minKeeperFee: amountSchema,
  liquidationFeeRatio: amountSchema,
  liquidationBufferRatio: amountSchema,
  minInitialMargin: amountSchema,
});

export type GlobalParameters = v.InferOutput<typeof GlobalParametersSchema>;
