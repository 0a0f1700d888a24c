/**
 * Parameter defaults and the market definition file format.
 *
 * Definition files carry decimal strings ("0.003") so that values survive
 * JSON without floating-point loss.
 */

import * as v from "valibot";

import { decimalStringSchema, toUnit } from "@/lib/decimal";

import type { GlobalParameters, MarketParameters } from "./types";

export const DEFAULT_GLOBAL_PARAMETERS: GlobalParameters = {
  minKeeperFee: toUnit(20), // 20 sUSD
  liquidationFeeRatio: toUnit("0.0035"), // 35 bps
  liquidationBufferRatio: toUnit("0.0025"), // 25 bps
  minInitialMargin: toUnit(100), // 100 sUSD
};

const MarketParametersDefinitionSchema = v.object({
  baseFee: decimalStringSchema,
  makerFee: v.optional(decimalStringSchema),
  takerFee: v.optional(decimalStringSchema),
  maxLeverage: decimalStringSchema,
  maxSingleSideValueUSD: decimalStringSchema,
  maxFundingRate: decimalStringSchema,
  skewScaleUSD: decimalStringSchema,
});

export const MarketsConfigSchema = v.object({
  globals: v.optional(
    v.object({
      minKeeperFee: v.optional(decimalStringSchema),
      liquidationFeeRatio: v.optional(decimalStringSchema),
      liquidationBufferRatio: v.optional(decimalStringSchema),
      minInitialMargin: v.optional(decimalStringSchema),
    }),
  ),
  markets: v.array(
    v.object({
      marketKey: v.pipe(v.string(), v.minLength(1)),
      baseAsset: v.pipe(v.string(), v.minLength(1)),
      parameters: MarketParametersDefinitionSchema,
    }),
  ),
});

export interface MarketDefinition {
  marketKey: string;
  baseAsset: string;
  parameters: MarketParameters;
}

export interface MarketsConfig {
  globals: GlobalParameters;
  markets: MarketDefinition[];
}

/**
 * Parses a market definition document. Range checks happen later, when the
 * parameter store accepts the values.
 */
export const parseMarketsConfig = (raw: unknown): MarketsConfig => {
  const parsed = v.parse(MarketsConfigSchema, raw);
  const globals = parsed.globals ?? {};
  return {
    globals: {
      minKeeperFee: globals.minKeeperFee ?? DEFAULT_GLOBAL_PARAMETERS.minKeeperFee,
      liquidationFeeRatio:
        globals.liquidationFeeRatio ?? DEFAULT_GLOBAL_PARAMETERS.liquidationFeeRatio,
      liquidationBufferRatio:
        globals.liquidationBufferRatio ?? DEFAULT_GLOBAL_PARAMETERS.liquidationBufferRatio,
      minInitialMargin: globals.minInitialMargin ?? DEFAULT_GLOBAL_PARAMETERS.minInitialMargin,
    },
    markets: parsed.markets,
  };
};
