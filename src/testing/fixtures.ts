/**
 * Shared test values. Amounts mirror a mid-sized ETH market.
 */

import type { GlobalParameters, MarketParameters } from "@/domains/parameters";
import type { Position } from "@/domains/ledger";
import { toUnit } from "@/lib/decimal";

export const createMarketParameters = (
  overrides: Partial<MarketParameters> = {},
): MarketParameters => ({
  baseFee: toUnit("0.003"),
  maxLeverage: toUnit(10),
  maxSingleSideValueUSD: toUnit(100000),
  maxFundingRate: toUnit("0.1"),
  skewScaleUSD: toUnit(100000),
  ...overrides,
});

export const createGlobalParameters = (
  overrides: Partial<GlobalParameters> = {},
): GlobalParameters => ({
  minKeeperFee: toUnit(20),
  liquidationFeeRatio: toUnit("0.0035"),
  liquidationBufferRatio: toUnit("0.0025"),
  minInitialMargin: toUnit(100),
  ...overrides,
});

export const createPosition = (overrides: Partial<Position> = {}): Position => ({
  id: 1,
  lastFundingIndex: 0,
  margin: toUnit(1000),
  lockedMargin: 0n,
  lastPrice: toUnit(100),
  size: 0n,
  ...overrides,
});
