import type { Context } from "hono";
import { Hono } from "hono";

import { isPerpsError } from "@/domains/errors";
import type { Position } from "@/domains/ledger";
import type { MarketSummary, PerpsEngine, PositionSummary } from "@/engine/types";
import { formatDecimal } from "@/lib/decimal";

type MarketReads = Pick<PerpsEngine, "listMarkets" | "marketSummary" | "positionSummary">;

export const renderMarketSummary = (summary: MarketSummary) => ({
  marketKey: summary.marketKey,
  baseAsset: summary.baseAsset,
  price: formatDecimal(summary.price),
  priceInvalid: summary.priceInvalid,
  marketSize: formatDecimal(summary.marketSize),
  marketSkew: formatDecimal(summary.marketSkew),
  marketDebt: formatDecimal(summary.marketDebt),
  proportionalSkew: formatDecimal(summary.proportionalSkew),
  currentFundingRate: formatDecimal(summary.currentFundingRate),
  unrecordedFunding: formatDecimal(summary.unrecordedFunding),
  fundingLastRecomputed: summary.fundingLastRecomputed,
  fundingSequenceLength: summary.fundingSequenceLength,
});

export const renderPosition = (position: Position) => ({
  id: position.id,
  lastFundingIndex: position.lastFundingIndex,
  margin: formatDecimal(position.margin),
  lockedMargin: formatDecimal(position.lockedMargin),
  lastPrice: formatDecimal(position.lastPrice),
  size: formatDecimal(position.size),
});

export const renderPositionSummary = (summary: PositionSummary) => ({
  marketKey: summary.marketKey,
  account: summary.account,
  position: renderPosition(summary.position),
  notionalValue: formatDecimal(summary.notionalValue),
  profitLoss: formatDecimal(summary.profitLoss),
  accruedFunding: formatDecimal(summary.accruedFunding),
  remainingMargin: formatDecimal(summary.remainingMargin),
  accessibleMargin: formatDecimal(summary.accessibleMargin),
  currentLeverage: formatDecimal(summary.currentLeverage),
  liquidationMargin: formatDecimal(summary.liquidationMargin),
  canLiquidate: summary.canLiquidate,
  approxLiquidationPrice: formatDecimal(summary.approxLiquidationPrice),
  approxLiquidationFee: formatDecimal(summary.approxLiquidationFee),
  priceInvalid: summary.priceInvalid,
});

const notFound = (c: Context, error: unknown): Response => {
  if (isPerpsError(error) && error.code === "MARKET_NOT_FOUND") {
    return c.json({ error: error.code, message: error.message }, 404);
  }
  throw error;
};

export const createMarketsRoute = (engine: MarketReads): Hono => {
  const markets = new Hono();

  markets.get("/", (c) =>
    c.json({
      markets: engine
        .listMarkets()
        .map((marketKey) => renderMarketSummary(engine.marketSummary(marketKey))),
    }),
  );

  markets.get("/:marketKey", (c) => {
    try {
      return c.json(renderMarketSummary(engine.marketSummary(c.req.param("marketKey"))));
    } catch (error) {
      return notFound(c, error);
    }
  });

  markets.get("/:marketKey/positions/:account", (c) => {
    try {
      const summary = engine.positionSummary(c.req.param("marketKey"), c.req.param("account"));
      return c.json(renderPositionSummary(summary));
    } catch (error) {
      return notFound(c, error);
    }
  });

  return markets;
};
