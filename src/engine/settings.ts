/**
 * Market administration: listing markets and changing parameters.
 *
 * Funding accrued under the old parameters is recorded before new market
 * parameters apply, so a parameter change never rewrites past funding.
 *
 * @see {@link ../../adrs/0003-funding-and-debt.md ADR-0003: Funding and Market Debt}
 */

import type { Clock } from "@/adapters/types";
import { createPerpsError } from "@/domains/errors";
import type { MarketState, PositionLedger } from "@/domains/ledger";
import type { GlobalParameters, MarketParameters, ParameterStore } from "@/domains/parameters";
import type { Logger } from "@/lib/logger";

import type { PerpsEngine } from "./types";

export interface MarketSettingsDeps {
  ledger: PositionLedger;
  parameters: ParameterStore;
  engine: Pick<PerpsEngine, "recomputeFunding">;
  clock: Clock;
  logger: Logger;
}

export interface MarketSettings {
  addMarket: (
    marketKey: string,
    baseAsset: string,
    parameters: MarketParameters,
  ) => Readonly<MarketState>;
  /** Recomputes funding at the current values, then applies `patch`. */
  setMarketParameters: (marketKey: string, patch: Partial<MarketParameters>) => MarketParameters;
  setGlobalParameters: (patch: Partial<GlobalParameters>) => GlobalParameters;
}

export const createMarketSettings = (deps: MarketSettingsDeps): MarketSettings => {
  const { ledger, parameters, engine, clock } = deps;
  const logger = deps.logger.child({ component: "market-settings" });

  return {
    addMarket: (marketKey, baseAsset, marketParameters) => {
      if (ledger.hasMarket(marketKey) || parameters.hasMarket(marketKey)) {
        throw createPerpsError("MARKET_EXISTS", marketKey);
      }
      parameters.defineMarket(marketKey, marketParameters);
      const market = ledger.createMarket(marketKey, baseAsset, clock.now());
      logger.info("Market added", { marketKey, baseAsset });
      return market;
    },

    setMarketParameters: (marketKey, patch) => {
      const next = parameters.previewMarketParameters(marketKey, patch);
      const fundingIndex = engine.recomputeFunding(marketKey);
      parameters.setMarketParameters(marketKey, next);
      logger.info("Market parameters updated", {
        marketKey,
        fields: Object.keys(patch),
        fundingIndex,
      });
      return next;
    },

    setGlobalParameters: (patch) => {
      const globals = parameters.setGlobalParameters(patch);
      logger.info("Global parameters updated", { fields: Object.keys(patch) });
      return globals;
    },
  };
};
