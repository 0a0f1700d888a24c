import * as v from "valibot";

import { createPerpsError } from "../errors";

import { DEFAULT_GLOBAL_PARAMETERS } from "./config";
import {
  type GlobalParameters,
  GlobalParametersSchema,
  type MarketParameters,
  MarketParametersSchema,
} from "./types";

export interface ParameterStore {
  hasMarket: (marketKey: string) => boolean;
  getMarketParameters: (marketKey: string) => Readonly<MarketParameters>;
  /** Registers parameters for a new market. */
  defineMarket: (marketKey: string, parameters: MarketParameters) => void;
  /**
   * Merges `patch` into the current parameters and validates the result
   * without applying it.
   */
  previewMarketParameters: (marketKey: string, patch: Partial<MarketParameters>) => MarketParameters;
  setMarketParameters: (marketKey: string, parameters: MarketParameters) => void;
  getGlobalParameters: () => Readonly<GlobalParameters>;
  setGlobalParameters: (patch: Partial<GlobalParameters>) => GlobalParameters;
}

const describeIssues = (issues: readonly v.BaseIssue<unknown>[]): string =>
  issues
    .map((issue) => {
      const path = issue.path?.map((item) => String(item.key)).join(".");
      return path ? `${path} ${issue.message}` : issue.message;
    })
    .join("; ");

const validateMarket = (marketKey: string, parameters: MarketParameters): MarketParameters => {
  const result = v.safeParse(MarketParametersSchema, parameters);
  if (!result.success) {
    throw createPerpsError("INVALID_PARAMETER", marketKey, describeIssues(result.issues));
  }
  return result.output;
};

const validateGlobals = (parameters: GlobalParameters): GlobalParameters => {
  const result = v.safeParse(GlobalParametersSchema, parameters);
  if (!result.success) {
    throw createPerpsError("INVALID_PARAMETER", undefined, describeIssues(result.issues));
  }
  if (result.output.minInitialMargin < result.output.minKeeperFee) {
    throw createPerpsError("MARGIN_BELOW_KEEPER_FEE");
  }
  return result.output;
};

/**
 * In-memory parameter store. Writes are validated as a whole; a rejected
 * write leaves the previous values in place.
 *
 * Market parameter writes do not recompute funding here. Callers that change
 * live markets go through the market settings service, which recomputes
 * funding at the old values first.
 */
export const createParameterStore = (
  initialGlobals: GlobalParameters = DEFAULT_GLOBAL_PARAMETERS,
): ParameterStore => {
  const markets = new Map<string, MarketParameters>();
  let globals = validateGlobals(initialGlobals);

  const getMarketParameters = (marketKey: string): MarketParameters => {
    const parameters = markets.get(marketKey);
    if (!parameters) {
      throw createPerpsError("MARKET_NOT_FOUND", marketKey);
    }
    return parameters;
  };

  return {
    hasMarket: (marketKey) => markets.has(marketKey),

    getMarketParameters,

    defineMarket: (marketKey, parameters) => {
      if (markets.has(marketKey)) {
        throw createPerpsError("MARKET_EXISTS", marketKey);
      }
      markets.set(marketKey, validateMarket(marketKey, parameters));
    },

    previewMarketParameters: (marketKey, patch) =>
      validateMarket(marketKey, { ...getMarketParameters(marketKey), ...patch }),

    setMarketParameters: (marketKey, parameters) => {
      getMarketParameters(marketKey);
      markets.set(marketKey, validateMarket(marketKey, parameters));
    },

    getGlobalParameters: () => globals,

    setGlobalParameters: (patch) => {
      globals = validateGlobals({ ...globals, ...patch });
      return globals;
    },
  };
};
