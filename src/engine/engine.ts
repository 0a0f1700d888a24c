/**
 * Perps engine: the stateful API over the pure funding, margin, trade and
 * liquidation rules.
 *
 * Every mutation runs as one ledger transaction:
 *   1. suspension and price gates
 *   2. funding recompute (appends to the funding sequence)
 *   3. the operation's own checks and ledger writes
 *   4. treasury settlement (burns and issues)
 * Any failure rolls the ledger back to its state before step 2. Once the
 * transaction commits, the oracle accepts the price it used and the events
 * are published.
 *
 * @see {@link ../../adrs/0001-engine-architecture.md ADR-0001: Engine Architecture}
 * @see {@link ../../adrs/0003-funding-and-debt.md ADR-0003: Funding and Market Debt}
 */

import { CollaboratorError } from "@/adapters/errors";
import type { TreasuryOperation } from "@/adapters/types";
import {
  PERPS_ERROR_MESSAGES,
  PerpsError,
  createPerpsError,
  isPerpsError,
} from "@/domains/errors";
import {
  accruedFunding,
  currentFundingRate,
  nextFundingEntry,
  proportionalSkew,
  unrecordedFunding,
} from "@/domains/funding";
import type { Position } from "@/domains/ledger";
import {
  approxLiquidationFee,
  approxLiquidationPrice,
  canLiquidate,
  liquidationFee,
  liquidationMargin,
  liquidationPayout,
} from "@/domains/liquidation";
import {
  type MarginLimits,
  type Valuation,
  accessibleMargin,
  checkMarginTransfer,
  currentLeverage,
  notionalValue,
  positionDebtCorrection,
  profitLoss,
  rawRemainingMargin,
  remainingMargin,
} from "@/domains/margin";
import {
  type TradeProjection,
  orderFee,
  postTradeDetails,
  skewFeePolicy,
} from "@/domains/trade";
import { abs, divideDecimal, max, multiplyDecimal } from "@/lib/decimal";

import { createEventBus } from "./events";
import type {
  AssetPrice,
  EngineEvent,
  LiquidationResult,
  PerpsEngine,
  PerpsEngineDeps,
  TradeOptions,
} from "./types";

export const DEFAULT_FEE_POOL_ACCOUNT = "fee-pool";

interface MutationContext {
  marketKey: string;
  price: bigint;
  now: number;
  fundingIndex: number;
  events: EngineEvent[];
  settlements: TreasuryOperation[];
}

interface MutationOptions {
  /** Funding recomputes triggered by settings changes run while suspended. */
  ignoreSuspension?: boolean;
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Treasury failures surface as SETTLEMENT_FAILED with the original error as
 * cause. Engine errors raised by a re-entering treasury pass through.
 */
const settlementError = (marketKey: string, error: unknown): PerpsError => {
  if (isPerpsError(error)) {
    return error;
  }
  const detail =
    error instanceof CollaboratorError ? `${error.code}: ${error.message}` : toError(error).message;
  return new PerpsError(
    `${PERPS_ERROR_MESSAGES.SETTLEMENT_FAILED}: ${detail}`,
    "SETTLEMENT_FAILED",
    marketKey,
    error,
  );
};

export const createPerpsEngine = (deps: PerpsEngineDeps): PerpsEngine => {
  const { ledger, parameters, oracle, treasury, suspension, clock } = deps;
  const feePolicy = deps.feePolicy ?? skewFeePolicy;
  const feePoolAccount = deps.feePoolAccount ?? DEFAULT_FEE_POOL_ACCOUNT;
  const logger = deps.logger.child({ component: "perps-engine" });
  const bus = createEventBus(logger);

  // -------------------------------------------------------------------------
  // Valuation helpers
  // -------------------------------------------------------------------------

  const assetPrice = (marketKey: string): AssetPrice => {
    const { baseAsset } = ledger.getMarket(marketKey);
    const reading = oracle.currentPrice(baseAsset);
    return {
      price: reading.price,
      invalid: reading.invalid || reading.price <= 0n,
      roundId: reading.roundId,
    };
  };

  const fundingRateAt = (marketKey: string, price: bigint): bigint => {
    const { maxFundingRate, skewScaleUSD } = parameters.getMarketParameters(marketKey);
    const { marketSkew } = ledger.getMarket(marketKey);
    return currentFundingRate({ marketSkew, price, skewScaleUSD, maxFundingRate });
  };

  const nextFunding = (marketKey: string, price: bigint, now: number): bigint => {
    const { maxFundingRate, skewScaleUSD } = parameters.getMarketParameters(marketKey);
    const { marketSkew } = ledger.getMarket(marketKey);
    const last = ledger.fundingEntry(marketKey, ledger.latestFundingIndex(marketKey));
    return nextFundingEntry({
      marketSkew,
      price,
      skewScaleUSD,
      maxFundingRate,
      lastFunding: last.funding,
      lastTimestamp: last.timestamp,
      now,
    });
  };

  const valuationOf = (
    marketKey: string,
    position: Position,
    price: bigint,
    now: number,
  ): Valuation => ({
    price,
    fundingPerUnit:
      position.size === 0n
        ? 0n
        : nextFunding(marketKey, price, now) -
          ledger.fundingEntry(marketKey, position.lastFundingIndex).funding,
  });

  const liquidationMarginOrZero = (size: bigint, price: bigint): bigint =>
    size === 0n ? 0n : liquidationMargin(size, price, parameters.getGlobalParameters());

  const marginLimits = (marketKey: string, position: Position, price: bigint): MarginLimits => ({
    maxLeverage: parameters.getMarketParameters(marketKey).maxLeverage,
    minInitialMargin: parameters.getGlobalParameters().minInitialMargin,
    liquidationMargin: liquidationMarginOrZero(position.size, price),
  });

  const accessibleMarginOf = (
    marketKey: string,
    position: Position,
    price: bigint,
    now: number,
  ): bigint =>
    accessibleMargin(
      position,
      valuationOf(marketKey, position, price, now),
      marginLimits(marketKey, position, price),
    );

  const marketDebtAt = (marketKey: string, price: bigint): bigint => {
    const market = ledger.getMarket(marketKey);
    const funding = nextFunding(marketKey, price, clock.now());
    return max(
      0n,
      multiplyDecimal(market.marketSkew, price + funding) + market.entryDebtCorrection,
    );
  };

  const explicitFeeRate = (marketKey: string, feeRate: bigint | undefined): bigint | undefined => {
    if (feeRate !== undefined && feeRate < 0n) {
      throw createPerpsError("INVALID_PARAMETER", marketKey, "fee rate must not be negative");
    }
    return feeRate;
  };

  const projectTrade = (
    marketKey: string,
    account: string,
    sizeDelta: bigint,
    feeRate: bigint | undefined,
    price: bigint,
    priceInvalid: boolean,
    now: number,
  ): TradeProjection => {
    const position = ledger.getPosition(marketKey, account);
    const market = ledger.getMarket(marketKey);
    const marketParameters = parameters.getMarketParameters(marketKey);
    return postTradeDetails({
      position,
      sizeDelta,
      valuation: valuationOf(marketKey, position, price, now),
      priceInvalid,
      feeRate:
        explicitFeeRate(marketKey, feeRate) ??
        feePolicy({ sizeDelta, marketSkew: market.marketSkew, parameters: marketParameters }),
      latestFundingIndex: ledger.latestFundingIndex(marketKey),
      market,
      parameters: marketParameters,
      globals: parameters.getGlobalParameters(),
    });
  };

  // -------------------------------------------------------------------------
  // Mutation plumbing
  // -------------------------------------------------------------------------

  const quoteBurn = (marketKey: string, account: string, amount: bigint): bigint => {
    try {
      return treasury.quoteBurn(account, amount);
    } catch (error) {
      throw settlementError(marketKey, error);
    }
  };

  const settle = (context: MutationContext): void => {
    if (context.settlements.length === 0) {
      return;
    }
    try {
      treasury.settle(context.settlements);
    } catch (error) {
      throw settlementError(context.marketKey, error);
    }
  };

  /**
   * Moves aggregates and the debt correction from `previous` to `next`.
   * `next` must already point at the latest funding index.
   */
  const applyPositionChange = (marketKey: string, previous: Position, next: Position): void => {
    const market = ledger.getMarket(marketKey);
    const previousCorrection = positionDebtCorrection(
      previous,
      ledger.fundingEntry(marketKey, previous.lastFundingIndex).funding,
    );
    const nextCorrection = positionDebtCorrection(
      next,
      ledger.fundingEntry(marketKey, next.lastFundingIndex).funding,
    );
    ledger.updateMarket(marketKey, {
      marketSkew: market.marketSkew + next.size - previous.size,
      marketSize: market.marketSize + abs(next.size) - abs(previous.size),
      entryDebtCorrection: market.entryDebtCorrection + nextCorrection - previousCorrection,
    });
  };

  const execute = <T>(
    marketKey: string,
    work: (context: MutationContext) => T,
    options: MutationOptions,
  ): { context: MutationContext; result: T } => {
    if (!options.ignoreSuspension) {
      if (suspension.systemSuspended()) {
        throw createPerpsError("SYSTEM_SUSPENDED", marketKey);
      }
      if (suspension.marketSuspended(marketKey)) {
        throw createPerpsError("MARKET_SUSPENDED", marketKey);
      }
    }
    const { price, invalid } = assetPrice(marketKey);
    if (invalid) {
      throw createPerpsError("INVALID_PRICE", marketKey);
    }

    const context: MutationContext = {
      marketKey,
      price,
      now: clock.now(),
      fundingIndex: 0,
      events: [],
      settlements: [],
    };

    const result = ledger.transact(marketKey, () => {
      const funding = nextFunding(marketKey, price, context.now);
      context.fundingIndex = ledger.appendFundingEntry(marketKey, {
        funding,
        timestamp: context.now,
      });
      context.events.push({
        type: "FUNDING_RECOMPUTED",
        marketKey,
        funding,
        index: context.fundingIndex,
        timestamp: context.now,
      });

      const value = work(context);
      settle(context);
      return value;
    });
    oracle.acceptPrice(ledger.getMarket(marketKey).baseAsset, price);
    return { context, result };
  };

  const mutate = <T>(
    marketKey: string,
    operation: string,
    work: (context: MutationContext) => T,
    options: MutationOptions = {},
  ): T => {
    let outcome: { context: MutationContext; result: T };
    try {
      outcome = execute(marketKey, work, options);
    } catch (error) {
      logger.warn(`${operation} rejected`, {
        marketKey,
        code: isPerpsError(error) ? error.code : undefined,
        reason: toError(error).message,
      });
      throw error;
    }

    const { context, result } = outcome;
    logger.debug(`${operation} committed`, {
      marketKey,
      fundingIndex: context.fundingIndex,
      events: context.events.length,
    });
    bus.publish({ marketKey, events: context.events });
    return result;
  };

  // -------------------------------------------------------------------------
  // Operations inside a transaction
  // -------------------------------------------------------------------------

  const transferWithin = (
    context: MutationContext,
    account: string,
    marginDelta: bigint,
  ): Position => {
    const { marketKey, price } = context;
    const previous = ledger.getPosition(marketKey, account);
    if (marginDelta === 0n) {
      return previous;
    }

    const credited = marginDelta > 0n ? quoteBurn(marketKey, account, marginDelta) : marginDelta;
    const valuation = valuationOf(marketKey, previous, price, context.now);
    const newMargin = rawRemainingMargin(previous, valuation) + credited;
    const status = checkMarginTransfer(
      previous,
      newMargin,
      credited,
      price,
      marginLimits(marketKey, previous, price),
    );
    if (status !== "OK") {
      throw createPerpsError(status, marketKey);
    }

    const next: Position = {
      ...previous,
      margin: newMargin,
      lastPrice: price,
      lastFundingIndex: context.fundingIndex,
    };
    applyPositionChange(marketKey, previous, next);
    const saved = ledger.savePosition(marketKey, account, next);

    context.settlements.push(
      marginDelta > 0n
        ? { kind: "BURN", account, amount: marginDelta, credited }
        : { kind: "ISSUE", account, amount: -marginDelta },
    );
    context.events.push(
      { type: "MARGIN_MODIFIED", marketKey, account, marginDelta, creditedDelta: credited },
      {
        type: "POSITION_MODIFIED",
        marketKey,
        id: saved.id,
        account,
        margin: saved.margin,
        size: saved.size,
        tradeSize: 0n,
        price,
        fundingIndex: saved.lastFundingIndex,
        fee: 0n,
      },
    );
    return saved;
  };

  const tradeWithin = (
    context: MutationContext,
    account: string,
    sizeDelta: bigint,
    options: TradeOptions,
  ): Position => {
    const { marketKey, price } = context;
    const previous = ledger.getPosition(marketKey, account);
    const projection = projectTrade(
      marketKey,
      account,
      sizeDelta,
      options.feeRate,
      price,
      false,
      context.now,
    );
    if (projection.status !== "OK") {
      throw createPerpsError(projection.status, marketKey);
    }

    applyPositionChange(marketKey, previous, projection.position);
    const saved = ledger.savePosition(marketKey, account, projection.position);

    if (projection.fee > 0n) {
      context.settlements.push({ kind: "ISSUE", account: feePoolAccount, amount: projection.fee });
    }
    context.events.push({
      type: "POSITION_MODIFIED",
      marketKey,
      id: saved.id,
      account,
      margin: saved.margin,
      size: saved.size,
      tradeSize: sizeDelta,
      price,
      fundingIndex: saved.lastFundingIndex,
      fee: projection.fee,
      ...(options.trackingCode !== undefined && { trackingCode: options.trackingCode }),
    });
    return saved;
  };

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  return {
    listMarkets: () => ledger.listMarkets().map((market) => market.marketKey),

    assetPrice,

    marketSizes: (marketKey) => {
      const { marketSize, marketSkew } = ledger.getMarket(marketKey);
      return { long: (marketSize + marketSkew) / 2n, short: (marketSize - marketSkew) / 2n };
    },

    marketDebt: (marketKey) => {
      const { price, invalid } = assetPrice(marketKey);
      return { value: marketDebtAt(marketKey, price), invalid };
    },

    marketSummary: (marketKey) => {
      const market = ledger.getMarket(marketKey);
      const { skewScaleUSD } = parameters.getMarketParameters(marketKey);
      const { price, invalid } = assetPrice(marketKey);
      const latest = ledger.fundingEntry(marketKey, ledger.latestFundingIndex(marketKey));
      const rate = fundingRateAt(marketKey, price);
      return {
        marketKey,
        baseAsset: market.baseAsset,
        price,
        marketSize: market.marketSize,
        marketSkew: market.marketSkew,
        marketDebt: marketDebtAt(marketKey, price),
        proportionalSkew: proportionalSkew(market.marketSkew, price, skewScaleUSD),
        currentFundingRate: rate,
        unrecordedFunding: unrecordedFunding(rate, price, clock.now() - latest.timestamp),
        fundingLastRecomputed: latest.timestamp,
        fundingSequenceLength: ledger.fundingSequence(marketKey).length,
        priceInvalid: invalid,
      };
    },

    positionSummary: (marketKey, account) => {
      const position = ledger.getPosition(marketKey, account);
      const { price, invalid } = assetPrice(marketKey);
      const globals = parameters.getGlobalParameters();
      const valuation = valuationOf(marketKey, position, price, clock.now());
      return {
        marketKey,
        account,
        position: { ...position },
        notionalValue: notionalValue(position.size, price),
        profitLoss: profitLoss(position, price),
        accruedFunding: accruedFunding(position.size, valuation.fundingPerUnit),
        remainingMargin: remainingMargin(position, valuation),
        rawRemainingMargin: rawRemainingMargin(position, valuation),
        accessibleMargin: accessibleMargin(
          position,
          valuation,
          marginLimits(marketKey, position, price),
        ),
        currentLeverage: currentLeverage(position, valuation),
        liquidationMargin: liquidationMarginOrZero(position.size, price),
        canLiquidate: !invalid && canLiquidate(position, valuation, globals),
        approxLiquidationPrice: approxLiquidationPrice(position, valuation, globals),
        approxLiquidationFee: approxLiquidationFee(position, valuation, globals),
        priceInvalid: invalid,
      };
    },

    postTradeDetails: (marketKey, account, sizeDelta, feeRate) => {
      const { price, invalid } = assetPrice(marketKey);
      return projectTrade(marketKey, account, sizeDelta, feeRate, price, invalid, clock.now());
    },

    orderFee: (marketKey, sizeDelta, feeRate) => {
      const { price, invalid } = assetPrice(marketKey);
      const market = ledger.getMarket(marketKey);
      const rate =
        explicitFeeRate(marketKey, feeRate) ??
        feePolicy({
          sizeDelta,
          marketSkew: market.marketSkew,
          parameters: parameters.getMarketParameters(marketKey),
        });
      return { value: orderFee(sizeDelta, price, rate), invalid };
    },

    accessibleMargin: (marketKey, account) => {
      const { price, invalid } = assetPrice(marketKey);
      const position = ledger.getPosition(marketKey, account);
      return { value: accessibleMarginOf(marketKey, position, price, clock.now()), invalid };
    },

    liquidationMargin: (marketKey, account) => {
      const { size } = ledger.getPosition(marketKey, account);
      const { price } = assetPrice(marketKey);
      return liquidationMargin(size, price, parameters.getGlobalParameters());
    },

    canLiquidate: (marketKey, account) => {
      const { price, invalid } = assetPrice(marketKey);
      if (invalid) {
        return false;
      }
      const position = ledger.getPosition(marketKey, account);
      return canLiquidate(
        position,
        valuationOf(marketKey, position, price, clock.now()),
        parameters.getGlobalParameters(),
      );
    },

    maxOrderSizes: (marketKey) => {
      const { price, invalid } = assetPrice(marketKey);
      if (price <= 0n) {
        return { long: 0n, short: 0n, invalid: true };
      }
      const { marketSize, marketSkew } = ledger.getMarket(marketKey);
      const sizeLimit = divideDecimal(
        parameters.getMarketParameters(marketKey).maxSingleSideValueUSD,
        price,
      );
      const long = (marketSize + marketSkew) / 2n;
      const short = (marketSize - marketSkew) / 2n;
      return { long: max(0n, sizeLimit - long), short: max(0n, sizeLimit - short), invalid };
    },

    currentFundingRate: (marketKey) => fundingRateAt(marketKey, assetPrice(marketKey).price),

    unrecordedFunding: (marketKey) => {
      const { price, invalid } = assetPrice(marketKey);
      const latest = ledger.fundingEntry(marketKey, ledger.latestFundingIndex(marketKey));
      return {
        value: unrecordedFunding(
          fundingRateAt(marketKey, price),
          price,
          clock.now() - latest.timestamp,
        ),
        invalid,
      };
    },

    fundingSequence: (marketKey) => ledger.fundingSequence(marketKey),

    positionIdToAccount: (marketKey, id) => ledger.accountForPositionId(marketKey, id),

    recomputeFunding: (marketKey) =>
      mutate(marketKey, "recomputeFunding", (context) => context.fundingIndex, {
        ignoreSuspension: true,
      }),

    transferMargin: (marketKey, account, marginDelta) =>
      mutate(marketKey, "transferMargin", (context) =>
        transferWithin(context, account, marginDelta),
      ),

    withdrawAllMargin: (marketKey, account) =>
      mutate(marketKey, "withdrawAllMargin", (context) => {
        const position = ledger.getPosition(marketKey, account);
        const accessible = accessibleMarginOf(marketKey, position, context.price, context.now);
        return transferWithin(context, account, -accessible);
      }),

    modifyLockedMargin: (marketKey, account, delta) =>
      mutate(marketKey, "modifyLockedMargin", (context) => {
        const previous = ledger.getPosition(marketKey, account);
        if (delta === 0n) {
          return previous;
        }
        const lockedMargin = previous.lockedMargin + delta;
        if (lockedMargin < 0n) {
          throw createPerpsError("INVALID_PARAMETER", marketKey, "locked margin cannot go negative");
        }
        if (lockedMargin > previous.margin) {
          throw createPerpsError("INSUFFICIENT_MARGIN", marketKey);
        }
        const saved = ledger.savePosition(marketKey, account, { ...previous, lockedMargin });
        context.events.push({
          type: "LOCKED_MARGIN_MODIFIED",
          marketKey,
          account,
          lockedMargin,
          delta,
        });
        return saved;
      }),

    modifyPosition: (marketKey, account, sizeDelta, options = {}) =>
      mutate(marketKey, "modifyPosition", (context) =>
        tradeWithin(context, account, sizeDelta, options),
      ),

    closePosition: (marketKey, account, options = {}) =>
      mutate(marketKey, "closePosition", (context) => {
        const { size } = ledger.getPosition(marketKey, account);
        if (size === 0n) {
          throw createPerpsError("NO_POSITION_OPEN", marketKey);
        }
        return tradeWithin(context, account, -size, options);
      }),

    liquidatePosition: (marketKey, account, liquidator) =>
      mutate(marketKey, "liquidatePosition", (context): LiquidationResult => {
        const { price } = context;
        const previous = ledger.getPosition(marketKey, account);
        if (previous.size === 0n) {
          throw createPerpsError("ZERO_SIZE_POSITION", marketKey, "position cannot be liquidated");
        }
        const globals = parameters.getGlobalParameters();
        const valuation = valuationOf(marketKey, previous, price, context.now);
        if (!canLiquidate(previous, valuation, globals)) {
          throw createPerpsError("POSITION_NOT_LIQUIDATABLE", marketKey);
        }

        const { keeperFee, poolFee } = liquidationPayout(
          remainingMargin(previous, valuation),
          liquidationFee(previous.size, price, globals),
        );
        const next: Position = {
          id: previous.id,
          lastFundingIndex: context.fundingIndex,
          margin: 0n,
          lockedMargin: 0n,
          lastPrice: price,
          size: 0n,
        };
        applyPositionChange(marketKey, previous, next);
        const saved = ledger.savePosition(marketKey, account, next);

        if (keeperFee > 0n) {
          context.settlements.push({ kind: "ISSUE", account: liquidator, amount: keeperFee });
        }
        if (poolFee > 0n) {
          context.settlements.push({ kind: "ISSUE", account: feePoolAccount, amount: poolFee });
        }
        context.events.push(
          {
            type: "POSITION_MODIFIED",
            marketKey,
            id: saved.id,
            account,
            margin: 0n,
            size: 0n,
            tradeSize: -previous.size,
            price,
            fundingIndex: saved.lastFundingIndex,
            fee: 0n,
          },
          {
            type: "POSITION_LIQUIDATED",
            marketKey,
            id: saved.id,
            account,
            liquidator,
            size: previous.size,
            price,
            fee: keeperFee,
            poolFee,
          },
        );
        return { position: saved, price, keeperFee, poolFee };
      }),

    subscribe: bus.subscribe,
  };
};
