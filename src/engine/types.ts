/**
 * Public engine types: events, summaries and the engine API.
 *
 * @see {@link ../../adrs/0001-engine-architecture.md ADR-0001: Engine Architecture}
 */

import type { Clock, PriceOracle, SuspensionOracle, Treasury } from "@/adapters/types";
import type { FundingEntry, Position, PositionLedger } from "@/domains/ledger";
import type { ParameterStore } from "@/domains/parameters";
import type { FeePolicy, TradeProjection } from "@/domains/trade";
import type { Logger } from "@/lib/logger";

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type EngineEvent =
  | {
      type: "FUNDING_RECOMPUTED";
      marketKey: string;
      funding: bigint;
      index: number;
      timestamp: number;
    }
  | {
      type: "MARGIN_MODIFIED";
      marketKey: string;
      account: string;
      /** Requested change; positive for deposits. */
      marginDelta: bigint;
      /** Change applied to margin, after any fee reclamation. */
      creditedDelta: bigint;
    }
  | {
      type: "LOCKED_MARGIN_MODIFIED";
      marketKey: string;
      account: string;
      lockedMargin: bigint;
      delta: bigint;
    }
  | {
      type: "POSITION_MODIFIED";
      marketKey: string;
      id: number;
      account: string;
      margin: bigint;
      size: bigint;
      tradeSize: bigint;
      price: bigint;
      fundingIndex: number;
      fee: bigint;
      trackingCode?: string;
    }
  | {
      type: "POSITION_LIQUIDATED";
      marketKey: string;
      id: number;
      account: string;
      liquidator: string;
      size: bigint;
      price: bigint;
      /** Paid to the liquidator. */
      fee: bigint;
      /** Remaining margin paid to the fee pool. */
      poolFee: bigint;
    };

export type EngineEventType = EngineEvent["type"];

/** Events of one committed mutation, in emission order. */
export interface EventBatch {
  marketKey: string;
  events: EngineEvent[];
}

export type EventListener = (batch: EventBatch) => void;

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export interface AssetPrice {
  price: bigint;
  invalid: boolean;
  roundId: number;
}

export interface MarketSizes {
  long: bigint;
  short: bigint;
}

export interface MaxOrderSizes extends MarketSizes {
  invalid: boolean;
}

export interface MarketSummary {
  marketKey: string;
  baseAsset: string;
  price: bigint;
  marketSize: bigint;
  marketSkew: bigint;
  marketDebt: bigint;
  proportionalSkew: bigint;
  currentFundingRate: bigint;
  unrecordedFunding: bigint;
  fundingLastRecomputed: number;
  fundingSequenceLength: number;
  priceInvalid: boolean;
}

export interface PositionSummary {
  marketKey: string;
  account: string;
  position: Position;
  notionalValue: bigint;
  profitLoss: bigint;
  accruedFunding: bigint;
  remainingMargin: bigint;
  /** Remaining margin before flooring at zero. */
  rawRemainingMargin: bigint;
  accessibleMargin: bigint;
  currentLeverage: bigint;
  /** 0 for empty positions. */
  liquidationMargin: bigint;
  canLiquidate: boolean;
  approxLiquidationPrice: bigint;
  approxLiquidationFee: bigint;
  priceInvalid: boolean;
}

export interface ValueWithValidity {
  value: bigint;
  invalid: boolean;
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

export interface TradeOptions {
  /** Overrides the fee policy for this trade. */
  feeRate?: bigint;
  /** Opaque integrator tag copied onto the emitted event. */
  trackingCode?: string;
}

export interface LiquidationResult {
  position: Position;
  price: bigint;
  keeperFee: bigint;
  poolFee: bigint;
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export interface PerpsEngineDeps {
  ledger: PositionLedger;
  parameters: ParameterStore;
  oracle: PriceOracle;
  treasury: Treasury;
  suspension: SuspensionOracle;
  clock: Clock;
  logger: Logger;
  feePolicy?: FeePolicy;
  /** Account that receives trading fees and leftover liquidation margin. */
  feePoolAccount?: string;
}

export interface PerpsEngine {
  // Reads
  listMarkets: () => string[];
  assetPrice: (marketKey: string) => AssetPrice;
  marketSizes: (marketKey: string) => MarketSizes;
  marketDebt: (marketKey: string) => ValueWithValidity;
  marketSummary: (marketKey: string) => MarketSummary;
  positionSummary: (marketKey: string, account: string) => PositionSummary;
  postTradeDetails: (
    marketKey: string,
    account: string,
    sizeDelta: bigint,
    feeRate?: bigint,
  ) => TradeProjection;
  orderFee: (marketKey: string, sizeDelta: bigint, feeRate?: bigint) => ValueWithValidity;
  accessibleMargin: (marketKey: string, account: string) => ValueWithValidity;
  liquidationMargin: (marketKey: string, account: string) => bigint;
  canLiquidate: (marketKey: string, account: string) => boolean;
  maxOrderSizes: (marketKey: string) => MaxOrderSizes;
  currentFundingRate: (marketKey: string) => bigint;
  unrecordedFunding: (marketKey: string) => ValueWithValidity;
  fundingSequence: (marketKey: string) => readonly FundingEntry[];
  positionIdToAccount: (marketKey: string, id: number) => string | undefined;

  // Writes
  recomputeFunding: (marketKey: string) => number;
  transferMargin: (marketKey: string, account: string, marginDelta: bigint) => Position;
  withdrawAllMargin: (marketKey: string, account: string) => Position;
  modifyLockedMargin: (marketKey: string, account: string, delta: bigint) => Position;
  modifyPosition: (
    marketKey: string,
    account: string,
    sizeDelta: bigint,
    options?: TradeOptions,
  ) => Position;
  closePosition: (marketKey: string, account: string, options?: TradeOptions) => Position;
  liquidatePosition: (marketKey: string, account: string, liquidator: string) => LiquidationResult;

  /** Receives the events of each committed mutation. Returns an unsubscribe function. */
  subscribe: (listener: EventListener) => () => void;
}
