/**
 * Ledger record types.
 *
 * @see {@link ../../../adrs/0002-ledger-transactions.md ADR-0002: Ledger Transactions}
 */

import * as v from "valibot";

export const bigintSchema = v.custom<bigint>((input) => typeof input === "bigint", "Expected bigint");

/**
 * A trader's position in one market.
 *
 * `id` is 0 until the account first touches the market. `size` is signed:
 * positive is long, negative is short.
 */
export interface Position {
  id: number;
  /** Index into the market's funding sequence when the position was last modified. */
  lastFundingIndex: number;
  margin: bigint;
  /** Portion of margin reserved and unavailable for withdrawal. */
  lockedMargin: bigint;
  lastPrice: bigint;
  size: bigint;
}

export const PositionSchema = v.object({
  id: v.pipe(v.number(), v.integer(), v.minValue(0)),
  lastFundingIndex: v.pipe(v.number(), v.integer(), v.minValue(0)),
  margin: bigintSchema,
  lockedMargin: bigintSchema,
  lastPrice: bigintSchema,
  size: bigintSchema,
});

export const EMPTY_POSITION: Readonly<Position> = Object.freeze({
  id: 0,
  lastFundingIndex: 0,
  margin: 0n,
  lockedMargin: 0n,
  lastPrice: 0n,
  size: 0n,
});

export interface FundingEntry {
  /** Cumulative funding per unit of size since market creation. */
  funding: bigint;
  /** Unix seconds. */
  timestamp: number;
}

export const FundingEntrySchema = v.object({
  funding: bigintSchema,
  timestamp: v.pipe(v.number(), v.integer(), v.minValue(0)),
});

/**
 * Aggregate state of one market. Funding lives in a separate sequence.
 */
export interface MarketState {
  marketKey: string;
  baseAsset: string;
  /** Sum of absolute position sizes. */
  marketSize: bigint;
  /** Sum of signed position sizes. */
  marketSkew: bigint;
  /** Accumulated per-position debt terms; see the market debt identity. */
  entryDebtCorrection: bigint;
  lastPositionId: number;
}

export type MarketScalars = Pick<MarketState, "marketSize" | "marketSkew" | "entryDebtCorrection">;

/**
 * Complete persisted form of one market, used to restore a ledger.
 */
export interface MarketRecord {
  market: MarketState;
  fundingSequence: FundingEntry[];
  positions: Array<{ account: string; position: Position }>;
}

export const isPosition = (value: unknown): value is Position => v.is(PositionSchema, value);

export const isFundingEntry = (value: unknown): value is FundingEntry =>
  v.is(FundingEntrySchema, value);
