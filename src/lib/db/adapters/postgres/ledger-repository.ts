import { asc } from "drizzle-orm";

import type { TreasuryBalance } from "@/adapters/types";
import type { MarketRecord, MarketState, Position } from "@/domains/ledger";
import type { EngineEvent } from "@/engine/types";

import type { Database } from "../../client";
import type { LedgerRepository } from "../../ports/ledger-repository";
import {
  perpEvents,
  perpFundingEntries,
  perpMarkets,
  perpPositions,
  treasuryBalances,
} from "../../schema";

const toBigint = (column: string, value: string): bigint => {
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`Invalid fixed-point value in ${column}: ${value}`);
  }
  return BigInt(value);
};

export const serializeEvent = (event: EngineEvent): Record<string, string | number> => {
  const payload: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(event)) {
    if (typeof value === "bigint") {
      payload[key] = value.toString();
    } else if (typeof value === "string" || typeof value === "number") {
      payload[key] = value;
    }
  }
  return payload;
};

const mapMarketToDb = (market: MarketState): typeof perpMarkets.$inferInsert => ({
  marketKey: market.marketKey,
  baseAsset: market.baseAsset,
  marketSize: market.marketSize.toString(),
  marketSkew: market.marketSkew.toString(),
  entryDebtCorrection: market.entryDebtCorrection.toString(),
  lastPositionId: market.lastPositionId,
});

const mapMarketToDomain = (row: typeof perpMarkets.$inferSelect): MarketState => ({
  marketKey: row.marketKey,
  baseAsset: row.baseAsset,
  marketSize: toBigint("market_size", row.marketSize),
  marketSkew: toBigint("market_skew", row.marketSkew),
  entryDebtCorrection: toBigint("entry_debt_correction", row.entryDebtCorrection),
  lastPositionId: row.lastPositionId,
});

const mapPositionToDb = (
  marketKey: string,
  account: string,
  position: Position,
): typeof perpPositions.$inferInsert => ({
  marketKey,
  account,
  id: position.id,
  lastFundingIndex: position.lastFundingIndex,
  margin: position.margin.toString(),
  lockedMargin: position.lockedMargin.toString(),
  lastPrice: position.lastPrice.toString(),
  size: position.size.toString(),
});

const mapPositionToDomain = (row: typeof perpPositions.$inferSelect): Position => ({
  id: row.id,
  lastFundingIndex: row.lastFundingIndex,
  margin: toBigint("margin", row.margin),
  lockedMargin: toBigint("locked_margin", row.lockedMargin),
  lastPrice: toBigint("last_price", row.lastPrice),
  size: toBigint("size", row.size),
});

type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

const upsertBalances = async (tx: Transaction, balances: TreasuryBalance[]): Promise<void> => {
  for (const { account, balance } of balances) {
    const row = { account, balance: balance.toString() };
    await tx
      .insert(treasuryBalances)
      .values(row)
      .onConflictDoUpdate({
        target: treasuryBalances.account,
        set: { ...row, updatedAt: new Date() },
      });
  }
};

export const createPostgresLedgerRepository = (db: Database): LedgerRepository => ({
  save: async (changes) => {
    const { marketKey } = changes.market;
    await db.transaction(async (tx) => {
      const market = mapMarketToDb(changes.market);
      await tx
        .insert(perpMarkets)
        .values(market)
        .onConflictDoUpdate({
          target: perpMarkets.marketKey,
          set: { ...market, updatedAt: new Date() },
        });

      for (const { account, position } of changes.positions) {
        const row = mapPositionToDb(marketKey, account, position);
        await tx
          .insert(perpPositions)
          .values(row)
          .onConflictDoUpdate({
            target: [perpPositions.marketKey, perpPositions.account],
            set: { ...row, updatedAt: new Date() },
          });
      }

      if (changes.fundingEntries.length > 0) {
        await tx
          .insert(perpFundingEntries)
          .values(
            changes.fundingEntries.map(({ index, entry }) => ({
              marketKey,
              index,
              funding: entry.funding.toString(),
              timestamp: entry.timestamp,
            })),
          )
          .onConflictDoNothing();
      }

      if (changes.events.length > 0) {
        await tx.insert(perpEvents).values(
          changes.events.map((event) => ({
            marketKey,
            type: event.type,
            payload: serializeEvent(event),
          })),
        );
      }

      await upsertBalances(tx, changes.balances);
    });
  },

  saveBalances: async (balances) => {
    if (balances.length === 0) {
      return;
    }
    await db.transaction(async (tx) => {
      await upsertBalances(tx, balances);
    });
  },

  loadMarkets: async () => {
    const markets = await db.select().from(perpMarkets).orderBy(asc(perpMarkets.marketKey));
    const positions = await db.select().from(perpPositions);
    const funding = await db
      .select()
      .from(perpFundingEntries)
      .orderBy(asc(perpFundingEntries.marketKey), asc(perpFundingEntries.index));

    return markets.map((row): MarketRecord => {
      const fundingSequence = funding
        .filter((entry) => entry.marketKey === row.marketKey)
        .map((entry, position) => {
          if (entry.index !== position) {
            throw new Error(`Gap in funding sequence of ${row.marketKey} at index ${position}`);
          }
          return { funding: toBigint("funding", entry.funding), timestamp: entry.timestamp };
        });
      return {
        market: mapMarketToDomain(row),
        fundingSequence,
        positions: positions
          .filter((position) => position.marketKey === row.marketKey)
          .map((position) => ({
            account: position.account,
            position: mapPositionToDomain(position),
          })),
      };
    });
  },

  loadBalances: async () => {
    const rows = await db.select().from(treasuryBalances).orderBy(asc(treasuryBalances.account));
    return rows.map((row) => ({ account: row.account, balance: toBigint("balance", row.balance) }));
  },
});
