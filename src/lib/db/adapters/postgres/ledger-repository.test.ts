import { describe, expect, it, vi } from "vitest";

import { toUnit } from "@/lib/decimal";

import type { Database } from "../../client";
import {
  perpEvents,
  perpFundingEntries,
  perpMarkets,
  perpPositions,
  treasuryBalances,
} from "../../schema";

import { createPostgresLedgerRepository, serializeEvent } from "./ledger-repository";

const marketRow = {
  marketKey: "sETH",
  baseAsset: "ETH",
  marketSize: toUnit(50).toString(),
  marketSkew: toUnit(50).toString(),
  entryDebtCorrection: (-toUnit(4015)).toString(),
  lastPositionId: 1,
  updatedAt: new Date(),
};

const positionRow = {
  marketKey: "sETH",
  account: "alice",
  id: 1,
  lastFundingIndex: 2,
  margin: toUnit(985).toString(),
  lockedMargin: "0",
  lastPrice: toUnit(100).toString(),
  size: toUnit(50).toString(),
  updatedAt: new Date(),
};

const fundingRows = [
  { marketKey: "sETH", index: 0, funding: "0", timestamp: 100 },
  { marketKey: "sETH", index: 1, funding: "0", timestamp: 160 },
  { marketKey: "sETH", index: 2, funding: (-toUnit("0.5")).toString(), timestamp: 220 },
];

const createSelectDb = (rows: Map<unknown, unknown[]>): Database =>
  ({
    select: () => ({
      from: (table: unknown) => {
        const result = rows.get(table) ?? [];
        return Object.assign(Promise.resolve(result), {
          orderBy: () => Promise.resolve(result),
        });
      },
    }),
  }) as unknown as Database;

describe("createPostgresLedgerRepository", () => {
  describe("loadMarkets", () => {
    it("maps rows back into market records", async () => {
      const db = createSelectDb(
        new Map<unknown, unknown[]>([
          [perpMarkets, [marketRow]],
          [perpPositions, [positionRow]],
          [perpFundingEntries, fundingRows],
        ]),
      );

      const [record] = await createPostgresLedgerRepository(db).loadMarkets();

      expect(record).toEqual({
        market: {
          marketKey: "sETH",
          baseAsset: "ETH",
          marketSize: toUnit(50),
          marketSkew: toUnit(50),
          entryDebtCorrection: -toUnit(4015),
          lastPositionId: 1,
        },
        fundingSequence: [
          { funding: 0n, timestamp: 100 },
          { funding: 0n, timestamp: 160 },
          { funding: -toUnit("0.5"), timestamp: 220 },
        ],
        positions: [
          {
            account: "alice",
            position: {
              id: 1,
              lastFundingIndex: 2,
              margin: toUnit(985),
              lockedMargin: 0n,
              lastPrice: toUnit(100),
              size: toUnit(50),
            },
          },
        ],
      });
    });

    it("rejects a funding sequence with gaps", async () => {
      const db = createSelectDb(
        new Map<unknown, unknown[]>([
          [perpMarkets, [marketRow]],
          [perpFundingEntries, [fundingRows[0], fundingRows[2]]],
        ]),
      );

      await expect(createPostgresLedgerRepository(db).loadMarkets()).rejects.toThrow(
        "Gap in funding sequence of sETH at index 1",
      );
    });

    it("rejects non-integer numeric values", async () => {
      const db = createSelectDb(
        new Map<unknown, unknown[]>([[perpMarkets, [{ ...marketRow, marketSkew: "1.5" }]]]),
      );

      await expect(createPostgresLedgerRepository(db).loadMarkets()).rejects.toThrow(
        "Invalid fixed-point value in market_skew: 1.5",
      );
    });
  });

  describe("save", () => {
    it("writes every part of the change set inside one transaction", async () => {
      const inserted: Array<{ table: unknown; values: unknown }> = [];
      const tx = {
        insert: (table: unknown) => ({
          values: (values: unknown) => {
            inserted.push({ table, values });
            return Object.assign(Promise.resolve(), {
              onConflictDoUpdate: vi.fn(async () => undefined),
              onConflictDoNothing: vi.fn(async () => undefined),
            });
          },
        }),
      };
      const transaction = vi.fn(async (work: (client: typeof tx) => Promise<void>) => work(tx));
      const db = { transaction } as unknown as Database;

      await createPostgresLedgerRepository(db).save({
        market: {
          marketKey: "sETH",
          baseAsset: "ETH",
          marketSize: toUnit(50),
          marketSkew: toUnit(50),
          entryDebtCorrection: -toUnit(4015),
          lastPositionId: 1,
        },
        positions: [
          {
            account: "alice",
            position: {
              id: 1,
              lastFundingIndex: 2,
              margin: toUnit(985),
              lockedMargin: 0n,
              lastPrice: toUnit(100),
              size: toUnit(50),
            },
          },
        ],
        fundingEntries: [{ index: 2, entry: { funding: 0n, timestamp: 220 } }],
        events: [
          { type: "FUNDING_RECOMPUTED", marketKey: "sETH", funding: 0n, index: 2, timestamp: 220 },
        ],
        balances: [{ account: "fee-pool", balance: toUnit(15) }],
      });

      expect(transaction).toHaveBeenCalledTimes(1);
      expect(inserted.map(({ table }) => table)).toEqual([
        perpMarkets,
        perpPositions,
        perpFundingEntries,
        perpEvents,
        treasuryBalances,
      ]);
      expect(inserted[1]?.values).toEqual({
        marketKey: "sETH",
        account: "alice",
        id: 1,
        lastFundingIndex: 2,
        margin: "985000000000000000000",
        lockedMargin: "0",
        lastPrice: "100000000000000000000",
        size: "50000000000000000000",
      });
      expect(inserted[3]?.values).toEqual([
        {
          marketKey: "sETH",
          type: "FUNDING_RECOMPUTED",
          payload: {
            type: "FUNDING_RECOMPUTED",
            marketKey: "sETH",
            funding: "0",
            index: 2,
            timestamp: 220,
          },
        },
      ]);
      expect(inserted[4]?.values).toEqual({ account: "fee-pool", balance: "15000000000000000000" });
    });
  });

  describe("balances", () => {
    it("loads balances as fixed-point values", async () => {
      const db = createSelectDb(
        new Map<unknown, unknown[]>([
          [treasuryBalances, [{ account: "alice", balance: toUnit(250).toString(), updatedAt: new Date() }]],
        ]),
      );

      await expect(createPostgresLedgerRepository(db).loadBalances()).resolves.toEqual([
        { account: "alice", balance: toUnit(250) },
      ]);
    });

    it("skips the transaction when there is nothing to write", async () => {
      const transaction = vi.fn();
      const db = { transaction } as unknown as Database;

      await createPostgresLedgerRepository(db).saveBalances([]);

      expect(transaction).not.toHaveBeenCalled();
    });
  });

  describe("serializeEvent", () => {
    it("renders bigints as strings and drops absent fields", () => {
      expect(
        serializeEvent({
          type: "POSITION_MODIFIED",
          marketKey: "sETH",
          id: 1,
          account: "alice",
          margin: toUnit(985),
          size: toUnit(50),
          tradeSize: toUnit(50),
          price: toUnit(100),
          fundingIndex: 2,
          fee: toUnit(15),
        }),
      ).toEqual({
        type: "POSITION_MODIFIED",
        marketKey: "sETH",
        id: 1,
        account: "alice",
        margin: "985000000000000000000",
        size: "50000000000000000000",
        tradeSize: "50000000000000000000",
        price: "100000000000000000000",
        fundingIndex: 2,
        fee: "15000000000000000000",
      });
    });
  });
});
