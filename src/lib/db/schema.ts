import {
  bigint,
  index,
  integer,
  jsonb,
  numeric,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

/** Signed 18-decimal fixed-point values stored as raw integers. */
const fixedPoint = (name: string) => numeric(name, { precision: 78, scale: 0 });

export const perpMarkets = pgTable("perp_markets", {
  marketKey: text("market_key").primaryKey(),
  baseAsset: text("base_asset").notNull(),
  marketSize: fixedPoint("market_size").notNull(),
  marketSkew: fixedPoint("market_skew").notNull(),
  entryDebtCorrection: fixedPoint("entry_debt_correction").notNull(),
  lastPositionId: integer("last_position_id").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow(),
});

export const perpPositions = pgTable(
  "perp_positions",
  {
    marketKey: text("market_key").notNull(),
    account: text("account").notNull(),
    id: integer("id").notNull(),
    lastFundingIndex: integer("last_funding_index").notNull(),
    margin: fixedPoint("margin").notNull(),
    lockedMargin: fixedPoint("locked_margin").notNull(),
    lastPrice: fixedPoint("last_price").notNull(),
    size: fixedPoint("size").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.marketKey, table.account] }),
    marketIdIdx: index("idx_perp_positions_market_id").on(table.marketKey, table.id),
  }),
);

export const perpFundingEntries = pgTable(
  "perp_funding_entries",
  {
    marketKey: text("market_key").notNull(),
    index: integer("index").notNull(),
    funding: fixedPoint("funding").notNull(),
    timestamp: bigint("timestamp", { mode: "number" }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.marketKey, table.index] }),
  }),
);

export const perpEvents = pgTable(
  "perp_events",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    marketKey: text("market_key").notNull(),
    type: text("type").notNull(),
    payload: jsonb("payload").$type<Record<string, string | number>>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (table) => ({
    marketCreatedIdx: index("idx_perp_events_market_created").on(table.marketKey, table.createdAt),
  }),
);

export const treasuryBalances = pgTable("treasury_balances", {
  account: text("account").primaryKey(),
  balance: fixedPoint("balance").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow(),
});
