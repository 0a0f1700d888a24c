// Types
export type { Database, DatabaseInstance } from "./client";
export type { LedgerRepository, MarketChangeSet } from "./ports/ledger-repository";

// Client
export { createDatabase } from "./client";

// Adapters
export { createPostgresLedgerRepository, serializeEvent } from "./adapters/postgres/ledger-repository";
