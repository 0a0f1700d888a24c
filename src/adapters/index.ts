// Types
export type {
  Clock,
  PriceOracle,
  PriceReading,
  SuspensionOracle,
  Treasury,
  TreasuryBalance,
  TreasuryOperation,
} from "./types";
export type { ManualClock } from "./clock";
export type { PushPriceOracle, PushPriceOracleConfig, PriceUpdate } from "./oracle/push-oracle";
export type { InMemoryTreasury, InMemoryTreasuryConfig } from "./treasury/in-memory-treasury";
export type { SuspensionRegistry, SuspensionStatus } from "./suspension/suspension-registry";

// Errors
export { CollaboratorError, type CollaboratorErrorCode } from "./errors";

// Implementations
export { createManualClock, systemClock } from "./clock";
export { createPushPriceOracle } from "./oracle/push-oracle";
export { createInMemoryTreasury } from "./treasury/in-memory-treasury";
export { createSuspensionRegistry } from "./suspension/suspension-registry";
