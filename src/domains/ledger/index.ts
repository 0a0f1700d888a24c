// Types
export type {
  FundingEntry,
  MarketRecord,
  MarketScalars,
  MarketState,
  Position,
} from "./types";
export type { PositionLedger } from "./ledger";

// Constants
export { EMPTY_POSITION } from "./types";

// Ledger
export { createPositionLedger } from "./ledger";
