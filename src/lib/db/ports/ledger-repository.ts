import type { TreasuryBalance } from "@/adapters/types";
import type { FundingEntry, MarketRecord, MarketState, Position } from "@/domains/ledger";
import type { EngineEvent } from "@/engine/types";

/**
 * Post-commit state of one market: the aggregates, the positions a batch
 * touched, the funding entries it appended, its events and the settlement
 * balances that changed with it.
 */
export interface MarketChangeSet {
  market: MarketState;
  positions: Array<{ account: string; position: Position }>;
  fundingEntries: Array<{ index: number; entry: FundingEntry }>;
  events: EngineEvent[];
  balances: TreasuryBalance[];
}

export interface LedgerRepository {
  /** Writes a change set in one database transaction. */
  save(changes: MarketChangeSet): Promise<void>;
  /** Upserts settlement balances outside any market change. */
  saveBalances(balances: TreasuryBalance[]): Promise<void>;
  loadMarkets(): Promise<MarketRecord[]>;
  loadBalances(): Promise<TreasuryBalance[]>;
}
