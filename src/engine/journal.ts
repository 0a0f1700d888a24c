/**
 * Persists committed engine state through a {@link LedgerRepository}.
 *
 * The journal listens to committed event batches, captures the touched part
 * of the ledger synchronously (the listener runs right after commit, before
 * any other mutation) and writes it on a serial queue so batches reach the
 * database in commit order.
 *
 * A failed write leaves the market behind the ledger. Until a later write
 * succeeds, every write for that market carries the market's full state and
 * the events of the failed batches instead of a delta.
 *
 * @see {@link ../../adrs/0002-ledger-transactions.md ADR-0002: Ledger Transactions}
 */

import type { InMemoryTreasury, TreasuryBalance } from "@/adapters";
import type { PositionLedger } from "@/domains/ledger";
import type { LedgerRepository, MarketChangeSet } from "@/lib/db";
import type { LogContext, Logger } from "@/lib/logger";
import { createSerialQueue } from "@/lib/queue";

import type { EngineEvent, EventBatch, PerpsEngine } from "./types";

export interface JournalMetrics {
  persisted: number;
  failed: number;
  pending: number;
}

export interface LedgerJournal {
  /** Writes a market's full state, such as right after it was added. */
  persistMarket: (marketKey: string) => Promise<void>;
  /** Writes settlement balances changed outside any market mutation. */
  persistBalances: () => Promise<void>;
  /** Resolves once every captured batch has been written or has failed. */
  flush: () => Promise<void>;
  getMetrics: () => JournalMetrics;
  stop: () => void;
}

export interface LedgerJournalDeps {
  engine: Pick<PerpsEngine, "subscribe">;
  ledger: PositionLedger;
  repository: LedgerRepository;
  /** Source of settlement balances; without one no balances are written. */
  treasury?: Pick<InMemoryTreasury, "takeChangedBalances" | "listBalances">;
  logger: Logger;
}

const touchedAccounts = (events: EngineEvent[]): string[] => {
  const accounts = new Set<string>();
  for (const event of events) {
    if (event.type !== "FUNDING_RECOMPUTED") {
      accounts.add(event.account);
    }
  }
  return [...accounts];
};

export const createLedgerJournal = (deps: LedgerJournalDeps): LedgerJournal => {
  const { ledger, repository, treasury } = deps;
  const logger = deps.logger.child({ component: "ledger-journal" });
  const queue = createSerialQueue();
  const inflight = new Set<Promise<void>>();
  // Events of failed writes, keyed by the market that fell behind
  const recovering = new Map<string, EngineEvent[]>();
  let balancesBehind = false;
  let persisted = 0;
  let failed = 0;

  const changedBalances = (): TreasuryBalance[] => treasury?.takeChangedBalances() ?? [];

  const fullState = (marketKey: string, events: EngineEvent[]): MarketChangeSet => ({
    market: { ...ledger.getMarket(marketKey) },
    positions: ledger.listPositions(marketKey).map(({ account, position }) => ({
      account,
      position: { ...position },
    })),
    fundingEntries: ledger
      .fundingSequence(marketKey)
      .map((entry, index) => ({ index, entry: { ...entry } })),
    events,
    balances: [],
  });

  const write = async (captured: MarketChangeSet): Promise<void> => {
    const { marketKey } = captured.market;
    const missed = recovering.get(marketKey);
    const changes = missed ? fullState(marketKey, [...missed, ...captured.events]) : captured;
    const balances = balancesBehind ? (treasury?.listBalances() ?? []) : captured.balances;
    try {
      await repository.save({ ...changes, balances });
    } catch (error) {
      recovering.set(marketKey, changes.events);
      balancesBehind = treasury !== undefined;
      throw error;
    }
    recovering.delete(marketKey);
    balancesBehind = false;
  };

  const writeBalances = async (captured: TreasuryBalance[]): Promise<void> => {
    const balances = balancesBehind ? (treasury?.listBalances() ?? []) : captured;
    try {
      await repository.saveBalances(balances);
    } catch (error) {
      balancesBehind = treasury !== undefined;
      throw error;
    }
    balancesBehind = false;
  };

  const track = (job: Promise<void>, context: LogContext): Promise<void> => {
    const done: Promise<void> = job.then(
      () => {
        persisted += 1;
        inflight.delete(done);
      },
      (error: unknown) => {
        failed += 1;
        inflight.delete(done);
        logger.error(
          "Failed to persist ledger changes",
          error instanceof Error ? error : new Error(String(error)),
          context,
        );
      },
    );
    inflight.add(done);
    return done;
  };

  const persist = (changes: MarketChangeSet): Promise<void> =>
    track(queue.enqueue(() => write(changes)), {
      marketKey: changes.market.marketKey,
      events: changes.events.length,
    });

  const capture = (batch: EventBatch): MarketChangeSet => {
    const { marketKey, events } = batch;
    return {
      market: { ...ledger.getMarket(marketKey) },
      positions: touchedAccounts(events).map((account) => ({
        account,
        position: { ...ledger.getPosition(marketKey, account) },
      })),
      fundingEntries: events.flatMap((event) =>
        event.type === "FUNDING_RECOMPUTED"
          ? [{ index: event.index, entry: { funding: event.funding, timestamp: event.timestamp } }]
          : [],
      ),
      events,
      balances: changedBalances(),
    };
  };

  const unsubscribe = deps.engine.subscribe((batch) => {
    void persist(capture(batch));
  });

  return {
    persistMarket: (marketKey) =>
      persist({ ...fullState(marketKey, []), balances: changedBalances() }),

    persistBalances: () => {
      const balances = changedBalances();
      return track(queue.enqueue(() => writeBalances(balances)), { balances: balances.length });
    },

    flush: async () => {
      await Promise.all([...inflight]);
    },

    getMetrics: () => ({ persisted, failed, pending: inflight.size }),

    stop: unsubscribe,
  };
};

/**
 * Loads every persisted market into an empty ledger. Returns the market keys
 * restored.
 */
export const restoreLedger = async (
  repository: LedgerRepository,
  ledger: PositionLedger,
): Promise<string[]> => {
  const records = await repository.loadMarkets();
  for (const record of records) {
    ledger.restoreMarket(record);
  }
  return records.map((record) => record.market.marketKey);
};
