import { createPerpsError } from "../errors";

import {
  EMPTY_POSITION,
  type FundingEntry,
  type MarketRecord,
  type MarketScalars,
  type MarketState,
  type Position,
  isFundingEntry,
  isPosition,
} from "./types";

/**
 * Owns every market's positions, aggregates and funding sequence.
 *
 * Writes are only accepted inside {@link PositionLedger.transact}. Each write
 * records an undo step, so a transaction that throws leaves the market exactly
 * as it found it. `transact` is synchronous; the work function must not
 * return a promise.
 */
export interface PositionLedger {
  hasMarket: (marketKey: string) => boolean;
  createMarket: (marketKey: string, baseAsset: string, timestamp: number) => Readonly<MarketState>;
  restoreMarket: (record: MarketRecord) => void;
  listMarkets: () => Array<Readonly<MarketState>>;
  getMarket: (marketKey: string) => Readonly<MarketState>;
  /** Returns an empty position for accounts that never touched the market. */
  getPosition: (marketKey: string, account: string) => Readonly<Position>;
  listPositions: (marketKey: string) => Array<{ account: string; position: Readonly<Position> }>;
  accountForPositionId: (marketKey: string, id: number) => string | undefined;
  fundingSequence: (marketKey: string) => readonly FundingEntry[];
  fundingEntry: (marketKey: string, index: number) => FundingEntry;
  latestFundingIndex: (marketKey: string) => number;

  appendFundingEntry: (marketKey: string, entry: FundingEntry) => number;
  updateMarket: (marketKey: string, scalars: Partial<MarketScalars>) => void;
  /** Stores a position, assigning the next id on first touch. */
  savePosition: (marketKey: string, account: string, position: Position) => Readonly<Position>;

  transact: <T>(marketKey: string, work: () => T) => T;
  inTransaction: (marketKey: string) => boolean;
}

interface MarketBook {
  state: MarketState;
  funding: FundingEntry[];
  positions: Map<string, Position>;
  accountsById: Map<number, string>;
  journal: Array<() => void> | null;
}

const assertPositionInvariants = (marketKey: string, account: string, position: Position): void => {
  if (position.margin < 0n) {
    throw new Error(`Negative margin for ${account} in ${marketKey}`);
  }
  if (position.lockedMargin < 0n || position.lockedMargin > position.margin) {
    throw new Error(`Locked margin out of range for ${account} in ${marketKey}`);
  }
};

export const createPositionLedger = (): PositionLedger => {
  const books = new Map<string, MarketBook>();

  const getBook = (marketKey: string): MarketBook => {
    const book = books.get(marketKey);
    if (!book) {
      throw createPerpsError("MARKET_NOT_FOUND", marketKey);
    }
    return book;
  };

  const openJournal = (marketKey: string): Array<() => void> => {
    const { journal } = getBook(marketKey);
    if (!journal) {
      throw new Error(`Ledger write to ${marketKey} outside a transaction`);
    }
    return journal;
  };

  const fundingEntry = (marketKey: string, index: number): FundingEntry => {
    const entry = getBook(marketKey).funding[index];
    if (!entry) {
      throw new Error(`Funding index ${index} out of range for ${marketKey}`);
    }
    return entry;
  };

  return {
    hasMarket: (marketKey) => books.has(marketKey),

    createMarket: (marketKey, baseAsset, timestamp) => {
      if (books.has(marketKey)) {
        throw createPerpsError("MARKET_EXISTS", marketKey);
      }
      const state: MarketState = {
        marketKey,
        baseAsset,
        marketSize: 0n,
        marketSkew: 0n,
        entryDebtCorrection: 0n,
        lastPositionId: 0,
      };
      books.set(marketKey, {
        state,
        funding: [{ funding: 0n, timestamp }],
        positions: new Map(),
        accountsById: new Map(),
        journal: null,
      });
      return state;
    },

    restoreMarket: (record) => {
      const { marketKey } = record.market;
      if (books.has(marketKey)) {
        throw createPerpsError("MARKET_EXISTS", marketKey);
      }
      if (record.fundingSequence.length === 0 || !record.fundingSequence.every(isFundingEntry)) {
        throw new Error(`Invalid funding sequence for ${marketKey}`);
      }
      const positions = new Map<string, Position>();
      const accountsById = new Map<number, string>();
      for (const { account, position } of record.positions) {
        if (!isPosition(position)) {
          throw new Error(`Invalid position for ${account} in ${marketKey}`);
        }
        assertPositionInvariants(marketKey, account, position);
        positions.set(account, { ...position });
        if (position.id > 0) {
          accountsById.set(position.id, account);
        }
      }
      books.set(marketKey, {
        state: { ...record.market },
        funding: record.fundingSequence.map((entry) => ({ ...entry })),
        positions,
        accountsById,
        journal: null,
      });
    },

    listMarkets: () => [...books.values()].map((book) => book.state),

    getMarket: (marketKey) => getBook(marketKey).state,

    getPosition: (marketKey, account) => getBook(marketKey).positions.get(account) ?? EMPTY_POSITION,

    listPositions: (marketKey) =>
      [...getBook(marketKey).positions.entries()].map(([account, position]) => ({
        account,
        position,
      })),

    accountForPositionId: (marketKey, id) => getBook(marketKey).accountsById.get(id),

    fundingSequence: (marketKey) => getBook(marketKey).funding,

    fundingEntry,

    latestFundingIndex: (marketKey) => getBook(marketKey).funding.length - 1,

    appendFundingEntry: (marketKey, entry) => {
      const journal = openJournal(marketKey);
      const { funding } = getBook(marketKey);
      const last = fundingEntry(marketKey, funding.length - 1);
      if (entry.timestamp < last.timestamp) {
        throw new Error(`Funding timestamp moved backwards in ${marketKey}`);
      }
      funding.push({ ...entry });
      journal.push(() => {
        funding.pop();
      });
      return funding.length - 1;
    },

    updateMarket: (marketKey, scalars) => {
      const journal = openJournal(marketKey);
      const { state } = getBook(marketKey);
      const previous: MarketScalars = {
        marketSize: state.marketSize,
        marketSkew: state.marketSkew,
        entryDebtCorrection: state.entryDebtCorrection,
      };
      Object.assign(state, scalars);
      journal.push(() => {
        Object.assign(state, previous);
      });
    },

    savePosition: (marketKey, account, position) => {
      const journal = openJournal(marketKey);
      const book = getBook(marketKey);
      assertPositionInvariants(marketKey, account, position);

      const previous = book.positions.get(account);
      const stored: Position = { ...position };

      if (stored.id === 0) {
        const previousLastId = book.state.lastPositionId;
        stored.id = previousLastId + 1;
        book.state.lastPositionId = stored.id;
        book.accountsById.set(stored.id, account);
        journal.push(() => {
          book.state.lastPositionId = previousLastId;
          book.accountsById.delete(stored.id);
        });
      }

      book.positions.set(account, stored);
      journal.push(() => {
        if (previous) {
          book.positions.set(account, previous);
        } else {
          book.positions.delete(account);
        }
      });
      return stored;
    },

    transact: (marketKey, work) => {
      const book = getBook(marketKey);
      if (book.journal) {
        throw createPerpsError("REENTRANT_MUTATION", marketKey);
      }
      const journal: Array<() => void> = [];
      book.journal = journal;
      try {
        const result = work();
        book.journal = null;
        return result;
      } catch (error) {
        book.journal = null;
        for (const undo of journal.reverse()) {
          undo();
        }
        throw error;
      }
    },

    inTransaction: (marketKey) => getBook(marketKey).journal !== null,
  };
};
