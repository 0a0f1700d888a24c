/**
 * Collaborator interfaces the engine depends on.
 *
 * The engine never reaches an oracle, token ledger or admin switch directly;
 * hosts supply implementations of these interfaces. In-process versions live
 * beside this file.
 *
 * @see {@link ../../adrs/0001-engine-architecture.md ADR-0001: Engine Architecture}
 */

export interface PriceReading {
  price: bigint;
  /** Stale, circuit-broken, too far from the last accepted price, or never published. */
  invalid: boolean;
  roundId: number;
}

export interface PriceOracle {
  currentPrice: (asset: string) => PriceReading;
  /** Records the price a committed mutation used. */
  acceptPrice: (asset: string, price: bigint) => void;
}

export type TreasuryOperation =
  | {
      kind: "BURN";
      account: string;
      amount: bigint;
      /** Credit returned by `quoteBurn`; the burn fails if it would credit anything else. */
      credited: bigint;
    }
  | { kind: "ISSUE"; account: string; amount: bigint };

/**
 * Settlement-asset ledger. Burning moves a trader's balance into margin;
 * issuing pays margin, fees and keeper rewards back out.
 */
export interface Treasury {
  /**
   * Amount that burning `amount` from `account` would credit, net of any fee
   * reclamation. Throws when the account cannot cover `amount`.
   */
  quoteBurn: (account: string, amount: bigint) => bigint;
  /** Applies every operation in order, or none of them when any fails. */
  settle: (operations: readonly TreasuryOperation[]) => void;
}

export interface TreasuryBalance {
  account: string;
  balance: bigint;
}

export interface SuspensionOracle {
  systemSuspended: () => boolean;
  marketSuspended: (marketKey: string) => boolean;
}

/** Unix time in whole seconds. */
export interface Clock {
  now: () => number;
}
