/**
 * In-process settlement-asset ledger.
 *
 * Tracks balances and total supply. Accounts may carry a pending fee
 * reclamation, which the next burn deducts from the credited amount.
 * Batches settle against a working copy that replaces the live state only
 * once every operation has succeeded.
 */

import { min } from "@/lib/decimal";

import { CollaboratorError } from "../errors";
import type { Treasury, TreasuryBalance, TreasuryOperation } from "../types";

export interface InMemoryTreasuryConfig {
  initialBalances?: Record<string, bigint>;
}

export interface InMemoryTreasury extends Treasury {
  /** Credits `account` with settlement asset deposited from outside. */
  deposit: (account: string, amount: bigint) => void;
  balanceOf: (account: string) => bigint;
  totalSupply: () => bigint;
  /** Registers an amount to be reclaimed on the account's next burn. */
  setReclaim: (account: string, amount: bigint) => void;
  /** Balances changed since the previous call. */
  takeChangedBalances: () => TreasuryBalance[];
  listBalances: () => TreasuryBalance[];
}

interface TreasuryState {
  balances: Map<string, bigint>;
  reclaims: Map<string, bigint>;
  supply: bigint;
}

const COLLABORATOR = "in-memory-treasury";

const assertPositive = (amount: bigint): void => {
  if (amount <= 0n) {
    throw new CollaboratorError(`Amount must be positive, got ${amount}`, "INVALID_AMOUNT", COLLABORATOR);
  }
};

const balanceIn = (state: TreasuryState, account: string): bigint =>
  state.balances.get(account) ?? 0n;

const quoteIn = (state: TreasuryState, account: string, amount: bigint): bigint => {
  assertPositive(amount);
  if (balanceIn(state, account) < amount) {
    throw new CollaboratorError(
      `Balance of ${account} is below ${amount}`,
      "INSUFFICIENT_BALANCE",
      COLLABORATOR,
    );
  }
  return amount - min(state.reclaims.get(account) ?? 0n, amount);
};

const issueIn = (state: TreasuryState, account: string, amount: bigint): void => {
  assertPositive(amount);
  state.balances.set(account, balanceIn(state, account) + amount);
  state.supply += amount;
};

const burnIn = (state: TreasuryState, account: string, amount: bigint, credited: bigint): void => {
  const quoted = quoteIn(state, account, amount);
  if (quoted !== credited) {
    throw new CollaboratorError(
      `Burn of ${amount} from ${account} credits ${quoted}, expected ${credited}`,
      "CREDIT_MISMATCH",
      COLLABORATOR,
    );
  }
  state.balances.set(account, balanceIn(state, account) - amount);
  state.supply -= amount;
  state.reclaims.delete(account);
};

export const createInMemoryTreasury = (config: InMemoryTreasuryConfig = {}): InMemoryTreasury => {
  let state: TreasuryState = { balances: new Map(), reclaims: new Map(), supply: 0n };
  const changed = new Set<string>();

  for (const [account, amount] of Object.entries(config.initialBalances ?? {})) {
    issueIn(state, account, amount);
  }

  return {
    quoteBurn: (account, amount) => quoteIn(state, account, amount),

    settle: (operations: readonly TreasuryOperation[]) => {
      const working: TreasuryState = {
        balances: new Map(state.balances),
        reclaims: new Map(state.reclaims),
        supply: state.supply,
      };
      for (const operation of operations) {
        if (operation.kind === "BURN") {
          burnIn(working, operation.account, operation.amount, operation.credited);
        } else {
          issueIn(working, operation.account, operation.amount);
        }
      }
      state = working;
      for (const operation of operations) {
        changed.add(operation.account);
      }
    },

    deposit: (account, amount) => {
      issueIn(state, account, amount);
      changed.add(account);
    },

    balanceOf: (account) => balanceIn(state, account),

    totalSupply: () => state.supply,

    setReclaim: (account, amount) => {
      if (amount <= 0n) {
        state.reclaims.delete(account);
      } else {
        state.reclaims.set(account, amount);
      }
    },

    takeChangedBalances: () => {
      const balances = [...changed].map((account) => ({
        account,
        balance: balanceIn(state, account),
      }));
      changed.clear();
      return balances;
    },

    listBalances: () =>
      [...state.balances].map(([account, balance]) => ({ account, balance })),
  };
};
