import type { SuspensionOracle } from "../types";

export interface SuspensionStatus {
  suspended: boolean;
  reason?: string;
}

export interface SuspensionRegistry extends SuspensionOracle {
  suspendSystem: (reason: string) => void;
  resumeSystem: () => void;
  suspendMarket: (marketKey: string, reason: string) => void;
  resumeMarket: (marketKey: string) => void;
  systemStatus: () => SuspensionStatus;
  marketStatus: (marketKey: string) => SuspensionStatus;
}

/**
 * Operator-controlled circuit breakers for the whole system and for single
 * markets.
 */
export const createSuspensionRegistry = (): SuspensionRegistry => {
  let systemReason: string | undefined;
  const marketReasons = new Map<string, string>();

  return {
    systemSuspended: () => systemReason !== undefined,
    marketSuspended: (marketKey) => marketReasons.has(marketKey),

    suspendSystem: (reason) => {
      systemReason = reason;
    },
    resumeSystem: () => {
      systemReason = undefined;
    },
    suspendMarket: (marketKey, reason) => {
      marketReasons.set(marketKey, reason);
    },
    resumeMarket: (marketKey) => {
      marketReasons.delete(marketKey);
    },

    systemStatus: () =>
      systemReason === undefined ? { suspended: false } : { suspended: true, reason: systemReason },
    marketStatus: (marketKey) => {
      const reason = marketReasons.get(marketKey);
      return reason === undefined ? { suspended: false } : { suspended: true, reason };
    },
  };
};
