/**
 * Price oracle fed by pushes from an external feed.
 *
 * A reading turns invalid when it is older than `staleAfterSeconds`, when the
 * feed flags it, or when no price was ever published. With a
 * `deviationFactor`, a price that has moved by that factor or more from the
 * last accepted price is invalid too, until a mutation accepts a price again.
 */

import { divideDecimal, max, min } from "@/lib/decimal";

import type { Clock, PriceOracle, PriceReading } from "../types";

export interface PushPriceOracleConfig {
  clock: Clock;
  staleAfterSeconds: number;
  /** Ratio between a new and the last accepted price at which the new one is invalid. */
  deviationFactor?: bigint;
}

export interface PriceUpdate {
  price: bigint;
  /** Set by feeds that detect a broken source, such as a circuit breaker. */
  invalid?: boolean;
}

export interface PushPriceOracle extends PriceOracle {
  setPrice: (asset: string, update: PriceUpdate | bigint) => PriceReading;
  /** Unix seconds of the last update, if any. */
  lastUpdatedAt: (asset: string) => number | undefined;
  lastAcceptedPrice: (asset: string) => bigint | undefined;
}

interface StoredPrice {
  price: bigint;
  flaggedInvalid: boolean;
  roundId: number;
  updatedAt: number;
}

export const createPushPriceOracle = (config: PushPriceOracleConfig): PushPriceOracle => {
  const prices = new Map<string, StoredPrice>();
  const accepted = new Map<string, bigint>();

  const deviates = (asset: string, price: bigint): boolean => {
    const last = accepted.get(asset);
    if (config.deviationFactor === undefined || last === undefined) {
      return false;
    }
    return divideDecimal(max(price, last), min(price, last)) >= config.deviationFactor;
  };

  const read = (asset: string, stored: StoredPrice): PriceReading => {
    const age = config.clock.now() - stored.updatedAt;
    return {
      price: stored.price,
      invalid:
        stored.flaggedInvalid ||
        stored.price <= 0n ||
        age > config.staleAfterSeconds ||
        deviates(asset, stored.price),
      roundId: stored.roundId,
    };
  };

  return {
    currentPrice: (asset) => {
      const stored = prices.get(asset);
      if (!stored) {
        return { price: 0n, invalid: true, roundId: 0 };
      }
      return read(asset, stored);
    },

    acceptPrice: (asset, price) => {
      accepted.set(asset, price);
    },

    setPrice: (asset, update) => {
      const normalized: PriceUpdate = typeof update === "bigint" ? { price: update } : update;
      const { price, invalid = false } = normalized;
      const previous = prices.get(asset);
      const stored: StoredPrice = {
        price,
        flaggedInvalid: invalid,
        roundId: (previous?.roundId ?? 0) + 1,
        updatedAt: config.clock.now(),
      };
      prices.set(asset, stored);
      // The first usable price becomes the reference
      if (!accepted.has(asset) && price > 0n && !invalid) {
        accepted.set(asset, price);
      }
      return read(asset, stored);
    },

    lastUpdatedAt: (asset) => prices.get(asset)?.updatedAt,

    lastAcceptedPrice: (asset) => accepted.get(asset),
  };
};
