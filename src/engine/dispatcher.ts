/**
 * Serializes asynchronous callers onto the synchronous engine.
 *
 * Each market gets its own concurrency-1 queue, so commands for one market
 * run in arrival order while different markets proceed independently.
 * Failures come back as results instead of rejections.
 *
 * @see {@link ../../adrs/0001-engine-architecture.md ADR-0001: Engine Architecture}
 */

import { type PerpsError, isPerpsError } from "@/domains/errors";
import type { Position } from "@/domains/ledger";
import type { Logger } from "@/lib/logger";
import { type SerialQueue, createSerialQueue } from "@/lib/queue";

import type { LiquidationResult, PerpsEngine, TradeOptions } from "./types";

export type EngineCommand =
  | { type: "TRANSFER_MARGIN"; marketKey: string; account: string; marginDelta: bigint }
  | { type: "WITHDRAW_ALL_MARGIN"; marketKey: string; account: string }
  | { type: "MODIFY_LOCKED_MARGIN"; marketKey: string; account: string; delta: bigint }
  | {
      type: "MODIFY_POSITION";
      marketKey: string;
      account: string;
      sizeDelta: bigint;
      options?: TradeOptions;
    }
  | { type: "CLOSE_POSITION"; marketKey: string; account: string; options?: TradeOptions }
  | { type: "LIQUIDATE_POSITION"; marketKey: string; account: string; liquidator: string }
  | { type: "RECOMPUTE_FUNDING"; marketKey: string };

export type EngineCommandType = EngineCommand["type"];

/** Position for margin and trade commands, the liquidation outcome, or a funding index. */
export type CommandValue = Position | LiquidationResult | number;

export type CommandResult =
  | { ok: true; value: CommandValue }
  | { ok: false; error: PerpsError | Error };

export interface DispatcherMetrics {
  processed: number;
  failed: number;
  pending: number;
}

export interface MarketDispatcher {
  dispatch: (command: EngineCommand) => Promise<CommandResult>;
  getMetrics: () => DispatcherMetrics;
  /** Resolves once every queued command has run. */
  drain: () => Promise<void>;
}

export interface MarketDispatcherDeps {
  engine: PerpsEngine;
  logger: Logger;
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export const createMarketDispatcher = (deps: MarketDispatcherDeps): MarketDispatcher => {
  const { engine } = deps;
  const logger = deps.logger.child({ component: "market-dispatcher" });
  const queues = new Map<string, SerialQueue>();
  let processed = 0;
  let failed = 0;

  const queueFor = (marketKey: string): SerialQueue => {
    let queue = queues.get(marketKey);
    if (!queue) {
      queue = createSerialQueue();
      queues.set(marketKey, queue);
    }
    return queue;
  };

  const execute = (command: EngineCommand): CommandValue => {
    switch (command.type) {
      case "TRANSFER_MARGIN":
        return engine.transferMargin(command.marketKey, command.account, command.marginDelta);
      case "WITHDRAW_ALL_MARGIN":
        return engine.withdrawAllMargin(command.marketKey, command.account);
      case "MODIFY_LOCKED_MARGIN":
        return engine.modifyLockedMargin(command.marketKey, command.account, command.delta);
      case "MODIFY_POSITION":
        return engine.modifyPosition(
          command.marketKey,
          command.account,
          command.sizeDelta,
          command.options,
        );
      case "CLOSE_POSITION":
        return engine.closePosition(command.marketKey, command.account, command.options);
      case "LIQUIDATE_POSITION":
        return engine.liquidatePosition(command.marketKey, command.account, command.liquidator);
      case "RECOMPUTE_FUNDING":
        return engine.recomputeFunding(command.marketKey);
    }
  };

  const run = (command: EngineCommand): CommandResult => {
    try {
      const value = execute(command);
      processed += 1;
      return { ok: true, value };
    } catch (error) {
      failed += 1;
      if (isPerpsError(error)) {
        return { ok: false, error };
      }
      const unexpected = toError(error);
      logger.error("Command failed unexpectedly", unexpected, {
        type: command.type,
        marketKey: command.marketKey,
      });
      return { ok: false, error: unexpected };
    }
  };

  return {
    dispatch: (command) => queueFor(command.marketKey).enqueue(async () => run(command)),

    getMetrics: () => ({
      processed,
      failed,
      pending: [...queues.values()].reduce((sum, queue) => sum + queue.getPendingCount(), 0),
    }),

    drain: async () => {
      await Promise.all([...queues.values()].map((queue) => queue.waitForIdle()));
    },
  };
};
