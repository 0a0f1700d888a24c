import type { Logger } from "@/lib/logger";

import type { EventBatch, EventListener } from "./types";

export interface EventBus {
  subscribe: (listener: EventListener) => () => void;
  publish: (batch: EventBatch) => void;
}

/**
 * Fan-out for committed event batches. A failing listener is logged and does
 * not stop delivery to the others; the mutation has already committed.
 */
export const createEventBus = (logger: Logger): EventBus => {
  const listeners = new Set<EventListener>();

  return {
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    publish: (batch) => {
      if (batch.events.length === 0) {
        return;
      }
      for (const listener of listeners) {
        try {
          listener(batch);
        } catch (error) {
          logger.error(
            "Event listener failed",
            error instanceof Error ? error : new Error(String(error)),
            { marketKey: batch.marketKey, events: batch.events.map((event) => event.type) },
          );
        }
      }
    },
  };
};
