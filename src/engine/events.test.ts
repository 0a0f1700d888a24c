import { describe, expect, it, vi } from "vitest";

import { createMockLogger } from "@/testing/mocks";

import { createEventBus } from "./events";
import type { EventBatch } from "./types";

const batch: EventBatch = {
  marketKey: "sETH",
  events: [
    { type: "FUNDING_RECOMPUTED", marketKey: "sETH", funding: 0n, index: 1, timestamp: 100 },
  ],
};

describe("createEventBus", () => {
  it("delivers batches to every listener", () => {
    const bus = createEventBus(createMockLogger());
    const first = vi.fn();
    const second = vi.fn();
    bus.subscribe(first);
    bus.subscribe(second);

    bus.publish(batch);

    expect(first).toHaveBeenCalledWith(batch);
    expect(second).toHaveBeenCalledWith(batch);
  });

  it("skips empty batches", () => {
    const bus = createEventBus(createMockLogger());
    const listener = vi.fn();
    bus.subscribe(listener);

    bus.publish({ marketKey: "sETH", events: [] });

    expect(listener).not.toHaveBeenCalled();
  });

  it("keeps delivering after a listener throws", () => {
    const logger = createMockLogger();
    const bus = createEventBus(logger);
    const listener = vi.fn();
    bus.subscribe(() => {
      throw new Error("boom");
    });
    bus.subscribe(listener);

    bus.publish(batch);

    expect(listener).toHaveBeenCalledWith(batch);
    expect(logger.error).toHaveBeenCalledWith("Event listener failed", expect.any(Error), {
      marketKey: "sETH",
      events: ["FUNDING_RECOMPUTED"],
    });
  });

  it("stops delivering after unsubscribe", () => {
    const bus = createEventBus(createMockLogger());
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);

    unsubscribe();
    bus.publish(batch);

    expect(listener).not.toHaveBeenCalled();
  });
});
