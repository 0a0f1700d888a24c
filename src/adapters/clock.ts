import type { Clock } from "./types";

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export interface ManualClock extends Clock {
  advance: (seconds: number) => number;
  set: (timestamp: number) => void;
}

/**
 * Clock that only moves when told to. Used for simulations and tests.
 */
export const createManualClock = (start = 0): ManualClock => {
  let current = start;

  return {
    now: () => current,
    advance: (seconds) => {
      if (seconds < 0) {
        throw new Error("Clock cannot move backwards");
      }
      current += seconds;
      return current;
    },
    set: (timestamp) => {
      if (timestamp < current) {
        throw new Error("Clock cannot move backwards");
      }
      current = timestamp;
    },
  };
};
