import PQueue from "p-queue";

export interface SerialQueue {
  /** Runs `fn` after every earlier job has settled and resolves to its result. */
  enqueue: <T>(fn: () => Promise<T>) => Promise<T>;
  getPendingCount: () => number;
  waitForIdle: () => Promise<void>;
}

/**
 * FIFO queue that runs one job at a time.
 */
export const createSerialQueue = (): SerialQueue => {
  const queue = new PQueue({ concurrency: 1 });

  return {
    enqueue: (fn) => queue.add(() => fn(), { throwOnTimeout: true }),

    getPendingCount: () => queue.size + queue.pending,

    waitForIdle: async () => {
      await queue.onIdle();
    },
  };
};
