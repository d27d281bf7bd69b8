import PQueue from "p-queue";

/** Work the hedger serializes: control-loop cycles and operator closes */
export type JobKind = "cycle" | "emergency_close";

export class QueueClosedError extends Error {
  public override readonly name = "QueueClosedError";

  constructor(public readonly kind: JobKind) {
    super(`Queue is closed; ${kind} job not accepted`);
  }
}

export interface SerialQueue {
  /** Run `fn` after every earlier job has settled */
  enqueue: <T>(kind: JobKind, fn: () => Promise<T>) => Promise<T>;
  /** Jobs of `kind` waiting or running */
  countOf: (kind: JobKind) => number;
  getPendingCount: () => number;
  /** Refuse new jobs; queued jobs still run */
  close: () => void;
  isClosed: () => boolean;
  waitForIdle: () => Promise<void>;
}

/**
 * One-at-a-time job queue. Cycles and emergency closes share it so an
 * operator close never interleaves with a cycle's order.
 */
export const createSerialQueue = (): SerialQueue => {
  const queue = new PQueue({ concurrency: 1 });
  const counts: Record<JobKind, number> = { cycle: 0, emergency_close: 0 };
  let closed = false;

  const enqueue = <T>(kind: JobKind, fn: () => Promise<T>): Promise<T> => {
    if (closed) {
      return Promise.reject(new QueueClosedError(kind));
    }

    counts[kind] += 1;
    return queue.add(
      async () => {
        try {
          return await fn();
        } finally {
          counts[kind] -= 1;
        }
      },
      { throwOnTimeout: true },
    );
  };

  return {
    enqueue,
    countOf: (kind) => counts[kind],
    getPendingCount: () => queue.size + queue.pending,
    close: () => {
      closed = true;
    },
    isClosed: () => closed,
    waitForIdle: async () => {
      await queue.onIdle();
    },
  };
};
