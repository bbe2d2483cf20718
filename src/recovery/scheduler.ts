/**
 * Work scheduler
 *
 * Runs a bounded pool of workers that pull from one shared async source until
 * it is exhausted. Each item is handed to exactly one worker. A handler that
 * throws is reported through `onFailure` and the worker moves on to the next
 * item; only an error raised by the source itself ends the run.
 */

export interface WorkSchedulerOptions {
  /** Number of concurrent workers; clamped to at least 1 */
  workerCount: number;
  /** Stops workers from taking new items once aborted */
  signal?: AbortSignal;
}

export type WorkHandler<T> = (item: T, workerId: number) => Promise<void>;
export type FailureHandler<T> = (item: T, error: unknown) => void;

export interface WorkStats {
  /** Items handed to a worker */
  dispatched: number;
  /** Items whose handler threw */
  failed: number;
  /** Whether the run stopped early because the signal was aborted */
  aborted: boolean;
}

export function clampWorkerCount(count: number): number {
  if (!Number.isFinite(count)) return 1;
  return Math.max(1, Math.floor(count));
}

export class WorkScheduler {
  private readonly workerCount: number;
  private readonly signal?: AbortSignal;

  constructor(options: WorkSchedulerOptions) {
    this.workerCount = clampWorkerCount(options.workerCount);
    this.signal = options.signal;
  }

  get size(): number {
    return this.workerCount;
  }

  /**
   * Drain `source` through `handler` using the configured number of workers.
   * Resolves once every worker is idle and the source is exhausted or aborted.
   */
  async run<T>(
    source: AsyncIterable<T> | Iterable<T>,
    handler: WorkHandler<T>,
    onFailure: FailureHandler<T>
  ): Promise<WorkStats> {
    const iterator = toAsyncIterator(source);
    const stats: WorkStats = { dispatched: 0, failed: 0, aborted: false };

    // Async generators queue concurrent next() calls, so workers never receive the same item
    const worker = async (workerId: number): Promise<void> => {
      for (;;) {
        if (this.signal?.aborted) {
          stats.aborted = true;
          return;
        }

        const next = await iterator.next();
        if (next.done) return;

        stats.dispatched++;
        try {
          await handler(next.value, workerId);
        } catch (error) {
          stats.failed++;
          onFailure(next.value, error);
        }
      }
    };

    const workers = Array.from({ length: this.workerCount }, (_, i) => worker(i));
    try {
      await Promise.all(workers);
    } finally {
      // Settle every worker before closing the source, even when one rejected
      await Promise.allSettled(workers);
      if (stats.aborted) {
        await iterator.return?.();
      }
    }

    return stats;
  }
}

function toAsyncIterator<T>(source: AsyncIterable<T> | Iterable<T>): AsyncIterator<T> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  const sync = source[Symbol.iterator]();
  return {
    next: async () => sync.next(),
    return: async () => sync.return?.() ?? { done: true, value: undefined },
  };
}

function isAsyncIterable<T>(source: AsyncIterable<T> | Iterable<T>): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}
