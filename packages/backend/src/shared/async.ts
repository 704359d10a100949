import pLimit from 'p-limit';
import { TimeoutError, ValidationError } from './errors';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with TimeoutError as soon as the budget elapses, whether or
 * not `fn` honours the signal.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  label: string,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs, `${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

type Limit = ReturnType<typeof pLimit>;

/**
 * Bounded pool over a p-limit limiter.
 *
 * `submit` resolves once the task holds a slot, so a producer awaiting it is
 * throttled to the pool's pace. `drain` waits for everything submitted and
 * rethrows the first task failure, if any.
 */
export class WorkerPool {
  private readonly limit: Limit;
  private readonly unsettled = new Set<Promise<void>>();
  private failure: { error: unknown } | null = null;

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.limit = pLimit(concurrency);
  }

  get inFlight(): number {
    return this.limit.activeCount + this.limit.pendingCount;
  }

  async submit(task: () => Promise<void>): Promise<void> {
    const settled: Promise<void> = this.limit(task)
      .catch((err: unknown) => {
        if (!this.failure) this.failure = { error: err };
      })
      .finally(() => {
        this.unsettled.delete(settled);
      });
    this.unsettled.add(settled);

    // Queued beyond the slots: wait until a running task frees one
    while (this.inFlight > this.concurrency && this.unsettled.size > 0) {
      await Promise.race(this.unsettled);
    }
  }

  async drain(): Promise<void> {
    while (this.unsettled.size > 0) {
      await Promise.all(this.unsettled);
    }
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      throw error;
    }
  }
}
