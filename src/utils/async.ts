/**
 * Shared async utilities: bounded parallel execution.
 * @module
 */

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Counting admission gate. At most `permits` holders run at once; waiters
 * are admitted in arrival order.
 */
export class AdmissionGate {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`AdmissionGate requires a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  /** Currently free permits. */
  get free(): number {
    return this.available;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Permit passes straight to the next waiter.
      next();
      return;
    }
    this.available++;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

export interface RunParallelOptions {
  /** Upper bound on tasks in flight. Defaults to the number of tasks. */
  maxConcurrentTasks?: number;
  /**
   * Capture failures per item (the `Error` takes the item's slot) instead of
   * rejecting the whole batch.
   */
  allowFailures?: boolean;
  /** Called for every captured failure when `allowFailures` is set. */
  onFailure?: (error: Error, index: number) => void;
}

/**
 * Run task factories with bounded concurrency. Results keep input order.
 */
export function runParallel<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  options: RunParallelOptions & { allowFailures: true },
): Promise<Array<T | Error>>;
export function runParallel<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  options?: RunParallelOptions,
): Promise<T[]>;
export async function runParallel<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  options: RunParallelOptions = {},
): Promise<Array<T | Error>> {
  if (tasks.length === 0) return [];
  const limit = options.maxConcurrentTasks && options.maxConcurrentTasks > 0
    ? options.maxConcurrentTasks
    : tasks.length;
  const gate = new AdmissionGate(limit);

  return Promise.all(
    tasks.map(async (task, index) => {
      try {
        return await gate.run(task);
      } catch (err) {
        if (!options.allowFailures) throw err;
        const error = toError(err);
        options.onFailure?.(error, index);
        return error;
      }
    }),
  );
}
