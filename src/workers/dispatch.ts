import type { HarvestMode } from "../types/enums.js";

export type Job<T, R> = (item: T) => Promise<R>;

export interface DispatchOptions<R> {
  /** In-flight cap for async mode; 0 lets the whole batch run at once */
  maxInFlight: number;
  /** Receives every result; sync mode calls it per item, async mode after the batch */
  emit: (result: R) => void;
}

/**
 * Run a worker's batch in the given mode and return the results in input
 * order. Jobs are expected to turn their own errors into results.
 */
export async function dispatchBatch<T, R>(
  mode: HarvestMode,
  items: readonly T[],
  job: Job<T, R>,
  options: DispatchOptions<R>,
): Promise<R[]> {
  if (mode === "sync") {
    return runSequential(items, job, options.emit);
  }

  const results = await runConcurrent(items, job, options.maxInFlight);
  for (const result of results) {
    options.emit(result);
  }
  return results;
}

/**
 * One job at a time, in the order received
 */
export async function runSequential<T, R>(
  items: readonly T[],
  job: Job<T, R>,
  onResult: (result: R) => void = () => undefined,
): Promise<R[]> {
  const results: R[] = [];
  for (const item of items) {
    const result = await job(item);
    onResult(result);
    results.push(result);
  }
  return results;
}

/**
 * Every job launched cooperatively, at most `maxInFlight` pending at once
 */
export async function runConcurrent<T, R>(
  items: readonly T[],
  job: Job<T, R>,
  maxInFlight: number,
): Promise<R[]> {
  const limit = maxInFlight > 0 ? maxInFlight : Number.POSITIVE_INFINITY;
  const results = new Array<R>(items.length);
  const active = new Set<Promise<void>>();

  for (const [index, item] of items.entries()) {
    while (active.size >= limit) {
      await Promise.race(active);
    }

    const pending: Promise<void> = job(item).then((result) => {
      results[index] = result;
      active.delete(pending);
    });
    active.add(pending);
  }

  await Promise.all([...active]);
  return results;
}

/**
 * Counting semaphore shared by every request of one worker; a limit of 0
 * admits everything
 */
export class InFlightLimiter {
  private readonly limit: number;
  private active = 0;
  private waiting: Array<() => void> = [];

  constructor(limit: number) {
    this.limit = limit > 0 ? limit : Number.POSITIVE_INFINITY;
  }

  async run<R>(task: () => Promise<R>): Promise<R> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get inFlight(): number {
    return this.active;
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  /** A freed slot passes straight to the next waiter */
  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.active--;
  }
}
