import { CompletionTimeoutError } from "../errors.js";
import type { QueueEntry, StatusRecord, Task } from "./types.js";

/**
 * Unbounded FIFO with a blocking get.
 *
 * Waiting consumers are served in the order they called `get()`, so
 * several workers racing on the same queue each receive a distinct value.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<(value: T) => void> = [];

  put(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
      return;
    }
    this.items.push(value);
  }

  get(): Promise<T> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.splice(0, 1)[0]);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Like `get()`, but gives up without consuming a value once `timeoutMs`
   * elapses or `signal` aborts. Values already queued are still returned
   * after the signal aborted.
   */
  poll(options: { timeoutMs?: number; signal?: AbortSignal }): Promise<T | undefined> {
    const { timeoutMs, signal } = options;
    if (this.items.length > 0) {
      return Promise.resolve(this.items.splice(0, 1)[0]);
    }
    if (signal?.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const settle = (value: T | undefined) => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      };
      const waiter = (value: T) => settle(value);
      const giveUp = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        settle(undefined);
      };
      const onAbort = () => giveUp();

      if (timeoutMs !== undefined) {
        timer = setTimeout(giveUp, timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  get size(): number {
    return this.items.length;
  }

  get pendingConsumers(): number {
    return this.waiters.length;
  }
}

/**
 * Task Queue
 *
 * Joinable queue distributing tasks to workers. Every entry handed out
 * (tasks and sentinels alike) must be acknowledged with `taskDone()`;
 * `join()` resolves once nothing is left unacknowledged.
 */
export class TaskQueue {
  private queue = new AsyncQueue<QueueEntry>();
  private unfinishedCount = 0;
  private joiners: Array<() => void> = [];

  put(task: Task): void {
    this.unfinishedCount++;
    this.queue.put({ kind: "task", task });
  }

  putSentinel(): void {
    this.unfinishedCount++;
    this.queue.put({ kind: "sentinel" });
  }

  get(): Promise<QueueEntry> {
    return this.queue.get();
  }

  /**
   * Take the next entry, or undefined once `signal` aborts first
   */
  poll(signal: AbortSignal): Promise<QueueEntry | undefined> {
    return this.queue.poll({ signal });
  }

  /**
   * Acknowledge one entry previously taken from the queue
   */
  taskDone(): void {
    if (this.unfinishedCount <= 0) {
      throw new Error("taskDone() called more times than entries were put");
    }
    this.unfinishedCount--;
    if (this.unfinishedCount === 0) {
      const joiners = this.joiners;
      this.joiners = [];
      for (const resolve of joiners) {
        resolve();
      }
    }
  }

  join(): Promise<void> {
    if (this.unfinishedCount === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.joiners.push(resolve);
    });
  }

  get unfinished(): number {
    return this.unfinishedCount;
  }

  get size(): number {
    return this.queue.size;
  }
}

/**
 * Channel carrying status records from workers back to the coordinator
 */
export class ResultChannel {
  private queue = new AsyncQueue<StatusRecord>();

  put(record: StatusRecord): void {
    this.queue.put(record);
  }

  /**
   * Wait for the next record.
   *
   * Rejects with CompletionTimeoutError when nothing arrives within
   * `timeoutMs`; resolves undefined once `signal` aborts and no record
   * is left.
   */
  async get(
    options: { timeoutMs?: number; signal?: AbortSignal } = {},
  ): Promise<StatusRecord | undefined> {
    const { timeoutMs, signal } = options;
    if (timeoutMs === undefined && signal === undefined) {
      return this.queue.get();
    }

    const record = await this.queue.poll({ timeoutMs, signal });
    if (record === undefined && !signal?.aborted && timeoutMs !== undefined) {
      throw new CompletionTimeoutError(timeoutMs);
    }
    return record;
  }

  get size(): number {
    return this.queue.size;
  }
}
