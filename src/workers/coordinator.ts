import fs from "fs";
import os from "os";
import chalk from "chalk";
import { CompletionTimeoutError } from "../errors.js";
import { Fetcher } from "../harvest/fetcher.js";
import { createStrategy } from "../harvest/strategies/index.js";
import { logger } from "../utils/logger.js";
import { ResultChannel, TaskQueue } from "./task-queue.js";
import type {
  CoordinatorOptions,
  HarvestSummary,
  StatusRecord,
  Task,
  WorkerConfig,
  WorkerCountBound,
  WorkerCountPolicy,
} from "./types.js";
import { WorkerPool } from "./worker-pool.js";

const COORDINATOR_ID = "coordinator";

/**
 * Coordinator
 *
 * Drives one harvest run:
 * 1. Clamps the worker count and plans the items
 * 2. Starts the workers before anything is enqueued
 * 3. Enqueues every item, then one sentinel per worker
 * 4. Collects exactly one status record per item and tallies them
 */
export class Coordinator {
  private config: WorkerConfig;
  private options: CoordinatorOptions;
  private queue: TaskQueue;
  private results: ResultChannel;
  private startTime: number;
  private workerPool: WorkerPool | null;

  constructor(config: WorkerConfig, options: CoordinatorOptions) {
    this.config = Object.freeze({ ...config });
    this.options = {
      ...options,
      isolation: options.isolation ?? "process",
      verbose: options.verbose ?? false,
    };
    this.queue = new TaskQueue();
    this.results = new ResultChannel();
    this.startTime = Date.now();
    this.workerPool = null;
  }

  /**
   * Main run method
   */
  async run(): Promise<HarvestSummary> {
    this.startTime = Date.now();

    const workerCount = effectiveWorkerCount(this.options);

    // Phase 1: Plan items
    const items = await this.planItems();
    logger.info(chalk.blue(`Processing ${this.config.mode} ${items.length} items`));

    // Phase 2: Prepare output directory
    fs.mkdirSync(this.config.outputDir, { recursive: true });

    // Phase 3: Start workers
    logger.info(chalk.blue(`Spawning ${workerCount} gatherers...`));
    const workerPool = new WorkerPool(this.queue, this.results, workerCount, this.config, {
      isolation: this.options.isolation,
      verbose: this.options.verbose,
      fetchImpl: this.options.fetchImpl,
    });
    this.workerPool = workerPool;
    await workerPool.start();

    try {
      // Phase 4: Enqueue work, one sentinel per worker
      for (const item of items) {
        this.queue.put(item);
      }
      for (let i = 0; i < workerCount; i++) {
        this.queue.putSentinel();
      }

      // Phase 5: Collect results
      const records = await this.collect(items, workerPool);

      const { failedWorkers } = await workerPool.waitForCompletion();

      return this.summarize(records, workerCount, failedWorkers);
    } catch (error) {
      await workerPool.terminate();
      throw error;
    } finally {
      this.workerPool = null;
    }
  }

  /**
   * Stop the workers of a run in progress (e.g. on SIGINT)
   */
  async terminate(): Promise<void> {
    await this.workerPool?.terminate();
  }

  private async planItems(): Promise<Task[]> {
    const strategy = createStrategy(this.config.strategy, this.config.outputDir);
    const fetcher = new Fetcher({
      workerId: COORDINATOR_ID,
      params: this.config.strategy.params,
      timeoutMs: this.config.requestTimeoutMs,
      fetchImpl: this.options.fetchImpl,
    });
    return strategy.planItems(this.options.itemCount, fetcher);
  }

  /**
   * Read one record per item. Items still unreported when the completion
   * deadline passes, or once every worker has exited, are recorded as
   * failures and the pool is torn down.
   */
  private async collect(items: Task[], workerPool: WorkerPool): Promise<StatusRecord[]> {
    const records: StatusRecord[] = [];
    const missing = new Map<string, Task>(items.map((item) => [itemKey(item), item]));
    const exited = new AbortController();
    void workerPool.allExited().then(() => exited.abort());

    const timeoutMs = this.options.completionTimeoutMs;
    const deadline = timeoutMs !== undefined ? Date.now() + timeoutMs : undefined;

    while (records.length < items.length) {
      let record: StatusRecord | undefined;
      try {
        record = await this.results.get({
          timeoutMs: deadline !== undefined ? Math.max(0, deadline - Date.now()) : undefined,
          signal: exited.signal,
        });
      } catch (error) {
        if (!(error instanceof CompletionTimeoutError)) {
          throw error;
        }
        logger.error(
          chalk.red(`Completion deadline of ${timeoutMs}ms passed with ${missing.size} items unreported`),
        );
        records.push(...this.synthesizeFailures(missing, "no status reported before deadline"));
        await workerPool.terminate();
        break;
      }

      if (record === undefined) {
        logger.error(chalk.red(`All workers exited with ${missing.size} items unreported`));
        records.push(...this.synthesizeFailures(missing, "worker exited before reporting"));
        break;
      }

      missing.delete(itemKey(record.item));
      records.push(record);

      if (record.outcome === "failure") {
        logger.error(chalk.red(`[${record.workerId}] ${record.item} failed: ${record.reason}`));
      } else {
        logger.debug(chalk.gray(`[${record.workerId}] ${record.item} fetch succeeded`));
      }

      this.options.onProgress?.(records.length, items.length);
    }

    return records;
  }

  private synthesizeFailures(missing: Map<string, Task>, reason: string): StatusRecord[] {
    const failures: StatusRecord[] = [...missing.values()].map((item) => ({
      outcome: "failure",
      item,
      workerId: COORDINATOR_ID,
      reason,
    }));
    missing.clear();
    return failures;
  }

  private summarize(
    records: StatusRecord[],
    workerCount: number,
    failedWorkers: number,
  ): HarvestSummary {
    const total = records.length;
    const failed = records.filter((record) => record.outcome === "failure").length;
    const succeeded = total - failed;

    logger.info(
      chalk.white(`Done, success: ${succeeded}/${total}, failure: ${failed}/${total}`),
    );

    return {
      total,
      succeeded,
      failed,
      records,
      workersUsed: workerCount,
      failedWorkers,
      duration: Date.now() - this.startTime,
    };
  }
}

/**
 * Number of workers a run with these options starts
 */
export function effectiveWorkerCount(options: CoordinatorOptions): number {
  return clampWorkerCount(
    options.workers,
    options.workerPolicy ?? {},
    options.cpuCount ?? os.cpus().length,
  );
}

/**
 * Apply the min/max worker bounds, never going below one worker
 */
export function clampWorkerCount(
  requested: number,
  policy: WorkerCountPolicy,
  cpuCount: number,
): number {
  const bound = (value: WorkerCountBound): number => (value === "cpus" ? cpuCount : value);

  let count = Math.floor(requested);
  if (policy.minWorkers !== undefined) {
    count = Math.max(count, bound(policy.minWorkers));
  }
  if (policy.maxWorkers !== undefined) {
    count = Math.min(count, bound(policy.maxWorkers));
  }
  return Math.max(1, count);
}

function itemKey(item: Task): string {
  return `${typeof item}:${item}`;
}
