/**
 * Fan-out Harvest Module
 *
 * Producer-consumer pipeline: one coordinator, N workers, a shared task
 * queue and a result channel.
 *
 * Usage:
 *   import { Coordinator } from "./src/workers/index.js";
 *
 *   const coordinator = new Coordinator(workerConfig, {
 *     itemCount: 10,
 *     workers: 4,
 *     isolation: "process",
 *   });
 *
 *   const summary = await coordinator.run();
 */

// Main classes
export { Coordinator, clampWorkerCount, effectiveWorkerCount } from "./coordinator.js";
export { WorkerPool } from "./worker-pool.js";
export { AsyncQueue, ResultChannel, TaskQueue } from "./task-queue.js";

// Worker functions
export { harvestItem, runWorker } from "./worker.js";
export type { WorkerChannel, WorkerRuntime } from "./worker.js";
export { dispatchBatch, runConcurrent, runSequential } from "./dispatch.js";

// Types
export type {
  Task,
  QueueEntry,
  FetchResult,
  StatusRecord,
  WorkerConfig,
  StrategyConfig,
  CoordinatorOptions,
  HarvestSummary,
  WorkerPoolOptions,
  WorkerPoolResult,
} from "./types.js";
