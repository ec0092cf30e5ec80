/**
 * Type definitions for the fan-out harvesting pipeline
 * Coordinator -> task queue -> workers -> result channel -> coordinator
 */

import type { ContentKind, HarvestMode, WorkerIsolation } from "../types/enums.js";

/**
 * A unit of work: a ticker symbol or a listing page number
 */
export type Task = string | number;

/**
 * Entry taken from the task queue. A sentinel tells the worker that took it
 * that no more work is coming.
 */
export type QueueEntry =
  | { kind: "task"; task: Task }
  | { kind: "sentinel" };

export type FetchResult =
  | { ok: true; status: 200; body: string | Uint8Array }
  | { ok: false; reason: string; status?: number };

/**
 * Per-item outcome reported by a worker, exactly one per real task
 */
export type StatusRecord =
  | { outcome: "success"; item: Task; workerId: string; files: string[] }
  | { outcome: "failure"; item: Task; workerId: string; reason: string };

export type QueryParams = Record<string, string | number | boolean>;

export interface TickerStrategyConfig {
  kind: "ticker";
  baseUrl: string;
  tickers: string[];
  params: QueryParams;
}

export interface ImageStrategyConfig {
  kind: "image";
  baseUrl: string;
  item: string;
  hostFilter: string;
  params: QueryParams;
}

/**
 * Serialisable strategy description, rebuilt inside each worker
 */
export type StrategyConfig = TickerStrategyConfig | ImageStrategyConfig;

/**
 * Shared read-only configuration, copied into every worker
 */
export interface WorkerConfig {
  mode: HarvestMode;
  outputDir: string;
  strategy: StrategyConfig;
  /** Cap on in-flight items per worker in async mode, 0 for no cap */
  maxInFlight: number;
  /** Per-request timeout, undefined waits forever */
  requestTimeoutMs?: number;
}

/**
 * A URL produced by a strategy for one item
 */
export interface HarvestTarget {
  url: string;
  expect: ContentKind;
}

export type WorkerCountBound = number | "cpus";

export interface WorkerCountPolicy {
  minWorkers?: WorkerCountBound;
  maxWorkers?: WorkerCountBound;
}

/**
 * Options for the Coordinator
 */
export interface CoordinatorOptions {
  itemCount: number;
  workers: number;
  workerPolicy?: WorkerCountPolicy;
  isolation?: WorkerIsolation;
  completionTimeoutMs?: number;
  verbose?: boolean;
  cpuCount?: number;
  fetchImpl?: typeof fetch;
  onProgress?: (done: number, total: number) => void;
}

/**
 * Result from the Coordinator run
 */
export interface HarvestSummary {
  total: number;
  succeeded: number;
  failed: number;
  records: StatusRecord[];
  workersUsed: number;
  /** Workers that exited with an error, whatever they had reported */
  failedWorkers: number;
  duration: number;
}

/**
 * Options for the WorkerPool
 */
export interface WorkerPoolOptions {
  isolation?: WorkerIsolation;
  verbose?: boolean;
  /** Only honoured by inline workers; forked workers use the global fetch */
  fetchImpl?: typeof fetch;
}

/**
 * Result from the WorkerPool
 */
export interface WorkerPoolResult {
  totalWorkers: number;
  completedWorkers: number;
  failedWorkers: number;
}

/**
 * Result from a worker run
 */
export interface WorkerResult {
  workerId: string;
  processed: number;
  succeeded: number;
  failed: number;
}

/**
 * Messages from the coordinator process to a forked worker
 */
export type ParentMessage =
  | { type: "init"; workerId: string; config: WorkerConfig; verbose: boolean }
  | { type: "entry"; entry: QueueEntry };

/**
 * Messages from a forked worker to the coordinator process
 */
export type ChildMessage =
  | { type: "take" }
  | { type: "task-done" }
  | { type: "status"; record: StatusRecord };
