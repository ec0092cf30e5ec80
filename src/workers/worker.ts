/**
 * Worker
 *
 * Harvests the items one worker pulls from the task queue:
 * 1. Intake: takes tasks until it receives a sentinel
 * 2. Dispatch: fetches and saves the whole batch in the configured mode
 * 3. Drain: reports one status record per task, acknowledges the sentinel
 * 4. Exit
 *
 * Runs inline inside the coordinator's process, or as a forked child
 * process when this file is executed directly (see worker-pool.ts):
 *   node dist/src/workers/worker.js   (spawned with an IPC channel)
 */

import path from "path";
import { fileURLToPath } from "url";
import chalk from "chalk";
import { errorMessage } from "../errors.js";
import { Fetcher } from "../harvest/fetcher.js";
import { createStrategy, type HarvestStrategy } from "../harvest/strategies/index.js";
import { logger, scopedLogger, setVerboseMode } from "../utils/logger.js";
import { InFlightLimiter, dispatchBatch, runConcurrent, runSequential } from "./dispatch.js";
import { AsyncQueue } from "./task-queue.js";
import type {
  ChildMessage,
  HarvestTarget,
  ParentMessage,
  QueueEntry,
  StatusRecord,
  Task,
  WorkerConfig,
  WorkerResult,
} from "./types.js";

/**
 * A worker's view of the task queue and the result channel
 */
export interface WorkerChannel {
  take(): Promise<QueueEntry>;
  taskDone(): void;
  report(record: StatusRecord): void;
}

export interface WorkerRuntime {
  fetchImpl?: typeof fetch;
  /** Aborts in-flight requests when the pool is torn down */
  signal?: AbortSignal;
}

/**
 * Main worker function
 */
export async function runWorker(
  workerId: string,
  config: WorkerConfig,
  channel: WorkerChannel,
  runtime: WorkerRuntime = {},
): Promise<WorkerResult> {
  const log = scopedLogger(workerId);
  const strategy = createStrategy(config.strategy, config.outputDir);
  const fetcher = new Fetcher({
    workerId,
    params: config.strategy.params,
    timeoutMs: config.requestTimeoutMs,
    signal: runtime.signal,
    fetchImpl: runtime.fetchImpl,
    // One cap for every request of the worker, listing pages and images alike
    limiter: config.mode === "async" ? new InFlightLimiter(config.maxInFlight) : undefined,
  });

  // Intake
  const items: Task[] = [];
  while (true) {
    const entry = await channel.take();
    if (entry.kind === "sentinel") {
      log.debug("Received all allocated items");
      break;
    }
    items.push(entry.task);
    channel.taskDone();
  }

  log.info(`processing ${config.mode} ${items.length} items`);

  const result: WorkerResult = {
    workerId,
    processed: 0,
    succeeded: 0,
    failed: 0,
  };

  // Dispatch + drain
  await dispatchBatch(
    config.mode,
    items,
    (item) => harvestItem(item, strategy, fetcher, config),
    {
      maxInFlight: config.maxInFlight,
      emit: (record) => {
        result.processed++;
        if (record.outcome === "success") {
          result.succeeded++;
        } else {
          result.failed++;
        }
        channel.report(record);
      },
    },
  );

  // Respond to the sentinel
  channel.taskDone();

  log.debug(`Finished: ${result.succeeded} succeeded, ${result.failed} failed`);
  return result;
}

/**
 * Resolve, fetch and save one item. Never throws: every problem becomes
 * the item's failure record.
 */
export async function harvestItem(
  item: Task,
  strategy: HarvestStrategy,
  fetcher: Fetcher,
  config: Pick<WorkerConfig, "mode" | "maxInFlight">,
): Promise<StatusRecord> {
  const workerId = fetcher.id;
  const log = scopedLogger(workerId);
  log.debug(`processing ${strategy.name} item ${item}`);

  try {
    const resolved = await strategy.resolve(item, fetcher);
    if (!resolved.ok) {
      return { outcome: "failure", item, workerId, reason: resolved.reason };
    }

    const download = async (target: HarvestTarget): Promise<string | Error> => {
      const fetched = await fetcher.fetch(target.url, target.expect);
      if (!fetched.ok) {
        return new Error(fetched.reason);
      }
      try {
        return await strategy.save(item, target, fetched.body);
      } catch (error) {
        log.error(errorMessage(error));
        return error instanceof Error ? error : new Error(String(error));
      }
    };

    const outcomes =
      config.mode === "sync"
        ? await runSequential(resolved.targets, download)
        : await runConcurrent(resolved.targets, download, config.maxInFlight);

    const files = outcomes.filter((outcome): outcome is string => typeof outcome === "string");
    const errors = outcomes.filter((outcome): outcome is Error => outcome instanceof Error);

    if (errors.length === 0) {
      return { outcome: "success", item, workerId, files };
    }

    const reason =
      outcomes.length === 1
        ? errors[0].message
        : `${errors.length} of ${outcomes.length} downloads failed, first: ${errors[0].message}`;
    return { outcome: "failure", item, workerId, reason };
  } catch (error) {
    log.error(`item ${item} failed: ${errorMessage(error)}`);
    return { outcome: "failure", item, workerId, reason: errorMessage(error) };
  }
}

// ============================================================================
// Child process entry
// ============================================================================

export function isParentMessage(value: unknown): value is ParentMessage {
  if (typeof value !== "object" || value === null || !("type" in value)) {
    return false;
  }
  if (value.type === "init") {
    return "workerId" in value && "config" in value;
  }
  return value.type === "entry" && "entry" in value;
}

export interface IpcChannel {
  channel: WorkerChannel;
  /** Hand over an entry the coordinator sent in answer to a take */
  deliver: (entry: QueueEntry) => void;
  /** Resolves once every message sent so far has left the process */
  flush: () => Promise<void>;
}

/**
 * Worker channel backed by the IPC link to the coordinator process
 */
export function createIpcChannel(send: (message: ChildMessage) => Promise<void>): IpcChannel {
  const entries = new AsyncQueue<QueueEntry>();
  const inFlight = new Set<Promise<void>>();

  const post = (message: ChildMessage): void => {
    const sending = send(message)
      .catch((error: unknown) => {
        logger.error(chalk.red(`IPC send failed: ${errorMessage(error)}`));
        process.exitCode = 1;
      })
      .finally(() => inFlight.delete(sending));
    inFlight.add(sending);
  };

  return {
    channel: {
      take: () => {
        post({ type: "take" });
        return entries.get();
      },
      taskDone: () => post({ type: "task-done" }),
      report: (record) => post({ type: "status", record }),
    },
    deliver: (entry) => entries.put(entry),
    flush: async () => {
      await Promise.all([...inFlight]);
    },
  };
}

function sendToParent(message: ChildMessage): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!process.send) {
      reject(new Error("IPC channel is not available"));
      return;
    }
    process.send(message, undefined, {}, (error) => (error ? reject(error) : resolve()));
  });
}

function startChildWorker(): void {
  const { channel, deliver, flush } = createIpcChannel(sendToParent);
  let started = false;

  process.on("message", (message: unknown) => {
    if (!isParentMessage(message)) {
      logger.warn(chalk.yellow(`Ignoring unknown message: ${JSON.stringify(message)}`));
      return;
    }

    if (message.type === "entry") {
      deliver(message.entry);
      return;
    }

    if (started) {
      return;
    }
    started = true;
    setVerboseMode(message.verbose);

    runWorker(message.workerId, message.config, channel)
      .then(async () => {
        await flush();
        process.disconnect();
      })
      .catch(async (error: unknown) => {
        logger.error(chalk.red(`[${message.workerId}] Fatal error: ${errorMessage(error)}`));
        await flush();
        process.exitCode = 1;
        process.disconnect();
      });
  });
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && path.resolve(entry) === fileURLToPath(import.meta.url);
}

// Run as a child process when executed directly
if (isMainModule() && process.send) {
  startChildWorker();
}
