import { fork, type ChildProcess } from "child_process";
import path from "path";
import { fileURLToPath } from "url";
import chalk from "chalk";
import { errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { ResultChannel, TaskQueue } from "./task-queue.js";
import type {
  ChildMessage,
  ParentMessage,
  WorkerConfig,
  WorkerPoolOptions,
  WorkerPoolResult,
} from "./types.js";
import { runWorker, type WorkerChannel } from "./worker.js";

const currentFile = fileURLToPath(import.meta.url);

/** worker.ts when running from source under a TypeScript loader, worker.js once built */
const WORKER_SCRIPT = path.join(path.dirname(currentFile), `worker${path.extname(currentFile)}`);

const TERMINATE_GRACE_MS = 10000;

/**
 * Worker Pool Manager
 *
 * Starts the harvesting workers, wires them to the task queue and result
 * channel, and tracks their exit. Workers are forked child processes
 * talking over IPC, or async tasks sharing the coordinator's event loop.
 */
export class WorkerPool {
  private queue: TaskQueue;
  private results: ResultChannel;
  private workerCount: number;
  private config: WorkerConfig;
  private options: WorkerPoolOptions;
  private children: Map<string, ChildProcess>;
  private running: Map<string, Promise<number>>;
  private exitCodes: Map<string, number>;
  private abortController: AbortController;
  private relay: IpcRelay;

  constructor(
    queue: TaskQueue,
    results: ResultChannel,
    workerCount: number,
    config: WorkerConfig,
    options: WorkerPoolOptions = {},
  ) {
    this.queue = queue;
    this.results = results;
    this.workerCount = Math.max(1, Math.floor(workerCount));
    this.config = config;
    this.options = { ...options, isolation: options.isolation ?? "process" };
    this.children = new Map();
    this.running = new Map();
    this.exitCodes = new Map();
    this.abortController = new AbortController();
    this.relay = new IpcRelay(queue, results, this.abortController.signal);
  }

  /**
   * Start all workers
   */
  async start(): Promise<void> {
    logger.debug(
      chalk.blue(`Starting ${this.workerCount} ${this.options.isolation} workers...`),
    );

    for (let i = 0; i < this.workerCount; i++) {
      const workerId = `worker-${i + 1}`;
      const exit =
        this.options.isolation === "inline"
          ? this.startInlineWorker(workerId)
          : this.spawnWorker(workerId);

      this.running.set(
        workerId,
        exit.then((code) => {
          this.exitCodes.set(workerId, code);
          this.running.delete(workerId);
          return code;
        }),
      );
    }

    logger.debug(chalk.green(`✓ All ${this.workerCount} workers started`));
  }

  /**
   * Resolves once every worker has exited, whatever the exit code
   */
  allExited(): Promise<void> {
    return Promise.all([...this.running.values()]).then(() => undefined);
  }

  /**
   * Run a worker as an async task sharing this process
   */
  private startInlineWorker(workerId: string): Promise<number> {
    const signal = this.abortController.signal;
    const channel: WorkerChannel = {
      take: async () => {
        const entry = await this.queue.poll(signal);
        if (!entry) {
          throw new Error("worker pool terminated");
        }
        return entry;
      },
      taskDone: () => this.queue.taskDone(),
      report: (record) => this.results.put(record),
    };

    logger.info(chalk.gray(`[${workerId}] Started`));

    return runWorker(workerId, { ...this.config }, channel, {
      fetchImpl: this.options.fetchImpl,
      signal,
    }).then(
      () => 0,
      (error: unknown) => {
        logger.error(chalk.red(`[${workerId}] Fatal error: ${errorMessage(error)}`));
        return 1;
      },
    );
  }

  /**
   * Fork a single worker process
   */
  private spawnWorker(workerId: string): Promise<number> {
    const worker = fork(WORKER_SCRIPT, [], {
      execArgv: process.execArgv,
      stdio: this.options.verbose
        ? ["ignore", "inherit", "inherit", "ipc"]
        : ["ignore", "pipe", "pipe", "ipc"],
    });

    this.children.set(workerId, worker);

    // Capture stdout/stderr for debugging
    let output = "";
    worker.stdout?.on("data", (data: Buffer) => {
      output += data.toString();
    });
    worker.stderr?.on("data", (data: Buffer) => {
      output += data.toString();
      logger.error(chalk.red(`[${workerId}] ${data.toString().trim()}`));
    });

    worker.on("message", (message: unknown) =>
      this.relay.handle(workerId, message, (reply) => this.sendToWorker(worker, reply)),
    );

    this.sendToWorker(worker, {
      type: "init",
      workerId,
      config: this.config,
      verbose: this.options.verbose ?? false,
    });

    logger.info(chalk.gray(`[${workerId}] Started`));

    return new Promise((resolve) => {
      // Handle worker errors
      worker.on("error", (error) => {
        logger.error(chalk.red(`[${workerId}] Error: ${error.message}`));
      });

      // Handle worker exit
      worker.on("close", (code, signal) => {
        this.children.delete(workerId);
        const exitCode = code ?? 1;

        if (exitCode !== 0) {
          logger.error(
            chalk.red(`[${workerId}] exited with code ${code}${signal ? ` (${signal})` : ""}`),
          );
          if (output && !this.options.verbose) {
            logger.error(chalk.red(`[${workerId}] Output:\n${output}`));
          }
        } else {
          logger.debug(chalk.gray(`[${workerId}] completed (code: ${code})`));
        }
        resolve(exitCode);
      });
    });
  }

  private sendToWorker(worker: ChildProcess, message: ParentMessage): void {
    if (!worker.connected) {
      return;
    }
    worker.send(message, (error) => {
      if (error) {
        logger.error(chalk.red(`IPC send to worker failed: ${error.message}`));
      }
    });
  }

  /**
   * Wait for all workers to complete
   */
  async waitForCompletion(): Promise<WorkerPoolResult> {
    logger.debug(chalk.blue("Waiting for workers to complete..."));

    await this.allExited();

    const result: WorkerPoolResult = {
      totalWorkers: this.workerCount,
      completedWorkers: 0,
      failedWorkers: 0,
    };

    for (const code of this.exitCodes.values()) {
      if (code === 0) {
        result.completedWorkers++;
      } else {
        result.failedWorkers++;
      }
    }

    logger.debug(
      chalk.green(
        `✓ All workers completed: ${result.completedWorkers} succeeded, ${result.failedWorkers} failed`,
      ),
    );

    return result;
  }

  /**
   * Stop every worker: abort inline workers and in-flight requests,
   * SIGTERM child processes and SIGKILL those still alive after the grace period
   */
  async terminate(): Promise<void> {
    logger.debug(chalk.yellow("Terminating all workers..."));

    this.abortController.abort("worker pool terminated");

    for (const worker of this.children.values()) {
      worker.kill("SIGTERM");
    }

    const startTime = Date.now();
    while (this.children.size > 0 && Date.now() - startTime < TERMINATE_GRACE_MS) {
      await sleep(100);
    }

    // Force kill any remaining workers
    for (const worker of this.children.values()) {
      if (worker.exitCode === null) {
        worker.kill("SIGKILL");
      }
    }

    logger.debug(chalk.gray("All workers terminated"));
  }
}

/**
 * Serves one forked worker's requests against the coordinator's queue and
 * result channel
 */
export class IpcRelay {
  private queue: TaskQueue;
  private results: ResultChannel;
  private signal: AbortSignal;

  constructor(queue: TaskQueue, results: ResultChannel, signal: AbortSignal) {
    this.queue = queue;
    this.results = results;
    this.signal = signal;
  }

  handle(workerId: string, message: unknown, reply: (message: ParentMessage) => void): void {
    if (!isChildMessage(message)) {
      logger.warn(chalk.yellow(`[${workerId}] Unknown message: ${JSON.stringify(message)}`));
      return;
    }

    switch (message.type) {
      case "take":
        this.queue
          .poll(this.signal)
          .then((entry) => {
            if (entry) {
              reply({ type: "entry", entry });
            }
          })
          .catch((error: unknown) => {
            logger.error(chalk.red(`[${workerId}] Dequeue failed: ${errorMessage(error)}`));
          });
        break;
      case "task-done":
        try {
          this.queue.taskDone();
        } catch (error) {
          logger.error(chalk.red(`[${workerId}] ${errorMessage(error)}`));
        }
        break;
      case "status":
        this.results.put(message.record);
        break;
    }
  }
}

export function isChildMessage(value: unknown): value is ChildMessage {
  if (typeof value !== "object" || value === null || !("type" in value)) {
    return false;
  }
  switch (value.type) {
    case "take":
    case "task-done":
      return true;
    case "status":
      return "record" in value;
    default:
      return false;
  }
}

/**
 * Sleep utility
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
