#!/usr/bin/env node
/**
 * Fan-out harvester CLI
 *
 * Fetches remote content for a bounded list of items (ticker symbols or
 * listing pages) with a pool of workers, writes one file per item and
 * reports how many items succeeded.
 *
 * @module index
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import {
  DEFAULT_SETTINGS_FILE,
  loadImageSettings,
  loadTickerConfig,
} from "./src/config/index.js";
import { ConfigLoadError, ExitCode, errorMessage } from "./src/errors.js";
import {
  DEFAULT_MAX_IN_FLIGHT,
  DEFAULT_MODES,
  DEFAULT_TICKER_COUNT,
  DEFAULT_TICKER_OUT_DIR,
  DEFAULT_WORKERS,
  buildImagePipeline,
  buildTickerPipeline,
  type PipelinePlan,
  type RunSettings,
} from "./src/harvest/pipelines.js";
import type { HarvestMode, PipelineKind, WorkerIsolation } from "./src/types/enums.js";
import {
  OptionError,
  cleanupAfterPromptExit,
  parseIsolation,
  parseMode,
  parseNonNegativeInt,
  parsePositiveInt,
  parseWorkerBound,
  showConfiguration,
  showHarvestSummary,
  showHeader,
} from "./src/utils/helpers.js";
import { installConsoleBridge, logger, setVerboseMode } from "./src/utils/logger.js";
import {
  addHarvestProgressTask,
  closeProgressBars,
  markTaskDone,
  updateHarvestProgress,
} from "./src/utils/progress.js";
import { promptConfirm, promptInput, promptSelect } from "./src/utils/prompt.js";
import { Coordinator, effectiveWorkerCount } from "./src/workers/index.js";
import type { WorkerCountBound } from "./src/workers/types.js";

// ============================================================================
// SECTION 2: CONSTANTS & CONFIGURATION
// ============================================================================

/** Application version from package.json (beside this file, or one level up once built) */
function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [path.join(here, "package.json"), path.join(here, "..", "package.json")]) {
    if (fs.existsSync(candidate)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
      if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
        return String(packageJson.version);
      }
    }
  }
  return "0.0.0";
}

const VERSION = readVersion();

interface CommonOptions {
  mode?: HarvestMode;
  parallel?: number;
  outdir?: string;
  maxInFlight: number;
  requestTimeout?: number;
  completionTimeout?: number;
  minWorkers?: WorkerCountBound;
  maxWorkers?: WorkerCountBound;
  isolation: WorkerIsolation;
  verbose: boolean;
}

interface TickerOptions extends CommonOptions {
  tickerconf: string;
  count: number;
}

interface ImageOptions extends CommonOptions {
  settings: string;
  pages?: number;
}

/**
 * Adapt a parser throwing OptionError to commander's argument errors
 */
function argument<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      if (error instanceof OptionError) {
        throw new InvalidArgumentError(error.message);
      }
      throw error;
    }
  };
}

/** Commander.js program instance */
const program = new Command();

let headerShown = false;

function showHeaderOnce(): void {
  if (!headerShown) {
    showHeader(VERSION);
    headerShown = true;
  }
}

/** Coordinator of the run in progress, stopped on SIGINT/SIGTERM */
let activeCoordinator: Coordinator | null = null;

installConsoleBridge();

// ============================================================================
// SECTION 3: HARVEST WORKFLOW
// ============================================================================

function toRunSettings(pipeline: PipelineKind, options: CommonOptions, count?: number): RunSettings {
  return {
    mode: options.mode ?? DEFAULT_MODES[pipeline],
    workers: options.parallel ?? DEFAULT_WORKERS[pipeline],
    count,
    outDir: options.outdir,
    maxInFlight: options.maxInFlight,
    requestTimeoutMs: options.requestTimeout,
    completionTimeoutMs: options.completionTimeout,
    minWorkers: options.minWorkers,
    maxWorkers: options.maxWorkers,
    isolation: options.isolation,
    verbose: options.verbose,
  };
}

/**
 * Load the pipeline's config file and build its plan.
 * Throws ConfigLoadError before any worker is started.
 */
function planPipeline(
  pipeline: PipelineKind,
  configPath: string,
  settings: RunSettings,
): PipelinePlan {
  if (pipeline === "tickers") {
    return buildTickerPipeline(loadTickerConfig(configPath), settings);
  }
  return buildImagePipeline(loadImageSettings(configPath), settings);
}

/**
 * Run one harvest and map its outcome to an exit code
 */
async function runHarvest(
  pipeline: PipelineKind,
  configPath: string,
  settings: RunSettings,
): Promise<number> {
  setVerboseMode(settings.verbose ?? false);
  showHeaderOnce();

  let plan: PipelinePlan;
  try {
    plan = planPipeline(pipeline, configPath, settings);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      logger.error(chalk.red(error.message));
      return ExitCode.ConfigLoad;
    }
    throw error;
  }

  showConfiguration(
    pipeline,
    plan.config,
    plan.options.itemCount,
    effectiveWorkerCount(plan.options),
    plan.options.isolation ?? "process",
  );
  console.log(chalk.green("\nStarting harvest...\n"));

  const showProgress = !settings.verbose && process.stdout.isTTY === true;
  let progressStarted = false;

  const coordinator = new Coordinator(plan.config, {
    ...plan.options,
    onProgress: showProgress
      ? (done, total) => {
          if (!progressStarted) {
            addHarvestProgressTask(total);
            progressStarted = true;
          }
          updateHarvestProgress(done, total);
        }
      : undefined,
  });

  activeCoordinator = coordinator;
  try {
    const summary = await coordinator.run();

    if (progressStarted) {
      markTaskDone(`${summary.succeeded} harvested ✓`, chalk.green);
      closeProgressBars();
    }

    showHarvestSummary(summary);

    if (summary.total === 0) {
      logger.warn(chalk.yellow("Nothing to harvest: zero items were planned"));
      return ExitCode.NoItems;
    }
    return ExitCode.Success;
  } finally {
    activeCoordinator = null;
    closeProgressBars();
  }
}

// ============================================================================
// SECTION 4: INTERACTIVE MODE
// ============================================================================

/**
 * Prompt for every run setting, then harvest
 */
async function runInteractiveMode(): Promise<number> {
  showHeaderOnce();

  const pipeline = await promptSelect<PipelineKind>({
    message: "What do you want to harvest?",
    choices: [
      { name: "Ticker data (CSV per ticker)", value: "tickers" },
      { name: "Images from listing pages", value: "images" },
    ],
    cleanup: cleanupAfterPromptExit,
  });

  const configPath = await promptInput({
    message: pipeline === "tickers" ? "Ticker config file (JSON):" : "Settings file (YAML):",
    default: pipeline === "tickers" ? "tickers.json" : DEFAULT_SETTINGS_FILE,
    validate: (value) => (value.trim() ? true : "A config file is required"),
    cleanup: cleanupAfterPromptExit,
  });

  const mode = await promptSelect<HarvestMode>({
    message: "Fetch mode:",
    choices: [
      { name: "Sequential (sync)", value: "sync" },
      { name: "Concurrent (async)", value: "async" },
    ],
    default: DEFAULT_MODES[pipeline],
    cleanup: cleanupAfterPromptExit,
  });

  const workersInput = await promptInput({
    message: "Number of workers:",
    default: String(DEFAULT_WORKERS[pipeline]),
    validate: (value) => {
      const num = Number(value);
      return Number.isInteger(num) && num >= 1 ? true : "Please enter a positive integer";
    },
    cleanup: cleanupAfterPromptExit,
  });

  const countInput = await promptInput({
    message:
      pipeline === "tickers"
        ? "How many tickers to fetch:"
        : "How many pages to fetch (leave empty for the settings file value):",
    default: pipeline === "tickers" ? String(DEFAULT_TICKER_COUNT) : "",
    validate: (value) => {
      if (value.trim() === "" && pipeline === "images") {
        return true;
      }
      const num = Number(value);
      return Number.isInteger(num) && num >= 0 ? true : "Please enter a non-negative integer";
    },
    cleanup: cleanupAfterPromptExit,
  });

  const isVerbose = await promptConfirm({
    message: "Enable verbose output?",
    default: false,
    cleanup: cleanupAfterPromptExit,
  });

  return runHarvest(pipeline, configPath, {
    mode,
    workers: Number(workersInput),
    count: countInput.trim() === "" ? undefined : Number(countInput),
    outDir: pipeline === "tickers" ? DEFAULT_TICKER_OUT_DIR : undefined,
    maxInFlight: DEFAULT_MAX_IN_FLIGHT,
    isolation: "process",
    verbose: isVerbose,
  });
}

// ============================================================================
// SECTION 5: MAIN APPLICATION
// ============================================================================

function addRunOptions(command: Command, pipeline: PipelineKind): Command {
  return command
    .option(
      "-m, --mode <mode>",
      `evaluation mode, sync or async (default: ${DEFAULT_MODES[pipeline]})`,
      argument(parseMode),
    )
    .option(
      "-p, --parallel <number>",
      `multiprocessing count (default: ${DEFAULT_WORKERS[pipeline]})`,
      argument((value) => parsePositiveInt(value, "--parallel")),
    )
    .option(
      "--max-in-flight <number>",
      "in-flight requests per worker in async mode, 0 for no cap",
      argument((value) => parseNonNegativeInt(value, "--max-in-flight")),
      DEFAULT_MAX_IN_FLIGHT,
    )
    .option(
      "--request-timeout <ms>",
      "per-request timeout in milliseconds",
      argument((value) => parsePositiveInt(value, "--request-timeout")),
    )
    .option(
      "--completion-timeout <ms>",
      "give up waiting for unreported items after this many milliseconds",
      argument((value) => parsePositiveInt(value, "--completion-timeout")),
    )
    .option(
      "--min-workers <n|cpus>",
      "never run fewer workers than this",
      argument((value) => parseWorkerBound(value, "--min-workers")),
    )
    .option(
      "--max-workers <n|cpus>",
      "never run more workers than this",
      argument((value) => parseWorkerBound(value, "--max-workers")),
    )
    .option(
      "--isolation <kind>",
      "run workers as child processes or inline async tasks",
      argument(parseIsolation),
      "process",
    )
    .option("-v, --verbose", "Show verbose debug output", false);
}

/**
 * Main application entry point.
 * Resolves to the process exit code.
 */
async function main(): Promise<number> {
  let exitCode: number = ExitCode.Success;

  program
    .name("harvest")
    .description("Evaluate sync vs async multiprocessing harvesting")
    .version(VERSION)
    .option("-i, --interactive", "Interactive mode: prompt for all options", false)
    .configureHelp({
      sortSubcommands: true,
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Interactive mode: harvest
    - Tickers, sequential: harvest tickers -t tickers.json -c 10 -p 4
    - Tickers, concurrent: harvest tickers -t tickers.json -m async -p 2 -o tickerdata
    - Images from settings.yaml: harvest images -m async -p 4
    - Bounded run: harvest images --request-timeout 10000 --completion-timeout 600000
    - Worker bounds: harvest tickers -t tickers.json -p 16 --max-workers cpus
    Exit codes: 0 done, 1 unexpected error, 2 config load failure, 3 nothing to harvest
      `,
    )
    .action(async () => {
      exitCode = await runInteractiveMode();
    });

  addRunOptions(
    program
      .command("tickers")
      .description("Fetch one CSV per ticker and append it to <outdir>/<ticker>.csv")
      .requiredOption("-t, --tickerconf <path>", "ticker config file")
      .option(
        "-c, --count <number>",
        "count of tickers to fetch",
        argument((value) => parseNonNegativeInt(value, "--count")),
        DEFAULT_TICKER_COUNT,
      )
      .option(
        "-o, --outdir <path>",
        "output directory to store downloaded tickers",
        DEFAULT_TICKER_OUT_DIR,
      ),
    "tickers",
  ).action(async (options: TickerOptions) => {
    exitCode = await runHarvest(
      "tickers",
      options.tickerconf,
      toRunSettings("tickers", options, options.count),
    );
  });

  addRunOptions(
    program
      .command("images")
      .description("Download the images of listing pages into <outdir>/<image name>")
      .option("-s, --settings <path>", "settings file", DEFAULT_SETTINGS_FILE)
      .option(
        "-n, --pages <number>",
        "pages to fetch (default: AMOUNT_PAGES from the settings file)",
        argument((value) => parseNonNegativeInt(value, "--pages")),
      )
      .option("-o, --outdir <path>", "output directory (default: OUT_DIR from the settings file)"),
    "images",
  ).action(async (options: ImageOptions) => {
    exitCode = await runHarvest(
      "images",
      options.settings,
      toRunSettings("images", options, options.pages),
    );
  });

  // -------------------------------------------------------------------------
  // Setup Signal Handlers for Graceful Interruption
  // -------------------------------------------------------------------------
  let isShuttingDown = false;

  const shutdown = async (label: string, code: number): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(chalk.yellow(`\n\n⚠ ${label}`));
    logger.info(chalk.gray("Cleaning up resources..."));
    closeProgressBars();

    logger.info(chalk.gray("- Stopping workers"));
    await activeCoordinator?.terminate().catch((error: unknown) => {
      logger.error(chalk.red(`Failed to stop workers: ${errorMessage(error)}`));
    });

    logger.info(chalk.gray("Exiting..."));
    process.exit(code);
  };

  process.on("SIGINT", () => void shutdown("Interrupted by user (Ctrl+C)", ExitCode.Interrupted));
  process.on("SIGTERM", () => void shutdown("Received SIGTERM", ExitCode.Terminated));

  logger.debug(chalk.gray(`Running on ${os.cpus().length} CPU cores`));

  await program.parseAsync();
  return exitCode;
}

// ============================================================================
// SECTION 6: ERROR HANDLING
// ============================================================================

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    closeProgressBars();
    logger.error(chalk.red(errorMessage(err)));
    process.exitCode = ExitCode.Failure;
  });
