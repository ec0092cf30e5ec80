import chalk from "chalk";
import {
  HARVEST_MODES,
  WORKER_ISOLATIONS,
  type HarvestMode,
  type PipelineKind,
  type WorkerIsolation,
} from "../types/enums.js";
import type { HarvestSummary, WorkerConfig, WorkerCountBound } from "../workers/types.js";
import { getAsciiArt } from "./ascii.js";
import { closeProgressBars } from "./progress.js";

export class OptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OptionError";
  }
}

export function parseMode(value: string): HarvestMode {
  const normalized = value.toLowerCase();
  const mode = HARVEST_MODES.find((candidate) => candidate === normalized);
  if (!mode) {
    throw new OptionError(`mode must be one of: ${HARVEST_MODES.join(", ")}`);
  }
  return mode;
}

export function parseIsolation(value: string): WorkerIsolation {
  const normalized = value.toLowerCase();
  const isolation = WORKER_ISOLATIONS.find((candidate) => candidate === normalized);
  if (!isolation) {
    throw new OptionError(`isolation must be one of: ${WORKER_ISOLATIONS.join(", ")}`);
  }
  return isolation;
}

export function parseNonNegativeInt(value: string, name = "value"): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed) || parsed < 0) {
    throw new OptionError(`${name} must be a non-negative integer`);
  }
  return parsed;
}

export function parsePositiveInt(value: string, name = "value"): number {
  const parsed = parseNonNegativeInt(value, name);
  if (parsed < 1) {
    throw new OptionError(`${name} must be a positive integer`);
  }
  return parsed;
}

/**
 * A worker bound is a number or "cpus" (the number of CPU cores)
 */
export function parseWorkerBound(value: string, name = "worker bound"): WorkerCountBound {
  if (value.toLowerCase() === "cpus") {
    return "cpus";
  }
  return parsePositiveInt(value, name);
}

export function showHeader(version: string): void {
  console.log(chalk.green(getAsciiArt("harvest")));
  console.log(chalk.green.bold(`\nFan-out harvester (Version ${version})`));
}

export function cleanupAfterPromptExit(): void {
  closeProgressBars();
}

export function showConfiguration(
  pipeline: PipelineKind,
  config: WorkerConfig,
  itemCount: number,
  workers: number,
  isolation: WorkerIsolation,
): void {
  console.log(chalk.cyan("\nCollected inputs:"));
  console.log(chalk.white(`  Pipeline: ${pipeline}`));
  console.log(chalk.white(`  Requested items: ${itemCount}`));
  console.log(chalk.white(`  Output directory: ${config.outputDir}`));

  if (config.mode === "async") {
    const cap = config.maxInFlight > 0 ? `${config.maxInFlight} in flight` : "no in-flight cap";
    console.log(chalk.white(`  Fetch mode: Concurrent (${cap} per worker)`));
  } else {
    console.log(chalk.white(`  Fetch mode: Sequential`));
  }

  console.log(chalk.white(`  Workers: ${workers} (${isolation})`));
  if (config.requestTimeoutMs !== undefined) {
    console.log(chalk.white(`  Request timeout: ${config.requestTimeoutMs}ms`));
  }
}

export function showHarvestSummary(summary: HarvestSummary): void {
  const line = (text: string) => `║ ${text.padEnd(48)} ║`;

  console.log(chalk.white("\n╔══════════════════════════════════════════════════╗"));
  console.log(chalk.white("║                     SUMMARY                      ║"));
  console.log(chalk.white("╠══════════════════════════════════════════════════╣"));
  console.log(chalk.white(line(`Items: ${summary.total}`)));
  console.log(chalk.green(line(`✓ Succeeded: ${summary.succeeded}`)));
  console.log(
    summary.failed > 0
      ? chalk.red(line(`✗ Failed: ${summary.failed}`))
      : chalk.white(line(`✗ Failed: 0`)),
  );
  console.log(chalk.white(line(`Workers Used: ${summary.workersUsed}`)));
  if (summary.failedWorkers > 0) {
    console.log(chalk.red(line(`Workers Failed: ${summary.failedWorkers}`)));
  }
  console.log(chalk.white(line(`Duration: ${formatDuration(summary.duration)}`)));
  console.log(chalk.white("╚══════════════════════════════════════════════════╝"));
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else if (seconds > 0) {
    return `${seconds}s`;
  }
  return `${ms}ms`;
}
