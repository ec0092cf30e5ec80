import type { ImageSettings, TickerConfig } from "../config/index.js";
import type { HarvestMode, PipelineKind, WorkerIsolation } from "../types/enums.js";
import type {
  CoordinatorOptions,
  WorkerConfig,
  WorkerCountBound,
  WorkerCountPolicy,
} from "../workers/types.js";

export const DEFAULT_MAX_IN_FLIGHT = 16;
export const DEFAULT_TICKER_COUNT = 10;
export const DEFAULT_TICKER_OUT_DIR = "tickerdata";

/**
 * Image harvesting never runs on fewer workers than cores, ticker
 * harvesting never on more
 */
export const DEFAULT_WORKER_POLICIES: Record<PipelineKind, WorkerCountPolicy> = {
  images: { minWorkers: "cpus" },
  tickers: { maxWorkers: "cpus" },
};

export const DEFAULT_MODES: Record<PipelineKind, HarvestMode> = {
  images: "async",
  tickers: "sync",
};

export const DEFAULT_WORKERS: Record<PipelineKind, number> = {
  images: 4,
  tickers: 1,
};

export interface RunSettings {
  mode: HarvestMode;
  workers: number;
  count?: number;
  outDir?: string;
  maxInFlight?: number;
  requestTimeoutMs?: number;
  completionTimeoutMs?: number;
  minWorkers?: WorkerCountBound;
  maxWorkers?: WorkerCountBound;
  isolation?: WorkerIsolation;
  verbose?: boolean;
}

export interface PipelinePlan {
  config: WorkerConfig;
  options: CoordinatorOptions;
}

export function buildTickerPipeline(ticker: TickerConfig, settings: RunSettings): PipelinePlan {
  return {
    config: {
      mode: settings.mode,
      outputDir: settings.outDir ?? DEFAULT_TICKER_OUT_DIR,
      strategy: {
        kind: "ticker",
        baseUrl: ticker.base_url,
        tickers: ticker.tickers,
        params: ticker.params,
      },
      maxInFlight: settings.maxInFlight ?? DEFAULT_MAX_IN_FLIGHT,
      requestTimeoutMs: settings.requestTimeoutMs,
    },
    options: coordinatorOptions("tickers", settings.count ?? DEFAULT_TICKER_COUNT, settings),
  };
}

export function buildImagePipeline(image: ImageSettings, settings: RunSettings): PipelinePlan {
  return {
    config: {
      mode: settings.mode,
      outputDir: settings.outDir ?? image.OUT_DIR,
      strategy: {
        kind: "image",
        baseUrl: image.URL,
        item: image.ITEM,
        hostFilter: image.HOST_FILTER,
        params: {},
      },
      maxInFlight: settings.maxInFlight ?? DEFAULT_MAX_IN_FLIGHT,
      requestTimeoutMs: settings.requestTimeoutMs,
    },
    options: coordinatorOptions("images", settings.count ?? image.AMOUNT_PAGES, settings),
  };
}

function coordinatorOptions(
  pipeline: PipelineKind,
  itemCount: number,
  settings: RunSettings,
): CoordinatorOptions {
  const hasExplicitBounds =
    settings.minWorkers !== undefined || settings.maxWorkers !== undefined;

  return {
    itemCount,
    workers: settings.workers,
    workerPolicy: hasExplicitBounds
      ? { minWorkers: settings.minWorkers, maxWorkers: settings.maxWorkers }
      : DEFAULT_WORKER_POLICIES[pipeline],
    isolation: settings.isolation,
    completionTimeoutMs: settings.completionTimeoutMs,
    verbose: settings.verbose,
  };
}
