/** "sync" runs a worker's batch one item at a time, "async" runs it concurrently */
export type HarvestMode = "sync" | "async";

export type PipelineKind = "tickers" | "images";

export type WorkerIsolation = "process" | "inline";

export type ContentKind = "text" | "binary";

export const HARVEST_MODES: readonly HarvestMode[] = ["sync", "async"];

export const WORKER_ISOLATIONS: readonly WorkerIsolation[] = ["process", "inline"];
