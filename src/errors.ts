/**
 * Error kinds raised by the harvester. Only configuration errors are fatal;
 * network and filesystem errors are turned into failure records by workers.
 */

export type HarvestErrorCode =
  | "CONFIG_LOAD"
  | "NETWORK"
  | "FILESYSTEM_WRITE"
  | "COMPLETION_TIMEOUT";

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;

  constructor(code: HarvestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigLoadError extends HarvestError {
  readonly path: string;

  constructor(path: string, detail: string, cause?: unknown) {
    super("CONFIG_LOAD", `Failed to load config ${path}: ${detail}`, { cause });
    this.path = path;
  }
}

export class NetworkFailure extends HarvestError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, detail: string, status?: number) {
    super("NETWORK", `${url} ${detail}`);
    this.url = url;
    this.status = status;
  }
}

export class FilesystemWriteError extends HarvestError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super("FILESYSTEM_WRITE", `Failed to write ${filePath}: ${errorMessage(cause)}`, { cause });
    this.filePath = filePath;
  }
}

export class CompletionTimeoutError extends HarvestError {
  constructor(timeoutMs: number) {
    super("COMPLETION_TIMEOUT", `No status record within ${timeoutMs}ms`);
  }
}

export const ExitCode = {
  Success: 0,
  Failure: 1,
  ConfigLoad: 2,
  NoItems: 3,
  Interrupted: 130,
  Terminated: 143,
} as const;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
