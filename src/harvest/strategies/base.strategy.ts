import fs from "fs/promises";
import path from "path";
import { FilesystemWriteError } from "../../errors.js";
import type { Fetcher } from "../fetcher.js";
import type { HarvestTarget, Task } from "../../workers/types.js";

let tempCounter = 0;

export type ResolveResult =
  | { ok: true; targets: HarvestTarget[] }
  | { ok: false; reason: string };

/**
 * Turns work items into fetchable URLs and persists what was fetched
 */
export interface HarvestStrategy {
  readonly name: string;
  /** Decide which items to enqueue; runs once in the coordinator */
  planItems(requested: number, fetcher: Fetcher): Promise<Task[]>;
  resolve(item: Task, fetcher: Fetcher): Promise<ResolveResult>;
  /** Persist one fetched body and return the written file path */
  save(item: Task, target: HarvestTarget, content: string | Uint8Array): Promise<string>;
}

/**
 * BaseHarvestStrategy
 * File helpers shared by all strategies
 */
export abstract class BaseHarvestStrategy implements HarvestStrategy {
  abstract readonly name: string;
  protected readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  abstract planItems(requested: number, fetcher: Fetcher): Promise<Task[]>;
  abstract resolve(item: Task, fetcher: Fetcher): Promise<ResolveResult>;
  abstract save(item: Task, target: HarvestTarget, content: string | Uint8Array): Promise<string>;

  protected outputPath(fileName: string): string {
    return path.join(this.outputDir, fileName);
  }

  /**
   * Replace the file. Content goes to a temporary file renamed into place,
   * so concurrent writers of one name leave exactly one of their contents.
   */
  protected async writeArtifact(fileName: string, content: string | Uint8Array): Promise<string> {
    const filePath = this.outputPath(fileName);
    const tempPath = `${filePath}.${process.pid}-${++tempCounter}.tmp`;
    try {
      await fs.writeFile(tempPath, content);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new FilesystemWriteError(filePath, error);
    }
    return filePath;
  }

  /**
   * Append to the file, creating it when missing
   */
  protected async appendArtifact(fileName: string, content: string | Uint8Array): Promise<string> {
    const filePath = this.outputPath(fileName);
    try {
      await fs.appendFile(filePath, content);
    } catch (error) {
      throw new FilesystemWriteError(filePath, error);
    }
    return filePath;
  }
}
