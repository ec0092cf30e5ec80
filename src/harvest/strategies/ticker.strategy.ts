import { logger } from "../../utils/logger.js";
import type { HarvestTarget, Task, TickerStrategyConfig } from "../../workers/types.js";
import { BaseHarvestStrategy, type ResolveResult } from "./base.strategy.js";

/**
 * TickerStrategy
 * One CSV download per ticker symbol: `<baseUrl><ticker>`, appended to
 * `<outputDir>/<ticker>.csv`.
 */
export class TickerStrategy extends BaseHarvestStrategy {
  readonly name = "tickers";
  private readonly baseUrl: string;
  private readonly tickers: string[];

  constructor(config: TickerStrategyConfig, outputDir: string) {
    super(outputDir);
    this.baseUrl = config.baseUrl;
    this.tickers = config.tickers;
  }

  async planItems(requested: number): Promise<Task[]> {
    // Appending is only safe while every ticker is scheduled once
    const unique = [...new Set(this.tickers)];
    const items = unique.slice(0, Math.max(0, requested));

    if (items.length < requested) {
      logger.info(
        `Requested ${requested} tickers, only ${items.length} configured; processing ${items.length}`,
      );
    }
    return items;
  }

  async resolve(item: Task): Promise<ResolveResult> {
    return {
      ok: true,
      targets: [{ url: `${this.baseUrl}${item}`, expect: "text" }],
    };
  }

  async save(item: Task, _target: HarvestTarget, content: string | Uint8Array): Promise<string> {
    return this.appendArtifact(`${item}.csv`, content);
  }
}
