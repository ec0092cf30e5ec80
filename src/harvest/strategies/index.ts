import type { StrategyConfig } from "../../workers/types.js";
import type { HarvestStrategy } from "./base.strategy.js";
import { ImageStrategy } from "./image.strategy.js";
import { TickerStrategy } from "./ticker.strategy.js";

/**
 * Rebuild a strategy from its serialisable config (workers receive only
 * plain data over IPC)
 */
export function createStrategy(config: StrategyConfig, outputDir: string): HarvestStrategy {
  switch (config.kind) {
    case "ticker":
      return new TickerStrategy(config, outputDir);
    case "image":
      return new ImageStrategy(config, outputDir);
  }
}

export { BaseHarvestStrategy } from "./base.strategy.js";
export type { HarvestStrategy, ResolveResult } from "./base.strategy.js";
export {
  DEFAULT_IMAGE_HOST_FILTER,
  ImageStrategy,
  extractImageUrls,
  lastPathSegment,
  parsePageCount,
} from "./image.strategy.js";
export { TickerStrategy } from "./ticker.strategy.js";
