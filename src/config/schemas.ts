/**
 * Schemas for the pipeline configuration files
 */

import { z } from "zod";
import { DEFAULT_IMAGE_HOST_FILTER } from "../harvest/strategies/image.strategy.js";

const queryParamsSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

/**
 * Ticker pipeline config (JSON)
 */
export const tickerConfigSchema = z.object({
  tickers: z.array(z.string().min(1)),
  base_url: z.string().url(),
  params: queryParamsSchema.default({}),
});

export type TickerConfig = z.infer<typeof tickerConfigSchema>;

const scraperSettingsSchema = z.object({
  URL: z.string().url(),
  OUT_DIR: z.string().min(1),
  AMOUNT_PAGES: z.coerce.number().int().nonnegative(),
  ITEM: z.string().min(1),
  HOST_FILTER: z.string().min(1).default(DEFAULT_IMAGE_HOST_FILTER),
});

/**
 * Image pipeline settings (YAML), either flat or under a `SCRAPER` section
 */
export const imageSettingsSchema = z.preprocess(
  (data) =>
    typeof data === "object" && data !== null && "SCRAPER" in data ? data.SCRAPER : data,
  scraperSettingsSchema,
);

export type ImageSettings = z.infer<typeof scraperSettingsSchema>;
