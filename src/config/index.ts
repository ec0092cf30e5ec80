import fs from "fs";
import yaml from "js-yaml";
import { ZodError } from "zod";
import { ConfigLoadError, errorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";
import {
  imageSettingsSchema,
  tickerConfigSchema,
  type ImageSettings,
  type TickerConfig,
} from "./schemas.js";

export const DEFAULT_SETTINGS_FILE = "settings.yaml";

/**
 * Load the ticker pipeline config: `{ tickers, base_url, params }`
 */
export function loadTickerConfig(filePath: string): TickerConfig {
  const raw = readConfigFile(filePath);

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigLoadError(filePath, `invalid JSON (${errorMessage(error)})`, error);
  }

  const config = validate(filePath, tickerConfigSchema, data);
  logger.debug(`Loaded ${config.tickers.length} tickers from ${filePath}`);
  return config;
}

/**
 * Load the image pipeline settings: `URL`, `OUT_DIR`, `AMOUNT_PAGES`, `ITEM`
 */
export function loadImageSettings(filePath: string = DEFAULT_SETTINGS_FILE): ImageSettings {
  const raw = readConfigFile(filePath);

  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (error) {
    throw new ConfigLoadError(filePath, `invalid YAML (${errorMessage(error)})`, error);
  }

  const settings = validate(filePath, imageSettingsSchema, data);
  logger.debug(`Loaded settings from ${filePath}`);
  return settings;
}

function readConfigFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigLoadError(filePath, errorMessage(error), error);
  }
}

function validate<T>(filePath: string, schema: { parse(data: unknown): T }, data: unknown): T {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigLoadError(filePath, issues, error);
    }
    throw error;
  }
}

export type { ImageSettings, TickerConfig };
