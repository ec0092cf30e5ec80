import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadImageSettings, loadTickerConfig } from "../../src/config/index.js";
import { ConfigLoadError } from "../../src/errors.js";
import { DEFAULT_IMAGE_HOST_FILTER } from "../../src/harvest/strategies/index.js";
import { makeTempDir, removeTempDir } from "../helpers/temp-dir.js";

describe("config loaders", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, content);
    return filePath;
  }

  describe("loadTickerConfig", () => {
    it("should load tickers, base URL and params", async () => {
      const filePath = await writeConfig(
        "tickers.json",
        JSON.stringify({
          tickers: ["AAA", "BBB"],
          base_url: "https://quotes.test/q/",
          params: { format: "csv", days: 30 },
        }),
      );

      expect(loadTickerConfig(filePath)).toEqual({
        tickers: ["AAA", "BBB"],
        base_url: "https://quotes.test/q/",
        params: { format: "csv", days: 30 },
      });
    });

    it("should default params to an empty object", async () => {
      const filePath = await writeConfig(
        "tickers.json",
        JSON.stringify({ tickers: ["AAA"], base_url: "https://quotes.test/q/" }),
      );

      expect(loadTickerConfig(filePath).params).toEqual({});
    });

    it("should reject a missing file", () => {
      const filePath = path.join(dir, "absent.json");

      expect(() => loadTickerConfig(filePath)).toThrow(ConfigLoadError);
      expect(() => loadTickerConfig(filePath)).toThrow(`Failed to load config ${filePath}: `);
    });

    it("should reject malformed JSON", async () => {
      const filePath = await writeConfig("tickers.json", "{ tickers: ");

      expect(() => loadTickerConfig(filePath)).toThrow(
        `Failed to load config ${filePath}: invalid JSON (`,
      );
    });

    it("should name every invalid field", async () => {
      const filePath = await writeConfig(
        "tickers.json",
        JSON.stringify({ tickers: "AAA", base_url: "not a url" }),
      );

      let error: unknown;
      try {
        loadTickerConfig(filePath);
      } catch (caught) {
        error = caught;
      }

      expect(error).toBeInstanceOf(ConfigLoadError);
      expect(error instanceof ConfigLoadError ? error.message : "").toBe(
        `Failed to load config ${filePath}: tickers: Expected array, received string; base_url: Invalid url`,
      );
    });
  });

  describe("loadImageSettings", () => {
    it("should read settings under a SCRAPER section", async () => {
      const filePath = await writeConfig(
        "settings.yaml",
        [
          "SCRAPER:",
          "  URL: https://img.test/",
          "  OUT_DIR: images",
          "  AMOUNT_PAGES: 5",
          "  ITEM: nature",
        ].join("\n"),
      );

      expect(loadImageSettings(filePath)).toEqual({
        URL: "https://img.test/",
        OUT_DIR: "images",
        AMOUNT_PAGES: 5,
        ITEM: "nature",
        HOST_FILTER: DEFAULT_IMAGE_HOST_FILTER,
      });
    });

    it("should read flat settings and coerce a quoted page count", async () => {
      const filePath = await writeConfig(
        "settings.yaml",
        [
          "URL: https://img.test/",
          "OUT_DIR: out",
          'AMOUNT_PAGES: "7"',
          "ITEM: city",
          "HOST_FILTER: cdn.img.test",
        ].join("\n"),
      );

      expect(loadImageSettings(filePath)).toEqual({
        URL: "https://img.test/",
        OUT_DIR: "out",
        AMOUNT_PAGES: 7,
        ITEM: "city",
        HOST_FILTER: "cdn.img.test",
      });
    });

    it("should reject settings missing a required key", async () => {
      const filePath = await writeConfig(
        "settings.yaml",
        ["URL: https://img.test/", "OUT_DIR: out", "AMOUNT_PAGES: 2"].join("\n"),
      );

      expect(() => loadImageSettings(filePath)).toThrow(
        `Failed to load config ${filePath}: ITEM: Required`,
      );
    });

    it("should reject malformed YAML", async () => {
      const filePath = await writeConfig("settings.yaml", "URL: [unclosed");

      expect(() => loadImageSettings(filePath)).toThrow(
        `Failed to load config ${filePath}: invalid YAML (`,
      );
    });
  });
});
