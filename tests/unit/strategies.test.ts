import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Fetcher } from "../../src/harvest/fetcher.js";
import {
  DEFAULT_IMAGE_HOST_FILTER,
  ImageStrategy,
  TickerStrategy,
  createStrategy,
  type HarvestStrategy,
  extractImageUrls,
  lastPathSegment,
  parsePageCount,
} from "../../src/harvest/strategies/index.js";
import { routes } from "../helpers/fake-fetch.js";
import { makeTempDir, removeTempDir } from "../helpers/temp-dir.js";

const IMAGE_BASE = "https://img.test/";

function pagerHtml(text: string): string {
  return `<html><body><ul class="pagination"><li class="pag-text">${text}</li></ul></body></html>`;
}

describe("TickerStrategy", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(outputDir);
  });

  function createTickers(tickers: string[]): HarvestStrategy {
    return new TickerStrategy(
      { kind: "ticker", baseUrl: "https://quotes.test/q/", tickers, params: {} },
      outputDir,
    );
  }

  it("should plan at most the requested tickers, each once", async () => {
    const fetcher = new Fetcher({ workerId: "coordinator", fetchImpl: routes({}).fetchImpl });
    const strategy = createTickers(["AAA", "BBB", "AAA", "CCC"]);

    expect(await strategy.planItems(2, fetcher)).toEqual(["AAA", "BBB"]);
    expect(await strategy.planItems(10, fetcher)).toEqual(["AAA", "BBB", "CCC"]);
    expect(await strategy.planItems(0, fetcher)).toEqual([]);
  });

  it("should resolve a ticker to one text download", async () => {
    const fetcher = new Fetcher({ workerId: "worker-1", fetchImpl: routes({}).fetchImpl });

    expect(await createTickers(["AAA"]).resolve("AAA", fetcher)).toEqual({
      ok: true,
      targets: [{ url: "https://quotes.test/q/AAA", expect: "text" }],
    });
  });

  it("should append to <ticker>.csv", async () => {
    const strategy = createTickers(["AAA"]);
    const target = { url: "https://quotes.test/q/AAA", expect: "text" as const };

    const first = await strategy.save("AAA", target, "1,2\n");
    const second = await strategy.save("AAA", target, "3,4\n");

    expect(first).toBe(path.join(outputDir, "AAA.csv"));
    expect(second).toBe(first);
    expect(await fs.readFile(first, "utf8")).toBe("1,2\n3,4\n");
  });
});

describe("ImageStrategy", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(outputDir);
  });

  function createImages(): ImageStrategy {
    return new ImageStrategy(
      {
        kind: "image",
        baseUrl: IMAGE_BASE,
        item: "nature",
        hostFilter: DEFAULT_IMAGE_HOST_FILTER,
        params: {},
      },
      outputDir,
    );
  }

  it("should build listing page URLs from base URL, page and item", () => {
    expect(createImages().listingUrl(3)).toBe("https://img.test/p3/nature.html");
  });

  it("should clamp the requested pages to the page count the site reports", async () => {
    const { fetchImpl } = routes({
      "https://img.test/p1/nature.html": { status: 200, body: pagerHtml("of 10") },
    });
    const fetcher = new Fetcher({ workerId: "coordinator", fetchImpl });

    expect(await createImages().planItems(50, fetcher)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(await createImages().planItems(3, fetcher)).toEqual([1, 2, 3]);
  });

  it("should keep the requested pages when the page count cannot be read", async () => {
    const fetcher = new Fetcher({ workerId: "coordinator", fetchImpl: routes({}).fetchImpl });

    expect(await createImages().planItems(3, fetcher)).toEqual([1, 2, 3]);
  });

  it("should resolve a page to the binary downloads of its matching images", async () => {
    const { fetchImpl } = routes({
      "https://img.test/p2/nature.html": {
        status: 200,
        body: '<img src="https://images.stockfreeimages.com/2/lake.jpg"><img src="/logo.png">',
      },
    });
    const fetcher = new Fetcher({ workerId: "worker-1", fetchImpl });

    expect(await createImages().resolve(2, fetcher)).toEqual({
      ok: true,
      targets: [{ url: "https://images.stockfreeimages.com/2/lake.jpg", expect: "binary" }],
    });
  });

  it("should fail the page when its listing cannot be fetched", async () => {
    const { fetchImpl } = routes({ "https://img.test/p2/nature.html": { status: 500 } });
    const fetcher = new Fetcher({ workerId: "worker-1", fetchImpl });

    expect(await createImages().resolve(2, fetcher)).toEqual({
      ok: false,
      reason: "listing page 2: https://img.test/p2/nature.html failed, status=500",
    });
  });

  it("should overwrite <last path segment> on save", async () => {
    const strategy = createImages();
    const target = { url: "https://images.stockfreeimages.com/2/lake.jpg", expect: "binary" as const };

    await strategy.save(2, target, new Uint8Array([1, 2, 3]));
    const filePath = await strategy.save(2, target, new Uint8Array([9]));

    expect(filePath).toBe(path.join(outputDir, "lake.jpg"));
    expect([...(await fs.readFile(filePath))]).toEqual([9]);
  });

  it("should leave one whole file when pages save the same image at once", async () => {
    const strategy = createImages();
    const target = { url: "https://images.stockfreeimages.com/shared/lake.jpg", expect: "binary" as const };
    const contents = [1, 2, 3, 4, 5, 6].map((page) => new Uint8Array(4096).fill(page));

    await Promise.all(contents.map((content, index) => strategy.save(index + 1, target, content)));

    expect(await fs.readdir(outputDir)).toEqual(["lake.jpg"]);
    const saved = await fs.readFile(path.join(outputDir, "lake.jpg"));
    expect(saved).toHaveLength(4096);
    expect(new Set(saved).size).toBe(1);
    expect([1, 2, 3, 4, 5, 6]).toContain(saved[0]);
  });
});

describe("extractImageUrls", () => {
  const pageUrl = "https://www.stockfreeimages.com/p1/nature.html";

  it("should keep matching sources, absolute and de-duplicated, in document order", () => {
    const html = `
      <div>
        <img src="https://images.stockfreeimages.com/1/forest.jpg">
        <img src="/static/logo.png">
        <img src="//images.stockfreeimages.com/1/river.jpg">
        <img src="https://images.stockfreeimages.com/1/forest.jpg">
        <img alt="no source">
      </div>`;

    expect(extractImageUrls(html, pageUrl, DEFAULT_IMAGE_HOST_FILTER)).toEqual([
      "https://images.stockfreeimages.com/1/forest.jpg",
      "https://images.stockfreeimages.com/1/river.jpg",
    ]);
  });

  it("should return nothing when no image matches the filter", () => {
    expect(extractImageUrls('<img src="/a.png">', pageUrl, DEFAULT_IMAGE_HOST_FILTER)).toEqual([]);
  });
});

describe("parsePageCount", () => {
  it("should read the second token of the pager text", () => {
    expect(parsePageCount(pagerHtml("of 10"))).toBe(10);
    expect(parsePageCount(pagerHtml("  of   42 pages "))).toBe(42);
  });

  it("should return undefined without a numeric page count", () => {
    expect(parsePageCount("<p>no pager</p>")).toBeUndefined();
    expect(parsePageCount(pagerHtml("of many"))).toBeUndefined();
  });
});

describe("lastPathSegment", () => {
  it("should return the file name of the URL path", () => {
    expect(lastPathSegment("https://images.stockfreeimages.com/a/b/photo.jpg?size=2")).toBe(
      "photo.jpg",
    );
  });

  it("should fall back to index for a bare host", () => {
    expect(lastPathSegment("https://images.stockfreeimages.com/")).toBe("index");
  });
});

describe("createStrategy", () => {
  it("should rebuild the strategy named by the config", () => {
    expect(
      createStrategy(
        { kind: "ticker", baseUrl: "https://quotes.test/q/", tickers: [], params: {} },
        "out",
      ).name,
    ).toBe("tickers");
    expect(
      createStrategy(
        { kind: "image", baseUrl: IMAGE_BASE, item: "nature", hostFilter: "x", params: {} },
        "out",
      ).name,
    ).toBe("images");
  });
});
