import { load } from "cheerio";
import { logger } from "../../utils/logger.js";
import type { Fetcher } from "../fetcher.js";
import type { HarvestTarget, ImageStrategyConfig, Task } from "../../workers/types.js";
import { BaseHarvestStrategy, type ResolveResult } from "./base.strategy.js";

export const DEFAULT_IMAGE_HOST_FILTER = "images.stockfreeimages.com";

/**
 * ImageStrategy
 *
 * Each item is a listing page number. The listing page
 * `<baseUrl>p<page>/<item>.html` is fetched as text, every `<img src>` whose
 * URL contains the host filter becomes a binary download, and each image is
 * written to `<outputDir>/<last path segment>`, replacing older copies.
 */
export class ImageStrategy extends BaseHarvestStrategy {
  readonly name = "images";
  private readonly baseUrl: string;
  private readonly item: string;
  private readonly hostFilter: string;

  constructor(config: ImageStrategyConfig, outputDir: string) {
    super(outputDir);
    this.baseUrl = config.baseUrl;
    this.item = config.item;
    this.hostFilter = config.hostFilter;
  }

  listingUrl(page: Task): string {
    return `${this.baseUrl}p${page}/${this.item}.html`;
  }

  /**
   * Pages 1..n, with n clamped to the page count the site reports
   */
  async planItems(requested: number, fetcher: Fetcher): Promise<Task[]> {
    let count = Math.max(0, requested);
    const available = await this.discoverPageCount(fetcher);

    if (available === undefined) {
      logger.warn(`Could not read the page count of ${this.listingUrl(1)}; keeping ${count} pages`);
    } else if (count > available) {
      logger.info(`Requested ${count} pages, source has ${available}; processing ${available}`);
      count = available;
    }

    return Array.from({ length: count }, (_, index) => index + 1);
  }

  async discoverPageCount(fetcher: Fetcher): Promise<number | undefined> {
    const result = await fetcher.fetch(this.listingUrl(1), "text");
    if (!result.ok) {
      return undefined;
    }
    return parsePageCount(asText(result.body));
  }

  async resolve(item: Task, fetcher: Fetcher): Promise<ResolveResult> {
    const pageUrl = this.listingUrl(item);
    const result = await fetcher.fetch(pageUrl, "text");
    if (!result.ok) {
      return { ok: false, reason: `listing page ${item}: ${result.reason}` };
    }

    const urls = extractImageUrls(asText(result.body), pageUrl, this.hostFilter);
    logger.debug(`[${fetcher.id}] page ${item}: ${urls.length} images`);

    return {
      ok: true,
      targets: urls.map((url) => ({ url, expect: "binary" })),
    };
  }

  async save(_item: Task, target: HarvestTarget, content: string | Uint8Array): Promise<string> {
    return this.writeArtifact(lastPathSegment(target.url), content);
  }
}

/**
 * `img/@src` values containing `hostFilter`, made absolute against the
 * listing page and de-duplicated in document order
 */
export function extractImageUrls(html: string, pageUrl: string, hostFilter: string): string[] {
  const $ = load(html);
  const urls = new Set<string>();

  $("img").each((_, element) => {
    const src = $(element).attr("src");
    if (!src || !src.includes(hostFilter)) {
      return;
    }
    try {
      urls.add(new URL(src, pageUrl).toString());
    } catch {
      logger.debug(`Skipping malformed image URL: ${src}`);
    }
  });

  return [...urls];
}

/**
 * Read the pager text (e.g. "of 10"); the second token is the page count
 */
export function parsePageCount(html: string): number | undefined {
  const $ = load(html);
  const text = $("li.pag-text").first().text().trim();
  const token = text.split(/\s+/)[1];
  if (token === undefined) {
    return undefined;
  }
  const count = parseInt(token, 10);
  return Number.isNaN(count) ? undefined : count;
}

export function lastPathSegment(url: string): string {
  const segments = new URL(url).pathname.split("/").filter(Boolean);
  return segments[segments.length - 1] ?? "index";
}

function asText(body: string | Uint8Array): string {
  return typeof body === "string" ? body : new TextDecoder().decode(body);
}
