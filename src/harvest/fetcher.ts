import { NetworkFailure, errorMessage } from "../errors.js";
import type { ContentKind } from "../types/enums.js";
import { scopedLogger, type ScopedLogger } from "../utils/logger.js";
import type { InFlightLimiter } from "../workers/dispatch.js";
import type { FetchResult, QueryParams } from "../workers/types.js";

export interface FetcherOptions {
  workerId: string;
  params?: QueryParams;
  /** Per-request timeout; without it a silent endpoint is waited on forever */
  timeoutMs?: number;
  /** Aborts every request still in flight, used when the pool is terminated */
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
  /** Caps the requests in flight across everything sharing this Fetcher */
  limiter?: InFlightLimiter;
}

/**
 * Fetcher
 *
 * Issues single GET requests and classifies the response. Only HTTP 200 is
 * a success; redirects are not followed, so a 3xx is reported as a failure
 * like any other status. Nothing is retried.
 *
 * One Fetcher is shared by every request a worker makes for its batch.
 */
export class Fetcher {
  private readonly workerId: string;
  private readonly params: QueryParams;
  private readonly timeoutMs?: number;
  private readonly signal?: AbortSignal;
  private readonly fetchImpl: typeof fetch;
  private readonly limiter?: InFlightLimiter;
  private readonly log: ScopedLogger;

  constructor(options: FetcherOptions) {
    this.workerId = options.workerId;
    this.params = options.params ?? {};
    this.timeoutMs = options.timeoutMs;
    this.signal = options.signal;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.limiter = options.limiter;
    this.log = scopedLogger(options.workerId);
  }

  get id(): string {
    return this.workerId;
  }

  /**
   * Build the request URL with the configured query parameters appended
   */
  buildUrl(url: string): string {
    const target = new URL(url);
    for (const [key, value] of Object.entries(this.params)) {
      target.searchParams.append(key, String(value));
    }
    return target.toString();
  }

  async fetch(url: string, expect: ContentKind): Promise<FetchResult> {
    let requestUrl: string;
    try {
      requestUrl = this.buildUrl(url);
    } catch (error) {
      return this.fail(new NetworkFailure(url, `failed: invalid URL (${errorMessage(error)})`));
    }

    this.log.debug(`http-get for ${requestUrl}`);

    // The timeout starts once a slot is free, not while queued
    if (this.limiter) {
      return this.limiter.run(() => this.request(url, requestUrl, expect));
    }
    return this.request(url, requestUrl, expect);
  }

  private async request(url: string, requestUrl: string, expect: ContentKind): Promise<FetchResult> {
    const { signal, dispose } = this.requestSignal();
    try {
      const response = await this.fetchImpl(requestUrl, {
        method: "GET",
        redirect: "manual",
        signal,
      });

      if (response.status !== 200) {
        await response.body?.cancel().catch((error: unknown) => {
          this.log.debug(`discarding body of ${url} failed: ${errorMessage(error)}`);
        });
        return this.fail(
          new NetworkFailure(url, `failed, status=${response.status}`, response.status),
        );
      }

      this.log.debug(`Got response [${response.status}] for URL: ${url}`);

      const body =
        expect === "text"
          ? await response.text()
          : new Uint8Array(await response.arrayBuffer());

      return { ok: true, status: 200, body };
    } catch (error) {
      if (signal.aborted) {
        return this.fail(new NetworkFailure(url, `failed: ${abortReason(signal)}`));
      }
      return this.fail(new NetworkFailure(url, `failed: ${errorMessage(error)}`));
    } finally {
      dispose();
    }
  }

  private fail(failure: NetworkFailure): FetchResult {
    this.log.error(failure.message);
    return { ok: false, reason: failure.message, status: failure.status };
  }

  /**
   * Combine the per-request timeout with the worker-wide abort signal
   */
  private requestSignal(): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const external = this.signal;

    const onExternalAbort = () => controller.abort(external?.reason ?? "aborted");
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener("abort", onExternalAbort, { once: true });
    }

    const timeoutMs = this.timeoutMs;
    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => controller.abort(`timeout after ${timeoutMs}ms`), timeoutMs)
        : undefined;

    return {
      signal: controller.signal,
      dispose: () => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        external?.removeEventListener("abort", onExternalAbort);
      },
    };
  }
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return typeof reason === "string" ? reason : errorMessage(reason);
}
