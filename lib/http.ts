/**
 * Outbound GET with per-attempt timeout and bounded exponential backoff.
 * One instance is shared by the chart fetch and the link providers.
 * Retries: network errors, timeouts, 5xx, 429. Other 4xx go back to the caller.
 */

import { loadConfig } from "@/lib/config";
import type { AppConfig } from "@/lib/config";
import { FetchFailedError } from "@/lib/errors";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type HttpClientOptions = {
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs: number;
  headers: Record<string, string>;
  fetchImpl: FetchLike;
  sleep: (ms: number) => Promise<void>;
};

export type RequestOptions = {
  headers?: Record<string, string>;
  timeoutMs?: number;
};

export type HttpResponse = {
  status: number;
  ok: boolean;
  url: string;
  headers: Headers;
  body: string;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** Seconds form of Retry-After only; HTTP-date values are ignored. */
function retryAfterMs(headers: Headers): number | null {
  const raw = headers.get("retry-after");
  if (!raw) return null;
  const seconds = Number(raw.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

export class HttpClient {
  readonly options: HttpClientOptions;

  constructor(options: Partial<HttpClientOptions> = {}) {
    this.options = {
      timeoutMs: options.timeoutMs ?? 8000,
      maxAttempts: Math.max(1, options.maxAttempts ?? 3),
      backoffMs: options.backoffMs ?? 600,
      maxBackoffMs: options.maxBackoffMs ?? 5000,
      headers: {
        "User-Agent": DEFAULT_USER_AGENT,
        "Accept-Language": "en-US,en;q=0.9",
        ...options.headers,
      },
      fetchImpl: options.fetchImpl ?? ((url, init) => fetch(url, init)),
      sleep: options.sleep ?? defaultSleep,
    };
  }

  /** Delay before the attempt that follows `attempt` (1-based). */
  backoffDelay(attempt: number, response?: Response): number {
    const hinted = response ? retryAfterMs(response.headers) : null;
    const computed = this.options.backoffMs * 2 ** (attempt - 1);
    return Math.min(hinted ?? computed, this.options.maxBackoffMs);
  }

  /**
   * GET with retries. Resolves with the terminal response (2xx, 3xx, or a 4xx
   * other than 429). Throws FetchFailedError once attempts run out.
   */
  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const { maxAttempts, fetchImpl, sleep } = this.options;
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const headers = { ...this.options.headers, ...options.headers };
    let lastReason = "no attempt made";
    let lastStatus: number | null = null;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
      let res: Response;
      try {
        res = await fetchImpl(url, { method: "GET", headers, signal: controller.signal });
      } catch (err) {
        clearTimeout(timeoutId);
        lastError = err;
        lastStatus = null;
        lastReason = controller.signal.aborted
          ? `timed out after ${timeoutMs}ms`
          : err instanceof Error ? err.message : String(err);
        if (attempt < maxAttempts) await sleep(this.backoffDelay(attempt));
        continue;
      }

      if (!isRetryableStatus(res.status)) {
        try {
          const body = await res.text();
          return { status: res.status, ok: res.ok, url: res.url || url, headers: res.headers, body };
        } catch (err) {
          lastError = err;
          lastStatus = res.status;
          lastReason = controller.signal.aborted
            ? `timed out after ${timeoutMs}ms reading body`
            : `body read failed: ${err instanceof Error ? err.message : String(err)}`;
          if (attempt < maxAttempts) await sleep(this.backoffDelay(attempt));
          continue;
        } finally {
          clearTimeout(timeoutId);
        }
      }

      clearTimeout(timeoutId);
      lastStatus = res.status;
      lastReason = `HTTP ${res.status}`;
      lastError = undefined;
      // Release the connection before backing off.
      try {
        await res.body?.cancel();
      } catch (err) {
        lastError = err;
      }
      if (attempt < maxAttempts) await sleep(this.backoffDelay(attempt, res));
    }

    throw new FetchFailedError(`${lastReason} (after ${maxAttempts} attempts)`, {
      url,
      attempts: maxAttempts,
      status: lastStatus,
      cause: lastError,
    });
  }

  /** GET that also treats a non-2xx terminal response as a failure. */
  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const res = await this.get(url, options);
    if (!res.ok) {
      throw new FetchFailedError(`HTTP ${res.status}`, { url, status: res.status });
    }
    return res.body;
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const body = await this.getText(url, {
      ...options,
      headers: { Accept: "application/json", ...options.headers },
    });
    try {
      return JSON.parse(body);
    } catch (err) {
      throw new FetchFailedError("response is not JSON", { url, cause: err });
    }
  }
}

/** Client built from configuration; callers set per-request headers and timeouts. */
export function createHttpClient(config: AppConfig = loadConfig()): HttpClient {
  return new HttpClient({
    timeoutMs: config.httpTimeoutMs,
    maxAttempts: config.httpMaxAttempts,
    backoffMs: config.httpBackoffMs,
  });
}
