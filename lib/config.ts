/**
 * Runtime settings. Everything comes from process.env with a default,
 * so the service runs without a .env file.
 */

export const DEFAULT_HOT100_URL_TEMPLATE = "https://www.billboard.com/charts/hot-100/{date}/";

export type AppConfig = {
  hot100UrlTemplate: string;
  httpTimeoutMs: number;
  httpMaxAttempts: number;
  httpBackoffMs: number;
  linkTimeoutMs: number;
  itunesCountry: string;
  chartCacheTtlMs: number;
  linkCacheTtlMs: number;
  linkConcurrency: number;
};

type Env = Record<string, string | undefined>;

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function nonEmpty(raw: string | undefined, fallback: string): string {
  const v = raw?.trim();
  return v ? v : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    hot100UrlTemplate: nonEmpty(env.HOT100_URL_TEMPLATE, DEFAULT_HOT100_URL_TEMPLATE),
    httpTimeoutMs: positiveInt(env.HTTP_TIMEOUT_MS, 8000),
    httpMaxAttempts: positiveInt(env.HTTP_MAX_ATTEMPTS, 3),
    httpBackoffMs: positiveInt(env.HTTP_BACKOFF_MS, 600),
    linkTimeoutMs: positiveInt(env.LINK_TIMEOUT_MS, 5000),
    itunesCountry: nonEmpty(env.ITUNES_COUNTRY, "US").toUpperCase(),
    chartCacheTtlMs: positiveInt(env.CHART_CACHE_TTL_MS, 60 * 60 * 1000),
    linkCacheTtlMs: positiveInt(env.LINK_CACHE_TTL_MS, 6 * 60 * 60 * 1000),
    linkConcurrency: positiveInt(env.LINK_CONCURRENCY, 5),
  };
}
