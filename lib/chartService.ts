/**
 * Caller side of the core: caches charts and links with a TTL and joins each
 * chart entry to its link by rank. The core itself holds no state.
 */

import { loadConfig } from "@/lib/config";
import type { AppConfig } from "@/lib/config";
import { TtlCache } from "@/lib/ttlCache";
import { toChartWeek } from "@/ingest/chart/chartDate";
import type { ChartEntry, ChartSnapshot, StrategyName } from "@/ingest/chart/types";
import { createHttpClient } from "@/lib/http";
import { getChart } from "@/ingest/hot100";
import type { GetChartOptions } from "@/ingest/hot100";
import { createLinkResolver, getLink } from "@/lib/links/resolve";
import type { LinkResolver } from "@/lib/links/resolve";
import type { LinkSource, ResolvedLink } from "@/lib/links/types";
import { normalizeName } from "@/normalize/text";

export type ChartRow = ChartEntry & { url: string; source: LinkSource };

export type ChartWithLinks = {
  date: string;
  strategy: StrategyName;
  rows: ChartRow[];
};

export type ChartServiceOptions = {
  loadChart: (date: string, size: number) => Promise<ChartSnapshot>;
  resolver: Pick<LinkResolver, "resolve">;
  chartTtlMs: number;
  linkTtlMs: number;
  linkConcurrency: number;
  now?: () => number;
};

export class ChartService {
  private readonly charts: TtlCache<ChartSnapshot>;
  private readonly links: TtlCache<ResolvedLink>;

  constructor(private readonly options: ChartServiceOptions) {
    this.charts = new TtlCache<ChartSnapshot>(options.chartTtlMs, options.now);
    this.links = new TtlCache<ResolvedLink>(options.linkTtlMs, options.now);
  }

  /** Throws FetchFailedError / ExtractionFailedError like getChart; failures are not cached. */
  getChart(date: Date | string, size: number): Promise<ChartSnapshot> {
    const week = toChartWeek(date);
    return this.charts.getOrLoad(`${week}:${size}`, () => this.options.loadChart(week, size));
  }

  getLink(title: string, artist: string): Promise<ResolvedLink> {
    const key = `${normalizeName(title)}|${normalizeName(artist)}`;
    return this.links.getOrLoad(key, () => getLink(title, artist, this.options.resolver));
  }

  async getChartWithLinks(date: Date | string, size: number): Promise<ChartWithLinks> {
    const snapshot = await this.getChart(date, size);
    const batch = Math.max(1, this.options.linkConcurrency);
    const linksByRank = new Map<number, ResolvedLink>();

    for (let i = 0; i < snapshot.entries.length; i += batch) {
      const slice = snapshot.entries.slice(i, i + batch);
      const resolved = await Promise.all(slice.map((e) => this.getLink(e.title, e.artist)));
      slice.forEach((e, j) => linksByRank.set(e.rank, resolved[j]));
    }

    const rows: ChartRow[] = [];
    for (const entry of snapshot.entries) {
      const link = linksByRank.get(entry.rank);
      if (link) rows.push({ ...entry, url: link.url, source: link.source });
    }
    return { date: snapshot.date, strategy: snapshot.strategy, rows };
  }
}

export function createChartService(
  config: AppConfig = loadConfig(),
  chartOptions: GetChartOptions = {}
): ChartService {
  const http = chartOptions.http ?? createHttpClient(config);
  return new ChartService({
    loadChart: (date, size) =>
      getChart(date, size, { http, urlTemplate: chartOptions.urlTemplate ?? config.hot100UrlTemplate }),
    resolver: createLinkResolver(http, config),
    chartTtlMs: config.chartCacheTtlMs,
    linkTtlMs: config.linkCacheTtlMs,
    linkConcurrency: config.linkConcurrency,
  });
}

let _service: ChartService | null = null;

/** Shared instance, created on first use. */
export function getDefaultChartService(): ChartService {
  if (!_service) _service = createChartService();
  return _service;
}
