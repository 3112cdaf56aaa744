/**
 * Billboard Hot 100 for one chart week: build URL → fetch → extract → truncate.
 * Fetch and extraction failures propagate; a wrong chart is worse than none.
 */

import { loadConfig } from "@/lib/config";
import { FetchFailedError } from "@/lib/errors";
import { createHttpClient } from "@/lib/http";
import type { HttpClient } from "@/lib/http";
import { toChartWeek } from "@/ingest/chart/chartDate";
import { extractChart } from "@/ingest/chart/extract";
import type { ChartSnapshot } from "@/ingest/chart/types";

export const MAX_CHART_SIZE = 100;

export type GetChartOptions = {
  http?: HttpClient;
  urlTemplate?: string;
};

export function chartUrl(chartWeek: string, template: string = loadConfig().hot100UrlTemplate): string {
  return template.replace("{date}", chartWeek);
}

/**
 * Fetch and parse the chart for the week containing `date`.
 * Throws FetchFailedError, ExtractionFailedError, or RangeError for a bad date/size.
 */
export async function getChart(
  date: Date | string,
  size: number,
  options: GetChartOptions = {}
): Promise<ChartSnapshot> {
  if (!Number.isInteger(size) || size < 1 || size > MAX_CHART_SIZE) {
    throw new RangeError(`Chart size must be an integer from 1 to ${MAX_CHART_SIZE}, got ${size}`);
  }
  const chartWeek = toChartWeek(date);
  const url = chartUrl(chartWeek, options.urlTemplate);
  const http = options.http ?? createHttpClient();

  const res = await http.get(url, { headers: { Accept: "text/html,application/xhtml+xml" } });
  if (!res.ok) {
    throw new FetchFailedError(`HTTP ${res.status}`, { url, status: res.status });
  }

  const snapshot = extractChart(res.body, { date: chartWeek, limit: size });
  if (process.env.NODE_ENV !== "test") {
    console.log(`[hot100] ${chartWeek} → ${snapshot.entries.length} entries via ${snapshot.strategy}`);
  }
  return { ...snapshot, entries: snapshot.entries.slice(0, size) };
}
