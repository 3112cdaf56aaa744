/**
 * Chart extraction: JSON-LD first, markup heuristics second.
 * Output ranks are always contiguous from 1.
 */

import * as cheerio from "cheerio";
import { ExtractionFailedError } from "@/lib/errors";
import { collapseWhitespace } from "@/normalize/text";
import { markupStrategy } from "./markup";
import { structuredDataStrategy } from "./structuredData";
import type { ChartEntry, ChartSnapshot, ParseStrategy, RawChartEntry } from "./types";

export const DEFAULT_STRATEGIES: readonly ParseStrategy[] = [structuredDataStrategy, markupStrategy];

export type ExtractOptions = {
  /** Publication date stamped on the snapshot (YYYY-MM-DD). */
  date: string;
  /** Optional early stop; callers still truncate. */
  limit?: number;
  strategies?: readonly ParseStrategy[];
};

/**
 * Clean raw rows into chart entries. Strategies hand over decoded text, so
 * only whitespace is normalized here.
 *  - drop rows whose title or artist is empty after cleanup
 *  - missing rank = 1-based document position, which takes part in the
 *    duplicate check like any explicit rank
 *  - duplicate rank: first in document order wins
 *  - stable sort by rank, then renumber 1..n
 */
export function finalizeEntries(raw: readonly RawChartEntry[], source = "chart"): ChartEntry[] {
  const byRank = new Map<number, { rank: number; order: number; title: string; artist: string }>();

  raw.forEach((row, i) => {
    const title = collapseWhitespace(row.title);
    const artist = collapseWhitespace(row.artist);
    if (!title || !artist) {
      if (process.env.NODE_ENV !== "test") {
        console.warn(`[extract] ${source} row ${i + 1} dropped: empty ${!title ? "title" : "artist"}`);
      }
      return;
    }
    const rank = row.rank ?? i + 1;
    if (byRank.has(rank)) {
      if (process.env.NODE_ENV !== "test") {
        console.warn(`[extract] ${source} duplicate rank ${rank} dropped: "${title}"`);
      }
      return;
    }
    byRank.set(rank, { rank, order: i, title, artist });
  });

  return Array.from(byRank.values())
    .sort((a, b) => a.rank - b.rank || a.order - b.order)
    .map((e, i) => ({ rank: i + 1, title: e.title, artist: e.artist }));
}

/**
 * Parse a chart page into a snapshot. Throws ExtractionFailedError when no
 * strategy yields at least its minimum number of entries.
 */
export function extractChart(html: string, options: ExtractOptions): ChartSnapshot {
  const $ = cheerio.load(html);
  const strategies = options.strategies ?? DEFAULT_STRATEGIES;

  for (const strategy of strategies) {
    const entries = finalizeEntries(strategy.parse($), strategy.name);
    if (entries.length === 0 || entries.length < strategy.minEntries) {
      if (process.env.NODE_ENV !== "test") {
        console.log(`[extract] ${strategy.name}: ${entries.length} entries, trying next strategy`);
      }
      continue;
    }
    const limited = options.limit !== undefined && options.limit > 0
      ? entries.slice(0, options.limit)
      : entries;
    return { date: options.date, entries: limited, strategy: strategy.name };
  }

  throw new ExtractionFailedError("no entries found");
}
