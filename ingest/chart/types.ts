/**
 * Chart extraction types. A ParseStrategy turns a loaded document into raw
 * rows; extractChart cleans, dedupes and ranks them.
 */

import type { CheerioAPI } from "cheerio";

export interface ChartEntry {
  readonly rank: number;
  readonly title: string;
  readonly artist: string;
}

export type StrategyName = "structured-data" | "markup";

export interface ChartSnapshot {
  /** Publication Saturday, YYYY-MM-DD. */
  readonly date: string;
  readonly entries: readonly ChartEntry[];
  readonly strategy: StrategyName;
}

/** Row as found in the document; rank is absent when the source has none. */
export type RawChartEntry = {
  rank: number | null;
  title: string;
  artist: string;
};

export interface ParseStrategy {
  name: StrategyName;
  /** Fewer rows than this after cleanup counts as "nothing found". */
  minEntries: number;
  parse($: CheerioAPI): RawChartEntry[];
}
