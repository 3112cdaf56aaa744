/**
 * Catalog lookup: iTunes Search API. Public, keyless, returns trackViewUrl
 * for songs. The first result is taken as-is (catalog relevance order).
 */

import { ProviderUnavailableError, errorMessage } from "@/lib/errors";
import type { HttpClient } from "@/lib/http";
import type { ProviderResult, TrackQuery } from "./types";
import { searchTerm } from "./searchFallback";
import { isAbsoluteHttpUrl, isRecord } from "./url";

export const ITUNES_SEARCH_URL = "https://itunes.apple.com/search";
const PROVIDER = "itunes";

export type ItunesCatalogOptions = {
  country?: string;
  timeoutMs?: number;
};

export function itunesSearchUrl(query: TrackQuery, country = "US"): string {
  const params = new URLSearchParams({
    term: searchTerm(query.title, query.artist),
    media: "music",
    entity: "song",
    limit: "1",
    country,
  });
  return `${ITUNES_SEARCH_URL}?${params.toString()}`;
}

export class ItunesCatalog {
  constructor(
    private readonly http: HttpClient,
    private readonly options: ItunesCatalogOptions = {}
  ) {}

  async findTrackUrl(query: TrackQuery): Promise<ProviderResult> {
    const url = itunesSearchUrl(query, this.options.country);
    let data: unknown;
    try {
      data = await this.http.getJson(url, { timeoutMs: this.options.timeoutMs });
    } catch (err) {
      return { ok: false, error: new ProviderUnavailableError(PROVIDER, errorMessage(err), err) };
    }

    const results = isRecord(data) && Array.isArray(data.results) ? data.results : [];
    const first: unknown = results[0];
    if (first === undefined) {
      return { ok: false, error: new ProviderUnavailableError(PROVIDER, "no results") };
    }
    const trackUrl = isRecord(first) ? first.trackViewUrl : undefined;
    if (!isAbsoluteHttpUrl(trackUrl)) {
      return { ok: false, error: new ProviderUnavailableError(PROVIDER, "first result has no trackViewUrl") };
    }
    return { ok: true, url: trackUrl };
  }
}
