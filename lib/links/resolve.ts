/**
 * Best-effort Spotify link without the Spotify API.
 * Providers are tried in order; the first ok result wins. If all fail (or
 * throw), the answer is a Spotify search URL. resolve() never rejects.
 */

import { loadConfig } from "@/lib/config";
import type { AppConfig } from "@/lib/config";
import { ProviderUnavailableError, errorMessage } from "@/lib/errors";
import { createHttpClient } from "@/lib/http";
import type { HttpClient } from "@/lib/http";
import { CatalogBridgeProvider } from "./catalogBridge";
import { ItunesCatalog } from "./itunes";
import { OdesliResolver } from "./odesli";
import { buildSearchUrl, searchTerm } from "./searchFallback";
import type { LinkProvider, ProviderResult, ResolvedLink, TrackQuery } from "./types";

export type LinkResolverOptions = {
  providers: readonly LinkProvider[];
  searchUrl?: (title: string, artist: string) => string;
};

export class LinkResolver {
  private readonly providers: readonly LinkProvider[];
  private readonly searchUrl: (title: string, artist: string) => string;

  constructor(options: LinkResolverOptions) {
    this.providers = options.providers;
    this.searchUrl = options.searchUrl ?? ((title, artist) => buildSearchUrl(title, artist));
  }

  private async attempt(provider: LinkProvider, query: TrackQuery): Promise<ProviderResult> {
    try {
      return await provider.resolve(query);
    } catch (err) {
      return { ok: false, error: new ProviderUnavailableError(provider.name, errorMessage(err), err) };
    }
  }

  async resolve(title: string, artist: string): Promise<ResolvedLink> {
    const query: TrackQuery = { title: title.trim(), artist: artist.trim() };

    if (searchTerm(query.title, query.artist)) {
      for (const provider of this.providers) {
        const result = await this.attempt(provider, query);
        if (result.ok) return { url: result.url, source: "provider-chain" };
        if (process.env.NODE_ENV !== "test") {
          console.warn(`[links] ${result.error.message} ("${query.title}" / "${query.artist}")`);
        }
      }
    }

    return { url: this.searchUrl(query.title, query.artist), source: "search-fallback" };
  }
}

/** Default chain: iTunes Search → Odesli → Spotify search URL. */
export function createLinkResolver(
  http?: HttpClient,
  config: AppConfig = loadConfig()
): LinkResolver {
  const client = http ?? createHttpClient(config);
  const catalog = new ItunesCatalog(client, {
    country: config.itunesCountry,
    timeoutMs: config.linkTimeoutMs,
  });
  const odesli = new OdesliResolver(client, { platform: "spotify", timeoutMs: config.linkTimeoutMs });
  return new LinkResolver({ providers: [new CatalogBridgeProvider(catalog, odesli)] });
}

let defaultResolver: LinkResolver | null = null;

function defaultLinkResolver(): LinkResolver {
  if (!defaultResolver) defaultResolver = createLinkResolver();
  return defaultResolver;
}

/**
 * Caller-facing entry point. Never rejects. Without a resolver, a default
 * one is built from configuration on first use.
 */
export function getLink(
  title: string,
  artist: string,
  resolver: Pick<LinkResolver, "resolve"> = defaultLinkResolver()
): Promise<ResolvedLink> {
  return resolver.resolve(title, artist);
}
