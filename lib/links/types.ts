/**
 * Link resolution types. Providers report failure as a value, never by throwing
 * past the resolver.
 */

import type { ProviderUnavailableError } from "@/lib/errors";

export type TrackQuery = {
  title: string;
  artist: string;
};

export type LinkSource = "provider-chain" | "search-fallback";

export interface ResolvedLink {
  readonly url: string;
  readonly source: LinkSource;
}

export type ProviderResult =
  | { ok: true; url: string }
  | { ok: false; error: ProviderUnavailableError };

export interface LinkProvider {
  name: string;
  resolve(query: TrackQuery): Promise<ProviderResult>;
}
