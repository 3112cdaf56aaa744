/**
 * Catalog lookup → cross-platform resolution, as one LinkProvider.
 */

import type { ItunesCatalog } from "./itunes";
import type { OdesliResolver } from "./odesli";
import type { LinkProvider, ProviderResult, TrackQuery } from "./types";

export class CatalogBridgeProvider implements LinkProvider {
  readonly name = "itunes+odesli";

  constructor(
    private readonly catalog: Pick<ItunesCatalog, "findTrackUrl">,
    private readonly crossPlatform: Pick<OdesliResolver, "toPlatformUrl">
  ) {}

  async resolve(query: TrackQuery): Promise<ProviderResult> {
    const found = await this.catalog.findTrackUrl(query);
    if (!found.ok) return found;
    return this.crossPlatform.toPlatformUrl(found.url);
  }
}
