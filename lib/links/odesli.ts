/**
 * Cross-platform resolution via Odesli (song.link): catalog URL in,
 * linksByPlatform out. We only read the target platform's entry.
 */

import { ProviderUnavailableError, errorMessage } from "@/lib/errors";
import type { HttpClient } from "@/lib/http";
import type { ProviderResult } from "./types";
import { isAbsoluteHttpUrl, isRecord } from "./url";

export const ODESLI_LINKS_URL = "https://api.song.link/v1-alpha.1/links";
const PROVIDER = "odesli";

export type OdesliOptions = {
  platform?: string;
  timeoutMs?: number;
};

export function odesliLinksUrl(sourceUrl: string): string {
  return `${ODESLI_LINKS_URL}?url=${encodeURIComponent(sourceUrl)}`;
}

export class OdesliResolver {
  readonly platform: string;

  constructor(
    private readonly http: HttpClient,
    private readonly options: OdesliOptions = {}
  ) {
    this.platform = options.platform ?? "spotify";
  }

  async toPlatformUrl(sourceUrl: string): Promise<ProviderResult> {
    let data: unknown;
    try {
      data = await this.http.getJson(odesliLinksUrl(sourceUrl), { timeoutMs: this.options.timeoutMs });
    } catch (err) {
      return { ok: false, error: new ProviderUnavailableError(PROVIDER, errorMessage(err), err) };
    }

    const links = isRecord(data) && isRecord(data.linksByPlatform) ? data.linksByPlatform : {};
    const entry = links[this.platform];
    const url = isRecord(entry) ? entry.url : undefined;
    if (!isAbsoluteHttpUrl(url)) {
      return {
        ok: false,
        error: new ProviderUnavailableError(PROVIDER, `no ${this.platform} link in response`),
      };
    }
    return { ok: true, url };
  }
}
