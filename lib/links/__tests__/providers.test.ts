import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { HttpClient } from "../../http";
import { fakeFetch, recordingSleep } from "../../__tests__/fakeFetch";
import type { FakeReply } from "../../__tests__/fakeFetch";
import { ItunesCatalog, itunesSearchUrl } from "../itunes";
import { OdesliResolver, odesliLinksUrl } from "../odesli";
import { CatalogBridgeProvider } from "../catalogBridge";

const TRACK_URL = "https://music.apple.com/us/album/bad-habit/1631211865?i=1631211867";
const SPOTIFY_URL = "https://open.spotify.com/track/4k6Uh1HXdhtusDW5y8Gbvy";

function httpFor(handler: (url: string, call: number) => FakeReply) {
  const fake = fakeFetch(handler);
  return { http: new HttpClient({ fetchImpl: fake.fetchImpl, sleep: recordingSleep().sleep }), calls: fake.calls };
}

describe("itunesSearchUrl", () => {
  it("queries songs by title and artist, one result", () => {
    assert.equal(
      itunesSearchUrl({ title: "Bad Habit", artist: "Steve Lacy" }),
      "https://itunes.apple.com/search?term=Bad+Habit+Steve+Lacy&media=music&entity=song&limit=1&country=US"
    );
  });
});

describe("ItunesCatalog", () => {
  it("takes the first result's trackViewUrl", async () => {
    const { http, calls } = httpFor(() => ({
      json: { resultCount: 2, results: [{ trackViewUrl: TRACK_URL }, { trackViewUrl: "https://music.apple.com/other" }] },
    }));
    const result = await new ItunesCatalog(http, { country: "BR" }).findTrackUrl({ title: "Bad Habit", artist: "Steve Lacy" });
    assert.deepEqual(result, { ok: true, url: TRACK_URL });
    assert.match(calls[0], /country=BR$/);
  });

  it("reports no results as unavailable", async () => {
    const { http } = httpFor(() => ({ json: { resultCount: 0, results: [] } }));
    const result = await new ItunesCatalog(http).findTrackUrl({ title: "Nothing", artist: "Nobody" });
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.provider, "itunes");
      assert.equal(result.error.message, "itunes: no results");
    }
  });

  it("reports a missing trackViewUrl as unavailable", async () => {
    const { http } = httpFor(() => ({ json: { results: [{ trackName: "Bad Habit" }] } }));
    const result = await new ItunesCatalog(http).findTrackUrl({ title: "Bad Habit", artist: "Steve Lacy" });
    assert.equal(result.ok, false);
  });

  it("turns a fetch failure into an unavailable result", async () => {
    const { http } = httpFor(() => new TypeError("fetch failed"));
    const result = await new ItunesCatalog(http).findTrackUrl({ title: "Bad Habit", artist: "Steve Lacy" });
    assert.equal(result.ok, false);
    if (!result.ok) assert.match(result.error.message, /^itunes: Fetch failed/);
  });
});

describe("OdesliResolver", () => {
  it("reads the spotify entry of linksByPlatform", async () => {
    const { http, calls } = httpFor(() => ({
      json: {
        linksByPlatform: {
          appleMusic: { url: TRACK_URL },
          spotify: { url: SPOTIFY_URL, entityUniqueId: "SPOTIFY_SONG::4k6Uh1HXdhtusDW5y8Gbvy" },
        },
      },
    }));
    const result = await new OdesliResolver(http).toPlatformUrl(TRACK_URL);
    assert.deepEqual(result, { ok: true, url: SPOTIFY_URL });
    assert.deepEqual(calls, [odesliLinksUrl(TRACK_URL)]);
    assert.equal(
      odesliLinksUrl("https://music.apple.com/x?i=1"),
      "https://api.song.link/v1-alpha.1/links?url=https%3A%2F%2Fmusic.apple.com%2Fx%3Fi%3D1"
    );
  });

  it("reports a response without the platform as unavailable", async () => {
    const { http } = httpFor(() => ({ json: { linksByPlatform: { appleMusic: { url: TRACK_URL } } } }));
    const result = await new OdesliResolver(http).toPlatformUrl(TRACK_URL);
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.error.message, "odesli: no spotify link in response");
  });
});

describe("CatalogBridgeProvider", () => {
  it("feeds the catalog URL into cross-platform resolution", async () => {
    const { http, calls } = httpFor((url) =>
      url.startsWith("https://itunes.apple.com/")
        ? { json: { results: [{ trackViewUrl: TRACK_URL }] } }
        : { json: { linksByPlatform: { spotify: { url: SPOTIFY_URL } } } }
    );
    const provider = new CatalogBridgeProvider(new ItunesCatalog(http), new OdesliResolver(http));
    const result = await provider.resolve({ title: "Bad Habit", artist: "Steve Lacy" });
    assert.deepEqual(result, { ok: true, url: SPOTIFY_URL });
    assert.equal(calls.length, 2);
    assert.equal(calls[1], odesliLinksUrl(TRACK_URL));
  });

  it("stops after a failed catalog lookup", async () => {
    const { http, calls } = httpFor(() => ({ json: { results: [] } }));
    const provider = new CatalogBridgeProvider(new ItunesCatalog(http), new OdesliResolver(http));
    const result = await provider.resolve({ title: "Bad Habit", artist: "Steve Lacy" });
    assert.equal(result.ok, false);
    assert.equal(calls.length, 1);
  });
});
