import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { buildSearchUrl, searchTerm } from "../searchFallback";

describe("buildSearchUrl", () => {
  it("encodes title and artist joined by a single space", () => {
    assert.equal(buildSearchUrl("Bad Habit", "Steve Lacy"), "https://open.spotify.com/search/Bad%20Habit%20Steve%20Lacy");
  });

  it("encodes reserved characters", () => {
    assert.equal(
      buildSearchUrl("Kill Bill", "SZA & Friends/Co?"),
      "https://open.spotify.com/search/Kill%20Bill%20SZA%20%26%20Friends%2FCo%3F"
    );
  });

  it("trims each field", () => {
    assert.equal(searchTerm("  Flowers ", " Miley Cyrus  "), "Flowers Miley Cyrus");
    assert.equal(searchTerm("", "  "), "");
  });

  it("honours a custom template", () => {
    assert.equal(buildSearchUrl("A", "B", "https://music.example.test/find?q={query}"), "https://music.example.test/find?q=A%20B");
  });
});
