/**
 * Last-resort Spotify link: a search URL. No network call.
 */

export const SPOTIFY_SEARCH_TEMPLATE = "https://open.spotify.com/search/{query}";

/** "title artist", each trimmed and joined by one space. */
export function searchTerm(title: string, artist: string): string {
  return `${title.trim()} ${artist.trim()}`.trim();
}

export function buildSearchUrl(
  title: string,
  artist: string,
  template: string = SPOTIFY_SEARCH_TEMPLATE
): string {
  return template.replace("{query}", encodeURIComponent(searchTerm(title, artist)));
}
