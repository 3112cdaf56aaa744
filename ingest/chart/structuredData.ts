/**
 * JSON-LD strategy. Chart pages describe the list as an ItemList (or a
 * MusicPlaylist) in <script type="application/ld+json">; that block survives
 * layout redesigns far better than the visible markup.
 */

import type { CheerioAPI } from "cheerio";
import { cleanText } from "@/normalize/text";
import type { ParseStrategy, RawChartEntry } from "./types";

type JsonObject = Record<string, unknown>;

const LIST_TYPES = new Set(["ItemList", "MusicPlaylist"]);
const ARTIST_FIELDS = ["byArtist", "creator", "author"] as const;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasType(obj: JsonObject, types: Set<string>): boolean {
  const t = obj["@type"];
  if (typeof t === "string") return types.has(t);
  if (Array.isArray(t)) return t.some((v) => typeof v === "string" && types.has(v));
  return false;
}

/** Flatten top-level arrays and @graph containers, keeping document order. */
export function collectJsonLdObjects(data: unknown): JsonObject[] {
  const out: JsonObject[] = [];
  const visit = (node: unknown) => {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (!isObject(node)) return;
    out.push(node);
    if (Array.isArray(node["@graph"])) node["@graph"].forEach(visit);
  };
  visit(data);
  return out;
}

/** "Artist", { name }, or an array of either; first usable name wins. */
function personName(value: unknown): string {
  if (typeof value === "string") return cleanText(value);
  if (isObject(value) && typeof value.name === "string") return cleanText(value.name);
  if (Array.isArray(value)) {
    for (const v of value) {
      const name = personName(v);
      if (name) return name;
    }
  }
  return "";
}

function parsePosition(value: unknown): number | null {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof n === "number" && Number.isInteger(n) && n > 0 ? n : null;
}

function listItems(list: JsonObject): unknown[] {
  if (Array.isArray(list.itemListElement)) return list.itemListElement;
  const track = list.track;
  if (Array.isArray(track)) return track;
  if (isObject(track) && Array.isArray(track.itemListElement)) return track.itemListElement;
  return [];
}

/**
 * Map one list element to a raw row. ListItem wrappers are merged with their
 * `item`, the inner record winning. Returns null (and logs) when title or
 * artist is missing.
 */
function toRawEntry(element: unknown, index: number): RawChartEntry | null {
  if (!isObject(element)) return null;
  const record: JsonObject = isObject(element.item) ? { ...element, ...element.item } : element;

  const title = typeof record.name === "string" ? cleanText(record.name) : "";
  let artist = "";
  for (const field of ARTIST_FIELDS) {
    artist = personName(record[field]);
    if (artist) break;
  }

  if (!title || !artist) {
    if (process.env.NODE_ENV !== "test") {
      console.warn(
        `[extract] JSON-LD item ${index + 1} skipped: missing ${!title ? "title" : "artist"}`
      );
    }
    return null;
  }
  return { rank: parsePosition(element.position ?? record.position), title, artist };
}

export function parseItemList(list: JsonObject): RawChartEntry[] {
  const rows: RawChartEntry[] = [];
  listItems(list).forEach((element, i) => {
    const row = toRawEntry(element, i);
    if (row) rows.push(row);
  });
  return rows;
}

export const structuredDataStrategy: ParseStrategy = {
  name: "structured-data",
  minEntries: 1,

  parse($: CheerioAPI): RawChartEntry[] {
    const scripts = $('script[type="application/ld+json"]').toArray();
    for (const script of scripts) {
      const raw = ($(script).html() ?? "").trim();
      if (!raw) continue;

      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch {
        if (process.env.NODE_ENV !== "test") {
          console.warn("[extract] skipping JSON-LD block that does not parse");
        }
        continue;
      }

      for (const obj of collectJsonLdObjects(data)) {
        if (!hasType(obj, LIST_TYPES)) continue;
        const rows = parseItemList(obj);
        if (rows.length > 0) return rows;
      }
    }
    return [];
  },
};
