/**
 * Markup fallback for chart pages without usable JSON-LD.
 * No class-name selectors: the per-entry pattern is found structurally.
 *  - title: the largest group of h2/h3/h4 headings sharing a shape
 *    (heading tag + parent tag + parent classes)
 *  - artist: first text sibling after the heading, else first text leaf in its container
 *  - rank: first 1-3 digit leaf in the widest ancestor that holds only this entry
 */

import type { CheerioAPI } from "cheerio";
import { collapseWhitespace, normalizeName } from "@/normalize/text";
import type { ParseStrategy, RawChartEntry } from "./types";

const BADGES = new Set(["NEW", "RE-ENTRY", "HOT SHOT DEBUT"]);
const RANK_TEXT = /^\d{1,3}$/;
const MAX_RANK_DEPTH = 4;

function looksLikeArtist(text: string, title: string): boolean {
  if (text.length < 2) return false;
  if (/^\d+$/.test(text)) return false;
  if (BADGES.has(text.toUpperCase())) return false;
  return text.toLowerCase() !== title.toLowerCase();
}

export const markupStrategy: ParseStrategy = {
  name: "markup",
  minEntries: 2,

  parse($: CheerioAPI): RawChartEntry[] {
    const headings = $("h2, h3, h4").toArray();
    const groups = new Map<string, typeof headings>();

    for (const h of headings) {
      if (!collapseWhitespace($(h).text())) continue;
      const parent = $(h).parent();
      if (parent.length === 0) continue;
      const classes = (parent.attr("class") ?? "").split(/\s+/).filter(Boolean).sort().join(".");
      const shape = `${$(h).prop("tagName")}<${parent.prop("tagName")}.${classes}`;
      const group = groups.get(shape);
      if (group) group.push(h);
      else groups.set(shape, [h]);
    }

    let pattern: typeof headings = [];
    for (const group of groups.values()) {
      if (group.length > pattern.length) pattern = group;
    }
    if (pattern.length === 0) return [];
    const inPattern = new Set(pattern);

    const rows: RawChartEntry[] = [];
    const seen = new Set<string>();

    for (const h of pattern) {
      const $h = $(h);
      const title = collapseWhitespace($h.text());

      let artist = "";
      for (const sib of $h.nextAll().toArray()) {
        const text = collapseWhitespace($(sib).text());
        if (looksLikeArtist(text, title)) {
          artist = text;
          break;
        }
      }
      if (!artist) {
        const leaves = $h
          .parent()
          .find("span, p, a, div")
          .toArray()
          .filter((el) => el !== h && !$.contains(h, el) && $(el).children().length === 0);
        for (const el of leaves) {
          const text = collapseWhitespace($(el).text());
          if (looksLikeArtist(text, title)) {
            artist = text;
            break;
          }
        }
      }

      // Widest ancestor (up to MAX_RANK_DEPTH) that holds only this entry;
      // its first numeric leaf in document order is the rank marker.
      let scope = $h.parent();
      let entryScope: typeof scope | null = null;
      for (let depth = 0; depth < MAX_RANK_DEPTH && scope.length > 0; depth++) {
        const entryHeadings = scope.find("h2, h3, h4").toArray().filter((el) => inPattern.has(el));
        if (entryHeadings.length > 1) break;
        entryScope = scope;
        scope = scope.parent();
      }

      let rank: number | null = null;
      const rankLeaf = entryScope
        ?.find("*")
        .toArray()
        .find(
          (el) =>
            el !== h &&
            !$.contains(h, el) &&
            $(el).children().length === 0 &&
            RANK_TEXT.test(collapseWhitespace($(el).text()))
        );
      if (rankLeaf) {
        const n = parseInt(collapseWhitespace($(rankLeaf).text()), 10);
        rank = n > 0 ? n : null;
      }

      const key = `${normalizeName(title)}|${normalizeName(artist)}`;
      if (seen.has(key)) continue;
      seen.add(key);
      rows.push({ rank, title, artist });
    }

    return rows;
  },
};
