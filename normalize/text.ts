/**
 * Text cleanup for chart titles and artist names pulled from HTML or JSON-LD.
 */

import * as cheerio from "cheerio";

/** Trim and collapse runs of whitespace (nbsp included) to one space. */
export function collapseWhitespace(value: string): string {
  if (!value || typeof value !== "string") return "";
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Decode HTML entities and drop stray tags. JSON-LD text is often
 * HTML-escaped ("Simon &amp; Garfunkel").
 */
export function decodeEntities(value: string): string {
  if (!value) return "";
  if (!/[&<]/.test(value)) return value;
  return cheerio.load(value, undefined, false).root().text();
}

/** decodeEntities + collapseWhitespace. */
export function cleanText(value: string): string {
  return collapseWhitespace(decodeEntities(value));
}

/**
 * Key for matching the same track across sources. Takes already decoded
 * text: whitespace collapsed, lowercased.
 */
export function normalizeName(name: string): string {
  return collapseWhitespace(name).toLowerCase();
}
