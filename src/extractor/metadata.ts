/**
 * @fileoverview Page-metadata readers shared by both extractors.
 *
 * Readability exposes title, byline and publication time when it finds an
 * article; the selector fallback has no such luck. These helpers read the
 * same facts straight from `<meta>` tags and microdata so both paths fill
 * in the {@link ExtractionCandidate} metadata the same way.
 *
 * @module extractor/metadata
 */

import type { CheerioAPI } from "cheerio";

/**
 * Matches a leading "By" / "By:" in a byline.
 */
const BYLINE_PREFIX = /^\s*by[:\s]+/i;

/**
 * Separators between author names in a byline: commas, "and", ampersands,
 * pipes and semicolons.
 */
const AUTHOR_SEPARATOR = /\s*(?:,|;|\||&|\band\b)\s*/i;

/** Bylines longer than this are paragraphs, not names. */
const MAX_AUTHOR_LENGTH = 80;

/**
 * First non-empty `content` attribute among `selectors`, trimmed.
 */
function firstMetaContent($: CheerioAPI, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    const value = $(selector).first().attr("content")?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Split a byline into an ordered list of author names.
 *
 * @example
 * ```typescript
 * splitAuthors("By Jane Doe and John Roe");    // ["Jane Doe", "John Roe"]
 * splitAuthors("Ana Lima, Bo Chen | Reuters"); // ["Ana Lima", "Bo Chen", "Reuters"]
 * splitAuthors("   ");                         // []
 * ```
 */
export function splitAuthors(byline: string | null | undefined): string[] {
  if (!byline) {
    return [];
  }

  const cleaned = byline.replace(/\s+/g, " ").replace(BYLINE_PREFIX, "").trim();
  const seen = new Set<string>();
  const authors: string[] = [];

  for (const part of cleaned.split(AUTHOR_SEPARATOR)) {
    const name = part.trim();
    if (!name || name.length > MAX_AUTHOR_LENGTH) continue;

    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    authors.push(name);
  }

  return authors;
}

/**
 * Title from Open Graph / Twitter card metadata, then the `<title>` tag.
 */
export function readMetaTitle($: CheerioAPI): string | undefined {
  const meta = firstMetaContent($, [
    'meta[property="og:title"]',
    'meta[name="twitter:title"]',
  ]);
  if (meta) {
    return meta;
  }
  const title = $("title").first().text().trim();
  return title || undefined;
}

/**
 * Raw author string from `<meta name="author">` and friends.
 */
export function readMetaAuthor($: CheerioAPI): string | undefined {
  return firstMetaContent($, [
    'meta[name="author"]',
    'meta[property="article:author"]',
    'meta[name="parsely-author"]',
  ]);
}

/**
 * Publication timestamp from article metadata, microdata, or the first
 * `<time datetime>` element.
 */
export function readMetaPublishedTime($: CheerioAPI): string | undefined {
  const meta = firstMetaContent($, [
    'meta[property="article:published_time"]',
    'meta[property="og:published_time"]',
    'meta[itemprop="datePublished"]',
    'meta[name="pubdate"]',
    'meta[name="publishdate"]',
  ]);
  if (meta) {
    return meta;
  }
  const datetime = $("time[datetime]").first().attr("datetime")?.trim();
  return datetime || undefined;
}
