/**
 * @fileoverview Fallback article extractor: an ordered CSS-selector scan.
 *
 * When Readability cannot find an article, most news pages still wrap their
 * story in one of a handful of well-known containers. This extractor tries
 * them in priority order, from the most specific CMS class names down to the
 * bare `<body>`, and keeps the first one holding enough text. There is no
 * scoring across selectors: the first sufficient match wins.
 *
 * @module extractor/selector-extractor
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { ExtractionError } from "../utils/errors.js";
import { blockText, collapsedLength, loadWithoutNoise } from "./dom-text.js";
import { readMetaAuthor, readMetaPublishedTime, readMetaTitle, splitAuthors } from "./metadata.js";
import type { ArticleExtractor, ExtractionCandidate } from "./types.js";

/** A body-container selector and its rank (lower runs first). */
export interface ContentSelector {
  readonly selector: string;
  readonly priority: number;
}

/**
 * Body containers, most specific first, `body` last.
 */
export const CONTENT_SELECTORS: readonly ContentSelector[] = [
  { selector: ".entry-content", priority: 1 },
  { selector: ".article-content", priority: 2 },
  { selector: ".post-content", priority: 3 },
  { selector: ".story-body", priority: 4 },
  { selector: "article .content", priority: 5 },
  { selector: '[data-module="ArticleBody"]', priority: 6 },
  { selector: '[itemprop="articleBody"]', priority: 7 },
  { selector: ".article-body", priority: 8 },
  { selector: "main article", priority: 9 },
  { selector: "article", priority: 10 },
  { selector: "main", priority: 11 },
  { selector: "body", priority: 12 },
];

/** Headline selectors, tried in order. */
const TITLE_SELECTORS: readonly string[] = [
  "h1.entry-title",
  "h1.headline",
  "h1.article-title",
  ".headline h1",
  "article h1",
];

/** Byline selectors, tried in order before the author meta tag. */
const AUTHOR_SELECTORS: readonly string[] = [
  ".author",
  ".byline",
  '[rel="author"]',
  ".article-author",
  ".post-author",
];

/** Constructor settings for {@link SelectorExtractor}. */
export interface SelectorExtractorOptions {
  /** A selector wins only when its collapsed text is longer than this. */
  minLength: number;
  /** Overrides {@link CONTENT_SELECTORS}; sorted by priority before use. */
  selectors?: readonly ContentSelector[];
}

function firstText($: CheerioAPI, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    const text = $(selector).first().text().replace(/\s+/g, " ").trim();
    if (text) {
      return text;
    }
  }
  return undefined;
}

/**
 * Selector-scan implementation of {@link ArticleExtractor}.
 *
 * @example
 * ```typescript
 * const extractor = new SelectorExtractor({ minLength: 200 });
 * const candidate = extractor.extract(html, url);
 * candidate.method; // "fallback"
 * ```
 */
export class SelectorExtractor implements ArticleExtractor {
  readonly method = "fallback" as const;

  private readonly selectors: readonly ContentSelector[];

  constructor(private readonly options: SelectorExtractorOptions) {
    this.selectors = [...(options.selectors ?? CONTENT_SELECTORS)].sort(
      (a, b) => a.priority - b.priority,
    );
  }

  /**
   * @throws {ExtractionError} When no selector yields more than `minLength`
   *   characters of text.
   */
  extract(html: string, url: string): ExtractionCandidate {
    // Headlines and bylines often sit in a <header>, which noise removal
    // drops, so metadata is read from the untouched page.
    const meta = cheerio.load(html);
    const title = firstText(meta, TITLE_SELECTORS) ?? readMetaTitle(meta) ?? firstText(meta, ["h1"]);
    const byline = firstText(meta, AUTHOR_SELECTORS) ?? readMetaAuthor(meta);
    const publishedAt = readMetaPublishedTime(meta);

    const $ = loadWithoutNoise(html);
    for (const { selector } of this.selectors) {
      const match = $(selector).first();
      if (match.length === 0) continue;

      const text = blockText(match);
      if (collapsedLength(text) > this.options.minLength) {
        return {
          method: this.method,
          title,
          authors: splitAuthors(byline),
          text,
          publishedAt,
        };
      }
    }

    throw new ExtractionError(
      `No content selector matched more than ${this.options.minLength} characters on ${url}`,
    );
  }
}
