/**
 * @fileoverview Primary article extractor: Mozilla Readability over jsdom.
 *
 * **Phase 1, cheerio preprocessing:**
 *   Raw HTML is loaded into cheerio to strip non-content elements (script,
 *   style, nav, footer, header, aside, ...) and comments.
 *
 * **Phase 2, Readability extraction:**
 *   The cleaned HTML is parsed by jsdom and Readability isolates the article. Its HTML output is turned
 *   back into paragraph-separated text with cheerio.
 *
 * When Readability gives up this throws {@link ExtractionError}; the
 * pipeline then runs the selector fallback.
 *
 * @module extractor/readability-extractor
 */

import { JSDOM, VirtualConsole } from "jsdom";
import { Readability } from "@mozilla/readability";
import { ExtractionError } from "../utils/errors.js";
import { htmlToText, loadWithoutNoise } from "./dom-text.js";
import {
  readMetaAuthor,
  readMetaPublishedTime,
  readMetaTitle,
  splitAuthors,
} from "./metadata.js";
import type { ArticleExtractor, ExtractionCandidate } from "./types.js";

/**
 * Readability-based implementation of {@link ArticleExtractor}.
 *
 * @example
 * ```typescript
 * const extractor = new ReadabilityExtractor();
 * const candidate = extractor.extract(html, "https://news.example.com/story");
 * candidate.method;  // "primary"
 * candidate.authors; // ["Jane Doe"]
 * ```
 */
export class ReadabilityExtractor implements ArticleExtractor {
  readonly method = "primary" as const;

  /**
   * @throws {ExtractionError} When Readability finds no article, finds one
   *   with no text, or the document cannot be parsed at all.
   */
  extract(html: string, url: string): ExtractionCandidate {
    const $ = loadWithoutNoise(html);

    // A VirtualConsole with no listeners keeps jsdom's CSS and script
    // warnings off the terminal.
    const dom = new JSDOM($.html(), { url, virtualConsole: new VirtualConsole() });

    let article: ReturnType<Readability["parse"]>;
    try {
      article = new Readability(dom.window.document).parse();
    } catch (error) {
      throw new ExtractionError(
        `Readability failed on ${url}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    } finally {
      dom.window.close();
    }

    if (!article) {
      throw new ExtractionError(`Readability found no article body on ${url}`);
    }

    const text = article.content ? htmlToText(article.content) : (article.textContent ?? "");
    if (!text.trim()) {
      throw new ExtractionError(`Readability returned an empty article body for ${url}`);
    }

    const bylineAuthors = splitAuthors(article.byline);

    return {
      method: this.method,
      title: article.title?.trim() || readMetaTitle($),
      authors: bylineAuthors.length > 0 ? bylineAuthors : splitAuthors(readMetaAuthor($)),
      text,
      publishedAt: article.publishedTime?.trim() || readMetaPublishedTime($),
    };
  }
}
