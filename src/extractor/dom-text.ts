/**
 * @fileoverview Cheerio helpers shared by both extractors: noise removal and
 * block-aware text extraction.
 *
 * cheerio's `.text()` concatenates text nodes verbatim, so
 * `<p>One.</p><p>Two.</p>` comes out as "One.Two.". {@link blockText} marks
 * the end of every block-level element with a newline first, which keeps
 * paragraphs apart and gives the normalizer something to collapse.
 *
 * @module extractor/dom-text
 */

import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";

/**
 * Elements that never carry article text.
 *
 * - `script` / `noscript`: code and fallback markup.
 * - `style`: CSS.
 * - `nav`, `header`, `footer`, `aside`: site chrome, sidebars, ad slots.
 * - `iframe`: embeds.
 * - ARIA landmarks marking non-content regions.
 *
 * `form` stays: some CMSs (ASP.NET WebForms) wrap the whole page in one.
 */
export const NOISE_SELECTORS: readonly string[] = [
  "script",
  "noscript",
  "style",
  "nav",
  "footer",
  "header",
  "aside",
  "iframe",
  "[role='navigation']",
  "[role='banner']",
  "[role='contentinfo']",
] as const;

/**
 * Tags after which a line break is inserted before reading text.
 */
const BLOCK_SELECTOR = [
  "p",
  "div",
  "section",
  "article",
  "main",
  "li",
  "blockquote",
  "pre",
  "figcaption",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "tr",
  "dd",
  "dt",
].join(",");

/**
 * Load `html` into cheerio and remove noise elements and comments.
 *
 * @example
 * ```typescript
 * const $ = loadWithoutNoise('<nav>Menu</nav><p>Article</p>');
 * $("body").text(); // "Article"
 * ```
 */
export function loadWithoutNoise(html: string): CheerioAPI {
  const $ = cheerio.load(html);

  for (const selector of NOISE_SELECTORS) {
    $(selector).remove();
  }

  // Comments hold ad-server markers and template leftovers; nodeType 8 is Comment.
  $("*")
    .contents()
    .filter((_index, node) => node.nodeType === 8)
    .remove();

  return $;
}

/**
 * Text of `selection` with a newline after each block element and in place
 * of each `<br>`. Whitespace is NOT collapsed here; that is the normalizer's
 * job.
 *
 * The marks are added to the document, so call this on a document that is
 * not reused for anything else afterwards.
 */
export function blockText<T extends AnyNode>(selection: Cheerio<T>): string {
  selection.find("br").replaceWith("\n");
  selection.find(BLOCK_SELECTOR).append("\n");
  return selection.text();
}

/**
 * Plain text of an HTML fragment, paragraphs separated by newlines.
 *
 * @example
 * ```typescript
 * htmlToText("<p>One.</p><p>Two.</p>"); // "One.\nTwo.\n"
 * ```
 */
export function htmlToText(fragment: string): string {
  const $ = cheerio.load(fragment);
  return blockText($("body"));
}

/**
 * Collapse all whitespace to single spaces. Used to measure how much real
 * text a selection holds.
 */
export function collapsedLength(text: string): number {
  return text.replace(/\s+/g, " ").trim().length;
}
