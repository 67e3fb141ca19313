/**
 * @module extractor/types
 * @fileoverview Shared types of the extraction chain.
 */

/**
 * Which strategy produced a piece of content:
 * - `primary`: Mozilla Readability over a jsdom document.
 * - `fallback`: the ordered CSS-selector scan.
 */
export type ExtractionMethod = "primary" | "fallback";

/**
 * What a single extractor returns, before normalization and validation.
 */
export interface ExtractionCandidate {
  method: ExtractionMethod;
  title?: string;
  /** Author names in byline order, without duplicates. */
  authors: string[];
  /** Raw article text; paragraphs separated by newlines. */
  text: string;
  /** Publication timestamp as found on the page (usually ISO 8601). */
  publishedAt?: string;
}

/**
 * The article as handed to the analyzer and the report writer.
 *
 * Built once by the pipeline on success and frozen. `body` is never empty,
 * `charCount === body.length`, and `charCount` never exceeds the configured
 * `maxContentLength`.
 */
export interface ExtractionResult {
  readonly title?: string;
  readonly authors: readonly string[];
  readonly body: string;
  readonly sourceUrl: string;
  readonly method: ExtractionMethod;
  readonly charCount: number;
  readonly publishedAt?: string;
}

/**
 * Capability interface shared by both extraction strategies, so either can
 * be replaced with a test double.
 */
export interface ArticleExtractor {
  readonly method: ExtractionMethod;

  /**
   * @param html - Raw page HTML.
   * @param url  - Final page URL, used to resolve relative references.
   * @throws {ExtractionError} When no article body can be identified.
   */
  extract(html: string, url: string): ExtractionCandidate;
}
