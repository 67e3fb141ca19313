/**
 * @fileoverview Extraction pipeline: the orchestration layer.
 *
 * Coordinates one article run as a linear chain of stages:
 *
 *   1. **fetching**: download the page via the injected fetcher.
 *   2. **primary**: run the Readability extractor.
 *   3. **fallback**: only when the primary failed or came back short, run
 *      the selector extractor on the same HTML.
 *   4. **normalizing**: clean and truncate the chosen text.
 *   5. **validating**: enforce the content floor and build the result.
 *
 * The extractors and the normalizer are pure and synchronous; this module
 * adds the async I/O and the decision of which candidate survives. Fetch
 * errors are not caught here: a page that cannot be downloaded ends the run.
 *
 * @module extractor/pipeline
 */

import type { ExtractionConfig } from "../config.js";
import type { FetchResult } from "../services/fetch.js";
import { ExtractionError, InsufficientContentError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { collapsedLength } from "./dom-text.js";
import type { ContentNormalizer } from "./normalizer.js";
import type { ArticleExtractor, ExtractionCandidate, ExtractionResult } from "./types.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/** Anything that can turn a URL into page HTML. {@link HtmlFetcher} in production. */
export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
}

/** Pipeline stages, in the order they are entered. */
export type PipelineStage =
  | "fetching"
  | "primary"
  | "fallback"
  | "normalizing"
  | "validating";

/** Collaborators of {@link ArticlePipeline}. */
export interface PipelineDeps {
  fetcher: PageFetcher;
  primary: ArticleExtractor;
  fallback: ArticleExtractor;
  normalizer: Pick<ContentNormalizer, "normalize">;
  config: Pick<ExtractionConfig, "minContentLength">;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Fetch → extract → normalize → validate, for a single URL.
 *
 * @example
 * ```typescript
 * const pipeline = new ArticlePipeline({
 *   fetcher: new HtmlFetcher(options),
 *   primary: new ReadabilityExtractor(),
 *   fallback: new SelectorExtractor({ minLength: 200 }),
 *   normalizer: new ContentNormalizer({ maxLength: 10_000 }),
 *   config,
 *   logger,
 * });
 *
 * const article = await pipeline.extract("https://news.example.com/story");
 * article.method;    // "primary"
 * article.charCount; // 4821
 * ```
 */
export class ArticlePipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: PipelineDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Run the whole chain for `url`.
   *
   * @throws {FetchError} When the page cannot be downloaded (any subclass).
   * @throws {ExtractionError} When both extractors throw.
   * @throws {InsufficientContentError} When the surviving text, once
   *   normalized, is shorter than `minContentLength`.
   */
  async extract(url: string): Promise<ExtractionResult> {
    this.enter("fetching", { url });
    const page = await this.deps.fetcher.fetch(url);
    this.logger.debug("Fetched page", {
      finalUrl: page.url,
      status: page.statusCode,
      bytes: page.html.length,
    });

    const candidate = this.selectCandidate(page);

    this.enter("normalizing", { method: candidate.method });
    const body = this.deps.normalizer.normalize(candidate.text);

    this.enter("validating", { chars: body.length });
    return this.validate(candidate, body, url);
  }

  /**
   * Primary first; the fallback only when the primary throws or falls short.
   * A short primary candidate is kept so that, if the fallback fails too,
   * validation can report how little content there was.
   */
  private selectCandidate(page: FetchResult): ExtractionCandidate {
    const { minContentLength } = this.deps.config;

    this.enter("primary");
    let primary: ExtractionCandidate | undefined;
    let primaryError: unknown;
    try {
      primary = this.deps.primary.extract(page.html, page.url);
    } catch (error) {
      primaryError = error;
    }

    // Layout whitespace between blocks is not content.
    const primaryLength = primary ? collapsedLength(primary.text) : 0;
    if (primary && primaryLength >= minContentLength) {
      return primary;
    }

    this.enter("fallback", {
      reason: primary
        ? `primary returned ${primaryLength} characters`
        : `primary failed: ${describe(primaryError)}`,
    });

    try {
      return this.deps.fallback.extract(page.html, page.url);
    } catch (fallbackError) {
      if (primary) {
        this.logger.debug("Fallback failed, keeping short primary candidate", {
          error: describe(fallbackError),
        });
        return primary;
      }
      throw new ExtractionError(
        `Both extraction methods failed for ${page.url}: ` +
          `primary: ${describe(primaryError)}; fallback: ${describe(fallbackError)}`,
        { cause: fallbackError },
      );
    }
  }

  private validate(
    candidate: ExtractionCandidate,
    body: string,
    sourceUrl: string,
  ): ExtractionResult {
    const { minContentLength } = this.deps.config;

    if (body.length < minContentLength) {
      throw new InsufficientContentError(
        `Extracted content too short: ${body.length} characters (minimum ${minContentLength})`,
        body.length,
        minContentLength,
      );
    }

    return Object.freeze({
      title: candidate.title,
      authors: Object.freeze([...candidate.authors]),
      body,
      sourceUrl,
      method: candidate.method,
      charCount: body.length,
      publishedAt: candidate.publishedAt,
    });
  }

  private enter(stage: PipelineStage, meta?: Record<string, unknown>): void {
    this.logger.debug(`Stage: ${stage}`, meta);
  }
}
