/**
 * @fileoverview Critical analysis of an extracted article.
 *
 * Six questions are put to the model one after another: core claims,
 * language and tone, red flags, verification questions, entities and an
 * opposing reading. Each answer is parsed into the shape the report needs.
 *
 * @module analysis/analyzer
 */

import type { ExtractionMethod, ExtractionResult } from "../extractor/types.js";
import { AnalysisError, SkepticError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { LanguageModelClient } from "./model-client.js";
import {
  parseBulletPoints,
  parseEntities,
  parseNumberedList,
  type EntityGroups,
} from "./parsers.js";
import type { PromptName, PromptRenderer } from "./prompts.js";

/** Canonical answer when the model finds nothing worth flagging. */
export const NO_RED_FLAGS = "No significant red flags detected in the available content.";

export interface ArticleMetadata {
  title?: string;
  url: string;
  authors: readonly string[];
  publishedAt?: string;
  method: ExtractionMethod;
  charCount: number;
}

export interface ArticleAnalysis {
  coreClaims: string[];
  languageAnalysis: string;
  /** Either concrete findings, or exactly `[NO_RED_FLAGS]`. */
  redFlags: string[];
  verificationQuestions: string[];
  entities: EntityGroups;
  counterArgument: string;
  metadata: ArticleMetadata;
}

/**
 * @example
 * ```typescript
 * const analyzer = new ArticleAnalyzer(new OpenAiModelClient(config.llm), new PromptLibrary());
 * const analysis = await analyzer.analyze(article);
 * analysis.coreClaims; // ["The council approved ...", ...]
 * ```
 */
export class ArticleAnalyzer {
  private readonly logger: Logger;

  constructor(
    private readonly client: LanguageModelClient,
    private readonly prompts: PromptRenderer,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  /**
   * @throws {AnalysisError} When any of the six requests fails.
   */
  async analyze(article: ExtractionResult): Promise<ArticleAnalysis> {
    const coreClaims = parseBulletPoints(await this.ask("core-claims", article));
    const languageAnalysis = await this.ask("language-tone", article);
    const redFlags = parseRedFlags(await this.ask("red-flags", article));
    const verificationQuestions = parseNumberedList(
      await this.ask("verification-questions", article),
    );
    const entities = parseEntities(await this.ask("entities", article));
    const counterArgument = await this.ask("counter-argument", article);

    return {
      coreClaims,
      languageAnalysis,
      redFlags,
      verificationQuestions,
      entities,
      counterArgument,
      metadata: {
        title: article.title,
        url: article.sourceUrl,
        authors: article.authors,
        publishedAt: article.publishedAt,
        method: article.method,
        charCount: article.charCount,
      },
    };
  }

  private async ask(name: PromptName, article: ExtractionResult): Promise<string> {
    this.logger.debug(`Requesting ${name}`);
    try {
      const prompt = await this.prompts.render(name, article);
      return await this.client.complete(prompt);
    } catch (error) {
      if (error instanceof SkepticError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new AnalysisError(`Analysis step "${name}" failed: ${reason}`, { cause: error });
    }
  }
}

function parseRedFlags(answer: string): string[] {
  if (answer.toLowerCase().includes("no significant red flags detected")) {
    return [NO_RED_FLAGS];
  }
  return parseBulletPoints(answer);
}
