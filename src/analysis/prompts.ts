/**
 * @fileoverview Prompt templates for the six analysis questions.
 *
 * The templates are plain Markdown files under `prompts/` at the package
 * root, so they can be edited without touching code. `{{title}}`,
 * `{{content}}` and `{{authors}}` are filled in per article; the article
 * body is cut to a per-template budget first.
 *
 * @module analysis/prompts
 */

import { readFile } from "node:fs/promises";
import type { ExtractionResult } from "../extractor/types.js";
import { AnalysisError } from "../utils/errors.js";

export type PromptName =
  | "core-claims"
  | "language-tone"
  | "red-flags"
  | "verification-questions"
  | "entities"
  | "counter-argument";

/** Characters of article body each template receives. */
export const PROMPT_CONTENT_BUDGET: Readonly<Record<PromptName, number>> = {
  "core-claims": 3000,
  "language-tone": 3000,
  "red-flags": 3000,
  "verification-questions": 3000,
  entities: 2000,
  "counter-argument": 2500,
};

/** Resolves to `<package root>/prompts/` from both `src/` and `dist/`. */
export const DEFAULT_PROMPT_DIR = new URL("../../prompts/", import.meta.url);

export interface PromptVariables {
  title: string;
  content: string;
  authors: string;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

/**
 * Substitute `{{name}}` placeholders in a single pass. Unknown placeholders
 * are left as they are, and placeholders inside substituted values are not
 * expanded.
 *
 * @example
 * ```typescript
 * fillTemplate("Title: {{title}}", { title: "Budget", content: "", authors: "" });
 * // => "Title: Budget"
 * ```
 */
export function fillTemplate(template: string, variables: PromptVariables): string {
  const values = new Map<string, string>(Object.entries(variables));
  return template.replace(PLACEHOLDER, (match, name: string) => values.get(name) ?? match);
}

/** Anything that can turn an article into the text of a named prompt. */
export interface PromptRenderer {
  render(name: PromptName, article: ExtractionResult): Promise<string>;
}

/**
 * Loads templates from disk on first use and keeps them for the life of
 * the process.
 */
export class PromptLibrary implements PromptRenderer {
  private readonly cache = new Map<PromptName, Promise<string>>();

  constructor(private readonly directory: URL = DEFAULT_PROMPT_DIR) {}

  async render(name: PromptName, article: ExtractionResult): Promise<string> {
    const template = await this.load(name);
    return fillTemplate(template, {
      title: article.title ?? "Unknown",
      content: article.body.slice(0, PROMPT_CONTENT_BUDGET[name]),
      authors: article.authors.length > 0 ? article.authors.join(", ") : "Unknown",
    });
  }

  private load(name: PromptName): Promise<string> {
    let pending = this.cache.get(name);
    if (!pending) {
      const file = new URL(`${name}.md`, this.directory);
      pending = readFile(file, "utf8").catch((error: unknown) => {
        this.cache.delete(name);
        throw new AnalysisError(`Prompt template "${name}" could not be read from ${file.href}`, {
          cause: error,
        });
      });
      this.cache.set(name, pending);
    }
    return pending;
  }
}
