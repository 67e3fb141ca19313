/**
 * @fileoverview Language-model client used by the analyzer.
 *
 * The analyzer only needs "prompt in, text out". {@link OpenAiModelClient}
 * provides that over the AI SDK's `generateText` with an OpenAI provider;
 * retries with backoff are left to the SDK (`maxRetries`).
 *
 * @module analysis/model-client
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText } from "ai";
import type { LlmConfig } from "../config.js";
import { AnalysisError } from "../utils/errors.js";

export interface LanguageModelClient {
  complete(prompt: string): Promise<string>;
}

/** Everything sent with one completion request. */
export interface TextRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
}

/** Sends a request to a concrete model. Replaced in tests. */
export type TextGenerator = (request: TextRequest) => Promise<{ text: string }>;

export const SYSTEM_PROMPT =
  "You are an expert in critical thinking, journalism ethics and media analysis. " +
  "Give precise, well-grounded analysis that helps readers think critically about what they read.";

/** Low temperature keeps the six answers consistent between runs. */
const TEMPERATURE = 0.3;
const MAX_TOKENS = 1000;

/**
 * Build a {@link TextGenerator} bound to the configured OpenAI (or
 * OpenAI-compatible) model.
 */
export function openAiGenerator(config: LlmConfig): TextGenerator {
  const provider = createOpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
  const model = provider(config.model);
  return (request) => generateText({ model, ...request });
}

/**
 * @example
 * ```typescript
 * const client = new OpenAiModelClient(config.llm);
 * const answer = await client.complete("List the core claims of ...");
 * ```
 */
export class OpenAiModelClient implements LanguageModelClient {
  private readonly generate: TextGenerator;

  constructor(
    private readonly config: LlmConfig,
    generate?: TextGenerator,
  ) {
    this.generate = generate ?? openAiGenerator(config);
  }

  /**
   * @throws {AnalysisError} When every attempt fails or the model answers
   *   with nothing but whitespace.
   */
  async complete(prompt: string): Promise<string> {
    const attempts = this.config.maxAttempts;

    let result: { text: string };
    try {
      result = await this.generate({
        system: SYSTEM_PROMPT,
        prompt,
        temperature: TEMPERATURE,
        maxTokens: MAX_TOKENS,
        maxRetries: Math.max(0, attempts - 1),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AnalysisError(
        `Language model request failed after ${attempts} attempt(s): ${reason}`,
        { cause: error },
      );
    }

    const answer = result.text.trim();
    if (!answer) {
      throw new AnalysisError(`Language model ${this.config.model} returned an empty response`);
    }
    return answer;
  }
}
