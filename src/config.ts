/**
 * @module config
 * @fileoverview Application configuration loaded from environment variables.
 *
 * Every tunable value flows through {@link loadConfig}. The resulting object
 * is read-only and is handed explicitly to each component's constructor, so
 * no module below the CLI entry point ever reads `process.env` itself.
 *
 * ## Architecture Position
 * ```
 *  +-----------+   +-----------+   +-----------+
 *  | commands  |   | extractor |   | analysis  |
 *  +-----+-----+   +-----+-----+   +-----+-----+
 *        |               |               |
 *        +-------+-------+-------+-------+
 *                |               |
 *          +-----v-----+  +-----v-----+
 *          |   config   |  |   utils   |
 *          +-----------+  +-----------+
 * ```
 *
 * ## Environment Variables
 * | Variable                | Field                           | Default        |
 * |-------------------------|---------------------------------|----------------|
 * | `OPENAI_API_KEY`        | `llm.apiKey`                    | (required)     |
 * | `OPENAI_MODEL`          | `llm.model`                     | `gpt-4`        |
 * | `OPENAI_BASE_URL`       | `llm.baseUrl`                   | provider's     |
 * | `MAX_RETRIES`           | `llm.maxAttempts`               | `3`            |
 * | `MIN_CONTENT_LENGTH`    | `extraction.minContentLength`   | `200`          |
 * | `MAX_ARTICLE_LENGTH`    | `extraction.maxContentLength`   | `10000`        |
 * | `FETCH_TIMEOUT_SECONDS` | `extraction.timeoutSeconds`     | `10`           |
 * | `USER_AGENT`            | `extraction.userAgent`          | desktop Chrome |
 * | `SELECTOR_MIN_LENGTH`   | `extraction.selectorMinLength`  | `200`          |
 * | `BOILERPLATE_PHRASES`   | `extraction.boilerplatePhrases` | (none)         |
 * | `MAX_RESPONSE_SIZE`     | `maxResponseBytes`              | `10485760`     |
 * | `DEBUG_MODE`            | `debug`                         | `false`        |
 *
 * @example
 * ```ts
 * import { loadConfig } from "./config.js";
 *
 * const config = loadConfig();             // reads process.env
 * const testConfig = loadConfig({          // or any env-shaped record
 *   OPENAI_API_KEY: "test-key",
 *   MAX_ARTICLE_LENGTH: "5000",
 * });
 * testConfig.extraction.maxContentLength;  // 5000
 * ```
 */

import { z } from "zod";
import { ConfigError } from "./utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Settings for the fetch → extract → normalize chain.
 */
export interface ExtractionConfig {
  /**
   * Content floor: bodies shorter than this are rejected, and a primary
   * result shorter than this triggers the selector fallback.
   *
   * @default 200
   */
  readonly minContentLength: number;

  /**
   * Character budget of the normalized body. Longer text is cut at the last
   * whitespace boundary inside the budget.
   *
   * @default 10000
   */
  readonly maxContentLength: number;

  /**
   * Seconds before the in-flight page request is aborted.
   *
   * @default 10
   */
  readonly timeoutSeconds: number;

  /** User-Agent header sent with the page request. */
  readonly userAgent: string;

  /**
   * A fallback selector wins only when its text is longer than this.
   *
   * @default 200
   */
  readonly selectorMinLength: number;

  /**
   * Extra literal phrases to strip as boilerplate, matched case-insensitively,
   * on top of the built-in deny-list.
   */
  readonly boilerplatePhrases: readonly string[];
}

/** Settings for the language-model client. */
export interface LlmConfig {
  readonly apiKey: string;
  readonly model: string;
  /** Override for OpenAI-compatible endpoints; `undefined` uses the provider default. */
  readonly baseUrl?: string;
  /** Total attempts per prompt, including the first one. */
  readonly maxAttempts: number;
}

/** Complete application configuration. */
export interface AppConfig {
  readonly extraction: ExtractionConfig;
  readonly llm: LlmConfig;
  /** Maximum accepted response body, in bytes. */
  readonly maxResponseBytes: number;
  readonly debug: boolean;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Defaults
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * A desktop browser User-Agent. Several news sites answer 403 to obvious
 * bot agents.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

/** Extraction settings used when no environment override is present. */
export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = Object.freeze({
  minContentLength: 200,
  maxContentLength: 10_000,
  timeoutSeconds: 10,
  userAgent: DEFAULT_USER_AGENT,
  selectorMinLength: 200,
  boilerplatePhrases: Object.freeze([]),
});

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

/**
 * Zod schema over the raw environment. Unset variables take their defaults;
 * empty strings are treated as unset.
 */
const EnvSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: "OPENAI_API_KEY is required" })
    .min(1, "OPENAI_API_KEY is required"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4"),
  OPENAI_BASE_URL: z.string().url().optional(),
  MAX_RETRIES: positiveInt(3),
  MIN_CONTENT_LENGTH: positiveInt(DEFAULT_EXTRACTION_CONFIG.minContentLength),
  MAX_ARTICLE_LENGTH: positiveInt(DEFAULT_EXTRACTION_CONFIG.maxContentLength),
  FETCH_TIMEOUT_SECONDS: positiveInt(DEFAULT_EXTRACTION_CONFIG.timeoutSeconds),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  SELECTOR_MIN_LENGTH: positiveInt(DEFAULT_EXTRACTION_CONFIG.selectorMinLength),
  BOILERPLATE_PHRASES: z.string().optional(),
  MAX_RESPONSE_SIZE: positiveInt(10 * 1024 * 1024),
  DEBUG_MODE: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() === "true"),
});

/**
 * Drop empty-string entries so that `FOO=` in a `.env` file means "unset".
 */
function withoutBlanks(
  env: Record<string, string | undefined>,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      out[key] = value;
    }
  }
  return out;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Read an environment record and build a validated {@link AppConfig}.
 *
 * @param env - Environment variables; defaults to `process.env`.
 * @throws {ConfigError} When a required variable is missing, a numeric
 *   variable is not a positive integer, or the content bounds contradict
 *   each other.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;

  if (vars.MIN_CONTENT_LENGTH > vars.MAX_ARTICLE_LENGTH) {
    throw new ConfigError(
      `Invalid configuration: MIN_CONTENT_LENGTH (${vars.MIN_CONTENT_LENGTH}) ` +
        `exceeds MAX_ARTICLE_LENGTH (${vars.MAX_ARTICLE_LENGTH})`,
    );
  }

  const boilerplatePhrases = (vars.BOILERPLATE_PHRASES ?? "")
    .split(";")
    .map((phrase) => phrase.trim())
    .filter((phrase) => phrase.length > 0);

  return Object.freeze({
    extraction: Object.freeze({
      minContentLength: vars.MIN_CONTENT_LENGTH,
      maxContentLength: vars.MAX_ARTICLE_LENGTH,
      timeoutSeconds: vars.FETCH_TIMEOUT_SECONDS,
      userAgent: vars.USER_AGENT,
      selectorMinLength: vars.SELECTOR_MIN_LENGTH,
      boilerplatePhrases: Object.freeze(boilerplatePhrases),
    }),
    llm: Object.freeze({
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
      baseUrl: vars.OPENAI_BASE_URL,
      maxAttempts: vars.MAX_RETRIES,
    }),
    maxResponseBytes: vars.MAX_RESPONSE_SIZE,
    debug: vars.DEBUG_MODE,
  });
}
