/**
 * @fileoverview The `article-skeptic <url>` command.
 *
 * Flow: parse arguments → load config → extract → print article summary →
 * analyze → render → write report → print preview.
 *
 * Every failure is turned into a one-line `[ERROR]` message and exit code 1;
 * nothing escapes as an unhandled rejection. Collaborators are injected so
 * tests can drive the whole command without a network.
 *
 * @module commands/analyze
 */

import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { z } from "zod";
import { ArticleAnalyzer, type ArticleAnalysis } from "../analysis/analyzer.js";
import { OpenAiModelClient } from "../analysis/model-client.js";
import { PromptLibrary } from "../analysis/prompts.js";
import { loadConfig, type AppConfig } from "../config.js";
import { ContentNormalizer } from "../extractor/normalizer.js";
import { ArticlePipeline } from "../extractor/pipeline.js";
import { ReadabilityExtractor } from "../extractor/readability-extractor.js";
import { SelectorExtractor } from "../extractor/selector-extractor.js";
import type { ExtractionResult } from "../extractor/types.js";
import { renderReport } from "../report/markdown-report.js";
import { HtmlFetcher } from "../services/fetch.js";
import { formatError } from "../utils/errors.js";
import { createLogger, type LogSink, type Logger } from "../utils/logger.js";

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

export const DEFAULT_OUTPUT_PATH = "critical_analysis_report.md";

/** Characters of the written report echoed to the terminal. */
export const PREVIEW_LENGTH = 500;

export const USAGE = [
  "Usage: article-skeptic <url> [--output|-o <path>] [--debug]",
  "",
  "Fetches a news article, runs a critical analysis with a language model",
  "and writes the result as a Markdown report.",
  "",
  "Options:",
  `  -o, --output <path>  Report file (default: ${DEFAULT_OUTPUT_PATH})`,
  "      --debug          Print pipeline stages and error stacks",
  "  -h, --help           Show this message",
].join("\n");

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Validated command arguments. Shaped like the raw `parseArgs` output so
 * the schema does the checking in one place.
 */
export const AnalyzeArgsSchema = z.object({
  /** Article to analyze; http(s) only. */
  url: z
    .string({ required_error: "A URL argument is required" })
    .refine(isHttpUrl, (value) => ({ message: `Not an http(s) URL: ${value}` })),

  /** Where to write the report. */
  output: z.string().min(1, "Output path must not be empty").default(DEFAULT_OUTPUT_PATH),

  /** Verbose logging and stack traces. */
  debug: z.boolean().default(false),
});

export type AnalyzeArgs = z.infer<typeof AnalyzeArgsSchema>;

function readArgv(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      debug: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

export type ParsedCommand =
  | { kind: "run"; args: AnalyzeArgs }
  | { kind: "help" }
  | { kind: "invalid"; message: string };

/**
 * Parse `argv` (without the node and script entries).
 *
 * @example
 * ```typescript
 * parseCommand(["https://example.com/a", "-o", "out.md"]);
 * // => { kind: "run", args: { url: "https://example.com/a", output: "out.md", debug: false } }
 * ```
 */
export function parseCommand(argv: readonly string[]): ParsedCommand {
  let parsed: ReturnType<typeof readArgv>;
  try {
    parsed = readArgv(argv);
  } catch (error) {
    return { kind: "invalid", message: formatError(error) };
  }

  if (parsed.values.help) {
    return { kind: "help" };
  }
  if (parsed.positionals.length > 1) {
    return {
      kind: "invalid",
      message: `Expected one URL, got ${parsed.positionals.length}: ${parsed.positionals.join(" ")}`,
    };
  }

  const result = AnalyzeArgsSchema.safeParse({
    url: parsed.positionals[0],
    output: parsed.values.output,
    debug: parsed.values.debug,
  });
  if (!result.success) {
    return {
      kind: "invalid",
      message: result.error.issues.map((issue) => issue.message).join("; "),
    };
  }
  return { kind: "run", args: result.data };
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

/** What {@link runAnalyze} needs from the outside world. */
export interface AnalyzeDeps {
  extract: (url: string) => Promise<ExtractionResult>;
  analyze: (article: ExtractionResult) => Promise<ArticleAnalysis>;
  writeFile: (path: string, content: string) => Promise<void>;
  now: () => Date;
  logger: Logger;
}

/**
 * Run one analysis and return the process exit code.
 */
export async function runAnalyze(args: AnalyzeArgs, deps: AnalyzeDeps): Promise<number> {
  const { logger } = deps;

  try {
    logger.info(`Fetching and extracting article from ${args.url}`);
    const article = await deps.extract(args.url);
    logger.success(`Extracted ${article.charCount} characters (${article.method} method)`);
    logger.article(article);

    logger.info("Running critical analysis");
    const analysis = await deps.analyze(article);

    const report = renderReport(analysis, deps.now());
    await deps.writeFile(args.output, report);
    logger.success(`Report written to ${args.output}`);

    logger.raw(`\nReport preview:\n${"-".repeat(40)}`);
    logger.raw(
      report.length > PREVIEW_LENGTH ? `${report.slice(0, PREVIEW_LENGTH)}...` : report,
    );
    return 0;
  } catch (error) {
    logger.error(formatError(error));
    if (args.debug && error instanceof Error && error.stack) {
      logger.raw(error.stack);
    }
    return 1;
  }
}

/**
 * Wire the production collaborators from a loaded config.
 */
export function createAnalyzeDeps(config: AppConfig, logger: Logger): AnalyzeDeps {
  const { extraction } = config;

  const pipeline = new ArticlePipeline({
    fetcher: new HtmlFetcher({
      timeoutSeconds: extraction.timeoutSeconds,
      userAgent: extraction.userAgent,
      maxResponseBytes: config.maxResponseBytes,
    }),
    primary: new ReadabilityExtractor(),
    fallback: new SelectorExtractor({ minLength: extraction.selectorMinLength }),
    normalizer: new ContentNormalizer({
      maxLength: extraction.maxContentLength,
      extraPhrases: extraction.boilerplatePhrases,
    }),
    config: extraction,
    logger,
  });
  const analyzer = new ArticleAnalyzer(
    new OpenAiModelClient(config.llm),
    new PromptLibrary(),
    logger,
  );

  return {
    extract: (url) => pipeline.extract(url),
    analyze: (article) => analyzer.analyze(article),
    writeFile: (path, content) => writeFile(path, content, "utf8"),
    now: () => new Date(),
    logger,
  };
}

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

export interface CliOptions {
  env?: Record<string, string | undefined>;
  sink?: LogSink;
  /** Replaces {@link createAnalyzeDeps}; used by tests. */
  createDeps?: (config: AppConfig, logger: Logger) => AnalyzeDeps;
}

/**
 * Full command: argument parsing, config loading and the run itself.
 * Resolves to the exit code; never rejects.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const command = parseCommand(argv);

  if (command.kind === "help") {
    createLogger({ debug: false, sink: options.sink }).raw(USAGE);
    return 0;
  }
  if (command.kind === "invalid") {
    const logger = createLogger({ debug: false, sink: options.sink });
    logger.error(command.message);
    logger.raw(USAGE);
    return 1;
  }

  const { args } = command;
  let config: AppConfig;
  try {
    config = loadConfig(options.env);
  } catch (error) {
    createLogger({ debug: args.debug, sink: options.sink }).error(formatError(error));
    return 1;
  }

  const logger = createLogger({ debug: args.debug || config.debug, sink: options.sink });
  const deps = (options.createDeps ?? createAnalyzeDeps)(config, logger);
  return runAnalyze({ ...args, debug: args.debug || config.debug }, deps);
}
