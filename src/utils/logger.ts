/**
 * @module utils/logger
 * @fileoverview Console logger for the CLI.
 *
 * Progress goes to stdout with a `[SKEPTIC]` prefix, problems go to stderr.
 * Debug lines (pipeline stage transitions, fallback reasons) only appear
 * when debug mode is on. Optional metadata is appended as compact JSON.
 */

import type { ExtractionResult } from "../extractor/types.js";

type LogLevel = "debug" | "info" | "success" | "warn" | "error";

/** Where formatted lines end up. Tests pass an in-memory sink. */
export interface LogSink {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  success: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  /** Print the "ARTICLE INFORMATION" block for an extracted article. */
  article: (result: ExtractionResult) => void;
  /** Print a raw line to stdout without any prefix. */
  raw: (line: string) => void;
}

export interface LoggerOptions {
  debug: boolean;
  sink?: LogSink;
}

const PREFIXES: Record<LogLevel, string> = {
  debug: "[DEBUG]",
  info: "[SKEPTIC]",
  success: "[SUCCESS]",
  warn: "[WARN]",
  error: "[ERROR]",
};

const RULE = "=".repeat(60);

/* eslint-disable no-console */
const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};
/* eslint-enable no-console */

export function formatLine(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
): string {
  const suffix =
    meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${PREFIXES[level]} ${message}${suffix}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const sink = options.sink ?? consoleSink;

  const emit = (
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ) => {
    const line = formatLine(level, message, meta);
    if (level === "warn" || level === "error") {
      sink.err(line);
    } else {
      sink.out(line);
    }
  };

  return {
    debug: (message, meta) => {
      if (options.debug) emit("debug", message, meta);
    },
    info: (message, meta) => emit("info", message, meta),
    success: (message, meta) => emit("success", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    article: (result) => {
      const authors =
        result.authors.length > 0 ? result.authors.join(", ") : "Unknown";
      sink.out(
        [
          "",
          RULE,
          "ARTICLE INFORMATION",
          RULE,
          `Title: ${result.title ?? "Unknown"}`,
          `Author(s): ${authors}`,
          `URL: ${result.sourceUrl}`,
          `Content Length: ${result.charCount} characters`,
          `Extraction Method: ${result.method}`,
          RULE,
          "",
        ].join("\n"),
      );
    },
    raw: (line) => sink.out(line),
  };
}

/** A logger that drops everything; handy as a constructor default. */
export const silentLogger: Logger = createLogger({
  debug: false,
  sink: { out: () => undefined, err: () => undefined },
});
