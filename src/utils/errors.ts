/**
 * @module utils/errors
 * @fileoverview Error class hierarchy for article-skeptic.
 *
 * Every error raised by the tool extends {@link SkepticError}, which carries
 * a machine-readable `code` next to the human-readable `message`. The CLI
 * turns any of them into a one-line message and a non-zero exit code.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── SkepticError (base)        ─── code: string
 *         ├── FetchError              ─── "FETCH_FAILED" + optional statusCode
 *         │     ├── TimeoutError         ─── "TIMEOUT"
 *         │     ├── ContentTypeError     ─── "CONTENT_TYPE_REJECTED"
 *         │     └── ResponseTooLargeError ── "RESPONSE_TOO_LARGE"
 *         ├── ExtractionError         ─── "EXTRACTION_FAILED"
 *         ├── InsufficientContentError ── "INSUFFICIENT_CONTENT"
 *         ├── AnalysisError           ─── "ANALYSIS_FAILED"
 *         └── ConfigError             ─── "CONFIG_INVALID"
 * ```
 *
 * Timeouts, rejected content types and oversized bodies are all fetch
 * failures, so they subclass {@link FetchError}: `err instanceof FetchError`
 * holds for every way the download step can fail.
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * try {
 *   throw new FetchError("Server returned 503", 503);
 * } catch (err) {
 *   console.error(formatError(err));
 *   // => "[FETCH_FAILED] Server returned 503"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all article-skeptic errors.
 *
 * Subclasses only pass a stable code; `name` is taken from the concrete class
 * so stack traces read "FetchError:" rather than "Error:".
 */
export class SkepticError extends Error {
  /**
   * Machine-readable error code in SCREAMING_SNAKE_CASE.
   *
   * @example "FETCH_FAILED", "EXTRACTION_FAILED", "TIMEOUT"
   */
  public readonly code: string;

  /**
   * @param message - Human-readable description of what went wrong.
   * @param code    - Stable machine-readable error code.
   * @param options - Standard error options; `cause` keeps the wrapped error.
   */
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Fetch Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when the article page cannot be downloaded.
 *
 * Covers network-level failures (DNS resolution, TCP connect, TLS handshake)
 * as well as HTTP-level failures (4xx, 5xx). {@link statusCode} is set only
 * when the server actually answered.
 *
 * @example
 * ```ts
 * throw new FetchError("DNS resolution failed for news.invalid");
 * throw new FetchError("HTTP 404 Not Found for https://example.com/a", 404);
 * ```
 */
export class FetchError extends SkepticError {
  /** HTTP status code of the response, when one was received. */
  public readonly statusCode?: number;

  constructor(
    message: string,
    statusCode?: number,
    options?: ErrorOptions & { code?: string },
  ) {
    super(message, options?.code ?? "FETCH_FAILED", options);
    this.statusCode = statusCode;
  }
}

/**
 * Thrown when the request does not complete within the configured timeout.
 * The in-flight request is aborted; nothing of the partial body is kept.
 */
export class TimeoutError extends FetchError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, undefined, { ...options, code: "TIMEOUT" });
  }
}

/**
 * Thrown when the response Content-Type is not an HTML-like type.
 *
 * @example
 * ```ts
 * throw new ContentTypeError(
 *   'Unacceptable Content-Type: "application/pdf" for https://example.com/a.pdf'
 * );
 * ```
 */
export class ContentTypeError extends FetchError {
  constructor(message: string) {
    super(message, undefined, { code: "CONTENT_TYPE_REJECTED" });
  }
}

/**
 * Thrown when the response body exceeds the configured byte limit.
 * The limit is enforced while streaming, so the body is never fully buffered.
 */
export class ResponseTooLargeError extends FetchError {
  constructor(message: string) {
    super(message, undefined, { code: "RESPONSE_TOO_LARGE" });
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Extraction Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when an extractor cannot identify an article body.
 *
 * Extractors throw this individually; the pipeline rethrows one of its own
 * once both the primary and the fallback method have been exhausted.
 */
export class ExtractionError extends SkepticError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "EXTRACTION_FAILED", options);
  }
}

/**
 * Thrown when the normalized article body is shorter than the content floor.
 */
export class InsufficientContentError extends SkepticError {
  /** Length of the body that was rejected. */
  public readonly charCount: number;

  /** The content floor it was measured against. */
  public readonly minLength: number;

  constructor(message: string, charCount: number, minLength: number) {
    super(message, "INSUFFICIENT_CONTENT");
    this.charCount = charCount;
    this.minLength = minLength;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Analysis & Startup Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when the language-model call fails after all attempts, or answers
 * with nothing.
 */
export class AnalysisError extends SkepticError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "ANALYSIS_FAILED", options);
  }
}

/**
 * Thrown at startup when the environment does not form a valid configuration
 * (for example, `OPENAI_API_KEY` is missing).
 */
export class ConfigError extends SkepticError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Convert any caught value to a single-line, user-facing description.
 *
 * - {@link SkepticError} subclasses: `"[CODE] message"`.
 * - Other `Error` instances: just the `.message`.
 * - Everything else: `String(value)`.
 *
 * @example
 * ```ts
 * formatError(new FetchError("Not Found", 404)); // => "[FETCH_FAILED] Not Found"
 * formatError(new TypeError("boom"));            // => "boom"
 * formatError(42);                               // => "42"
 * ```
 */
export function formatError(error: unknown): string {
  // SkepticError first: it also matches `instanceof Error`.
  if (error instanceof SkepticError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
