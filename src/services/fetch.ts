/**
 * @fileoverview HTTP fetch service: downloads the raw HTML of an article page.
 *
 * Wraps the Node.js native `fetch()` with the controls the extraction chain
 * relies on:
 *
 * 1. **Protocol check** - only `http:` and `https:` URLs are fetched.
 * 2. **Timeout** - `AbortSignal.timeout()` aborts the in-flight request after
 *    `timeoutSeconds`; nothing of a partial body is kept.
 * 3. **Status check** - only 2xx responses are accepted.
 * 4. **Content-Type filter** - only HTML-like responses are read.
 * 5. **Response size limit** - the body is streamed with a byte counter.
 *
 * One call makes exactly one GET. Retrying is not this layer's job.
 *
 * ```
 *   HtmlFetcher.fetch(url)
 *     |
 *     +--> URL parsing & protocol check
 *     +--> fetch() with AbortSignal.timeout, User-Agent, redirect: "follow"
 *     +--> status / Content-Type validation
 *     +--> streaming read with byte limit
 *     +--> FetchResult
 * ```
 *
 * @module services/fetch
 */

import type { ExtractionConfig } from "../config.js";
import {
  ContentTypeError,
  FetchError,
  ResponseTooLargeError,
  TimeoutError,
} from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * Result of a successful page download.
 *
 * @example
 * ```typescript
 * const result: FetchResult = {
 *   html: "<!DOCTYPE html><html>...</html>",
 *   url: "https://news.example.com/2024/05/story",
 *   contentType: "text/html; charset=utf-8",
 *   statusCode: 200,
 * };
 * ```
 */
export interface FetchResult {
  /** The raw HTML body. */
  html: string;

  /**
   * The final URL after redirects. Readability needs it to resolve relative
   * links inside the article.
   */
  url: string;

  /** The Content-Type header value, e.g. "text/html; charset=utf-8". */
  contentType: string;

  /** Status code of the final response. */
  statusCode: number;
}

/** Constructor settings for {@link HtmlFetcher}. */
export interface FetcherOptions {
  timeoutSeconds: ExtractionConfig["timeoutSeconds"];
  userAgent: ExtractionConfig["userAgent"];
  /** Maximum body size in bytes. */
  maxResponseBytes: number;
}

/** The subset of the global `fetch` signature the fetcher calls. */
export type FetchImpl = (
  input: string,
  init: RequestInit,
) => Promise<Response>;

// ---------------------------------------------------------------------------
// Content-Type Allowlist
// ---------------------------------------------------------------------------

/**
 * MIME types treated as HTML. JSON, plain text, PDF and images are rejected
 * before their bodies are read.
 */
const ALLOWED_CONTENT_TYPES = new Set<string>([
  "text/html",
  "application/xhtml+xml",
  "text/xml",
  "application/xml",
]);

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/**
 * Extracts the MIME type from a Content-Type header value.
 *
 * @example
 * ```typescript
 * extractMimeType("text/html; charset=utf-8"); // => "text/html"
 * extractMimeType("APPLICATION/XHTML+XML");    // => "application/xhtml+xml"
 * extractMimeType(null);                       // => ""
 * ```
 */
export function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  const [mimeType = ""] = contentType.split(";");
  return mimeType.trim().toLowerCase();
}

/**
 * Reads a Response body as text, aborting once more than `maxBytes` have
 * arrived. Content-Length is checked first as a fast path but is not
 * trusted: chunked responses omit it and compressed ones misstate it.
 *
 * @throws {ResponseTooLargeError} If the body exceeds the limit.
 * @throws {FetchError} If the stream fails mid-read.
 */
async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
): Promise<string> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      throw new ResponseTooLargeError(
        `Response Content-Length (${declaredSize} bytes) exceeds limit of ${maxBytes} bytes`,
      );
    }
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  // fatal: false replaces malformed sequences with U+FFFD instead of throwing.
  const decoder = new TextDecoder("utf-8", { fatal: false });

  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw new ResponseTooLargeError(
          `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`,
        );
      }

      // stream: true keeps multi-byte characters split across chunks intact.
      chunks.push(decoder.decode(value, { stream: true }));
    }
    chunks.push(decoder.decode());
  } catch (error) {
    if (error instanceof ResponseTooLargeError) {
      throw error;
    }
    throw new FetchError(
      `Error reading response body: ${error instanceof Error ? error.message : String(error)}`,
      response.status,
      { cause: error },
    );
  }

  return chunks.join("");
}

/**
 * True when `error` is the rejection `fetch()` produces for a fired abort
 * signal. Node reports `AbortSignal.timeout()` as a DOMException named
 * "TimeoutError"; a plain abort is named "AbortError".
 */
function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Unwraps undici's generic "fetch failed" into the underlying cause
 * (ENOTFOUND, ECONNREFUSED, ...), which says far more to the user.
 */
function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Downloads article pages.
 *
 * @example
 * ```typescript
 * const fetcher = new HtmlFetcher({
 *   timeoutSeconds: 10,
 *   userAgent: DEFAULT_USER_AGENT,
 *   maxResponseBytes: 10 * 1024 * 1024,
 * });
 * const page = await fetcher.fetch("https://news.example.com/story");
 * page.html.length; // 48213
 * ```
 */
export class HtmlFetcher {
  private readonly fetchImpl: FetchImpl;

  /**
   * @param options   - Timeout, User-Agent and size limit.
   * @param fetchImpl - `fetch` implementation; tests pass a stub.
   */
  constructor(
    private readonly options: FetcherOptions,
    fetchImpl?: FetchImpl,
  ) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Fetch `url` and return its HTML.
   *
   * @throws {TimeoutError} If the request exceeds `timeoutSeconds`.
   * @throws {ContentTypeError} If the response is not HTML-like.
   * @throws {ResponseTooLargeError} If the body exceeds `maxResponseBytes`.
   * @throws {FetchError} For invalid URLs, unsupported protocols, DNS or
   *   connection failures, and non-2xx statuses.
   */
  async fetch(url: string): Promise<FetchResult> {
    let parsedUrl: URL;
    try {
      parsedUrl = new URL(url);
    } catch (error) {
      throw new FetchError(`Invalid URL: ${url}`, undefined, { cause: error });
    }

    if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
      throw new FetchError(
        `Unsupported protocol: ${parsedUrl.protocol} (only http: and https: are allowed)`,
      );
    }

    const timeoutMs = this.options.timeoutSeconds * 1000;
    const target = parsedUrl.href;

    let response: Response;
    try {
      response = await this.fetchImpl(target, {
        method: "GET",
        signal: AbortSignal.timeout(timeoutMs),
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.5",
        },
        redirect: "follow",
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new TimeoutError(
          `Request to ${target} timed out after ${this.options.timeoutSeconds}s`,
          { cause: error },
        );
      }
      throw new FetchError(
        `Failed to fetch ${target}: ${describeNetworkError(error)}`,
        undefined,
        { cause: error },
      );
    }

    if (!response.ok) {
      const status = [response.status, response.statusText]
        .filter(Boolean)
        .join(" ");
      await response.body?.cancel();
      throw new FetchError(`HTTP ${status} for ${target}`, response.status);
    }

    const contentType = response.headers.get("content-type");
    const mimeType = extractMimeType(contentType);
    if (!ALLOWED_CONTENT_TYPES.has(mimeType)) {
      await response.body?.cancel();
      throw new ContentTypeError(
        `Unacceptable Content-Type: "${mimeType || "(none)"}" for ${target}. ` +
          `Expected one of: ${Array.from(ALLOWED_CONTENT_TYPES).join(", ")}`,
      );
    }

    let html: string;
    try {
      html = await readBodyWithLimit(response, this.options.maxResponseBytes);
    } catch (error) {
      // The timeout signal also covers the body stream.
      if (isAbortError(error) || isAbortError(errorCause(error))) {
        throw new TimeoutError(
          `Reading ${target} timed out after ${this.options.timeoutSeconds}s`,
          { cause: error },
        );
      }
      throw error;
    }

    return {
      html,
      // An empty response.url happens with hand-built Responses (tests).
      url: response.url || target,
      contentType: contentType ?? "text/html",
      statusCode: response.status,
    };
  }
}

function errorCause(error: unknown): unknown {
  return error instanceof Error ? error.cause : undefined;
}
