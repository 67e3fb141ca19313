/**
 * @fileoverview Tests for the extraction pipeline.
 *
 * Covers: primary/fallback selection, terminal fetch failures, the content
 * floor, truncation, result immutability and debug stage logging. Most
 * cases stub the fetcher and both extractors; the last group runs real page
 * markup through both extractors. The normalizer is always the real one.
 */

import { describe, it, expect, vi } from "vitest";
import { ContentNormalizer } from "../../src/extractor/normalizer.js";
import { ArticlePipeline } from "../../src/extractor/pipeline.js";
import { ReadabilityExtractor } from "../../src/extractor/readability-extractor.js";
import { SelectorExtractor } from "../../src/extractor/selector-extractor.js";
import type {
  ExtractionCandidate,
  ExtractionMethod,
} from "../../src/extractor/types.js";
import { HtmlFetcher, type FetchResult } from "../../src/services/fetch.js";
import {
  ExtractionError,
  FetchError,
  InsufficientContentError,
  TimeoutError,
} from "../../src/utils/errors.js";
import { createLogger } from "../../src/utils/logger.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const URL_REQUESTED = "https://news.example.com/story";
const URL_FINAL = "https://news.example.com/story?amp=1";
const PAGE_HTML = "<html><body><p>stub page</p></body></html>";

/** Exactly 500 characters. */
const LONG_TEXT = "Reporters ".repeat(50).trim() + ".";

/** 44 characters: well under the 200-character floor. */
const SHORT_TEXT = "Officials confirmed the bridge has reopened.";

function candidate(
  method: ExtractionMethod,
  text: string,
  extra: Partial<ExtractionCandidate> = {},
): ExtractionCandidate {
  return { method, authors: [], text, ...extra };
}

function extractor(
  method: ExtractionMethod,
  impl: (html: string, url: string) => ExtractionCandidate,
) {
  return { method, extract: vi.fn(impl) };
}

function failing(method: ExtractionMethod, message: string) {
  return extractor(method, () => {
    throw new ExtractionError(message);
  });
}

function stubFetcher(result: Partial<FetchResult> = {}) {
  return {
    fetch: vi.fn(
      async (_url: string): Promise<FetchResult> => ({
        html: PAGE_HTML,
        url: URL_FINAL,
        contentType: "text/html; charset=utf-8",
        statusCode: 200,
        ...result,
      }),
    ),
  };
}

function pipelineWith(
  deps: Partial<ConstructorParameters<typeof ArticlePipeline>[0]> = {},
) {
  return new ArticlePipeline({
    fetcher: stubFetcher(),
    primary: extractor("primary", () => candidate("primary", LONG_TEXT)),
    fallback: failing("fallback", "fallback should not be needed"),
    normalizer: new ContentNormalizer({ maxLength: 10_000 }),
    config: { minContentLength: 200 },
    ...deps,
  });
}

// ---------------------------------------------------------------------------
// Method selection
// ---------------------------------------------------------------------------

describe("ArticlePipeline: method selection", () => {
  it("uses the primary result and skips the fallback when it is long enough", async () => {
    const primary = extractor("primary", () =>
      candidate("primary", LONG_TEXT, {
        title: "Bridge Reopens",
        authors: ["Ana Lima"],
        publishedAt: "2026-03-01T08:00:00Z",
      }),
    );
    const fallback = failing("fallback", "unused");

    const result = await pipelineWith({ primary, fallback }).extract(URL_REQUESTED);

    expect(result.method).toBe("primary");
    expect(result.title).toBe("Bridge Reopens");
    expect(result.authors).toEqual(["Ana Lima"]);
    expect(result.publishedAt).toBe("2026-03-01T08:00:00Z");
    expect(result.body).toBe(LONG_TEXT);
    expect(result.charCount).toBe(500);
    expect(fallback.extract).not.toHaveBeenCalled();
  });

  it("runs the fallback when the primary throws", async () => {
    const primary = failing("primary", "Readability found no article body");
    const fallback = extractor("fallback", () => candidate("fallback", LONG_TEXT));

    const result = await pipelineWith({ primary, fallback }).extract(URL_REQUESTED);

    expect(result.method).toBe("fallback");
    expect(result.charCount).toBe(500);
    expect(fallback.extract).toHaveBeenCalledTimes(1);
  });

  it("runs the fallback when the primary text is shorter than the floor", async () => {
    const primary = extractor("primary", () => candidate("primary", SHORT_TEXT));
    const fallback = extractor("fallback", () => candidate("fallback", LONG_TEXT));

    const result = await pipelineWith({ primary, fallback }).extract(URL_REQUESTED);

    expect(result.method).toBe("fallback");
    expect(result.body).toBe(LONG_TEXT);
  });

  it("accepts a primary text of exactly the floor length", async () => {
    const exact = "x".repeat(200);
    const primary = extractor("primary", () => candidate("primary", exact));

    const result = await pipelineWith({ primary }).extract(URL_REQUESTED);

    expect(result.method).toBe("primary");
    expect(result.charCount).toBe(200);
  });

  it("does not count layout whitespace towards the primary's length", async () => {
    // 174 characters of words, padded to 606 by indentation between blocks.
    const indented = Array.from({ length: 25 }, () => "harbor").join("\n\n        \n        ");
    const primary = extractor("primary", () => candidate("primary", indented));
    const fallback = extractor("fallback", () => candidate("fallback", LONG_TEXT));

    const result = await pipelineWith({ primary, fallback }).extract(URL_REQUESTED);

    expect(result.method).toBe("fallback");
    expect(result.body).toBe(LONG_TEXT);
    expect(fallback.extract).toHaveBeenCalledTimes(1);
  });

  it("passes the same HTML and the final URL to both extractors", async () => {
    const primary = extractor("primary", () => candidate("primary", SHORT_TEXT));
    const fallback = extractor("fallback", () => candidate("fallback", LONG_TEXT));

    await pipelineWith({ primary, fallback }).extract(URL_REQUESTED);

    expect(primary.extract).toHaveBeenCalledWith(PAGE_HTML, URL_FINAL);
    expect(fallback.extract).toHaveBeenCalledWith(PAGE_HTML, URL_FINAL);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe("ArticlePipeline: failures", () => {
  it("fails with ExtractionError when both methods throw", async () => {
    const pipeline = pipelineWith({
      primary: failing("primary", "no article"),
      fallback: failing("fallback", "no selector matched"),
    });

    const run = pipeline.extract(URL_REQUESTED);

    await expect(run).rejects.toBeInstanceOf(ExtractionError);
    await expect(run).rejects.toThrow(
      `Both extraction methods failed for ${URL_FINAL}: primary: no article; fallback: no selector matched`,
    );
  });

  it("fails with InsufficientContentError when both methods come up short", async () => {
    const pipeline = pipelineWith({
      primary: extractor("primary", () => candidate("primary", SHORT_TEXT)),
      fallback: failing("fallback", "no selector matched"),
    });

    const run = pipeline.extract(URL_REQUESTED);

    await expect(run).rejects.toBeInstanceOf(InsufficientContentError);
    await expect(run).rejects.toMatchObject({
      code: "INSUFFICIENT_CONTENT",
      charCount: 44,
      minLength: 200,
    });
  });

  it("rejects a body that only reaches the floor because of boilerplate", async () => {
    const padded = "Short story.\n" + "Advertisement\n".repeat(20);
    const fallback = failing("fallback", "unused");
    const pipeline = pipelineWith({
      primary: extractor("primary", () => candidate("primary", padded)),
      fallback,
    });

    const run = pipeline.extract(URL_REQUESTED);

    await expect(run).rejects.toBeInstanceOf(InsufficientContentError);
    await expect(run).rejects.toMatchObject({ charCount: 12 });
    expect(fallback.extract).not.toHaveBeenCalled();
  });

  it("rethrows fetch failures without running any extractor", async () => {
    const primary = extractor("primary", () => candidate("primary", LONG_TEXT));
    const fetcher = {
      fetch: vi.fn(async (_url: string): Promise<FetchResult> => {
        throw new FetchError("HTTP 404 Not Found for https://news.example.com/story", 404);
      }),
    };

    const run = pipelineWith({ fetcher, primary }).extract(URL_REQUESTED);

    await expect(run).rejects.toBeInstanceOf(FetchError);
    await expect(run).rejects.toMatchObject({ statusCode: 404 });
    expect(primary.extract).not.toHaveBeenCalled();
  });

  it("surfaces a timed-out request as TimeoutError", async () => {
    const fetchImpl = vi.fn(async (): Promise<Response> => {
      throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
    });
    const fetcher = new HtmlFetcher(
      { timeoutSeconds: 10, userAgent: "test-agent", maxResponseBytes: 1024 },
      fetchImpl,
    );
    const primary = extractor("primary", () => candidate("primary", LONG_TEXT));

    const run = pipelineWith({ fetcher, primary }).extract(URL_REQUESTED);

    await expect(run).rejects.toBeInstanceOf(TimeoutError);
    await expect(run).rejects.toBeInstanceOf(FetchError);
    await expect(run).rejects.toMatchObject({ code: "TIMEOUT" });
    expect(primary.extract).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

describe("ArticlePipeline: result", () => {
  it("reports the requested URL, not the final one", async () => {
    const result = await pipelineWith().extract(URL_REQUESTED);

    expect(result.sourceUrl).toBe(URL_REQUESTED);
  });

  it("truncates the body to the normalizer budget at a word boundary", async () => {
    const pipeline = pipelineWith({
      normalizer: new ContentNormalizer({ maxLength: 300 }),
    });

    const result = await pipeline.extract(URL_REQUESTED);

    expect(result.charCount).toBe(299);
    expect(result.body.endsWith("Reporters")).toBe(true);
    expect(result.body).toBe(LONG_TEXT.slice(0, 299));
  });

  it("keeps charCount equal to the body length", async () => {
    const messy = `  ${LONG_TEXT}\n\n\n\nSubscribe to our weekly newsletter!  `;
    const primary = extractor("primary", () => candidate("primary", messy));

    const result = await pipelineWith({ primary }).extract(URL_REQUESTED);

    expect(result.body).toBe(LONG_TEXT);
    expect(result.charCount).toBe(result.body.length);
  });

  it("returns a frozen result", async () => {
    const result = await pipelineWith().extract(URL_REQUESTED);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.authors)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

describe("ArticlePipeline: logging", () => {
  function stagesLogged(lines: string[]): string[] {
    return lines
      .filter((line) => line.startsWith("[DEBUG] Stage:"))
      .map((line) => line.split(" ")[2] ?? "");
  }

  it("logs every stage at debug level", async () => {
    const lines: string[] = [];
    const logger = createLogger({
      debug: true,
      sink: { out: (line) => lines.push(line), err: (line) => lines.push(line) },
    });
    const pipeline = pipelineWith({
      primary: failing("primary", "no article"),
      fallback: extractor("fallback", () => candidate("fallback", LONG_TEXT)),
      logger,
    });

    await pipeline.extract(URL_REQUESTED);

    expect(stagesLogged(lines)).toEqual([
      "fetching",
      "primary",
      "fallback",
      "normalizing",
      "validating",
    ]);
  });

  it("logs nothing when debug mode is off", async () => {
    const lines: string[] = [];
    const logger = createLogger({
      debug: false,
      sink: { out: (line) => lines.push(line), err: (line) => lines.push(line) },
    });

    await pipelineWith({ logger }).extract(URL_REQUESTED);

    expect(lines).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Real extractors
// ---------------------------------------------------------------------------

describe("ArticlePipeline: real extractors", () => {
  const PARAGRAPHS = [
    "The county water board voted on Thursday, after a long debate, to replace the aging pumps at the east reservoir.",
    "Engineers told the board that the pumps, installed in 1978, fail more often each summer, and that parts are scarce.",
    "The replacement will cost about four million dollars, paid from reserves, and should take eighteen months to finish.",
    "Two members voted against the plan, saying the board should first study repairs, leasing, or a shared regional system.",
    "Residents at the meeting asked whether rates would rise, and the board chair said no increase is planned this year.",
    "Work is set to begin in the spring, once contracts are signed, and the reservoir will stay in service throughout.",
  ];
  const STORY_HTML = PARAGRAPHS.map((text) => `<p>${text}</p>`).join("\n");

  function pipelineFor(html: string) {
    return pipelineWith({
      fetcher: stubFetcher({ html }),
      primary: new ReadabilityExtractor(),
      fallback: new SelectorExtractor({ minLength: 200 }),
    });
  }

  it("takes the Readability result for a regular article page", async () => {
    const html = `<html><head><title>Pumps</title></head><body>
      <nav>Home News Weather</nav>
      <article>${STORY_HTML}</article>
      <footer>Contact us</footer>
    </body></html>`;

    const result = await pipelineFor(html).extract(URL_REQUESTED);

    expect(result.method).toBe("primary");
    for (const paragraph of PARAGRAPHS) {
      expect(result.body).toContain(paragraph);
    }
    expect(result.body).not.toContain("Contact us");
  });

  it("keeps an article whose whole page sits inside a form", async () => {
    const html = `<html><head><title>Pumps</title></head><body>
      <form id="aspnetForm" method="post" action="./story.aspx">
        <article>${STORY_HTML}</article>
      </form>
    </body></html>`;

    const result = await pipelineFor(html).extract(URL_REQUESTED);

    for (const paragraph of PARAGRAPHS) {
      expect(result.body).toContain(paragraph);
    }
  });

  it("falls back to the article selector when Readability skips a hidden story", async () => {
    const html = `<html><head><title>Pumps</title></head><body>
      <article hidden>${STORY_HTML}</article>
    </body></html>`;

    const result = await pipelineFor(html).extract(URL_REQUESTED);

    expect(result.method).toBe("fallback");
    for (const paragraph of PARAGRAPHS) {
      expect(result.body).toContain(paragraph);
    }
  });

  it("fails with InsufficientContentError when neither method finds enough text", async () => {
    const html = `<html><head><title>Bridge</title></head><body>
      <article><p>${SHORT_TEXT}</p></article>
    </body></html>`;

    const run = pipelineFor(html).extract(URL_REQUESTED);

    await expect(run).rejects.toBeInstanceOf(InsufficientContentError);
    await expect(run).rejects.toMatchObject({ charCount: 44, minLength: 200 });
  });
});
