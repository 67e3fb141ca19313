/**
 * @fileoverview Tests for the `article-skeptic <url>` command.
 *
 * Covers argument parsing, the run flow with injected collaborators, exit
 * codes for each failure kind, and config errors at startup. Nothing
 * touches the network or the file system.
 */

import { describe, it, expect, vi } from "vitest";
import type { ArticleAnalysis } from "../../src/analysis/analyzer.js";
import {
  DEFAULT_OUTPUT_PATH,
  PREVIEW_LENGTH,
  USAGE,
  parseCommand,
  runAnalyze,
  runCli,
  type AnalyzeDeps,
} from "../../src/commands/analyze.js";
import type { ExtractionResult } from "../../src/extractor/types.js";
import { renderReport } from "../../src/report/markdown-report.js";
import {
  AnalysisError,
  ExtractionError,
  FetchError,
  InsufficientContentError,
} from "../../src/utils/errors.js";
import { createLogger, type Logger } from "../../src/utils/logger.js";

const ARTICLE_URL = "https://news.example.com/harbor";
const GENERATED_AT = new Date(2026, 9, 19, 15, 5);

const ARTICLE: ExtractionResult = {
  title: "Harbor Dredging Wraps Up Early",
  authors: ["Ana Lima"],
  body: "The harbor dredging project finished two weeks early. ".repeat(5).trim(),
  sourceUrl: ARTICLE_URL,
  method: "primary",
  charCount: 269,
};

const ANALYSIS: ArticleAnalysis = {
  coreClaims: ["The project finished two weeks early"],
  languageAnalysis: "The tone is neutral.",
  redFlags: ["No source is named for the budget figure"],
  verificationQuestions: ["Who audited the budget?"],
  entities: { people: ["Ana Lima - reporter"], organizations: [], locations: [] },
  counterArgument: "An opposing perspective might argue that corners were cut.",
  metadata: {
    title: ARTICLE.title,
    url: ARTICLE_URL,
    authors: ARTICLE.authors,
    method: "primary",
    charCount: 269,
  },
};

function memorySink() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, sink: { out: (line: string) => out.push(line), err: (line: string) => err.push(line) } };
}

function fakeDeps(logger: Logger, overrides: Partial<AnalyzeDeps> = {}) {
  return {
    extract: vi.fn<AnalyzeDeps["extract"]>(async () => ARTICLE),
    analyze: vi.fn<AnalyzeDeps["analyze"]>(async () => ANALYSIS),
    writeFile: vi.fn<AnalyzeDeps["writeFile"]>(async () => undefined),
    now: () => GENERATED_AT,
    logger,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// parseCommand
// ---------------------------------------------------------------------------

describe("parseCommand", () => {
  it("reads the URL, output path and debug flag", () => {
    expect(parseCommand([ARTICLE_URL, "-o", "out.md", "--debug"])).toEqual({
      kind: "run",
      args: { url: ARTICLE_URL, output: "out.md", debug: true },
    });
  });

  it("defaults the output path and debug flag", () => {
    expect(parseCommand([ARTICLE_URL])).toEqual({
      kind: "run",
      args: { url: ARTICLE_URL, output: DEFAULT_OUTPUT_PATH, debug: false },
    });
  });

  it("recognises --help and -h", () => {
    expect(parseCommand(["--help"])).toEqual({ kind: "help" });
    expect(parseCommand(["-h", ARTICLE_URL])).toEqual({ kind: "help" });
  });

  it("requires a URL", () => {
    expect(parseCommand([])).toEqual({ kind: "invalid", message: "A URL argument is required" });
  });

  it("rejects non-http URLs", () => {
    expect(parseCommand(["ftp://x"])).toEqual({
      kind: "invalid",
      message: "Not an http(s) URL: ftp://x",
    });
    expect(parseCommand(["not a url"])).toEqual({
      kind: "invalid",
      message: "Not an http(s) URL: not a url",
    });
  });

  it("rejects more than one URL", () => {
    expect(parseCommand(["https://a.example", "https://b.example"])).toEqual({
      kind: "invalid",
      message: "Expected one URL, got 2: https://a.example https://b.example",
    });
  });

  it("rejects unknown options", () => {
    const command = parseCommand([ARTICLE_URL, "--bogus"]);

    expect(command.kind).toBe("invalid");
    expect(command).toMatchObject({ message: expect.stringContaining("--bogus") });
  });
});

// ---------------------------------------------------------------------------
// runAnalyze
// ---------------------------------------------------------------------------

describe("runAnalyze: success", () => {
  it("extracts, analyzes and writes the report", async () => {
    const { sink } = memorySink();
    const deps = fakeDeps(createLogger({ debug: false, sink }));

    const code = await runAnalyze({ url: ARTICLE_URL, output: "report.md", debug: false }, deps);

    expect(code).toBe(0);
    expect(deps.extract).toHaveBeenCalledWith(ARTICLE_URL);
    expect(deps.analyze).toHaveBeenCalledWith(ARTICLE);
    expect(deps.writeFile).toHaveBeenCalledWith("report.md", renderReport(ANALYSIS, GENERATED_AT));
  });

  it("reports progress and previews the report", async () => {
    const { out, err, sink } = memorySink();
    const deps = fakeDeps(createLogger({ debug: false, sink }));

    await runAnalyze({ url: ARTICLE_URL, output: "report.md", debug: false }, deps);

    const report = renderReport(ANALYSIS, GENERATED_AT);
    expect(err).toEqual([]);
    expect(out[0]).toBe(`[SKEPTIC] Fetching and extracting article from ${ARTICLE_URL}`);
    expect(out[1]).toBe("[SUCCESS] Extracted 269 characters (primary method)");
    expect(out[2]).toContain("ARTICLE INFORMATION");
    expect(out.slice(3)).toEqual([
      "[SKEPTIC] Running critical analysis",
      "[SUCCESS] Report written to report.md",
      `\nReport preview:\n${"-".repeat(40)}`,
      `${report.slice(0, PREVIEW_LENGTH)}...`,
    ]);
  });
});

describe("runAnalyze: failures", () => {
  const cases: Array<[string, Error, string]> = [
    [
      "fetch",
      new FetchError(`HTTP 404 Not Found for ${ARTICLE_URL}`, 404),
      `[ERROR] [FETCH_FAILED] HTTP 404 Not Found for ${ARTICLE_URL}`,
    ],
    [
      "extraction",
      new ExtractionError("Both extraction methods failed"),
      "[ERROR] [EXTRACTION_FAILED] Both extraction methods failed",
    ],
    [
      "short content",
      new InsufficientContentError("Extracted content too short: 12 characters (minimum 200)", 12, 200),
      "[ERROR] [INSUFFICIENT_CONTENT] Extracted content too short: 12 characters (minimum 200)",
    ],
  ];

  for (const [label, failure, line] of cases) {
    it(`exits 1 on a ${label} failure without analyzing`, async () => {
      const { err, sink } = memorySink();
      const deps = fakeDeps(createLogger({ debug: false, sink }), {
        extract: vi.fn<AnalyzeDeps["extract"]>(async () => Promise.reject(failure)),
      });

      const code = await runAnalyze({ url: ARTICLE_URL, output: "report.md", debug: false }, deps);

      expect(code).toBe(1);
      expect(err).toEqual([line]);
      expect(deps.analyze).not.toHaveBeenCalled();
      expect(deps.writeFile).not.toHaveBeenCalled();
    });
  }

  it("exits 1 on an analysis failure without writing", async () => {
    const { err, sink } = memorySink();
    const deps = fakeDeps(createLogger({ debug: false, sink }), {
      analyze: vi.fn<AnalyzeDeps["analyze"]>(async () =>
        Promise.reject(new AnalysisError("Language model gpt-4 returned an empty response")),
      ),
    });

    const code = await runAnalyze({ url: ARTICLE_URL, output: "report.md", debug: false }, deps);

    expect(code).toBe(1);
    expect(err).toEqual(["[ERROR] [ANALYSIS_FAILED] Language model gpt-4 returned an empty response"]);
    expect(deps.writeFile).not.toHaveBeenCalled();
  });

  it("exits 1 when the report cannot be written", async () => {
    const { err, sink } = memorySink();
    const deps = fakeDeps(createLogger({ debug: false, sink }), {
      writeFile: vi.fn<AnalyzeDeps["writeFile"]>(async () =>
        Promise.reject(new Error("EACCES: permission denied")),
      ),
    });

    const code = await runAnalyze({ url: ARTICLE_URL, output: "/root/report.md", debug: false }, deps);

    expect(code).toBe(1);
    expect(err).toEqual(["[ERROR] EACCES: permission denied"]);
  });

  it("prints the stack trace in debug mode", async () => {
    const { out, sink } = memorySink();
    const failure = new ExtractionError("nothing found");
    const deps = fakeDeps(createLogger({ debug: true, sink }), {
      extract: vi.fn<AnalyzeDeps["extract"]>(async () => Promise.reject(failure)),
    });

    await runAnalyze({ url: ARTICLE_URL, output: "report.md", debug: true }, deps);

    expect(out).toContain(failure.stack);
  });
});

// ---------------------------------------------------------------------------
// runCli
// ---------------------------------------------------------------------------

describe("runCli", () => {
  it("prints usage for --help", async () => {
    const { out, sink } = memorySink();

    expect(await runCli(["--help"], { sink, env: {} })).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it("prints the problem and usage for bad arguments", async () => {
    const { out, err, sink } = memorySink();

    expect(await runCli(["ftp://x"], { sink, env: {} })).toBe(1);
    expect(err).toEqual(["[ERROR] Not an http(s) URL: ftp://x"]);
    expect(out).toEqual([USAGE]);
  });

  it("fails before fetching when the API key is missing", async () => {
    const { err, sink } = memorySink();
    const createDeps = vi.fn((_config: unknown, logger: Logger) => fakeDeps(logger));

    expect(await runCli([ARTICLE_URL], { sink, env: {}, createDeps })).toBe(1);
    expect(err).toEqual([
      "[ERROR] [CONFIG_INVALID] Invalid configuration: OPENAI_API_KEY: OPENAI_API_KEY is required",
    ]);
    expect(createDeps).not.toHaveBeenCalled();
  });

  it("runs the command with collaborators built from the config", async () => {
    const { sink } = memorySink();
    const writeFile = vi.fn<AnalyzeDeps["writeFile"]>(async () => undefined);
    const createDeps = vi.fn((_config: unknown, logger: Logger) => fakeDeps(logger, { writeFile }));

    const code = await runCli([ARTICLE_URL, "-o", "out.md"], {
      sink,
      env: { OPENAI_API_KEY: "test-secret", OPENAI_MODEL: "gpt-4o-mini" },
      createDeps,
    });

    expect(code).toBe(0);
    expect(createDeps).toHaveBeenCalledWith(
      expect.objectContaining({ llm: expect.objectContaining({ apiKey: "test-secret", model: "gpt-4o-mini" }) }),
      expect.anything(),
    );
    expect(writeFile).toHaveBeenCalledWith("out.md", expect.stringContaining("# Critical Analysis Report"));
  });

  it("turns on debug output from DEBUG_MODE", async () => {
    const { out, sink } = memorySink();
    const createDeps = (_config: unknown, logger: Logger) => {
      logger.debug("probe");
      return fakeDeps(logger);
    };

    await runCli([ARTICLE_URL], {
      sink,
      env: { OPENAI_API_KEY: "test-secret", DEBUG_MODE: "true" },
      createDeps,
    });

    expect(out[0]).toBe("[DEBUG] probe");
  });
});
