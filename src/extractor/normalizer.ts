/**
 * @fileoverview Content normalizer: cleans extracted article text and fits it
 * to the character budget.
 *
 * Applied to every candidate regardless of which extractor produced it:
 *
 *   1. Unify line endings, drop zero-width characters, turn NBSP into spaces.
 *   2. Strip boilerplate phrases (a configurable deny-list), repeatedly,
 *      until nothing more matches.
 *   3. Collapse whitespace: spaces/tabs to one space, trimmed lines, at most
 *      one blank line between paragraphs.
 *   4. Truncate to `maxLength` at the last whitespace boundary, never
 *      mid-word.
 *
 * `normalize` is deterministic and idempotent: normalizing its own output
 * returns the same string.
 *
 * @module extractor/normalizer
 */

/**
 * Zero-width and invisible format characters some sites sprinkle through
 * their copy.
 */
const ZERO_WIDTH_CHARS = /[\u200B\u200C\u200D\u200E\u200F\uFEFF\u00AD\u2060]/g;

/**
 * Built-in deny-list. Every pattern stays inside one line, so a stray
 * "Subscribe to" can never swallow whole paragraphs.
 */
export const DEFAULT_BOILERPLATE_PATTERNS: readonly RegExp[] = [
  /Subscribe to[^\n]*?newsletter[.!]?/gi,
  /Follow us on[^\n]*?social media[.!]?/gi,
  /Copyright\s*(?:©|\(c\))?[^\n]*?rights reserved\.?/gi,
  /This article was originally published[^\n]*?(?:\.(?=\s|$)|$)/gim,
  /Read more:[^\n]*$/gim,
  /^[^\S\n]*Advertisement[^\S\n]*$/gim,
  /^[^\S\n]*(?:Share|Share this article|Skip to (?:main )?content)[^\S\n]*$/gim,
];

/** Upper bound on deny-list passes; each pass must shrink the text. */
const MAX_STRIP_PASSES = 10;

/** Constructor settings for {@link ContentNormalizer}. */
export interface NormalizerOptions {
  /** Character budget of the output. */
  maxLength: number;
  /** Literal phrases to strip, matched case-insensitively. */
  extraPhrases?: readonly string[];
  /** Replaces {@link DEFAULT_BOILERPLATE_PATTERNS} entirely. */
  patterns?: readonly RegExp[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Collapse whitespace while keeping paragraph breaks.
 *
 * @example
 * ```typescript
 * collapseWhitespace("  One \t two\n\n\n\nThree  "); // "One two\n\nThree"
 * ```
 */
export function collapseWhitespace(text: string): string {
  return text
    .replace(/[^\S\n]+/g, " ")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Cut `text` to at most `maxLength` characters at a whitespace boundary.
 *
 * The cut lands on the last whitespace at or before index `maxLength`, so the
 * character right after the kept text is always whitespace (or the end of
 * the input). A single word longer than the budget is cut hard, because
 * there is no boundary to use.
 *
 * @example
 * ```typescript
 * truncateAtWhitespace("alpha beta gamma", 12); // "alpha beta"
 * truncateAtWhitespace("alpha beta gamma", 10); // "alpha beta"
 * truncateAtWhitespace("alphabet", 5);          // "alpha"
 * ```
 */
export function truncateAtWhitespace(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const window = text.slice(0, maxLength + 1);
  const boundary = Math.max(window.lastIndexOf(" "), window.lastIndexOf("\n"));

  if (boundary <= 0) {
    return text.slice(0, maxLength);
  }

  return text.slice(0, boundary).trimEnd();
}

/**
 * Deterministic text cleaner shared by both extraction methods.
 *
 * @example
 * ```typescript
 * const normalizer = new ContentNormalizer({ maxLength: 10_000 });
 * normalizer.normalize("Budget  passed.\n\n\nSubscribe to our newsletter!");
 * // => "Budget passed."
 * ```
 */
export class ContentNormalizer {
  private readonly patterns: readonly RegExp[];

  constructor(private readonly options: NormalizerOptions) {
    const extra = (options.extraPhrases ?? [])
      .filter((phrase) => phrase.trim().length > 0)
      .map((phrase) => new RegExp(escapeRegExp(phrase.trim()), "gi"));
    this.patterns = [...(options.patterns ?? DEFAULT_BOILERPLATE_PATTERNS), ...extra];
  }

  normalize(raw: string): string {
    const prepared = raw
      .replace(/\r\n?/g, "\n")
      .replace(ZERO_WIDTH_CHARS, "")
      .replace(/\u00A0/g, " ");

    const truncated = truncateAtWhitespace(
      this.stripBoilerplate(prepared),
      this.options.maxLength,
    );

    // A cut can leave a line that now reads as boilerplate on its own
    // ("Share prices rose" -> "Share"), so strip once more. This only
    // shortens the text.
    return this.stripBoilerplate(truncated);
  }

  /**
   * Apply the deny-list until a full pass changes nothing. Removing one
   * phrase can join text into a new match; running to a fixed point is what
   * makes `normalize` idempotent. Whitespace is collapsed between passes so
   * the check sees the same text a later `normalize` call would.
   */
  private stripBoilerplate(text: string): string {
    let current = collapseWhitespace(text);

    for (let pass = 0; pass < MAX_STRIP_PASSES; pass++) {
      let next = current;
      for (const pattern of this.patterns) {
        next = next.replace(pattern, " ");
      }
      next = collapseWhitespace(next);

      if (next === current) {
        break;
      }
      current = next;
    }

    return current;
  }
}
