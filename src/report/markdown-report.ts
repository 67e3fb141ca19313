/**
 * @fileoverview Markdown rendering of an {@link ArticleAnalysis}.
 *
 * Output layout (sections separated by one blank line, empty ones dropped):
 *
 * ```
 * # Critical Analysis Report: <title>
 * - **Source URL:** ...          header (source, authors, dates,
 *                                extraction) + disclaimer
 * ## Core Claims
 * ## Language & Tone Analysis
 * ## Potential Red Flags
 * ## Verification Questions
 * ## Entity Investigation Guide  (omitted without entities)
 * ## Alternative Perspective     (omitted without a counter-argument)
 * ## How to Use This Analysis
 * ```
 *
 * @module report/markdown-report
 */

import { NO_RED_FLAGS, type ArticleAnalysis, type ArticleMetadata } from "../analysis/analyzer.js";
import type { EntityGroups } from "../analysis/parsers.js";

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

const DISCLAIMER =
  "_This report is meant to help you weigh the article's claims, sources and possible biases. " +
  "It does not decide what is true; it points at what deserves a closer look._";

const ENTITY_LABELS: ReadonlyArray<[keyof EntityGroups, string]> = [
  ["people", "People"],
  ["organizations", "Organizations"],
  ["locations", "Locations"],
];

/**
 * Local time in the form "October 19, 2026 at 03:05 PM".
 */
export function formatTimestamp(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${MONTHS[date.getMonth()]} ${date.getDate()}, ${date.getFullYear()} ` +
    `at ${pad(hour12)}:${pad(date.getMinutes())} ${hours < 12 ? "AM" : "PM"}`
  );
}

const bullets = (items: readonly string[]) => items.map((item) => `- ${item}`).join("\n");

function header(metadata: ArticleMetadata, generatedAt: Date): string {
  const details = [
    `- **Source URL:** ${metadata.url}`,
    metadata.authors.length > 0 ? `- **Author(s):** ${metadata.authors.join(", ")}` : null,
    metadata.publishedAt ? `- **Published:** ${metadata.publishedAt}` : null,
    `- **Extracted Text:** ${metadata.charCount} characters (${metadata.method} method)`,
    `- **Analysis Generated:** ${formatTimestamp(generatedAt)}`,
  ].filter((line): line is string => line !== null);

  return [
    `# Critical Analysis Report: ${metadata.title ?? "Unknown Article"}`,
    "",
    details.join("\n"),
    "",
    "---",
    "",
    DISCLAIMER,
  ].join("\n");
}

function coreClaims(claims: readonly string[]): string {
  if (claims.length === 0) {
    return "## Core Claims\n\n_No specific factual claims could be identified in the available content._";
  }
  return `## Core Claims\n\n_The main factual assertions made in the article:_\n\n${bullets(claims)}`;
}

function languageAnalysis(analysis: string): string {
  const body = analysis.trim() || "_Language analysis was not available for this content._";
  return `## Language & Tone Analysis\n\n${body}`;
}

function redFlags(flags: readonly string[]): string {
  if (flags.length === 0 || (flags.length === 1 && flags[0] === NO_RED_FLAGS)) {
    return (
      "## Potential Red Flags\n\n" +
      `_${NO_RED_FLAGS} Readers should still check the information against independent sources._`
    );
  }
  return (
    "## Potential Red Flags\n\n" +
    "_Issues that may point to bias or call for extra verification:_\n\n" +
    bullets(flags)
  );
}

function verificationQuestions(questions: readonly string[]): string {
  if (questions.length === 0) {
    return "## Verification Questions\n\n_No specific verification questions could be generated for this content._";
  }
  const numbered = questions.map((question, index) => `${index + 1}. ${question}`).join("\n");
  return (
    "## Verification Questions\n\n" +
    "_Questions worth investigating to check the article independently:_\n\n" +
    numbered
  );
}

function entityGuide(entities: EntityGroups): string {
  const groups = ENTITY_LABELS.filter(([key]) => entities[key].length > 0).map(
    ([key, label]) => `**${label}:**\n\n${bullets(entities[key])}`,
  );
  if (groups.length === 0) {
    return "";
  }
  return [
    "## Entity Investigation Guide",
    "_Key entities in the article and what to look into:_",
    ...groups,
  ].join("\n\n");
}

function alternativePerspective(counterArgument: string): string {
  const text = counterArgument.trim();
  if (!text) {
    return "";
  }
  const quoted = text
    .split("\n")
    .map((line) => (line ? `> ${line}` : ">"))
    .join("\n");
  return (
    "## Alternative Perspective\n\n" +
    "_An opposing reading of the same information, to surface possible bias:_\n\n" +
    quoted
  );
}

const FOOTER = [
  "---",
  "",
  "## How to Use This Analysis",
  "",
  "This analysis supports your own judgment; it does not replace it. Use it to:",
  "",
  "- **Question assumptions**: look past the surface of each claim",
  "- **Seek other sources**: compare coverage from other reputable outlets",
  "- **Investigate entities**: research the people and organizations involved",
  "- **Consider context**: ask what the article leaves out",
  "- **Decide for yourself**: draw conclusions from the evidence",
  "",
  "_The aim is not to dismiss information but to weigh it with care._",
].join("\n");

/**
 * Render the full report. `generatedAt` is passed in so output is
 * reproducible.
 */
export function renderReport(analysis: ArticleAnalysis, generatedAt: Date): string {
  const sections = [
    header(analysis.metadata, generatedAt),
    coreClaims(analysis.coreClaims),
    languageAnalysis(analysis.languageAnalysis),
    redFlags(analysis.redFlags),
    verificationQuestions(analysis.verificationQuestions),
    entityGuide(analysis.entities),
    alternativePerspective(analysis.counterArgument),
    FOOTER,
  ];
  return `${sections.filter((section) => section.length > 0).join("\n\n")}\n`;
}
