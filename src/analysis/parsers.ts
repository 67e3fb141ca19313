/**
 * @fileoverview Turn free-text model answers into lists.
 *
 * Models do not always follow the requested layout. Each parser falls back
 * to the whole answer as a single item rather than losing it.
 *
 * @module analysis/parsers
 */

/** `•`, or a single `-` / `*` (so `---` rules and `**bold**` are not bullets). */
const BULLET = /^(?:•|[-*](?![-*]))\s*/;

const NUMBERED = /^\d+\.\s*/;

/** Section headers of the entity answer, optionally in Markdown emphasis. */
const ENTITY_HEADER = /^(PEOPLE|ORGANIZATIONS|LOCATIONS)\b[^:]*:/i;

export interface EntityGroups {
  people: string[];
  organizations: string[];
  locations: string[];
}

function listItems(text: string, marker: RegExp): string[] {
  const items: string[] = [];
  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!marker.test(line)) continue;
    const item = line.replace(marker, "").trim();
    if (item) items.push(item);
  }

  if (items.length > 0) {
    return items;
  }
  const whole = text.trim();
  return whole ? [whole] : [];
}

/**
 * @example
 * ```typescript
 * parseBulletPoints("Claims:\n• One\n- Two");  // ["One", "Two"]
 * parseBulletPoints("Just a sentence.");      // ["Just a sentence."]
 * ```
 */
export function parseBulletPoints(text: string): string[] {
  return listItems(text, BULLET);
}

/**
 * @example
 * ```typescript
 * parseNumberedList("1. Who?\n2. When?"); // ["Who?", "When?"]
 * ```
 */
export function parseNumberedList(text: string): string[] {
  return listItems(text, NUMBERED);
}

/**
 * Group bulleted lines under the most recent PEOPLE / ORGANIZATIONS /
 * LOCATIONS header. Bullets before the first header are ignored.
 */
export function parseEntities(text: string): EntityGroups {
  const groups: EntityGroups = { people: [], organizations: [], locations: [] };
  let current: keyof EntityGroups | undefined;

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (BULLET.test(line)) {
      const item = line.replace(BULLET, "").trim();
      if (current && item) groups[current].push(item);
      continue;
    }
    const header = ENTITY_HEADER.exec(line.replace(/^[#*\s]+/, ""));
    if (header) {
      current = sectionKey(header[1]);
    }
  }

  return groups;
}

function sectionKey(header: string | undefined): keyof EntityGroups | undefined {
  switch (header?.toUpperCase()) {
    case "PEOPLE":
      return "people";
    case "ORGANIZATIONS":
      return "organizations";
    case "LOCATIONS":
      return "locations";
    default:
      return undefined;
  }
}
