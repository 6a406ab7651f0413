/**
 * @fileoverview Documentation sections
 *
 * A documentation text is handled as an ordered list of sections. Regex
 * matching only happens here, when text is decoded into sections or
 * encoded back.
 */

import type { DocStyle, DocumentSection } from '../types.js';

/** Longer labels first so `WHAT THIS DOES` wins over `WHAT`. */
export const FLAT_SECTION_LABELS = [
  'WHAT THIS DOES',
  'WHY THIS APPROACH',
  'AGENT INSTRUCTIONS',
  'DEPENDENCIES',
  'PERFORMANCE',
  'GUARDRAILS',
  'CHANGELOG',
  'TESTING',
  'NOTES',
  'WHAT',
  'DEPS',
  'WHY',
] as const;

export const FLAT_FACT_KEYS: ReadonlySet<string> = new Set(['DEPENDENCIES', 'DEPS', 'CHANGELOG']);
export const FENCED_FACT_KEYS: ReadonlySet<string> = new Set(['deps', 'dependencies', 'changelog']);

const FLAT_HEADER = new RegExp(
  `^[ \\t]*(#{1,6}[ \\t]*)?(?:\\*\\*)?(${FLAT_SECTION_LABELS.join('|')})(?:[ \\t]*\\([^)\\n]*\\))?(?:\\*\\*)?[ \\t]*(:)?(?:\\*\\*)?(.*)$`,
  'i',
);
const FENCED_KEY = /^([A-Za-z_][\w-]*)[ \t]*:/;

/** Normalized label of a flat header line, or null when the line is not one. */
export function matchFlatHeader(line: string): string | null {
  const match = FLAT_HEADER.exec(line);
  if (!match) return null;
  const [, hashes, label, colon, rest] = match;
  if (colon === undefined && (hashes === undefined || rest.trim().length > 0)) return null;
  return label.toUpperCase().replace(/\s+/g, ' ');
}

function splitSections(lines: readonly string[], keyOf: (line: string) => string | null): DocumentSection[] {
  const sections: DocumentSection[] = [];
  let header: string | null = null;
  let key: string | null = null;
  let body: string[] = [];

  const flush = (): void => {
    if (header !== null || body.length > 0) {
      sections.push({ header, key, lines: body });
    }
  };

  for (const line of lines) {
    const next = keyOf(line);
    if (next === null) {
      body.push(line);
      continue;
    }
    flush();
    header = line;
    key = next;
    body = [];
  }
  flush();
  return sections;
}

export function decodeFlatSections(text: string): DocumentSection[] {
  return splitSections(text.split(/\r?\n/), matchFlatHeader);
}

/** Split a fenced YAML body on column-0 `key:` lines. */
export function decodeFencedSections(lines: readonly string[]): DocumentSection[] {
  return splitSections(lines, (line) => {
    const match = FENCED_KEY.exec(line);
    return match ? match[1].toLowerCase() : null;
  });
}

export function encodeSectionLines(sections: readonly DocumentSection[]): string[] {
  return sections.flatMap((section) => (section.header === null ? [...section.lines] : [section.header, ...section.lines]));
}

export function encodeSections(sections: readonly DocumentSection[]): string {
  return encodeSectionLines(sections).join('\n');
}

export function isFactSection(section: DocumentSection, style: DocStyle): boolean {
  if (section.key === null) return false;
  return (style === 'flat' ? FLAT_FACT_KEYS : FENCED_FACT_KEYS).has(section.key);
}

export function withoutFactSections(sections: readonly DocumentSection[], style: DocStyle): DocumentSection[] {
  return sections.filter((section) => !isFactSection(section, style));
}

export function findSection(sections: readonly DocumentSection[], keys: readonly string[]): DocumentSection | null {
  return sections.find((section) => section.key !== null && keys.includes(section.key)) ?? null;
}
