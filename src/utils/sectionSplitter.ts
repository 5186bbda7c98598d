import type { PageText, Section } from '../core/types.js';
import { normalizeWhitespace, truncateChars } from './textNormalizer.js';

/**
 * Heading tokens that open a new section when they start a line.
 * Matched case-sensitively, so "Section" and "SECTION" are listed separately.
 */
export const HEADING_TOKENS = [
  'Section',
  'SECTION',
  'SCHEDULE',
  'Schedule',
  'CHAPTER',
  'CONTENTS',
  'Short title',
] as const;

export const MAX_TITLE_LENGTH = 200;

// The token must not run on into another letter, digit or underscore (any script)
const SECTION_BOUNDARY = new RegExp(
  `\\n(?=(?:${HEADING_TOKENS.join('|')})(?![\\p{L}\\p{N}_]))`,
  'u'
);

/**
 * Join page texts in page order, one newline between pages
 */
export function aggregatePages(pages: ReadonlyArray<Pick<PageText, 'text'>>): string {
  return pages.map((p) => p.text || '').join('\n');
}

/**
 * Split aggregated document text into titled sections.
 *
 * A boundary is a newline immediately followed by a heading token. Text before
 * the first boundary becomes its own section; blank segments are dropped.
 * Titles are cut to MAX_TITLE_LENGTH characters.
 */
export function splitIntoSections(text: string): Section[] {
  const sections: Section[] = [];

  for (const part of text.split(SECTION_BOUNDARY)) {
    const segment = part.trim();
    if (!segment) {
      continue;
    }

    const firstLine = segment.split('\n', 1)[0].trim();
    sections.push({
      title: truncateChars(firstLine, MAX_TITLE_LENGTH),
      text: normalizeWhitespace(segment),
    });
  }

  return sections;
}
