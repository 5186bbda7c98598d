import type { ContextMatch, FieldReport, Section } from './types.js';
import { findContextsInSection } from '../utils/contextExtractor.js';
import { MAX_TITLE_LENGTH } from '../utils/sectionSplitter.js';
import { truncateChars } from '../utils/textNormalizer.js';

export const DEFAULT_MAX_CONTEXTS = 2;
export const DEFAULT_MAX_EXAMPLES = 5;

/**
 * Scan every section for every keyword of one field.
 *
 * Sections are the outer loop and keywords the inner one, so a section that
 * matches three keywords yields three records. Snippet lists are capped here,
 * not in the extractor.
 */
export function collectFieldEvidence(
  sections: readonly Section[],
  keywords: readonly string[],
  maxContexts: number = DEFAULT_MAX_CONTEXTS
): ContextMatch[] {
  const found: ContextMatch[] = [];

  for (const section of sections) {
    const text = section.text || '';
    for (const keyword of keywords) {
      const contexts = findContextsInSection(text, keyword);
      if (contexts.length > 0) {
        found.push({
          section_title: truncateChars(section.title || '', MAX_TITLE_LENGTH),
          keyword,
          contexts: contexts.slice(0, maxContexts),
        });
      }
    }
  }

  return found;
}

/**
 * Fold a field's matches into its report entry
 */
export function buildFieldReport(
  matches: readonly ContextMatch[],
  maxExamples: number = DEFAULT_MAX_EXAMPLES
): FieldReport {
  if (matches.length === 0) {
    return { status: 'missing', num_hits: 0, examples: [] };
  }

  return {
    status: 'present',
    num_hits: matches.length,
    examples: matches.slice(0, maxExamples),
  };
}
