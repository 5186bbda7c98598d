import type { FieldReports, RuleDefinition, RuleVerdict } from './types.js';
import { truncateChars } from '../utils/textNormalizer.js';

export const CONFIDENCE_WITH_EVIDENCE = 95;
export const CONFIDENCE_WITHOUT_EVIDENCE = 90;
export const CONFIDENCE_FAIL = 30;

export const DEFAULT_EVIDENCE_LENGTH = 300;

/**
 * Turn field presence into pass/fail verdicts, one per rule, in table order.
 *
 * Confidence depends only on the verdict and whether an example exists to
 * cite; hit counts play no part.
 */
export function evaluateRules(
  fieldReports: Partial<FieldReports>,
  rules: readonly RuleDefinition[],
  evidenceLength: number = DEFAULT_EVIDENCE_LENGTH
): RuleVerdict[] {
  return rules.map(({ rule, field }) => {
    const report = fieldReports[field];

    if (!report || report.status !== 'present') {
      return { rule, status: 'fail', evidence: [], confidence: CONFIDENCE_FAIL };
    }

    const example = report.examples[0];
    if (!example) {
      return { rule, status: 'pass', evidence: [], confidence: CONFIDENCE_WITHOUT_EVIDENCE };
    }

    const snippet = truncateChars(example.contexts[0] ?? '', evidenceLength);
    return {
      rule,
      status: 'pass',
      evidence: [`${example.section_title} — ${snippet}`],
      confidence: CONFIDENCE_WITH_EVIDENCE,
    };
  });
}
