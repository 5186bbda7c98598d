import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { KeywordSet, RuleDefinition } from '../../core/types.js';
import { MalformedInputError, MissingInputError, errorMessage } from '../../utils/errors.js';
import { ruleCheckFileValidator } from '../../utils/validators.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Check Rules Job Configuration
 *
 * Keyword table per field and the fixed rule table, read from
 * config/rule-checks.json at the repository root. The loaded object is frozen
 * and handed explicitly to the evidence collector and rule evaluator.
 */
export interface RuleCheckConfig {
  readonly keywords: KeywordSet;
  readonly rules: readonly RuleDefinition[];
  /** Snippets kept per (section, keyword) match */
  readonly maxContextsPerMatch: number;
  /** Matches kept as examples per field */
  readonly maxExamplesPerField: number;
  /** Characters of the first snippet quoted as rule evidence */
  readonly evidenceSnippetLength: number;
}

export const DEFAULT_RULE_CHECKS_FILE = path.resolve(
  __dirname,
  '../../../config/rule-checks.json'
);

export function loadRuleCheckConfig(
  filePath: string = DEFAULT_RULE_CHECKS_FILE
): RuleCheckConfig {
  if (!fs.existsSync(filePath)) {
    throw new MissingInputError(filePath, `Rule-check configuration not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new MalformedInputError(filePath, `Rule-check configuration is not valid JSON`, [
      errorMessage(error),
    ]);
  }

  const result = ruleCheckFileValidator.validate(raw);
  if (!result.valid || !result.data) {
    throw new MalformedInputError(filePath, 'Invalid rule-check configuration', result.errors);
  }

  const { keywords, rules } = result.data;

  return Object.freeze({
    keywords: Object.freeze({
      definitions: Object.freeze([...keywords.definitions]),
      eligibility: Object.freeze([...keywords.eligibility]),
      obligations: Object.freeze([...keywords.obligations]),
      responsibilities: Object.freeze([...keywords.responsibilities]),
      payments: Object.freeze([...keywords.payments]),
      penalties: Object.freeze([...keywords.penalties]),
      record_keeping: Object.freeze([...keywords.record_keeping]),
    }),
    rules: Object.freeze(rules.map((r) => Object.freeze({ rule: r.rule, field: r.field }))),
    maxContextsPerMatch: 3,
    maxExamplesPerField: 5,
    evidenceSnippetLength: 300,
  });
}
