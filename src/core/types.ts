/**
 * Record types shared by the extraction, rule-check and summarization stages.
 * Field names mirror the JSON artifacts written to the output directory.
 */

export interface Section {
  /** First line of the segment, at most 200 characters */
  title: string;
  /** Whitespace-normalized segment text */
  text: string;
}

export interface SectionsDocument {
  sections: Section[];
}

export interface PageText {
  /** 1-based page number */
  page: number;
  text: string;
}

export const FIELD_NAMES = [
  'definitions',
  'eligibility',
  'obligations',
  'responsibilities',
  'payments',
  'penalties',
  'record_keeping',
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export type KeywordSet = Readonly<Record<FieldName, readonly string[]>>;

export interface ContextMatch {
  section_title: string;
  keyword: string;
  contexts: string[];
}

export type FieldStatus = 'present' | 'missing';

export interface FieldReport {
  status: FieldStatus;
  /** Number of (section, keyword) pairs with at least one occurrence */
  num_hits: number;
  examples: ContextMatch[];
}

export type FieldReports = Record<FieldName, FieldReport>;

export interface RuleDefinition {
  rule: string;
  field: FieldName;
}

export type RuleStatus = 'pass' | 'fail';

export interface RuleVerdict {
  rule: string;
  status: RuleStatus;
  evidence: string[];
  confidence: number;
}

export interface Provenance {
  source_file: string;
}

export interface Report {
  report_fields: FieldReports;
  rule_checks: RuleVerdict[];
  provenance: Provenance;
}

export interface DebugReport {
  debug: FieldReports;
}

export interface SummaryDocument {
  summary_text: string;
}

export interface SummaryCheckpointDocument {
  intermediate: string[];
}
