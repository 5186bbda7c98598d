/**
 * Rule Check Stage
 *
 * extracted_sections.json -> per-field evidence -> rule verdicts ->
 * report.json + report_debug.json
 */

import type { FieldName, FieldReports, Report, RuleVerdict, Section } from '../core/types.js';
import { buildFieldReport, collectFieldEvidence } from '../core/evidenceCollector.js';
import { evaluateRules } from '../core/ruleEvaluator.js';
import { ReportAssembler } from '../core/ReportAssembler.js';
import type { RuleCheckConfig } from '../jobs/check-rules/config.js';
import { loadRuleCheckConfig } from '../jobs/check-rules/config.js';
import type { PipelinePaths } from '../config/paths.js';
import { StageLogger } from '../utils/logger.js';
import { loadSections } from './sections-loader.js';

export interface RuleCheckOptions {
  paths: PipelinePaths;
  /** Defaults to config/rule-checks.json */
  config?: RuleCheckConfig;
}

export interface SectionCheckResult {
  fieldReports: FieldReports;
  ruleChecks: RuleVerdict[];
}

/**
 * Evidence and verdicts for already-loaded sections; no I/O
 */
export function checkSections(
  sections: readonly Section[],
  config: RuleCheckConfig
): SectionCheckResult {
  const reportFor = (field: FieldName) =>
    buildFieldReport(
      collectFieldEvidence(sections, config.keywords[field], config.maxContextsPerMatch),
      config.maxExamplesPerField
    );

  const fieldReports: FieldReports = {
    definitions: reportFor('definitions'),
    eligibility: reportFor('eligibility'),
    obligations: reportFor('obligations'),
    responsibilities: reportFor('responsibilities'),
    payments: reportFor('payments'),
    penalties: reportFor('penalties'),
    record_keeping: reportFor('record_keeping'),
  };

  return {
    fieldReports,
    ruleChecks: evaluateRules(fieldReports, config.rules, config.evidenceSnippetLength),
  };
}

export async function runRuleChecks(options: RuleCheckOptions): Promise<Report> {
  const { paths } = options;
  const logger = new StageLogger('check-rules');

  try {
    // Input is read before anything is written, so a missing file leaves no output behind
    const sections = loadSections(paths.sectionsFile);
    const config = options.config ?? loadRuleCheckConfig();

    logger.started({ sectionsFile: paths.sectionsFile, sections: sections.length });

    const { fieldReports, ruleChecks } = checkSections(sections, config);

    const assembler = new ReportAssembler(paths.reportFile, paths.debugFile);
    const report = assembler.assemble(fieldReports, ruleChecks, paths.pdfFile);
    await assembler.write(report);

    for (const verdict of report.rule_checks) {
      logger.info(`${verdict.rule}: ${verdict.status} (confidence ${verdict.confidence})`);
    }

    logger.completed({
      passed: report.rule_checks.filter((r) => r.status === 'pass').length,
      total: report.rule_checks.length,
    });

    return report;
  } catch (error) {
    logger.failed(error, { sectionsFile: paths.sectionsFile });
    throw error;
  }
}
