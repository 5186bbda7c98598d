import type { DebugReport, FieldReports, Report, RuleVerdict } from './types.js';
import { writeJsonFile } from '../utils/jsonFile.js';
import { StageLogger } from '../utils/logger.js';

/**
 * Report Assembler
 *
 * Builds the final report and the debug artifact from per-field results and
 * rule verdicts, and writes both as pretty-printed JSON.
 */
export class ReportAssembler {
  private logger: StageLogger;

  constructor(
    private reportFile: string,
    private debugFile: string
  ) {
    this.logger = new StageLogger('ReportAssembler');
  }

  /**
   * @param sourceFile Identifier of the analysed document, recorded as provenance
   */
  assemble(fieldReports: FieldReports, ruleChecks: RuleVerdict[], sourceFile: string): Report {
    return {
      report_fields: fieldReports,
      rule_checks: ruleChecks,
      provenance: { source_file: sourceFile },
    };
  }

  buildDebug(fieldReports: FieldReports): DebugReport {
    return { debug: fieldReports };
  }

  /**
   * Persist report and debug artifacts. Write failures propagate.
   */
  async write(report: Report): Promise<void> {
    await writeJsonFile(this.reportFile, report);
    await writeJsonFile(this.debugFile, this.buildDebug(report.report_fields));

    this.logger.info('Report written', {
      reportFile: this.reportFile,
      debugFile: this.debugFile,
    });
  }
}
