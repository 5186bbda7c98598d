import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

/**
 * Input / output locations for every pipeline stage
 */
export interface PipelinePaths {
  /** Source PDF, also reported as provenance */
  pdfFile: string;
  outputDir: string;
  sectionsFile: string;
  reportFile: string;
  debugFile: string;
  summaryFile: string;
  summaryCheckpointFile: string;
}

/**
 * Paths Configuration
 *
 * ACT_PDF_PATH and OUTPUT_DIR are read from the environment (.env);
 * artifact file names inside the output directory are fixed.
 */
export class PathsConfig {
  static readonly DEFAULT_PDF = 'data/ukpga_20250022_en.pdf';
  static readonly DEFAULT_OUTPUT_DIR = 'outputs';

  static getConfig(): PipelinePaths {
    return this.resolve(
      process.env.ACT_PDF_PATH || this.DEFAULT_PDF,
      process.env.OUTPUT_DIR || this.DEFAULT_OUTPUT_DIR
    );
  }

  /**
   * Derive every artifact path from a PDF path and an output directory
   */
  static resolve(pdfFile: string, outputDir: string): PipelinePaths {
    return {
      pdfFile,
      outputDir,
      sectionsFile: path.join(outputDir, 'extracted_sections.json'),
      reportFile: path.join(outputDir, 'report.json'),
      debugFile: path.join(outputDir, 'report_debug.json'),
      summaryFile: path.join(outputDir, 'summary.json'),
      summaryCheckpointFile: path.join(outputDir, 'summary_intermediate.json'),
    };
  }
}
