/**
 * Extraction Stage
 *
 * PDF -> per-page text -> aggregated document -> sections ->
 * extracted_sections.json
 */

import type { PageText, SectionsDocument } from '../core/types.js';
import type { PipelinePaths } from '../config/paths.js';
import { writeJsonFile } from '../utils/jsonFile.js';
import { extractPdfPages } from '../utils/pdfTextExtractor.js';
import { aggregatePages, splitIntoSections } from '../utils/sectionSplitter.js';
import { StageLogger } from '../utils/logger.js';

export interface ExtractionOptions {
  paths: PipelinePaths;
  /** Page source; defaults to reading paths.pdfFile with pdf.js */
  loadPages?: (pdfPath: string) => Promise<PageText[]>;
}

export async function runExtraction(options: ExtractionOptions): Promise<SectionsDocument> {
  const { paths } = options;
  const loadPages = options.loadPages ?? extractPdfPages;
  const logger = new StageLogger('extract-sections');

  logger.started({ pdfFile: paths.pdfFile });

  try {
    const pages = await loadPages(paths.pdfFile);
    const sections = splitIntoSections(aggregatePages(pages));
    const document: SectionsDocument = { sections };

    await writeJsonFile(paths.sectionsFile, document);

    logger.completed({
      sectionsFile: paths.sectionsFile,
      pages: pages.length,
      sections: sections.length,
    });

    return document;
  } catch (error) {
    logger.failed(error, { pdfFile: paths.pdfFile });
    throw error;
  }
}
