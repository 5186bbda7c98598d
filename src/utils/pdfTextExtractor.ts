import fs from 'fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PageText } from '../core/types.js';
import { MissingInputError } from './errors.js';
import { logger } from './logger.js';

/**
 * PDF Text Extractor
 *
 * Page-by-page plain text using pdf.js (legacy Node build). Lines are rebuilt
 * from the end-of-line markers pdf.js attaches to text items.
 */

/**
 * Rebuild a page's text from pdf.js text content items.
 * Marked-content entries (no `str`) are skipped.
 */
export function buildPageText(items: ReadonlyArray<object>): string {
  let text = '';

  for (const item of items) {
    if (!('str' in item) || typeof item.str !== 'string') {
      continue;
    }
    text += item.str;
    if ('hasEOL' in item && item.hasEOL === true) {
      text += '\n';
    }
  }

  return text.trimEnd();
}

/**
 * Extract text for every page, in page order (pages are 1-based)
 */
export async function extractPdfPages(pdfPath: string): Promise<PageText[]> {
  let data: Uint8Array;
  try {
    data = new Uint8Array(await fs.readFile(pdfPath));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new MissingInputError(pdfPath, `PDF not found: ${pdfPath}`);
    }
    throw error;
  }

  const document = await getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: true,
  }).promise;

  try {
    const pages: PageText[] = [];

    for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();
      pages.push({ page: pageNumber, text: buildPageText(content.items) });
      page.cleanup();
    }

    logger.debug('PDF text extracted', { pdfPath, pages: pages.length });
    return pages;
  } finally {
    await document.destroy();
  }
}
