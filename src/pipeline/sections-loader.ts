/**
 * Sections Loader
 *
 * Reads the interchange file written by the extraction stage.
 */

import fs from 'fs';
import type { Section } from '../core/types.js';
import { MalformedInputError, MissingInputError, errorMessage } from '../utils/errors.js';
import { StageLogger } from '../utils/logger.js';
import { sectionsDocumentValidator } from '../utils/validators.js';

const logger = new StageLogger('SectionsLoader');

/**
 * Load sections from disk.
 *
 * A missing file is fatal. A file without a `sections` key loads as an empty
 * list so every field downstream reports missing; any other shape problem is
 * a MalformedInputError.
 */
export function loadSections(filePath: string): Section[] {
  if (!fs.existsSync(filePath)) {
    throw new MissingInputError(
      filePath,
      `Missing input file: ${filePath}. Run the extraction step first.`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new MalformedInputError(filePath, `Sections file is not valid JSON`, [
      errorMessage(error),
    ]);
  }

  const result = sectionsDocumentValidator.validate(raw);
  if (!result.valid || !result.data) {
    throw new MalformedInputError(filePath, 'Sections file has an unexpected shape', result.errors);
  }

  const rawSections = result.data.sections;
  if (rawSections == null) {
    logger.warn('Sections file has no sections; continuing with an empty list', {
      path: filePath,
    });
    return [];
  }

  return rawSections.map((s) => ({
    title: s.title ?? '',
    text: s.text ?? '',
  }));
}
