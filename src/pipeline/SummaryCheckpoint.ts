import fs from 'fs/promises';
import type { SummaryCheckpointDocument } from '../core/types.js';
import { writeJsonFile } from '../utils/jsonFile.js';
import { errorMessage } from '../utils/errors.js';
import { StageLogger } from '../utils/logger.js';

/**
 * Summary Checkpoint
 *
 * Append-only list of finished chunk summaries, persisted as
 * { "intermediate": [...] }. Its length is the resume point: the next run
 * starts at chunk index `completed.length`.
 */
export class SummaryCheckpoint {
  private logger: StageLogger;

  constructor(private filePath: string) {
    this.logger = new StageLogger('SummaryCheckpoint');
  }

  /**
   * Results of a previous partial run, or [] when there is none.
   * An unreadable checkpoint is discarded, not fatal.
   */
  async load(): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      const intermediate = isCheckpointDocument(parsed) ? parsed.intermediate : null;
      if (!intermediate) {
        this.logger.warn('Checkpoint has an unexpected shape; starting over', {
          path: this.filePath,
        });
        return [];
      }
      this.logger.info(`Loaded ${intermediate.length} intermediate results (resume)`);
      return intermediate;
    } catch (error) {
      this.logger.warn('Checkpoint is not valid JSON; starting over', {
        path: this.filePath,
        error: errorMessage(error),
      });
      return [];
    }
  }

  async save(completed: readonly string[]): Promise<void> {
    const document: SummaryCheckpointDocument = { intermediate: [...completed] };
    await writeJsonFile(this.filePath, document);
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}

function isCheckpointDocument(value: unknown): value is SummaryCheckpointDocument {
  if (typeof value !== 'object' || value === null || !('intermediate' in value)) {
    return false;
  }
  const { intermediate } = value;
  return Array.isArray(intermediate) && intermediate.every((item) => typeof item === 'string');
}
