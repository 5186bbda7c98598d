/**
 * Summary Orchestrator
 *
 * Runs the map-reduce summary of the Act: chunk the section text, summarise
 * each chunk in order (checkpointing after every chunk), then combine the
 * chunk bullets into the final summary.
 */

import type { SummaryDocument } from '../core/types.js';
import type { PipelinePaths } from '../config/paths.js';
import { writeJsonFile } from '../utils/jsonFile.js';
import summarizeConfig, { type SummarizeActConfig } from '../jobs/summarize-act/config.js';
import { createChunkPrompt, createReducePrompt } from '../jobs/summarize-act/prompt.js';
import { OpenAIChatClient, type ChatCompleter } from '../llm/OpenAIChatClient.js';
import { SummarizerError } from '../utils/errors.js';
import { StageLogger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/retry.js';
import { loadSections } from './sections-loader.js';
import { SummaryCheckpoint } from './SummaryCheckpoint.js';

/**
 * Split text into consecutive slices of at most maxChars characters
 * (code points, so no chunk ends on half a surrogate pair)
 */
export function chunkText(text: string, maxChars: number): string[] {
  if (maxChars <= 0) {
    throw new RangeError(`maxChars must be positive, got ${maxChars}`);
  }

  const chars = Array.from(text);
  const chunks: string[] = [];
  for (let i = 0; i < chars.length; i += maxChars) {
    chunks.push(chars.slice(i, i + maxChars).join(''));
  }
  return chunks;
}

/**
 * Where the map phase stands: all chunks, and the summaries finished so far
 */
export interface SummaryState {
  chunks: string[];
  completed: string[];
}

export interface SummaryOptions {
  paths: PipelinePaths;
  /** Defaults to an OpenAIChatClient built from the environment */
  completer?: ChatCompleter;
  config?: SummarizeActConfig;
  sleep?: Sleep;
}

export class SummaryOrchestrator {
  private logger = new StageLogger('summarize-act');
  private config: SummarizeActConfig;
  private checkpoint: SummaryCheckpoint;
  private sleep: Sleep;

  constructor(private options: SummaryOptions) {
    this.config = options.config ?? summarizeConfig;
    this.checkpoint = new SummaryCheckpoint(options.paths.summaryCheckpointFile);
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(): Promise<SummaryDocument> {
    try {
      return await this.summarize();
    } catch (error) {
      this.logger.failed(error, { sectionsFile: this.options.paths.sectionsFile });
      throw error;
    }
  }

  private async summarize(): Promise<SummaryDocument> {
    const { paths } = this.options;

    const sections = loadSections(paths.sectionsFile);
    const completer =
      this.options.completer ??
      new OpenAIChatClient({
        retries: this.config.retries,
        retryBackoff: this.config.retryBackoff,
        sleep: this.sleep,
      });

    const whole = sections.map((s) => s.text).join('\n\n');
    if (!whole.trim()) {
      throw new SummarizerError('Extracted sections appear empty.');
    }

    const state = await this.resume(chunkText(whole, this.config.chunkMaxChars));
    this.logger.started({
      chunks: state.chunks.length,
      chunkMaxChars: this.config.chunkMaxChars,
      resumedAt: state.completed.length,
    });

    await this.mapChunks(state, completer);
    const summaryText = await this.reduce(state, completer);

    const document: SummaryDocument = { summary_text: summaryText };
    await writeJsonFile(paths.summaryFile, document);
    await this.checkpoint.clear();

    this.logger.completed({ summaryFile: paths.summaryFile });
    return document;
  }

  /**
   * Build the starting state from the checkpoint of a previous partial run
   */
  async resume(chunks: string[]): Promise<SummaryState> {
    const completed = await this.checkpoint.load();

    if (completed.length > chunks.length) {
      this.logger.warn('Checkpoint has more results than chunks; starting over', {
        checkpointed: completed.length,
        chunks: chunks.length,
      });
      return { chunks, completed: [] };
    }

    return { chunks, completed };
  }

  private async mapChunks(state: SummaryState, completer: ChatCompleter): Promise<void> {
    const total = state.chunks.length;

    for (let i = state.completed.length; i < total; i++) {
      this.logger.info(`Summarising chunk ${i + 1}/${total}`);
      const prompt = createChunkPrompt(this.config.actTitle, state.chunks[i], i + 1, total);

      let answer: string;
      try {
        answer = await completer.complete(prompt, this.config.chunkMaxTokens);
      } catch (error) {
        this.logger.error(`Summariser failed on chunk ${i + 1}`, error);
        await this.checkpoint.save(state.completed);
        throw error;
      }

      state.completed.push(answer);
      await this.checkpoint.save(state.completed);
      await this.sleep(this.config.chunkDelayMs);
    }
  }

  private async reduce(state: SummaryState, completer: ChatCompleter): Promise<string> {
    this.logger.info('Combining intermediate bullets into final 5-10 bullets');

    try {
      return await completer.complete(
        createReducePrompt(state.completed),
        this.config.reduceMaxTokens
      );
    } catch (error) {
      this.logger.error('Reduction step failed', error);
      await this.checkpoint.save(state.completed);
      throw error;
    }
  }
}

export async function runSummarization(options: SummaryOptions): Promise<SummaryDocument> {
  return new SummaryOrchestrator(options).run();
}
