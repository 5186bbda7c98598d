import dotenv from 'dotenv';

dotenv.config();

/**
 * Summarize Act Job Configuration
 *
 * Map-reduce summary of the whole Act:
 *   - map: fixed-size character chunks, each summarised into labelled bullets
 *   - reduce: all chunk bullets combined into 5-10 final bullets
 *
 * Calls run one at a time. Every finished chunk is checkpointed so an
 * interrupted run resumes at the first unfinished chunk.
 */
export interface SummarizeActConfig {
  /** Act name quoted in the chunk prompt */
  actTitle: string;
  chunkMaxChars: number;
  chunkMaxTokens: number;
  reduceMaxTokens: number;
  /** Attempts per model call, first one included */
  retries: number;
  /** Transient failures wait retryBackoff^(attempt-1) seconds; other failures wait retryBackoff seconds */
  retryBackoff: number;
  /** Pause between chunk calls */
  chunkDelayMs: number;
}

const config: SummarizeActConfig = {
  actTitle: process.env.ACT_TITLE || 'Universal Credit Act 2025',
  chunkMaxChars: 1200,
  chunkMaxTokens: 400,
  reduceMaxTokens: 800,
  retries: 3,
  retryBackoff: 2.0,
  chunkDelayMs: 500,
};

export default config;
