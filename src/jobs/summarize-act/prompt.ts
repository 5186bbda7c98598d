/**
 * Summarize Act Prompts
 */

export const SUMMARY_TOPICS = ['Purpose', 'Key definitions', 'Eligibility', 'Obligations', 'Enforcement'];

/**
 * Map step: one chunk of the Act -> 3-5 labelled bullets
 */
export function createChunkPrompt(
  actTitle: string,
  chunk: string,
  chunkNumber: number,
  totalChunks: number
): string {
  const topics = SUMMARY_TOPICS.map((t) => t.toUpperCase()).join(', ');
  return (
    `You are summarising a chunk of the ${actTitle}. ` +
    `Produce 3-5 concise bullets focusing on: ${topics}. ` +
    'Label bullets. Output only bullets.\n\n' +
    `CHUNK ${chunkNumber}/${totalChunks}:\n\n${chunk}`
  );
}

/**
 * Reduce step: every chunk's bullets -> 5-10 final bullets
 */
export function createReducePrompt(intermediate: readonly string[]): string {
  return (
    'Combine the intermediate bullets below into 5-10 final bullets covering: ' +
    `${SUMMARY_TOPICS.join(', ')}. Be concise and factual.\n\n` +
    intermediate.join('\n\n')
  );
}
