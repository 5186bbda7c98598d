/**
 * Pipeline error types
 *
 * Each stage fails with one of these; the CLI turns them into a logged
 * message and a non-zero exit code.
 */

/**
 * A required input file (sections JSON, source PDF) does not exist.
 */
export class MissingInputError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = 'MissingInputError';
    this.path = path;
  }
}

/**
 * An input file exists but cannot be parsed or has the wrong shape.
 */
export class MalformedInputError extends Error {
  readonly path: string;
  readonly details: string[];

  constructor(path: string, message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'MalformedInputError';
    this.path = path;
    this.details = details;
  }
}

/**
 * The summarization stage could not complete (empty input, exhausted retries).
 */
export class SummarizerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SummarizerError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
