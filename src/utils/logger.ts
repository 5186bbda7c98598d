import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging shared by the extraction, rule-check and summarization stages
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

/**
 * Create a logger instance
 * @param component Component name (e.g., 'RuleChecker', 'Summarizer')
 */
export function createLogger(component: string): winston.Logger {
  const silent = process.env.LOG_SILENT === 'true';
  const logDir = process.env.LOG_DIR || 'logs';

  const transports: Array<
    winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
  > = [
    new winston.transports.Console({
      format: consoleFormat,
      silent,
    }),
  ];

  // No log files while silenced, so test runs leave nothing behind
  if (!silent) {
    transports.push(
      new winston.transports.File({
        filename: path.join(process.cwd(), logDir, 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(process.cwd(), logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    transports,
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Helper to log pipeline stage events with consistent formatting
 */
export class StageLogger {
  private logger: winston.Logger;
  private stage: string;

  constructor(stage: string) {
    this.stage = stage;
    this.logger = createLogger(`Stage:${stage}`);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { stage: this.stage, ...metadata });
  }

  error(message: string, error?: Error | unknown, metadata?: object) {
    this.logger.error(message, {
      stage: this.stage,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { stage: this.stage, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { stage: this.stage, ...metadata });
  }

  started(metadata?: object) {
    this.info('Stage started', metadata);
  }

  completed(metadata?: object) {
    this.info('Stage completed', metadata);
  }

  failed(error: Error | unknown, metadata?: object) {
    this.error('Stage failed', error, metadata);
  }
}
