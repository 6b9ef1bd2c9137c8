/**
 * Structured logging utility for the STAC ingestor
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * JSON lines in production, a single readable line otherwise.
 *
 * Child loggers carry fixed fields (batch id, submission id) into every entry:
 *
 * ```typescript
 * const batchLog = log.child({ batchId: batch.id });
 * batchLog.warn('Batch dead-lettered', { size: 3 });
 * ```
 *
 * Error values in metadata are written as `{ name, message, code? }`.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  /** Fields added to every entry; call metadata wins on conflict */
  readonly context?: LogMetadata;
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  /**
   * Logger writing the same service and level with extra fixed fields
   */
  child(context: LogMetadata): Logger {
    return new Logger({ ...this.config, context: { ...this.config.context, ...context } });
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const fields = toFields({ ...this.config.context, ...metadata });
    const hasFields = Object.keys(fields).length > 0;

    if (this.config.pretty) {
      const metaStr = hasFields ? ` ${JSON.stringify(fields)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...fields,
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

function toFields(metadata: LogMetadata): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined) continue;
    fields[key] = value instanceof Error ? serializeError(value) : value;
  }
  return fields;
}

function serializeError(error: Error): Record<string, unknown> {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return code === undefined
    ? { name: error.name, message: error.message }
    : { name: error.name, message: error.message, code };
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

export const logger = new Logger({
  level: getLogLevel(),
  service: 'stac-ingestor',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a child logger with additional context
 */
export function createLogger(context: { readonly module?: string }): Logger {
  return new Logger({
    level: getLogLevel(),
    service: `stac-ingestor:${context.module ?? 'unknown'}`,
    pretty: process.env.NODE_ENV !== 'production',
  });
}
