/**
 * Structured logging utility for tally-witness
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Console-based: JSON lines in production, a single readable line otherwise.
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
  /** Send every level to stderr (keeps stdout free for command output) */
  readonly stderr?: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const baseLog = {
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };

    if (this.config.pretty) {
      const metaStr =
        metadata && Object.keys(metadata).length > 0
          ? ` ${JSON.stringify(metadata)}`
          : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify(baseLog);
  }

  private write(level: LogLevel, line: string): void {
    if (this.config.stderr) {
      console.error(line);
      return;
    }
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    this.write('debug', this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    this.write('info', this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    this.write('warn', this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    this.write('error', this.formatMessage('error', message, metadata));
  }

  /**
   * Derive a logger for a sub-module, keeping level and format
   */
  child(module: string): Logger {
    return new Logger({
      ...this.config,
      service: `${this.config.service}:${module}`,
    });
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'info';
};

export const logger = new Logger({
  level: getLogLevel(),
  service: 'tally-witness',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a logger scoped to a module
 */
export function createLogger(context: {
  readonly module?: string;
  readonly level?: LogLevel;
  readonly pretty?: boolean;
  readonly stderr?: boolean;
}): Logger {
  return new Logger({
    level: context.level ?? getLogLevel(),
    service: context.module ? `tally-witness:${context.module}` : 'tally-witness',
    pretty: context.pretty ?? process.env.NODE_ENV !== 'production',
    stderr: context.stderr ?? false,
  });
}
