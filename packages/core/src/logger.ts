/**
 * Console logger for launcher diagnostics.
 *
 * Writes to stderr so the gateway owns stdout.
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface LoggerConfig {
  /** Minimum level written (default: warn) */
  level?: LogLevel;
  /** Name shown in every line */
  name?: string;
  /** Output sink (default: process.stderr) */
  write?: (line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function prefixFor(level: Exclude<LogLevel, 'silent'>): string {
  switch (level) {
    case 'debug': return chalk.gray('[DEBUG]');
    case 'info': return chalk.blue('[INFO]');
    case 'warn': return chalk.yellow('[WARN]');
    case 'error': return chalk.red('[ERROR]');
  }
}

function formatContext(context?: Record<string, unknown>): string {
  if (!context) return '';
  const entries = Object.entries(context).filter(([, value]) => value !== undefined);
  if (entries.length === 0) return '';
  return ' ' + chalk.gray(entries.map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`).join(' '));
}

class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  private readonly name: string;
  private readonly write: (line: string) => void;

  constructor(config: LoggerConfig) {
    this.level = config.level ?? 'warn';
    this.name = config.name ?? 'launcher';
    this.write = config.write ?? ((line: string) => {
      process.stderr.write(line + '\n');
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    this.write(`${prefixFor(level)} ${chalk.cyan(this.name)} ${message}${formatContext(context)}`);
  }
}

/**
 * Create a logger
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new ConsoleLogger(config);
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = createLogger({ level: 'silent' });
