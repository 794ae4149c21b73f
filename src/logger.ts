/**
 * Logger - Levelled run log for the update pipeline.
 *
 * Every pipeline stage logs through the module-level `log` object. The
 * logger is configured once per run (`configureLogger`) and writes one line
 * per entry, either to stderr or appended to a log file:
 *
 *   2015-01-03T00:00:00.000Z - INFO - Starting execution.
 *
 * @module logger
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'critical'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  /** Lowest level that is emitted. */
  level?: LogLevel;
  /** Append to this file instead of writing to stderr. */
  logFile?: string;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'warning';

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export class Logger {
  private level: LogLevel;
  private logFile?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? DEFAULT_LOG_LEVEL;
    this.logFile = options.logFile;
  }

  /**
   * Apply new options. A log file is created (with its directory) right
   * away, so an unusable path fails here rather than on the first entry.
   */
  configure(options: LoggerOptions): void {
    if (options.logFile) {
      fs.mkdirSync(path.dirname(options.logFile), { recursive: true });
      fs.appendFileSync(options.logFile, '', 'utf-8');
    }
    this.level = options.level ?? this.level;
    this.logFile = options.logFile;
  }

  isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warning(message: string): void {
    this.write('warning', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  critical(message: string): void {
    this.write('critical', message);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;

    const line = `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}`;
    if (this.logFile) {
      fs.appendFileSync(this.logFile, line + '\n', 'utf-8');
    } else {
      console.error(line);
    }
  }
}

// ---------------------------------------------------------------------------
// Shared instance
// ---------------------------------------------------------------------------

export const log = new Logger();

/**
 * Configure the shared logger for a run.
 */
export function configureLogger(options: LoggerOptions): Logger {
  log.configure(options);
  return log;
}

/**
 * Restore the shared logger to its defaults (useful for tests).
 */
export function resetLogger(): void {
  log.configure({ level: DEFAULT_LOG_LEVEL });
}
