/**
 * Leveled logger.
 * Console lines go to stderr so stdout stays clean for the pass summary;
 * with a log directory the same lines are appended to metasync.log.
 */
import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'critical'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const LOG_LEVEL_SET: ReadonlySet<string> = new Set(LOG_LEVELS);

export type LogFields = Record<string, string | number | boolean | undefined>;

const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB
const MAX_LOG_AGE_DAYS = 7;
export const LOG_FILE_NAME = 'metasync.log';

export interface LoggerOptions {
  level: LogLevel;
  /** Directory for metasync.log; no file output when omitted */
  logDir?: string;
  scope?: string;
  /** Suppress console output (file output is unaffected) */
  silent?: boolean;
}

const levelColor: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: (text) => text,
  warning: chalk.yellow,
  error: chalk.red,
  critical: chalk.bold.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_SET.has(value);
}

/**
 * Parse a user-supplied level name (case-insensitive, "warn" accepted).
 */
export function parseLogLevel(value: string): LogLevel {
  const normalized = value.toLowerCase() === 'warn' ? 'warning' : value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new Error(`Invalid log level: ${value} (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return normalized;
}

/**
 * Rotate the log file if it exceeds the max size and drop old rotations.
 */
export function rotateLogIfNeeded(logFile: string): void {
  if (!fs.existsSync(logFile)) return;

  try {
    const stat = fs.statSync(logFile);
    if (stat.size > MAX_LOG_SIZE) {
      fs.renameSync(logFile, `${logFile}.${Date.now()}.old`);
    }

    const dir = path.dirname(logFile);
    const baseName = path.basename(logFile);
    const maxAge = MAX_LOG_AGE_DAYS * 24 * 60 * 60 * 1000;

    for (const entry of fs.readdirSync(dir)) {
      if (entry.startsWith(baseName + '.') && entry.endsWith('.old')) {
        const entryPath = path.join(dir, entry);
        if (Date.now() - fs.statSync(entryPath).mtimeMs > maxAge) {
          fs.unlinkSync(entryPath);
        }
      }
    }
  } catch (err) {
    process.stderr.write(chalk.yellow(`log rotation failed: ${err instanceof Error ? err.message : String(err)}`) + '\n');
  }
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ' ' + parts.join(' ') : '';
}

export class Logger {
  private readonly level: LogLevel;
  private readonly scope: string;
  private readonly logFile?: string;
  private readonly silent: boolean;

  constructor(options: LoggerOptions, logFile?: string) {
    this.level = options.level;
    this.scope = options.scope ?? 'metasync';
    this.silent = options.silent ?? false;
    if (logFile) {
      this.logFile = logFile;
    } else if (options.logDir) {
      fs.mkdirSync(options.logDir, { recursive: true });
      this.logFile = path.join(options.logDir, LOG_FILE_NAME);
      rotateLogIfNeeded(this.logFile);
    }
  }

  /**
   * Logger sharing this one's sinks and threshold under a nested scope.
   */
  child(scope: string): Logger {
    return new Logger(
      { level: this.level, scope: `${this.scope}.${scope}`, silent: this.silent },
      this.logFile,
    );
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warning', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  critical(message: string, fields?: LogFields): void {
    this.write('critical', message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) return;
    const line = `${new Date().toISOString()} ${this.scope} - ${level.toUpperCase()}: ${message}${formatFields(fields)}`;
    if (!this.silent) {
      process.stderr.write(levelColor[level](line) + '\n');
    }
    if (this.logFile) {
      fs.appendFileSync(this.logFile, line + '\n');
    }
  }
}

/**
 * Logger that drops everything. Handy default for library callers and tests.
 */
export function createNullLogger(): Logger {
  return new Logger({ level: 'critical', silent: true });
}
