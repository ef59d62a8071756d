/**
 * Logger
 *
 * Leveled, structured logging with a colored text format for terminals and a
 * JSON-lines format for log collectors. Output goes to stderr unless a sink is
 * supplied.
 */

import chalk from 'chalk';
import { LOG_FORMATS, LOG_LEVELS, SchedulerEnvSchema } from '../config/env-schema.js';

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];
export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  source?: string;
  context?: LogContext;
  error?: { name: string; message: string; stack?: string };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Component name prefixed to every entry */
  source?: string;
  /** Receives each formatted line; defaults to stderr */
  sink?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLORS: Record<LogEntry['level'], (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

const defaultSink = (line: string): void => {
  process.stderr.write(line + '\n');
};

export class Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly source?: string;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'text';
    this.source = options.source;
    this.sink = options.sink ?? defaultSink;
  }

  /**
   * Create a logger sharing this one's settings under another source name
   */
  child(source: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      source: this.source ? `${this.source}:${source}` : source,
      sink: this.sink,
    });
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext | Error): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext | Error): void {
    this.log('error', message, context);
  }

  private log(level: LogEntry['level'], message: string, context?: LogContext | Error): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      source: this.source,
    };
    if (context instanceof Error) {
      entry.error = { name: context.name, message: context.message, stack: context.stack };
    } else if (context && Object.keys(context).length > 0) {
      entry.context = context;
    }

    this.sink(this.format === 'json' ? formatJson(entry) : formatText(entry));
  }
}

// bigint is not JSON-serializable
function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry, replacer);
}

function formatText(entry: LogEntry): string {
  const parts = [
    chalk.dim(entry.timestamp),
    LEVEL_COLORS[entry.level](entry.level.toUpperCase().padEnd(5)),
  ];
  if (entry.source) parts.push(chalk.magenta(`[${entry.source}]`));
  parts.push(entry.message);
  if (entry.context) parts.push(chalk.dim(JSON.stringify(entry.context, replacer)));
  if (entry.error) parts.push(chalk.red(`${entry.error.name}: ${entry.error.message}`));
  return parts.join(' ');
}

let defaultLogger: Logger | null = null;

/**
 * Build a logger whose unset options come from LOG_LEVEL / LOG_FORMAT
 */
export function createLogger(
  options: LoggerOptions = {},
  env: Record<string, string | undefined> = process.env
): Logger {
  const parsed = SchedulerEnvSchema.pick({ LOG_LEVEL: true, LOG_FORMAT: true }).safeParse(env);
  const fromEnv = parsed.success ? parsed.data : { LOG_LEVEL: 'info' as const, LOG_FORMAT: 'text' as const };
  return new Logger({
    level: options.level ?? fromEnv.LOG_LEVEL,
    format: options.format ?? fromEnv.LOG_FORMAT,
    source: options.source,
    sink: options.sink,
  });
}

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

export function resetLogger(): void {
  defaultLogger = null;
}

export function isDebugEnabled(): boolean {
  return getLogger().isLevelEnabled('debug');
}

/**
 * Shared logger; always forwards to the current default instance
 */
export const logger = {
  debug: (message: string, context?: LogContext): void => getLogger().debug(message, context),
  info: (message: string, context?: LogContext): void => getLogger().info(message, context),
  warn: (message: string, context?: LogContext | Error): void => getLogger().warn(message, context),
  error: (message: string, context?: LogContext | Error): void => getLogger().error(message, context),
  child: (source: string): Logger => getLogger().child(source),
};
