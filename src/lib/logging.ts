import chalk from 'chalk';
import { Effect } from 'effect';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  module: string;
  metadata?: Record<string, unknown>;
  error?: Error;
}

export interface LogConfig {
  level: LogLevel;
  enableColors: boolean;
  /** Prefix each line with timestamp, level and module. Off for the interactive shell. */
  detailed: boolean;
  includeStackTrace: boolean;
}

export interface LoggingService {
  trace: (message: string, metadata?: Record<string, unknown>) => Effect.Effect<void, never>;
  debug: (message: string, metadata?: Record<string, unknown>) => Effect.Effect<void, never>;
  info: (message: string, metadata?: Record<string, unknown>) => Effect.Effect<void, never>;
  warn: (message: string, metadata?: Record<string, unknown>) => Effect.Effect<void, never>;
  error: (message: string, error?: Error, metadata?: Record<string, unknown>) => Effect.Effect<void, never>;
  fatal: (message: string, error?: Error, metadata?: Record<string, unknown>) => Effect.Effect<void, never>;
  withModule: (module: string) => LoggingService;
}

export type LogSink = (entry: LogEntry, line: string) => void;

const consoleSink: LogSink = (entry, line) => {
  switch (entry.level) {
    case 'trace':
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
    case 'fatal':
      console.error(line);
      break;
  }
};

export class ConsoleLogger implements LoggingService {
  constructor(
    private readonly config: LogConfig,
    private module: string = 'default',
    private sink: LogSink = consoleSink,
  ) {}

  trace(message: string, metadata: Record<string, unknown> = {}): Effect.Effect<void, never> {
    return this.log('trace', message, undefined, metadata);
  }

  debug(message: string, metadata: Record<string, unknown> = {}): Effect.Effect<void, never> {
    return this.log('debug', message, undefined, metadata);
  }

  info(message: string, metadata: Record<string, unknown> = {}): Effect.Effect<void, never> {
    return this.log('info', message, undefined, metadata);
  }

  warn(message: string, metadata: Record<string, unknown> = {}): Effect.Effect<void, never> {
    return this.log('warn', message, undefined, metadata);
  }

  error(message: string, error?: Error, metadata: Record<string, unknown> = {}): Effect.Effect<void, never> {
    return this.log('error', message, error, metadata);
  }

  fatal(message: string, error?: Error, metadata: Record<string, unknown> = {}): Effect.Effect<void, never> {
    return this.log('fatal', message, error, metadata);
  }

  // module loggers share the level and the sink
  withModule(module: string): LoggingService {
    return new ConsoleLogger(this.config, module, this.sink);
  }

  private log(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata: Record<string, unknown> = {},
  ): Effect.Effect<void, never> {
    return Effect.sync(() => {
      if (!this.shouldLog(level)) {
        return;
      }

      const entry: LogEntry = {
        timestamp: Date.now(),
        level,
        message,
        module: this.module,
        metadata,
        error,
      };

      this.sink(entry, this.format(entry));
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.config.level);
  }

  private format(entry: LogEntry): string {
    let output = entry.message;

    if (this.config.detailed) {
      const timestamp = new Date(entry.timestamp).toISOString();
      const level = entry.level.toUpperCase().padEnd(5);
      const module = `[${entry.module}]`.padEnd(12);
      output = `${timestamp} ${level} ${module} ${output}`;
      if (entry.metadata && Object.keys(entry.metadata).length > 0) {
        output += ` ${JSON.stringify(entry.metadata)}`;
      }
    } else if (entry.level === 'warn') {
      output = `Warning: ${output}`;
    } else if (entry.level === 'error' || entry.level === 'fatal') {
      output = `Error: ${output}`;
    }

    if (entry.error) {
      output += this.config.includeStackTrace && entry.error.stack ? `\n${entry.error.stack}` : `: ${entry.error.message}`;
    }

    return this.config.enableColors ? this.colorize(entry.level, output) : output;
  }

  private colorize(level: LogLevel, output: string): string {
    switch (level) {
      case 'trace':
        return chalk.gray(output);
      case 'debug':
        return chalk.cyan(output);
      case 'info':
        return output;
      case 'warn':
        return chalk.yellow(output);
      case 'error':
        return chalk.red(output);
      case 'fatal':
        return chalk.magenta(output);
    }
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Default logging configuration; SPRINTDECK_LOG_LEVEL overrides the level.
 */
export function defaultLogConfig(): LogConfig {
  const envLevel = process.env.SPRINTDECK_LOG_LEVEL;
  return {
    level: isLogLevel(envLevel) ? envLevel : 'info',
    enableColors: Boolean(process.stdout.isTTY),
    detailed: process.env.SPRINTDECK_LOG_DETAILED === '1',
    includeStackTrace: false,
  };
}

export function createLogger(config: LogConfig = defaultLogConfig(), sink?: LogSink): LoggingService {
  return new ConsoleLogger(config, 'sprintdeck', sink);
}

/**
 * A logger that records entries instead of printing them, for tests.
 */
export function createMemoryLogger(level: LogLevel = 'trace'): { logger: LoggingService; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new ConsoleLogger(
    { level, enableColors: false, detailed: false, includeStackTrace: false },
    'test',
    (entry) => {
      entries.push(entry);
    },
  );
  return { logger, entries };
}
