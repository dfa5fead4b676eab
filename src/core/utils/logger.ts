/**
 * Structured logging utility for BRAHMS Sync
 *
 * Loggers are created once at startup and passed to every component.
 * Each logger fans entries out to its sinks; each sink has its own minimum
 * level (console defaults to debug, the persistent log file to warn).
 *
 * @module logger
 */

import { appendFileSync } from 'node:fs';

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Single log entry as delivered to sinks
 */
export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly service: string;
  readonly message: string;
  readonly metadata: LogMetadata;
}

/**
 * Destination for log entries
 */
export interface LogSink {
  readonly level: LogLevel;
  write(entry: LogEntry): void;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function meetsLevel(level: LogLevel, minimum: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[minimum];
}

function formatValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

// ============================================================================
// Sinks
// ============================================================================

export interface ConsoleSinkOptions {
  readonly level: LogLevel;
  /** One JSON object per line instead of the colored human format */
  readonly json: boolean;
}

export class ConsoleSink implements LogSink {
  readonly level: LogLevel;
  private readonly json: boolean;

  constructor(options: ConsoleSinkOptions) {
    this.level = options.level;
    this.json = options.json;
  }

  write(entry: LogEntry): void {
    const formatted = this.json ? this.formatJson(entry) : this.formatHuman(entry);

    switch (entry.level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      service: entry.service,
      message: entry.message,
      ...entry.metadata,
    });
  }

  private formatHuman(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level];
    let line = `${COLORS.dim}${entry.timestamp}${COLORS.reset} `;
    line += `${color}${LEVEL_LABELS[entry.level]}${COLORS.reset} `;
    line += entry.message;

    const keys = Object.keys(entry.metadata);
    if (keys.length > 0) {
      const metaStr = keys
        .map((key) => `${COLORS.cyan}${key}${COLORS.reset}=${formatValue(entry.metadata[key])}`)
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }
}

export interface FileSinkOptions {
  readonly filePath: string;
  readonly level: LogLevel;
}

/**
 * Appends plain-text lines to a persistent log file
 *
 * Writes are synchronous so nothing is lost when the process exits early.
 */
export class FileSink implements LogSink {
  readonly level: LogLevel;
  readonly filePath: string;

  constructor(options: FileSinkOptions) {
    this.level = options.level;
    this.filePath = options.filePath;
  }

  write(entry: LogEntry): void {
    appendFileSync(this.filePath, `${FileSink.format(entry)}\n`, 'utf-8');
  }

  static format(entry: LogEntry): string {
    const label = entry.level.toUpperCase().padEnd(5);
    const meta = Object.keys(entry.metadata).length > 0 ? ` ${JSON.stringify(entry.metadata)}` : '';
    return `${entry.timestamp} [${entry.service}] [${label}] ${entry.message}${meta}`;
  }
}

/**
 * Keeps entries in memory (tests, summaries)
 */
export class MemorySink implements LogSink {
  readonly level: LogLevel;
  readonly entries: LogEntry[] = [];

  constructor(level: LogLevel = 'debug') {
    this.level = level;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }
}

// ============================================================================
// Logger
// ============================================================================

export interface LoggerConfig {
  readonly service: string;
  readonly sinks: readonly LogSink[];
  /** Metadata merged into every entry */
  readonly context?: LogMetadata;
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get sinks(): readonly LogSink[] {
    return this.config.sinks;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    const targets = this.config.sinks.filter((sink) => meetsLevel(level, sink.level));
    if (targets.length === 0) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.config.service,
      message,
      metadata: { ...this.config.context, ...metadata },
    };

    for (const sink of targets) {
      sink.write(entry);
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Create a child logger sharing sinks, with additional context
   */
  child(context: LogMetadata): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export interface CreateLoggerOptions {
  readonly service?: string;
  /** Console sink settings, or false to disable */
  readonly console?: ConsoleSinkOptions | false;
  /** Log file settings, or false to disable */
  readonly file?: FileSinkOptions | false;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const sinks: LogSink[] = [];

  if (options.console !== false) {
    sinks.push(new ConsoleSink(options.console ?? { level: 'info', json: false }));
  }
  if (options.file) {
    sinks.push(new FileSink(options.file));
  }

  return new Logger({ service: options.service ?? 'brahms-sync', sinks });
}

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}
