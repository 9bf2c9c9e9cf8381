/**
 * Structured logging for Policy Compiler
 *
 * Every entry carries a subsystem name ("traversal", "sql", ...) and optional
 * metadata. Entries go to a LogSink; the default sink writes one JSON line per
 * entry to stderr so stdout stays free for command output.
 */

export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
  /** Suppresses all output */
  SILENT: 'silent',
} as const;

export type LogLevelValue = (typeof LogLevel)[keyof typeof LogLevel];

type EntryLevel = Exclude<LogLevelValue, 'silent'>;

const LEVEL_PRIORITY: Record<LogLevelValue, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogEntry {
  readonly timestamp: string;
  readonly level: EntryLevel;
  readonly subsystem: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface Logger {
  readonly subsystem: string;
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  child(subsystem: string): Logger;
}

export interface LoggerOptions {
  readonly level?: LogLevelValue;
  readonly subsystem?: string;
  readonly sink?: LogSink;
}

/**
 * Check if a level should be logged given a minimum level
 */
export function shouldLog(level: LogLevelValue, minLevel: LogLevelValue): boolean {
  return level !== 'silent' && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

/**
 * Writes JSON lines to stderr
 */
export class StderrSink implements LogSink {
  write(entry: LogEntry): void {
    process.stderr.write(JSON.stringify(entry) + '\n');
  }
}

/**
 * Keeps entries in memory (tests, embedding callers)
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

class StructuredLogger implements Logger {
  readonly subsystem: string;
  private readonly level: LogLevelValue;
  private readonly sink: LogSink;

  constructor(subsystem: string, level: LogLevelValue, sink: LogSink) {
    this.subsystem = subsystem;
    this.level = level;
    this.sink = sink;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.log('error', message, metadata);
  }

  child(subsystem: string): Logger {
    return new StructuredLogger(`${this.subsystem}.${subsystem}`, this.level, this.sink);
  }

  private log(level: EntryLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) {
      return;
    }

    const entry: LogEntry =
      metadata !== undefined && Object.keys(metadata).length > 0
        ? { timestamp: new Date().toISOString(), level, subsystem: this.subsystem, message, metadata }
        : { timestamp: new Date().toISOString(), level, subsystem: this.subsystem, message };

    this.sink.write(entry);
  }
}

/**
 * Create a logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new StructuredLogger(
    options.subsystem ?? 'policy-compiler',
    options.level ?? 'info',
    options.sink ?? new StderrSink()
  );
}

/**
 * A logger that drops everything
 */
export const silentLogger: Logger = createLogger({ level: 'silent' });
