/**
 * Module logger for the curator core
 *
 * Every core module logs through `createLogger({ module })`. Lines go to
 * stderr so that a command's stdout carries only its result, which keeps
 * `--json` output parseable. Level and format are process-wide: the CLI sets
 * them once from `--verbose`/`--json` through `configureLogging`; until then
 * CURATOR_LOG_LEVEL (or LOG_LEVEL) picks the level.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LogRecord {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly module: string;
  readonly message: string;
  readonly metadata: LogMetadata;
}

/** Receives every emitted line (tests swap in a collector) */
export type LogSink = (line: string, record: LogRecord) => void;

export interface LoggingOptions {
  readonly level?: LogLevel;
  readonly format?: LogFormat;
  readonly sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.CURATOR_LOG_LEVEL ?? process.env.LOG_LEVEL)?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

const settings: { level: LogLevel; format: LogFormat; sink: LogSink } = {
  level: levelFromEnv(),
  format: 'text',
  sink: stderrSink,
};

/**
 * Set the process-wide level, format or sink. Omitted options keep their
 * current value.
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.level !== undefined) settings.level = options.level;
  if (options.format !== undefined) settings.format = options.format;
  if (options.sink !== undefined) settings.sink = options.sink;
}

/**
 * Back to the environment level, text format and stderr
 */
export function resetLogging(): void {
  settings.level = levelFromEnv();
  settings.format = 'text';
  settings.sink = stderrSink;
}

export function formatLogRecord(record: LogRecord, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify({
      timestamp: record.timestamp,
      level: record.level,
      module: record.module,
      message: record.message,
      ...record.metadata,
    });
  }
  const meta =
    Object.keys(record.metadata).length > 0 ? ` ${JSON.stringify(record.metadata)}` : '';
  return `[${record.timestamp}] ${record.level.toUpperCase()} ${record.module}: ${record.message}${meta}`;
}

export class Logger {
  constructor(
    readonly module: string,
    private readonly bound: LogMetadata = {}
  ) {}

  /**
   * Logger that adds `metadata` to every line (run id, partition, ...)
   */
  child(metadata: LogMetadata): Logger {
    return new Logger(this.module, { ...this.bound, ...metadata });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) return;
    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      module: this.module,
      message,
      metadata: { ...this.bound, ...metadata },
    };
    settings.sink(formatLogRecord(record, settings.format), record);
  }
}

export function createLogger(context: { readonly module: string }): Logger {
  return new Logger(`museum-curator:${context.module}`);
}
