/** Severity levels, lowest first. */
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

/** One of {@link LOG_LEVELS}. */
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Structured fields attached to a log line. */
export type LogFields = Record<string, unknown>;

/** Type guard for {@link LogLevel}. Case-sensitive. */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Logger used by the client and CLI. */
export interface Logger {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warning: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  critical: (message: string, fields?: LogFields) => void;
}

/** Destination for serialized log lines, e.g. `process.stderr`. */
export interface LogSink {
  write: (line: string) => unknown;
}

/** Options for {@link JsonLogger}. */
export interface JsonLoggerOptions {
  /**
   * Lowest level that is written.
   * @default 'INFO'
   */
  level?: LogLevel;
  /**
   * Where lines are written.
   * @default process.stderr
   */
  sink?: LogSink;
  /** Clock used for the `timestamp` field. */
  now?: () => Date;
}

/**
 * Level-filtered JSON-lines logger. Each entry is written as a single line:
 * `{"timestamp":"…","level":"INFO","message":"…",...fields}`.
 */
export class JsonLogger implements Logger {
  #level: LogLevel;
  #sink: LogSink;
  #now: () => Date;

  constructor({ level = 'INFO', sink = process.stderr, now = () => new Date() }: JsonLoggerOptions = {}) {
    this.#level = level;
    this.#sink = sink;
    this.#now = now;
  }

  /** Current minimum level. */
  get level(): LogLevel {
    return this.#level;
  }

  debug(message: string, fields?: LogFields) {
    this.#write('DEBUG', message, fields);
  }

  info(message: string, fields?: LogFields) {
    this.#write('INFO', message, fields);
  }

  warning(message: string, fields?: LogFields) {
    this.#write('WARNING', message, fields);
  }

  error(message: string, fields?: LogFields) {
    this.#write('ERROR', message, fields);
  }

  critical(message: string, fields?: LogFields) {
    this.#write('CRITICAL', message, fields);
  }

  #write(level: LogLevel, message: string, fields?: LogFields) {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.#level)) {
      return;
    }

    const entry = { timestamp: this.#now().toISOString(), level, message, ...fields };
    this.#sink.write(`${JSON.stringify(entry)}\n`);
  }
}

const noop = () => {};

/** Logger that discards everything; the library default. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warning: noop,
  error: noop,
  critical: noop,
};
