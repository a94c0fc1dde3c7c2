/**
 * Structured logging for the Ledgerwork packages.
 *
 * A small, zero-dependency logger that emits JSON entries. Library objects
 * (chains, comparators) take an optional logger and default to a silent
 * one, so only the CLI or an embedding application decides where output goes.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels used to control verbosity.
 *
 * An entry is emitted only when its level is greater than or equal to the
 * logger's threshold. {@link LogLevel.SILENT} suppresses everything.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/**
 * A single structured log entry.
 *
 * `level`, `message` and `timestamp` are always present; bound fields and
 * per-call fields are merged in, per-call fields last.
 */
export interface LogEntry {
  /** Human-readable level name (e.g. "DEBUG", "INFO"). */
  level: string;
  message: string;
  /** ISO 8601 timestamp of when the entry was created. */
  timestamp: string;
  /** Dotted component path, e.g. `chain.mining`. */
  component?: string;
  [key: string]: unknown;
}

/** Receives each formatted {@link LogEntry}. */
export type LogOutput = (entry: LogEntry) => void;

// ─── Helpers ────────────────────────────────────────────────────────────────────

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

/** JSON lines to stdout through `console.log`. */
const consoleOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry));
};

// ─── Logger options ─────────────────────────────────────────────────────────────

/** Configuration options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  /** Defaults to JSON lines on stdout. */
  output?: LogOutput;
  /** Fields attached to every entry this logger (and its children) emits. */
  bindings?: Record<string, unknown>;
}

// ─── Logger class ───────────────────────────────────────────────────────────────

/**
 * Structured logger with level filtering, bound fields and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'chain' });
 * log.debug('block mined', { index: 3, nonce: 4211 });
 * const replica = log.child('replica', { replica: 2 });
 * replica.warn('replica rejected');
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;
  private readonly bindings: Record<string, unknown>;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? consoleOutput;
    this.bindings = { ...options?.bindings };
  }

  // ── Public API ──────────────────────────────────────────────────────────────

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger sharing this logger's level and output.
   *
   * The child's component is `parent.component` when the parent has one,
   * and its bindings extend the parent's.
   */
  child(component: string, bindings?: Record<string, unknown>): Logger {
    const childComponent = this.component
      ? `${this.component}.${component}`
      : component;

    return new Logger({
      level: this.level,
      component: childComponent,
      output: this.output,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** True when an entry at `level` would be emitted. */
  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...this.bindings,
      ...fields,
    };

    this.output(entry);
  }
}

// ─── Factories ──────────────────────────────────────────────────────────────────

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * A logger that never emits. Default for library objects that were not
 * handed a logger.
 */
export function createSilentLogger(component?: string): Logger {
  return new Logger({ level: LogLevel.SILENT, component });
}
