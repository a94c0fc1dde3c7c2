/**
 * @ledgerwork/types — shared error types, logging and input guards.
 *
 * @packageDocumentation
 */

export {
  LedgerError,
  LedgerErrorCode,
  formatError,
  isLedgerError,
} from './errors';
export type { LedgerErrorOptions } from './errors';

export {
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
} from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

export {
  isDigest,
  isNonNegativeInteger,
  isPlainObject,
  assertNonNegativeInteger,
  assertPositiveInteger,
  assertFiniteNumber,
  assertNever,
} from './guards';

/** Package version reported by the CLI. */
export const LEDGERWORK_VERSION = '0.1.0';
