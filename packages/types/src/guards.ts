/**
 * Runtime type guards and assertions used at the public boundaries of the
 * Ledgerwork packages (constructors, CLI flag parsing, config loading).
 */

import { LedgerError, LedgerErrorCode } from './errors';

// ─── Type Guards ────────────────────────────────────────────────────────────────

/**
 * Check whether `value` is a 64-character lowercase hex string, the shape
 * of every digest the ledger produces.
 */
export function isDigest(value: unknown): value is string {
  return typeof value === 'string' && /^[0-9a-f]{64}$/.test(value);
}

/**
 * Check whether `value` is a non-negative safe integer.
 */
export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Check whether `value` is a plain object (not an array, null, or an object
 * with a non-Object prototype).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ─── Assertions ─────────────────────────────────────────────────────────────────

/**
 * Assert that `value` is a non-negative safe integer.
 *
 * @param name - Parameter name used in the error message.
 * @param code - Error code to raise; defaults to `OUT_OF_RANGE`.
 * @throws {LedgerError} When the assertion fails.
 */
export function assertNonNegativeInteger(
  value: number,
  name: string,
  code: LedgerErrorCode = LedgerErrorCode.OUT_OF_RANGE,
): void {
  if (!isNonNegativeInteger(value)) {
    throw new LedgerError(code, `${name} must be a non-negative integer, got ${String(value)}`, {
      context: { [name]: value },
    });
  }
}

/**
 * Assert that `value` is a safe integer greater than zero.
 *
 * @throws {LedgerError} `OUT_OF_RANGE` when the assertion fails.
 */
export function assertPositiveInteger(value: number, name: string): void {
  if (!isNonNegativeInteger(value) || value === 0) {
    throw new LedgerError(
      LedgerErrorCode.OUT_OF_RANGE,
      `${name} must be a positive integer, got ${String(value)}`,
      { context: { [name]: value } },
    );
  }
}

/**
 * Assert that `value` is a finite number (not NaN, not +/-Infinity).
 *
 * @throws {LedgerError} When the assertion fails.
 */
export function assertFiniteNumber(
  value: number,
  name: string,
  code: LedgerErrorCode = LedgerErrorCode.INVALID_INPUT,
): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new LedgerError(code, `${name} must be a finite number, got ${String(value)}`, {
      context: { [name]: value },
    });
  }
}

// ─── Exhaustiveness Check ───────────────────────────────────────────────────────

/**
 * Place in the `default` branch of a `switch` to get a compile-time error
 * when a case is not handled.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
