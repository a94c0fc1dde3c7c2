/**
 * Error code system for the Ledgerwork packages.
 *
 * Every error raised by the core carries a stable `LEDGER_Exxx` code so
 * callers and the CLI can branch on the failure without parsing messages.
 * Expected conditions (a tampered chain, an empty Merkle tree) are returned
 * as values and never reach this module.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Ledgerwork error codes. */
export enum LedgerErrorCode {
  // Input validation (1xx)
  /** A required input was empty, missing, or otherwise malformed. */
  INVALID_INPUT = 'LEDGER_E100',
  /** A numeric input was outside its permitted range. */
  OUT_OF_RANGE = 'LEDGER_E101',

  // Chain (2xx)
  /** Difficulty must be a non-negative integer. */
  INVALID_DIFFICULTY = 'LEDGER_E200',
  /** Block timestamps must be finite numbers. */
  INVALID_TIMESTAMP = 'LEDGER_E201',
  /** A block index does not address an existing block. */
  INVALID_INDEX = 'LEDGER_E202',
  /** Two chains with different difficulties cannot share history. */
  DIFFICULTY_MISMATCH = 'LEDGER_E203',

  // Mining (3xx)
  /** Mining stopped before a digest satisfying the difficulty was found. */
  MINING_BUDGET_EXHAUSTED = 'LEDGER_E300',

  // Merkle (4xx)
  /** A Merkle proof was requested for a leaf that does not exist. */
  MERKLE_LEAF_NOT_FOUND = 'LEDGER_E400',

  // Consensus (5xx)
  /** A comparison was requested over zero replicas. */
  EMPTY_REPLICA_SET = 'LEDGER_E500',

  // Configuration (6xx)
  /** A configuration file exists but does not parse or validate. */
  CONFIG_INVALID = 'LEDGER_E600',
}

// ─── Error class ────────────────────────────────────────────────────────────────

/** Options for constructing a LedgerError. */
export interface LedgerErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: Error;
}

/**
 * Base error class for all Ledgerwork errors.
 *
 * @example
 * ```typescript
 * throw new LedgerError(
 *   LedgerErrorCode.INVALID_DIFFICULTY,
 *   'Difficulty must be a non-negative integer, got -1',
 *   { hint: 'Pass 0 to disable proof-of-work.' }
 * );
 * ```
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: LedgerErrorCode, message: string, options?: LedgerErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'LedgerError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /**
   * Return a structured JSON representation suitable for logging.
   */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Format an error for display: code and message, then the hint if present.
 */
export function formatError(error: LedgerError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/** Type guard for LedgerError instances, optionally of a specific code. */
export function isLedgerError(value: unknown, code?: LedgerErrorCode): value is LedgerError {
  if (!(value instanceof LedgerError)) return false;
  return code === undefined || value.code === code;
}
