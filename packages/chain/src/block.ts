/**
 * A single proof-of-work ledger entry.
 *
 * A block's digest commits to its timestamp, payload, predecessor link and
 * nonce. Mining searches the nonce space until the digest carries the
 * required number of leading zero hex digits.
 *
 * @packageDocumentation
 */

import { sha256String, meetsDifficulty, DIGEST_HEX_LENGTH } from '@ledgerwork/crypto';
import type { HashHex } from '@ledgerwork/crypto';
import {
  LedgerError,
  LedgerErrorCode,
  assertFiniteNumber,
  assertNonNegativeInteger,
} from '@ledgerwork/types';

import type { BlockSnapshot, MiningOptions, MiningResult } from './types';

/** Current time in seconds, the unit block timestamps use. */
export function nowSeconds(): number {
  return Date.now() / 1000;
}

/**
 * Reject difficulties that are negative, fractional, or longer than a
 * digest (which no nonce could ever satisfy).
 *
 * @throws {LedgerError} `INVALID_DIFFICULTY`
 */
export function assertDifficulty(difficulty: number): void {
  assertNonNegativeInteger(difficulty, 'difficulty', LedgerErrorCode.INVALID_DIFFICULTY);
  if (difficulty > DIGEST_HEX_LENGTH) {
    throw new LedgerError(
      LedgerErrorCode.INVALID_DIFFICULTY,
      `difficulty must be at most ${DIGEST_HEX_LENGTH}, got ${difficulty}`,
      { hint: 'A digest has 64 hex digits; a longer zero prefix can never be found.' },
    );
  }
}

/**
 * One ledger entry.
 *
 * ```ts
 * const block = new Block('Transaction 0', previous.digest, 1001);
 * block.mine(3);
 * block.digest.startsWith('000'); // true
 * ```
 */
export class Block {
  readonly timestamp: number;
  private _payload: string;
  private _previousDigest: string;
  private _nonce = 0;
  private _digest: HashHex;

  constructor(payload: string, previousDigest: string, timestamp: number = nowSeconds()) {
    assertFiniteNumber(timestamp, 'timestamp', LedgerErrorCode.INVALID_TIMESTAMP);
    this.timestamp = timestamp;
    this._payload = payload;
    this._previousDigest = previousDigest;
    this._digest = this.computeDigest();
  }

  /**
   * Rebuild a block from a snapshot exactly as given, including a stored
   * digest that may not match the fields. Nothing is recomputed.
   */
  static restore(snapshot: BlockSnapshot): Block {
    assertNonNegativeInteger(snapshot.nonce, 'nonce', LedgerErrorCode.INVALID_INPUT);
    const block = new Block(snapshot.payload, snapshot.previousDigest, snapshot.timestamp);
    block._nonce = snapshot.nonce;
    block._digest = snapshot.digest;
    return block;
  }

  get payload(): string {
    return this._payload;
  }

  get previousDigest(): string {
    return this._previousDigest;
  }

  get nonce(): number {
    return this._nonce;
  }

  /** The stored digest, as last computed by construction, mining or an update. */
  get digest(): HashHex {
    return this._digest;
  }

  /**
   * Hash of `timestamp + payload + previousDigest + nonce`, concatenated in
   * that order with no separator. Does not touch the stored digest.
   */
  computeDigest(): HashHex {
    return sha256String(`${this.timestamp}${this._payload}${this._previousDigest}${this._nonce}`);
  }

  /** True when the stored digest equals a fresh recomputation. */
  verifyDigest(): boolean {
    return this._digest === this.computeDigest();
  }

  /**
   * Increment the nonce from its current value until the digest has
   * `difficulty` leading zero hex digits.
   *
   * Unbounded unless `options` sets a limit. When a limit stops the search
   * the block keeps the last nonce tried and its matching digest.
   *
   * @throws {LedgerError} `INVALID_DIFFICULTY` for an unusable difficulty,
   *   `MINING_BUDGET_EXHAUSTED` when a limit stops the search.
   */
  mine(difficulty: number, options?: MiningOptions): MiningResult {
    assertDifficulty(difficulty);
    const maxIterations = options?.maxIterations;
    if (maxIterations !== undefined) {
      assertNonNegativeInteger(maxIterations, 'maxIterations');
    }

    let iterations = 0;
    while (!meetsDifficulty(this._digest, difficulty)) {
      if (
        (maxIterations !== undefined && iterations >= maxIterations) ||
        options?.shouldAbort?.(iterations) === true
      ) {
        throw new LedgerError(
          LedgerErrorCode.MINING_BUDGET_EXHAUSTED,
          `Mining stopped after ${iterations} iterations without reaching difficulty ${difficulty}`,
          {
            hint: 'Raise maxIterations or lower the difficulty.',
            context: { iterations, nonce: this._nonce, difficulty },
          },
        );
      }
      this._nonce += 1;
      this._digest = this.computeDigest();
      iterations++;
    }

    return { nonce: this._nonce, digest: this._digest, iterations };
  }

  /**
   * Replace the payload, reset the nonce to 0 and recompute the digest.
   *
   * The block is not re-mined, so it generally no longer satisfies the
   * chain's difficulty and its successor's link no longer matches.
   */
  updateData(payload: string): void {
    this._payload = payload;
    this._nonce = 0;
    this._digest = this.computeDigest();
  }

  /**
   * Replace the payload and recompute the digest, keeping the current nonce.
   * Not re-mined.
   */
  replacePayload(payload: string): void {
    this._payload = payload;
    this._digest = this.computeDigest();
  }

  /**
   * Point the block at a new predecessor digest, reset the nonce to 0 and
   * recompute the digest. Not re-mined.
   */
  relink(previousDigest: string): void {
    this._previousDigest = previousDigest;
    this._nonce = 0;
    this._digest = this.computeDigest();
  }

  clone(): Block {
    return Block.restore(this.toJSON());
  }

  toJSON(): BlockSnapshot {
    return {
      timestamp: this.timestamp,
      payload: this._payload,
      previousDigest: this._previousDigest,
      nonce: this._nonce,
      digest: this._digest,
    };
  }

  toString(): string {
    return (
      `Block(digest=${this._digest.slice(0, 10)}..., prev=${this._previousDigest.slice(0, 10)}..., ` +
      `nonce=${this._nonce}, payload=${this._payload}, ts=${this.timestamp})`
    );
  }
}
