import { sha256 as nobleSha256 } from '@noble/hashes/sha256';

export type { HashHex, Difficulty } from './types';

import type { HashHex } from './types';

/** Length of every hex digest the ledger produces (SHA-256, 32 bytes). */
export const DIGEST_HEX_LENGTH = 64;

const encoder = new TextEncoder();

/**
 * SHA-256 hash of arbitrary bytes, returned as a lowercase hex string.
 *
 * @param data - The bytes to hash.
 * @returns A 64-character hex-encoded SHA-256 digest.
 *
 * @example
 * ```typescript
 * const hash = sha256(new TextEncoder().encode('hello'));
 * console.log(hash); // '2cf24dba5fb0a30e...'
 * ```
 */
export function sha256(data: Uint8Array): HashHex {
  return toHex(nobleSha256(data));
}

/**
 * SHA-256 hash of a UTF-8 string, returned as a lowercase hex string.
 *
 * This is the hash function behind block digests and Merkle nodes.
 *
 * @example
 * ```typescript
 * const hash = sha256String('1000Genesis Block00');
 * ```
 */
export function sha256String(data: string): HashHex {
  return sha256(encoder.encode(data));
}

/**
 * Encode a byte array to a lowercase hex string.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([255, 0])); // 'ff00'
 * ```
 */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < data.length; i++) {
    hex += data[i]!.toString(16).padStart(2, '0');
  }
  return hex;
}

/**
 * Count the leading `'0'` characters of a hex digest.
 *
 * @example
 * ```typescript
 * leadingZeroDigits('000af3...'); // 3
 * ```
 */
export function leadingZeroDigits(hex: string): number {
  let count = 0;
  while (count < hex.length && hex.charCodeAt(count) === 48) {
    count++;
  }
  return count;
}

/**
 * Proof-of-work predicate: the first `difficulty` characters are all `'0'`.
 *
 * Difficulty 0 is satisfied by every digest.
 */
export function meetsDifficulty(hex: string, difficulty: number): boolean {
  return leadingZeroDigits(hex) >= difficulty;
}

/**
 * The prefix a digest must start with to satisfy `difficulty`.
 */
export function difficultyTarget(difficulty: number): string {
  return '0'.repeat(difficulty);
}
