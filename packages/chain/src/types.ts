import type { HashHex } from '@ledgerwork/crypto';
import type { Logger } from '@ledgerwork/types';

/** Plain, serializable view of a block's fields. */
export interface BlockSnapshot {
  /** Creation instant in seconds. */
  timestamp: number;
  /** Opaque ledger entry content. */
  payload: string;
  /** Digest of the predecessor block; `"0"` for genesis. */
  previousDigest: string;
  /** Proof-of-work search variable. */
  nonce: number;
  /** Stored digest, which may disagree with the fields if the block was forged. */
  digest: HashHex;
}

/**
 * Optional limits on a mining search. Without them mining runs until a
 * satisfying nonce is found.
 */
export interface MiningOptions {
  /** Maximum number of nonce increments before giving up. */
  maxIterations?: number;
  /** Polled before every increment with the iterations done so far. */
  shouldAbort?: (iterations: number) => boolean;
}

/** Outcome of a completed mining search. */
export interface MiningResult {
  nonce: number;
  digest: HashHex;
  /** Number of nonce increments performed by this call. */
  iterations: number;
}

/** Which part of the chain invariant a block violated. */
export type ViolationKind = 'digest' | 'link' | 'difficulty';

/**
 * Result of {@link Chain.isValid}. A broken chain reports the first index
 * at which the invariant fails and which check failed there.
 */
export type ChainValidity =
  | { valid: true }
  | { valid: false; brokenAt: number; reason: ViolationKind };

/** Options accepted by the Chain constructor and factories. */
export interface ChainOptions {
  /** Receives a DEBUG entry per mined block. Defaults to a silent logger. */
  logger?: Logger;
  /** Limits applied to every mining call made by the chain. */
  mining?: MiningOptions;
}

/** Plain, serializable view of a whole chain. */
export interface ChainSnapshot {
  difficulty: number;
  blocks: BlockSnapshot[];
}
