/**
 * @ledgerwork/merkle — binary hash tree over an ordered list of digests.
 *
 * Each level pairs adjacent entries of the level below and hashes their
 * concatenation (left then right, no separator). A level with an odd number
 * of entries pairs its last entry with itself. The root commits to every
 * leaf and to their order.
 *
 * @packageDocumentation
 */

import { sha256String } from '@ledgerwork/crypto';
import type { HashHex } from '@ledgerwork/crypto';
import { LedgerError, LedgerErrorCode } from '@ledgerwork/types';

export type { MerkleProof, MerkleProofStep, SiblingSide } from './types';

import type { MerkleProof, MerkleProofStep } from './types';

/** Hash of two sibling nodes. */
export function hashPair(left: HashHex, right: HashHex): HashHex {
  return sha256String(left + right);
}

/** `level` with its last entry repeated when the count is odd. */
function padLevel(level: readonly HashHex[]): HashHex[] {
  const padded = [...level];
  if (padded.length % 2 !== 0) {
    padded.push(padded[padded.length - 1]!);
  }
  return padded;
}

/** Hash adjacent pairs of an even-length level. */
function reduceLevel(level: readonly HashHex[]): HashHex[] {
  const next: HashHex[] = [];
  for (let i = 0; i < level.length; i += 2) {
    next.push(hashPair(level[i]!, level[i + 1]!));
  }
  return next;
}

/**
 * Immutable Merkle tree built once from a snapshot of leaf digests.
 *
 * ```ts
 * const tree = new MerkleTree(chain.digests());
 * tree.root();   // single digest committing to the whole chain
 * tree.levels(); // [leaves, ..., [root]]
 * ```
 */
export class MerkleTree {
  private readonly leaves: readonly HashHex[];
  private readonly tree: readonly (readonly HashHex[])[];

  constructor(leaves: readonly HashHex[]) {
    this.leaves = Object.freeze([...leaves]);
    this.tree = this.leaves.length > 0 ? this.build() : [];
  }

  private build(): (readonly HashHex[])[] {
    const levels: (readonly HashHex[])[] = [];
    let current: readonly HashHex[] = this.leaves;
    while (current.length > 1) {
      const padded = Object.freeze(padLevel(current));
      levels.push(padded);
      current = reduceLevel(padded);
    }
    levels.push(Object.freeze([...current]));
    return levels;
  }

  /** The root digest, or `undefined` for a tree with no leaves. */
  root(): HashHex | undefined {
    const top = this.tree[this.tree.length - 1];
    return top?.[0];
  }

  /**
   * Every level from the leaves (index 0) up to the root. An odd level is
   * stored padded, with its last entry repeated, so every level below the
   * root has an even count.
   */
  levels(): readonly (readonly HashHex[])[] {
    return this.tree;
  }

  leafCount(): number {
    return this.leaves.length;
  }

  /** Number of levels, including the leaf level and the root level. */
  depth(): number {
    return this.tree.length;
  }

  /**
   * Build an inclusion proof for the leaf at `index`.
   *
   * @throws {LedgerError} `MERKLE_LEAF_NOT_FOUND` when `index` is out of range.
   */
  proof(index: number): MerkleProof {
    if (!Number.isInteger(index) || index < 0 || index >= this.leaves.length) {
      throw new LedgerError(
        LedgerErrorCode.MERKLE_LEAF_NOT_FOUND,
        `No leaf at index ${index}; tree has ${this.leaves.length} leaves`,
        { context: { index, leafCount: this.leaves.length } },
      );
    }

    const path: MerkleProofStep[] = [];
    let position = index;
    for (let depth = 0; depth < this.tree.length - 1; depth++) {
      const level = this.tree[depth]!;
      if (position % 2 === 0) {
        path.push({ sibling: level[position + 1]!, side: 'right' });
      } else {
        path.push({ sibling: level[position - 1]!, side: 'left' });
      }
      position = Math.floor(position / 2);
    }

    return { index, leafCount: this.leaves.length, path };
  }
}

/**
 * Fold a leaf up an inclusion proof and compare against `root`.
 */
export function verifyProof(leaf: HashHex, proof: MerkleProof, root: HashHex): boolean {
  let current = leaf;
  for (const step of proof.path) {
    current = step.side === 'left' ? hashPair(step.sibling, current) : hashPair(current, step.sibling);
  }
  return current === root;
}

/** Root of `leaves` without keeping the tree. */
export function merkleRoot(leaves: readonly HashHex[]): HashHex | undefined {
  return new MerkleTree(leaves).root();
}
