/**
 * @ledgerwork/consensus — majority-rule integrity check across replicas.
 *
 * Every replica is reduced to the Merkle root of its block digests and
 * validated on its own. The root held by the most replicas wins; a replica
 * is accepted only if it is valid and holds that root. This is plain
 * majority voting: a corrupted majority outvotes an honest minority.
 *
 * @packageDocumentation
 */

import type { Chain } from '@ledgerwork/chain';
import type { HashHex } from '@ledgerwork/crypto';
import { MerkleTree } from '@ledgerwork/merkle';
import { LedgerError, LedgerErrorCode, createSilentLogger } from '@ledgerwork/types';

export type {
  ReplicaVerdict,
  RootComparison,
  MajorityRoot,
  ChainDiff,
  CompareOptions,
} from './types';

import type {
  ReplicaVerdict,
  RootComparison,
  MajorityRoot,
  ChainDiff,
  CompareOptions,
} from './types';

// ---------------------------------------------------------------------------
// Roots
// ---------------------------------------------------------------------------

/** Merkle root over a chain's block digests. */
export function chainRoot(chain: Chain): HashHex {
  const root = new MerkleTree(chain.digests()).root();
  if (root === undefined) {
    throw new LedgerError(LedgerErrorCode.INVALID_INPUT, 'Chain has no blocks to summarize');
  }
  return root;
}

/**
 * Most frequent root in `roots`. On a tie the root seen first wins.
 *
 * @throws {LedgerError} `EMPTY_REPLICA_SET` when `roots` is empty.
 */
export function majorityRoot(roots: readonly HashHex[]): MajorityRoot {
  // Map iteration follows insertion order, so a strict `>` keeps the first maximum.
  const counts = new Map<HashHex, number>();
  for (const root of roots) {
    counts.set(root, (counts.get(root) ?? 0) + 1);
  }

  let best: MajorityRoot | undefined;
  for (const [root, count] of counts) {
    if (best === undefined || count > best.count) {
      best = { root, count };
    }
  }

  if (best === undefined) {
    throw new LedgerError(LedgerErrorCode.EMPTY_REPLICA_SET, 'Cannot take a majority of zero roots', {
      hint: 'Pass at least one replica.',
    });
  }
  return best;
}

// ---------------------------------------------------------------------------
// Replica comparison
// ---------------------------------------------------------------------------

/**
 * Compare a replica set by Merkle root and per-chain validity.
 *
 * Replicas are only read, never mutated.
 *
 * @throws {LedgerError} `EMPTY_REPLICA_SET` when `chains` is empty.
 */
export function compareRoots(chains: readonly Chain[], options?: CompareOptions): RootComparison {
  if (chains.length === 0) {
    throw new LedgerError(LedgerErrorCode.EMPTY_REPLICA_SET, 'No replicas to compare', {
      hint: 'Pass at least one chain.',
    });
  }
  const logger = options?.logger ?? createSilentLogger('consensus');

  const roots = chains.map(chainRoot);
  const majority = majorityRoot(roots);

  const replicas: ReplicaVerdict[] = chains.map((chain, index) => {
    const root = roots[index]!;
    const validity = chain.isValid();
    const matchesMajority = root === majority.root;
    return { index, root, validity, matchesMajority, accepted: validity.valid && matchesMajority };
  });

  const accepted: number[] = [];
  const rejected: number[] = [];
  for (const verdict of replicas) {
    if (verdict.accepted) {
      accepted.push(verdict.index);
      continue;
    }
    rejected.push(verdict.index);
    logger.warn('replica rejected', {
      index: verdict.index,
      root: verdict.root,
      majorityRoot: majority.root,
      valid: verdict.validity.valid,
      ...(verdict.validity.valid
        ? {}
        : { brokenAt: verdict.validity.brokenAt, reason: verdict.validity.reason }),
    });
  }

  return {
    replicas,
    majorityRoot: majority.root,
    majorityCount: majority.count,
    accepted,
    rejected,
  };
}

// ---------------------------------------------------------------------------
// Pairwise diff
// ---------------------------------------------------------------------------

/**
 * Indices at which the two chains' block digests differ, compared up to the
 * shorter length. Blocks past the shared prefix are not reported; use
 * {@link compareChains} to see a length mismatch.
 */
export function diffBlocks(a: Chain, b: Chain): number[] {
  const left = a.digests();
  const right = b.digests();
  const shared = Math.min(left.length, right.length);
  const differing: number[] = [];
  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) {
      differing.push(i);
    }
  }
  return differing;
}

/** {@link diffBlocks} plus lengths and roots of both chains. */
export function compareChains(a: Chain, b: Chain): ChainDiff {
  const rootA = chainRoot(a);
  const rootB = chainRoot(b);
  const lengthMismatch = a.length !== b.length;
  return {
    differingIndices: diffBlocks(a, b),
    lengthA: a.length,
    lengthB: b.length,
    lengthMismatch,
    rootA,
    rootB,
    identical: rootA === rootB && !lengthMismatch,
  };
}
