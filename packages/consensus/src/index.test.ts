import { describe, it, expect } from 'vitest';
import { Chain } from '@ledgerwork/chain';
import { merkleRoot } from '@ledgerwork/merkle';
import { LedgerError, LedgerErrorCode, Logger, LogLevel } from '@ledgerwork/types';
import type { LogEntry } from '@ledgerwork/types';
import { chainRoot, compareChains, compareRoots, diffBlocks, majorityRoot } from './index';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const DIFFICULTY = 1;

function buildChain(count: number): Chain {
  const chain = new Chain(DIFFICULTY, 1000);
  for (let i = 0; i < count; i++) {
    chain.addBlock(`Transaction ${i}`, 1000 + i + 1);
  }
  return chain;
}

function replicas(n: number, count = 3): Chain[] {
  return Array.from({ length: n }, () => buildChain(count));
}

function thrown(fn: () => unknown): LedgerError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err;
    throw err;
  }
  throw new Error('expected function to throw');
}

/** A chain whose block 1 carries a forged payload but the original digest. */
function forgedPayload(source: Chain): Chain {
  const snapshot = source.toJSON();
  snapshot.blocks[1] = { ...snapshot.blocks[1]!, payload: 'forged' };
  return Chain.restore(snapshot);
}

// ---------------------------------------------------------------------------
// chainRoot / majorityRoot
// ---------------------------------------------------------------------------

describe('chainRoot', () => {
  it('is the Merkle root of the block digests', () => {
    const chain = buildChain(3);
    expect(chainRoot(chain)).toBe(merkleRoot(chain.digests()));
  });

  it('is the genesis digest for a genesis-only chain', () => {
    const chain = new Chain(DIFFICULTY, 1000);
    expect(chainRoot(chain)).toBe(chain.block(0).digest);
  });
});

describe('majorityRoot', () => {
  it('picks the most frequent root', () => {
    expect(majorityRoot(['a', 'b', 'b', 'c'])).toEqual({ root: 'b', count: 2 });
  });

  it('breaks ties in favour of the first root seen', () => {
    expect(majorityRoot(['a', 'b', 'b', 'a'])).toEqual({ root: 'a', count: 2 });
    expect(majorityRoot(['b', 'a', 'a', 'b'])).toEqual({ root: 'b', count: 2 });
    expect(majorityRoot(['x', 'y', 'z'])).toEqual({ root: 'x', count: 1 });
  });

  it('rejects an empty list', () => {
    expect(thrown(() => majorityRoot([])).code).toBe(LedgerErrorCode.EMPTY_REPLICA_SET);
  });
});

// ---------------------------------------------------------------------------
// compareRoots
// ---------------------------------------------------------------------------

describe('compareRoots', () => {
  it('accepts every replica of an untampered set', () => {
    const result = compareRoots(replicas(5));
    expect(result.majorityCount).toBe(5);
    expect(result.accepted).toEqual([0, 1, 2, 3, 4]);
    expect(result.rejected).toEqual([]);
    for (const verdict of result.replicas) {
      expect(verdict).toMatchObject({ matchesMajority: true, accepted: true, validity: { valid: true } });
      expect(verdict.root).toBe(result.majorityRoot);
    }
  });

  it('rejects a single extended replica out of five', () => {
    const set = replicas(5);
    set[0]!.addBlock('Minor corruption', 2000);

    const result = compareRoots(set);
    expect(result.majorityCount).toBe(4);
    expect(result.majorityRoot).toBe(chainRoot(set[1]!));
    expect(result.accepted).toEqual([1, 2, 3, 4]);
    expect(result.rejected).toEqual([0]);
    expect(result.replicas[0]).toMatchObject({
      index: 0,
      validity: { valid: true },
      matchesMajority: false,
      accepted: false,
    });
  });

  it('lets a corrupted majority outvote the honest minority', () => {
    const set = replicas(5);
    const attacker = set[0]!;
    attacker.addBlock('Minor corruption', 2000);
    attacker.addBlock('Major corruption', 3000);
    set[1]!.overwriteWith(attacker);
    set[2]!.overwriteWith(attacker);

    const result = compareRoots(set);
    expect(result.majorityCount).toBe(3);
    expect(result.majorityRoot).toBe(chainRoot(attacker));
    expect(result.accepted).toEqual([0, 1, 2]);
    expect(result.rejected).toEqual([3, 4]);
  });

  it('breaks a tie between two roots by scan order', () => {
    const honestFirst = replicas(4);
    honestFirst[2]!.addBlock('fork', 2000);
    honestFirst[3]!.addBlock('fork', 2000);
    const a = compareRoots(honestFirst);
    expect(a.majorityCount).toBe(2);
    expect(a.majorityRoot).toBe(chainRoot(honestFirst[0]!));
    expect(a.accepted).toEqual([0, 1]);

    const forkFirst = replicas(4);
    forkFirst[0]!.addBlock('fork', 2000);
    forkFirst[1]!.addBlock('fork', 2000);
    const b = compareRoots(forkFirst);
    expect(b.majorityRoot).toBe(chainRoot(forkFirst[0]!));
    expect(b.accepted).toEqual([0, 1]);
  });

  it('rejects an invalid replica even when its root matches the majority', () => {
    const set = replicas(3);
    set[2] = forgedPayload(set[2]!);

    const result = compareRoots(set);
    expect(result.majorityCount).toBe(3);
    expect(result.replicas[2]).toMatchObject({
      matchesMajority: true,
      accepted: false,
      validity: { valid: false, brokenAt: 1, reason: 'digest' },
    });
    expect(result.rejected).toEqual([2]);
  });

  it('does not mutate the replicas', () => {
    const set = replicas(3);
    const before = set.map((chain) => chain.toJSON());
    compareRoots(set);
    expect(set.map((chain) => chain.toJSON())).toEqual(before);
  });

  it('accepts a single valid replica', () => {
    const result = compareRoots([buildChain(1)]);
    expect(result.majorityCount).toBe(1);
    expect(result.accepted).toEqual([0]);
  });

  it('throws EMPTY_REPLICA_SET for no replicas', () => {
    const err = thrown(() => compareRoots([]));
    expect(err.code).toBe(LedgerErrorCode.EMPTY_REPLICA_SET);
    expect(err.message).toBe('No replicas to compare');
  });

  it('logs a WARN per rejected replica', () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: LogLevel.DEBUG, output: (e) => entries.push(e) });
    const set = replicas(3);
    set[1]!.addBlock('extra', 2000);
    set[2] = forgedPayload(set[2]!);

    compareRoots(set, { logger });
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ level: 'WARN', message: 'replica rejected', index: 1, valid: true });
    expect(entries[1]).toMatchObject({
      level: 'WARN',
      message: 'replica rejected',
      index: 2,
      valid: false,
      brokenAt: 1,
      reason: 'digest',
    });
  });
});

// ---------------------------------------------------------------------------
// diffBlocks / compareChains
// ---------------------------------------------------------------------------

describe('diffBlocks', () => {
  it('is empty for identical chains', () => {
    expect(diffBlocks(buildChain(3), buildChain(3))).toEqual([]);
  });

  it('lists every index from an edit onward after re-mining', () => {
    const a = buildChain(4);
    const b = buildChain(4);
    b.block(2).updateData('edited');
    b.remineFrom(2);
    expect(diffBlocks(a, b)).toEqual([2, 3, 4]);
  });

  it('lists only the edited index when nothing is re-mined', () => {
    const a = buildChain(4);
    const b = buildChain(4);
    b.block(2).updateData('edited');
    expect(diffBlocks(a, b)).toEqual([2]);
  });

  it('ignores blocks past the shorter chain', () => {
    const a = buildChain(2);
    const b = buildChain(2);
    b.addBlock('extra', 2000);
    expect(diffBlocks(a, b)).toEqual([]);
    expect(diffBlocks(b, a)).toEqual([]);
  });
});

describe('compareChains', () => {
  it('reports identical chains', () => {
    const a = buildChain(2);
    expect(compareChains(a, buildChain(2))).toEqual({
      differingIndices: [],
      lengthA: 3,
      lengthB: 3,
      lengthMismatch: false,
      rootA: chainRoot(a),
      rootB: chainRoot(a),
      identical: true,
    });
  });

  it('surfaces a length mismatch the prefix diff cannot see', () => {
    const a = buildChain(2);
    const b = buildChain(2);
    b.addBlock('extra', 2000);
    const diff = compareChains(a, b);
    expect(diff.differingIndices).toEqual([]);
    expect(diff).toMatchObject({ lengthA: 3, lengthB: 4, lengthMismatch: true, identical: false });
    expect(diff.rootA).not.toBe(diff.rootB);
  });
});
