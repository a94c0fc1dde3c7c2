import { describe, it, expect, vi, afterEach } from 'vitest';
import { sha256String, meetsDifficulty } from '@ledgerwork/crypto';
import { LedgerError, LedgerErrorCode } from '@ledgerwork/types';
import { Block, assertDifficulty } from './block';

// ─── Helpers ────────────────────────────────────────────────────────────────────

function thrown(fn: () => unknown): LedgerError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err;
    throw err;
  }
  throw new Error('expected function to throw');
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Construction & digest ──────────────────────────────────────────────────────

describe('Block construction', () => {
  it('computes the digest over timestamp, payload, previous digest and nonce', () => {
    const block = new Block('hello', 'abc', 42);
    expect(block.nonce).toBe(0);
    expect(block.digest).toBe(sha256String('42helloabc0'));
  });

  it('exposes its fields', () => {
    const block = new Block('Transaction 0', '0', 1001);
    expect(block.payload).toBe('Transaction 0');
    expect(block.previousDigest).toBe('0');
    expect(block.timestamp).toBe(1001);
  });

  it('defaults the timestamp to the current time in seconds', () => {
    vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_500);
    const block = new Block('p', '0');
    expect(block.timestamp).toBe(1_700_000_000.5);
    expect(block.digest).toBe(sha256String('1700000000.5p00'));
  });

  it('rejects non-finite timestamps', () => {
    expect(thrown(() => new Block('p', '0', Number.NaN)).code).toBe(LedgerErrorCode.INVALID_TIMESTAMP);
    expect(thrown(() => new Block('p', '0', Infinity)).code).toBe(LedgerErrorCode.INVALID_TIMESTAMP);
  });

  it('computeDigest is pure and verifyDigest holds for a fresh block', () => {
    const block = new Block('p', '0', 7);
    const before = block.digest;
    expect(block.computeDigest()).toBe(before);
    expect(block.digest).toBe(before);
    expect(block.verifyDigest()).toBe(true);
  });
});

// ─── Mining ─────────────────────────────────────────────────────────────────────

describe('Block.mine', () => {
  it('finds the first nonce whose digest meets the difficulty', () => {
    const block = new Block('Test PoW', '0', 1234);
    const result = block.mine(2);

    expect(block.digest.startsWith('00')).toBe(true);
    expect(result).toEqual({ nonce: block.nonce, digest: block.digest, iterations: block.nonce });
    expect(block.verifyDigest()).toBe(true);

    for (let n = 0; n < block.nonce; n++) {
      expect(meetsDifficulty(sha256String(`1234Test PoW0${n}`), 2)).toBe(false);
    }
  });

  it('does nothing at difficulty 0', () => {
    const block = new Block('p', '0', 1);
    const digest = block.digest;
    expect(block.mine(0)).toEqual({ nonce: 0, digest, iterations: 0 });
  });

  it('resumes from the current nonce', () => {
    const block = new Block('p', '0', 1);
    const first = block.mine(2);
    const second = block.mine(2);
    expect(second).toEqual({ nonce: first.nonce, digest: first.digest, iterations: 0 });
  });

  it('is deterministic for identical inputs', () => {
    const a = new Block('same', 'prev', 99);
    const b = new Block('same', 'prev', 99);
    expect(a.mine(2)).toEqual(b.mine(2));
  });

  it('never needs fewer nonces at a higher difficulty', () => {
    for (let d = 0; d < 3; d++) {
      const easy = new Block('cost', '0', 1234);
      const hard = new Block('cost', '0', 1234);
      easy.mine(d);
      hard.mine(d + 1);
      expect(hard.nonce).toBeGreaterThanOrEqual(easy.nonce);
    }
  });

  it('rejects unusable difficulties', () => {
    const block = new Block('p', '0', 1);
    expect(thrown(() => block.mine(-1)).code).toBe(LedgerErrorCode.INVALID_DIFFICULTY);
    expect(thrown(() => block.mine(1.5)).code).toBe(LedgerErrorCode.INVALID_DIFFICULTY);
    expect(thrown(() => block.mine(65)).code).toBe(LedgerErrorCode.INVALID_DIFFICULTY);
  });

  it('stops at maxIterations and leaves a consistent block', () => {
    const block = new Block('p', '0', 1);
    const err = thrown(() => block.mine(64, { maxIterations: 5 }));
    expect(err.code).toBe(LedgerErrorCode.MINING_BUDGET_EXHAUSTED);
    expect(err.context).toEqual({ iterations: 5, nonce: 5, difficulty: 64 });
    expect(block.nonce).toBe(5);
    expect(block.verifyDigest()).toBe(true);
  });

  it('stops when shouldAbort returns true', () => {
    const block = new Block('p', '0', 1);
    const seen: number[] = [];
    const err = thrown(() =>
      block.mine(64, {
        shouldAbort: (iterations) => {
          seen.push(iterations);
          return iterations === 3;
        },
      }),
    );
    expect(err.code).toBe(LedgerErrorCode.MINING_BUDGET_EXHAUSTED);
    expect(seen).toEqual([0, 1, 2, 3]);
    expect(block.nonce).toBe(3);
  });

  it('rejects a negative maxIterations', () => {
    const block = new Block('p', '0', 1);
    expect(thrown(() => block.mine(1, { maxIterations: -1 })).code).toBe(LedgerErrorCode.OUT_OF_RANGE);
  });
});

// ─── Mutation ───────────────────────────────────────────────────────────────────

describe('Block.updateData', () => {
  it('replaces the payload, resets the nonce and recomputes without mining', () => {
    const block = new Block('original', 'prev', 10);
    block.mine(2);
    block.updateData('changed');

    expect(block.payload).toBe('changed');
    expect(block.nonce).toBe(0);
    expect(block.digest).toBe(sha256String('10changedprev0'));
    expect(block.verifyDigest()).toBe(true);
  });
});

describe('Block.replacePayload', () => {
  it('replaces the payload under the mined nonce', () => {
    const block = new Block('original', 'prev', 10);
    const { nonce } = block.mine(2);
    block.replacePayload('changed');

    expect(block.payload).toBe('changed');
    expect(block.nonce).toBe(nonce);
    expect(block.digest).toBe(sha256String(`10changedprev${nonce}`));
    expect(block.verifyDigest()).toBe(true);
  });
});

describe('Block.relink', () => {
  it('replaces the predecessor link and resets the nonce', () => {
    const block = new Block('p', 'old', 10);
    block.mine(1);
    block.relink('new');

    expect(block.previousDigest).toBe('new');
    expect(block.nonce).toBe(0);
    expect(block.digest).toBe(sha256String('10pnew0'));
  });
});

// ─── Snapshots ──────────────────────────────────────────────────────────────────

describe('Block snapshots', () => {
  it('toJSON exposes every field', () => {
    const block = new Block('p', '0', 5);
    expect(block.toJSON()).toEqual({
      timestamp: 5,
      payload: 'p',
      previousDigest: '0',
      nonce: 0,
      digest: sha256String('5p00'),
    });
  });

  it('restore keeps a stored digest that does not match the fields', () => {
    const forged = Block.restore({
      timestamp: 5,
      payload: 'p',
      previousDigest: '0',
      nonce: 3,
      digest: 'f'.repeat(64),
    });
    expect(forged.nonce).toBe(3);
    expect(forged.digest).toBe('f'.repeat(64));
    expect(forged.verifyDigest()).toBe(false);
  });

  it('restore rejects a negative nonce', () => {
    const snapshot = new Block('p', '0', 5).toJSON();
    expect(thrown(() => Block.restore({ ...snapshot, nonce: -1 })).code).toBe(LedgerErrorCode.INVALID_INPUT);
  });

  it('clone is independent of the original', () => {
    const original = new Block('p', '0', 5);
    original.mine(1);
    const copy = original.clone();
    expect(copy.toJSON()).toEqual(original.toJSON());

    copy.updateData('other');
    expect(original.payload).toBe('p');
    expect(original.verifyDigest()).toBe(true);
  });

  it('toString shows truncated digests', () => {
    const block = new Block('p', '0', 5);
    expect(block.toString()).toBe(`Block(digest=${block.digest.slice(0, 10)}..., prev=0..., nonce=0, payload=p, ts=5)`);
  });
});

describe('assertDifficulty', () => {
  it('accepts 0 through 64', () => {
    expect(() => assertDifficulty(0)).not.toThrow();
    expect(() => assertDifficulty(64)).not.toThrow();
  });

  it('explains the upper bound', () => {
    const err = thrown(() => assertDifficulty(70));
    expect(err.message).toBe('difficulty must be at most 64, got 70');
  });
});
