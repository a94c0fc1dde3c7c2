import { describe, it, expect } from 'vitest';
import {
  sha256,
  sha256String,
  toHex,
  leadingZeroDigits,
  meetsDifficulty,
  difficultyTarget,
  DIGEST_HEX_LENGTH,
} from './index';

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------
describe('sha256String', () => {
  it('matches the published SHA-256 vector for the empty string', () => {
    expect(sha256String('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('matches the published SHA-256 vector for "abc"', () => {
    expect(sha256String('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('matches the published SHA-256 vector for "hello"', () => {
    expect(sha256String('hello')).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  it('always returns 64 lowercase hex characters', () => {
    for (const input of ['', 'a', 'Genesis Block', 'été', 'x'.repeat(1000)]) {
      const digest = sha256String(input);
      expect(digest).toHaveLength(DIGEST_HEX_LENGTH);
      expect(digest).toMatch(/^[0-9a-f]{64}$/);
    }
  });

  it('is deterministic', () => {
    expect(sha256String('Transaction 0')).toBe(sha256String('Transaction 0'));
  });

  it('encodes non-ASCII input as UTF-8', () => {
    expect(sha256String('é')).toBe(sha256(new Uint8Array([0xc3, 0xa9])));
  });
});

describe('sha256', () => {
  it('agrees with sha256String on the same bytes', () => {
    expect(sha256(new TextEncoder().encode('abc'))).toBe(sha256String('abc'));
  });
});

// ---------------------------------------------------------------------------
// Hex codec
// ---------------------------------------------------------------------------
describe('toHex', () => {
  it('encodes bytes with zero padding', () => {
    expect(toHex(new Uint8Array([0, 1, 15, 16, 255]))).toBe('00010f10ff');
  });

  it('encodes zero bytes as the empty string', () => {
    expect(toHex(new Uint8Array(0))).toBe('');
  });
});

// ---------------------------------------------------------------------------
// Proof-of-work helpers
// ---------------------------------------------------------------------------
describe('leadingZeroDigits', () => {
  it('counts leading zeros', () => {
    expect(leadingZeroDigits('000a0')).toBe(3);
    expect(leadingZeroDigits('a000')).toBe(0);
    expect(leadingZeroDigits('0000')).toBe(4);
    expect(leadingZeroDigits('')).toBe(0);
  });
});

describe('meetsDifficulty', () => {
  const digest = '00' + 'f'.repeat(62);

  it('accepts difficulty up to the number of leading zeros', () => {
    expect(meetsDifficulty(digest, 0)).toBe(true);
    expect(meetsDifficulty(digest, 1)).toBe(true);
    expect(meetsDifficulty(digest, 2)).toBe(true);
  });

  it('rejects higher difficulty', () => {
    expect(meetsDifficulty(digest, 3)).toBe(false);
  });

  it('rejects difficulty longer than the digest', () => {
    expect(meetsDifficulty('00', 3)).toBe(false);
  });

  it('counts a digest made only of zeros', () => {
    expect(meetsDifficulty('0000', 4)).toBe(true);
    expect(meetsDifficulty('0000', 5)).toBe(false);
  });

  it('agrees with difficultyTarget prefix matching', () => {
    for (let d = 0; d <= 4; d++) {
      expect(meetsDifficulty(digest, d)).toBe(digest.startsWith(difficultyTarget(d)));
    }
  });
});
