/**
 * Append-only proof-of-work chain.
 *
 * Every block after genesis links to its predecessor's digest and carries a
 * digest with `difficulty` leading zero hex digits. Any edit to a block that
 * is not followed by re-mining it and every descendant is caught by
 * {@link Chain.isValid}.
 *
 * @packageDocumentation
 */

import { meetsDifficulty } from '@ledgerwork/crypto';
import type { HashHex } from '@ledgerwork/crypto';
import {
  LedgerError,
  LedgerErrorCode,
  assertFiniteNumber,
  createSilentLogger,
} from '@ledgerwork/types';
import type { Logger } from '@ledgerwork/types';

import { Block, assertDifficulty, nowSeconds } from './block';
import type {
  ChainOptions,
  ChainSnapshot,
  ChainValidity,
  MiningOptions,
  MiningResult,
} from './types';

/** Payload of every genesis block. */
export const GENESIS_PAYLOAD = 'Genesis Block';

/** Predecessor link of every genesis block. */
export const GENESIS_PREVIOUS_DIGEST = '0';

export const DEFAULT_DIFFICULTY = 3;

export const DEFAULT_GENESIS_TIMESTAMP = 1000;

/**
 * An ordered, append-only sequence of mined blocks.
 *
 * Usage:
 * ```ts
 * const chain = new Chain(3, 1000);
 * chain.addBlock('Transaction 0', 1001);
 * chain.addBlock('Transaction 1', 1002);
 *
 * chain.isValid(); // { valid: true }
 * chain.block(1).updateData('forged');
 * chain.isValid(); // { valid: false, brokenAt: 1, reason: 'difficulty' } (typically)
 * ```
 */
export class Chain {
  private _difficulty: number;
  private chain: Block[];
  private logger: Logger;
  private readonly mining: MiningOptions | undefined;

  /**
   * @param difficulty - Required leading zero hex digits per block digest.
   * @param genesisTimestamp - Timestamp of the genesis block, mined immediately.
   * @throws {LedgerError} `INVALID_DIFFICULTY` or `INVALID_TIMESTAMP` for
   *   malformed arguments.
   */
  constructor(
    difficulty: number = DEFAULT_DIFFICULTY,
    genesisTimestamp: number = DEFAULT_GENESIS_TIMESTAMP,
    options?: ChainOptions,
  ) {
    assertDifficulty(difficulty);
    assertFiniteNumber(genesisTimestamp, 'genesisTimestamp', LedgerErrorCode.INVALID_TIMESTAMP);
    this._difficulty = difficulty;
    this.logger = options?.logger ?? createSilentLogger('chain');
    this.mining = options?.mining;
    this.chain = [];
    this.chain.push(this.createGenesis(genesisTimestamp));
  }

  /**
   * Build a chain around existing blocks without mining or validating them.
   * The blocks are copied; the caller's instances are never shared.
   *
   * @throws {LedgerError} `INVALID_INPUT` when `blocks` is empty.
   */
  static fromBlocks(difficulty: number, blocks: readonly Block[], options?: ChainOptions): Chain {
    assertDifficulty(difficulty);
    const first = blocks[0];
    if (first === undefined) {
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, 'A chain needs at least one block', {
        hint: 'Pass the genesis block as the first element.',
      });
    }
    // Difficulty 0 makes the throwaway genesis free to mine; it is not logged.
    const chain = new Chain(0, first.timestamp, { mining: options?.mining });
    chain._difficulty = difficulty;
    chain.logger = options?.logger ?? chain.logger;
    chain.chain = blocks.map((block) => block.clone());
    return chain;
  }

  /** Rebuild a chain from {@link Chain.toJSON} output. */
  static restore(snapshot: ChainSnapshot, options?: ChainOptions): Chain {
    return Chain.fromBlocks(snapshot.difficulty, snapshot.blocks.map((b) => Block.restore(b)), options);
  }

  get difficulty(): number {
    return this._difficulty;
  }

  get length(): number {
    return this.chain.length;
  }

  /**
   * Build and mine the genesis block: fixed payload, `"0"` predecessor.
   * Called once by the constructor; does not append.
   */
  createGenesis(timestamp: number): Block {
    const genesis = new Block(GENESIS_PAYLOAD, GENESIS_PREVIOUS_DIGEST, timestamp);
    const result = genesis.mine(this._difficulty, this.mining);
    this.logMined(0, result);
    return genesis;
  }

  /**
   * Mine a new block linked to the current tail and append it.
   *
   * @param timestamp - Defaults to the current time in seconds; pass one
   *   explicitly for reproducible digests.
   * @returns The appended block.
   */
  addBlock(payload: string, timestamp?: number): Block {
    const block = new Block(payload, this.tail().digest, timestamp ?? nowSeconds());
    const result = block.mine(this._difficulty, this.mining);
    this.chain.push(block);
    this.logMined(this.chain.length - 1, result);
    return block;
  }

  /**
   * Check every block after genesis, in order: stored digest matches its
   * fields, predecessor link matches, digest meets the difficulty. Stops at
   * the first failure.
   */
  isValid(): ChainValidity {
    for (let i = 1; i < this.chain.length; i++) {
      const current = this.chain[i]!;
      const previous = this.chain[i - 1]!;

      if (!current.verifyDigest()) {
        return { valid: false, brokenAt: i, reason: 'digest' };
      }
      if (current.previousDigest !== previous.digest) {
        return { valid: false, brokenAt: i, reason: 'link' };
      }
      if (!meetsDifficulty(current.digest, this._difficulty)) {
        return { valid: false, brokenAt: i, reason: 'difficulty' };
      }
    }
    return { valid: true };
  }

  /** All blocks as a frozen array. The blocks themselves are live. */
  blocks(): readonly Block[] {
    return Object.freeze([...this.chain]);
  }

  /**
   * The block at `index`.
   *
   * @throws {LedgerError} `INVALID_INDEX` when out of range.
   */
  block(index: number): Block {
    const block = Number.isInteger(index) ? this.chain[index] : undefined;
    if (block === undefined) {
      throw new LedgerError(
        LedgerErrorCode.INVALID_INDEX,
        `No block at index ${index}; chain has ${this.chain.length} blocks`,
        { context: { index, length: this.chain.length } },
      );
    }
    return block;
  }

  latest(): Block {
    return this.tail();
  }

  /** Block digests in chain order, the leaves of the chain's Merkle tree. */
  digests(): HashHex[] {
    return this.chain.map((block) => block.digest);
  }

  /**
   * Re-mine the block at `index`, then relink and re-mine every descendant
   * so the chain satisfies its invariant again after an edit.
   *
   * @returns One mining result per re-mined block, starting at `index`.
   */
  remineFrom(index: number): MiningResult[] {
    this.block(index);
    const results: MiningResult[] = [];
    for (let i = index; i < this.chain.length; i++) {
      const block = this.chain[i]!;
      if (i > 0) {
        block.relink(this.chain[i - 1]!.digest);
      }
      const result = block.mine(this._difficulty, this.mining);
      this.logMined(i, result);
      results.push(result);
    }
    return results;
  }

  /** Deep copy sharing no blocks with this chain. */
  clone(): Chain {
    return Chain.fromBlocks(this._difficulty, this.chain, {
      logger: this.logger,
      mining: this.mining,
    });
  }

  /**
   * Replace this chain's history with an independent copy of `source`'s.
   *
   * @throws {LedgerError} `DIFFICULTY_MISMATCH` when the difficulties differ.
   */
  overwriteWith(source: Chain): void {
    if (source._difficulty !== this._difficulty) {
      throw new LedgerError(
        LedgerErrorCode.DIFFICULTY_MISMATCH,
        `Cannot overwrite a difficulty ${this._difficulty} chain with a difficulty ${source._difficulty} chain`,
        { context: { target: this._difficulty, source: source._difficulty } },
      );
    }
    this.chain = source.chain.map((block) => block.clone());
  }

  toJSON(): ChainSnapshot {
    return {
      difficulty: this._difficulty,
      blocks: this.chain.map((block) => block.toJSON()),
    };
  }

  private tail(): Block {
    return this.chain[this.chain.length - 1]!;
  }

  private logMined(index: number, result: MiningResult): void {
    this.logger.debug('block mined', {
      index,
      nonce: result.nonce,
      iterations: result.iterations,
      digest: result.digest,
      difficulty: this._difficulty,
    });
  }
}
