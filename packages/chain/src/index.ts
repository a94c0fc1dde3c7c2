/**
 * @ledgerwork/chain — proof-of-work blocks and the append-only chain.
 *
 * @packageDocumentation
 */

export { Block, assertDifficulty, nowSeconds } from './block';
export {
  Chain,
  GENESIS_PAYLOAD,
  GENESIS_PREVIOUS_DIGEST,
  DEFAULT_DIFFICULTY,
  DEFAULT_GENESIS_TIMESTAMP,
} from './chain';

export type {
  BlockSnapshot,
  ChainOptions,
  ChainSnapshot,
  ChainValidity,
  MiningOptions,
  MiningResult,
  ViolationKind,
} from './types';
