/**
 * @ledgerwork/simulation — scenario builders over in-memory replica sets.
 *
 * Each builder takes all of its parameters explicitly and returns replicas
 * it owns; nothing is shared between calls or between replicas.
 *
 * @packageDocumentation
 */

import { Chain, DEFAULT_DIFFICULTY, DEFAULT_GENESIS_TIMESTAMP } from '@ledgerwork/chain';
import type { Block } from '@ledgerwork/chain';
import {
  LedgerError,
  LedgerErrorCode,
  assertFiniteNumber,
  assertNonNegativeInteger,
  assertPositiveInteger,
} from '@ledgerwork/types';

export type { ScenarioConfig, ResolvedScenarioConfig, Scenario, TamperOptions } from './types';

import type { ScenarioConfig, ResolvedScenarioConfig, Scenario, TamperOptions } from './types';

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_REPLICAS = 5;
export const DEFAULT_BLOCKS = 4;

export const MINOR_CORRUPTION_PAYLOAD = 'Minor corruption';
export const MINOR_CORRUPTION_TIMESTAMP = 2000;
export const MAJOR_CORRUPTION_PAYLOAD = 'Major corruption';
export const MAJOR_CORRUPTION_TIMESTAMP = 3000;
export const TAMPER_PAYLOAD = 'Malicious corruption';

/** Fill in defaults and validate the counts. */
export function resolveScenarioConfig(config: ScenarioConfig = {}): ResolvedScenarioConfig {
  const resolved: ResolvedScenarioConfig = {
    replicas: config.replicas ?? DEFAULT_REPLICAS,
    difficulty: config.difficulty ?? DEFAULT_DIFFICULTY,
    blocks: config.blocks ?? DEFAULT_BLOCKS,
    genesisTimestamp: config.genesisTimestamp ?? DEFAULT_GENESIS_TIMESTAMP,
    logger: config.logger,
    mining: config.mining,
  };
  assertPositiveInteger(resolved.replicas, 'replicas');
  assertNonNegativeInteger(resolved.blocks, 'blocks');
  assertFiniteNumber(resolved.genesisTimestamp, 'genesisTimestamp', LedgerErrorCode.INVALID_TIMESTAMP);
  return resolved;
}

// ─── Building blocks ────────────────────────────────────────────────────────────

/**
 * Build `replicas` chains independently from identical inputs. Block `i`
 * after genesis carries `Transaction i` and timestamp `genesisTimestamp + i + 1`,
 * so every replica ends up with the same digests.
 */
export function simulateReplicas(config?: ScenarioConfig): Chain[] {
  const { replicas, difficulty, blocks, genesisTimestamp, logger, mining } = resolveScenarioConfig(config);
  const chains: Chain[] = [];
  for (let r = 0; r < replicas; r++) {
    const chain = new Chain(difficulty, genesisTimestamp, {
      logger: logger?.child('replica', { replica: r }),
      mining,
    });
    for (let i = 0; i < blocks; i++) {
      chain.addBlock(`Transaction ${i}`, genesisTimestamp + i + 1);
    }
    chains.push(chain);
  }
  return chains;
}

/** Append one mined block to `chain`. */
export function extendReplica(chain: Chain, payload: string, timestamp: number): Block {
  return chain.addBlock(payload, timestamp);
}

/**
 * Overwrite the payload of block `index` without re-mining. The chain is
 * left invalid from `index` (or the block after it) onward.
 */
export function corruptBlock(chain: Chain, index: number, payload: string): Block {
  const block = chain.block(index);
  block.updateData(payload);
  return block;
}

/**
 * Overwrite the payload of block `index` in place: the nonce mined for the
 * old payload stays and only the digest is recomputed.
 */
export function forgeBlock(chain: Chain, index: number, payload: string): Block {
  const block = chain.block(index);
  block.replacePayload(payload);
  return block;
}

/**
 * Edit block `index` and re-mine it and every descendant, producing a valid
 * chain with a different history.
 */
export function rewriteHistory(chain: Chain, index: number, payload: string): Block {
  const block = corruptBlock(chain, index, payload);
  chain.remineFrom(index);
  return block;
}

/**
 * Give every target replica an independent copy of the source replica's
 * history.
 *
 * @throws {LedgerError} `INVALID_INDEX` when any index is out of range.
 */
export function overwriteReplicas(
  replicas: readonly Chain[],
  sourceIndex: number,
  targetIndices: readonly number[],
): void {
  const source = replicaAt(replicas, sourceIndex);
  const targets = targetIndices.map((index) => replicaAt(replicas, index));
  for (const target of targets) {
    if (target !== source) {
      target.overwriteWith(source);
    }
  }
}

function replicaAt(replicas: readonly Chain[], index: number): Chain {
  const chain = Number.isInteger(index) ? replicas[index] : undefined;
  if (chain === undefined) {
    throw new LedgerError(
      LedgerErrorCode.INVALID_INDEX,
      `No replica at index ${index}; set has ${replicas.length} replicas`,
      { context: { index, replicas: replicas.length } },
    );
  }
  return chain;
}

// ─── Scenarios ──────────────────────────────────────────────────────────────────

/** Replica 0 appends one extra block; the others stay untouched. */
export function minorityAttack(config?: ScenarioConfig): Scenario {
  const replicas = simulateReplicas(config);
  extendReplica(replicas[0]!, MINOR_CORRUPTION_PAYLOAD, MINOR_CORRUPTION_TIMESTAMP);
  return { replicas, altered: [0] };
}

/**
 * Replica 0 appends two extra blocks and its history is copied over
 * replicas 1 and 2, giving the attacker three identical votes.
 *
 * @throws {LedgerError} `OUT_OF_RANGE` with fewer than three replicas.
 */
export function majorityAttack(config?: ScenarioConfig): Scenario {
  const resolved = resolveScenarioConfig(config);
  if (resolved.replicas < 3) {
    throw new LedgerError(
      LedgerErrorCode.OUT_OF_RANGE,
      `majority attack needs at least 3 replicas, got ${resolved.replicas}`,
      { context: { replicas: resolved.replicas } },
    );
  }
  const { replicas } = minorityAttack(resolved);
  extendReplica(replicas[0]!, MAJOR_CORRUPTION_PAYLOAD, MAJOR_CORRUPTION_TIMESTAMP);
  overwriteReplicas(replicas, 0, [1, 2]);
  return { replicas, altered: [0, 1, 2] };
}

/**
 * Edit one block of one replica. Without `remine` the payload is swapped
 * under the existing nonce and the replica fails validation; with it the
 * replica is valid but its root leaves the majority.
 */
export function tamperScenario(config?: ScenarioConfig, options: TamperOptions = {}): Scenario {
  const replicas = simulateReplicas(config);
  const replicaIndex = options.replica ?? 0;
  const chain = replicaAt(replicas, replicaIndex);
  const index = options.index ?? Math.min(2, chain.length - 1);
  const payload = options.payload ?? TAMPER_PAYLOAD;

  if (options.remine === true) {
    rewriteHistory(chain, index, payload);
  } else {
    forgeBlock(chain, index, payload);
  }
  return { replicas, altered: [replicaIndex] };
}
