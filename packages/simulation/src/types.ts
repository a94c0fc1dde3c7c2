import type { Chain, MiningOptions } from '@ledgerwork/chain';
import type { Logger } from '@ledgerwork/types';

/** Parameters of a replica set. Omitted fields take the defaults. */
export interface ScenarioConfig {
  /** Number of independent replicas. Default 5. */
  replicas?: number;
  /** Chain difficulty. Default 3. */
  difficulty?: number;
  /** Blocks appended after genesis. Default 4. */
  blocks?: number;
  /** Genesis timestamp; block i is stamped `genesisTimestamp + i + 1`. Default 1000. */
  genesisTimestamp?: number;
  /** Passed to every chain; receives a DEBUG entry per mined block. */
  logger?: Logger;
  mining?: MiningOptions;
}

export type ResolvedScenarioConfig = Required<Omit<ScenarioConfig, 'logger' | 'mining'>> &
  Pick<ScenarioConfig, 'logger' | 'mining'>;

/** Replica set produced by a scenario, with the replicas it tampered with. */
export interface Scenario {
  replicas: Chain[];
  /** Indices of replicas whose history the scenario altered, ascending. */
  altered: number[];
}

/** Where and how {@link tamperScenario} edits a replica. */
export interface TamperOptions {
  /** Replica to edit. Default 0. */
  replica?: number;
  /** Block to edit. Default 2. */
  index?: number;
  /** Replacement payload. Default `"Malicious corruption"`. */
  payload?: string;
  /** Re-mine the edited block and its descendants after the edit. Default false. */
  remine?: boolean;
}
