import type { ChainValidity } from '@ledgerwork/chain';
import type { HashHex } from '@ledgerwork/crypto';
import type { Logger } from '@ledgerwork/types';

/** Per-replica outcome of a root comparison. */
export interface ReplicaVerdict {
  /** Position of the replica in the compared collection. */
  index: number;
  /** Merkle root over the replica's block digests. */
  root: HashHex;
  validity: ChainValidity;
  matchesMajority: boolean;
  /** True iff the replica is valid and its root equals the majority root. */
  accepted: boolean;
}

/** Result of comparing a replica set. */
export interface RootComparison {
  replicas: ReplicaVerdict[];
  majorityRoot: HashHex;
  majorityCount: number;
  /** Indices of accepted replicas, ascending. */
  accepted: number[];
  /** Indices of rejected replicas, ascending. */
  rejected: number[];
}

/** Most frequent root and how many replicas share it. */
export interface MajorityRoot {
  root: HashHex;
  count: number;
}

/** Pairwise comparison of two chains. */
export interface ChainDiff {
  /** Indices within the shared prefix where block digests differ. */
  differingIndices: number[];
  lengthA: number;
  lengthB: number;
  lengthMismatch: boolean;
  rootA: HashHex;
  rootB: HashHex;
  /** Equal roots and equal lengths. */
  identical: boolean;
}

export interface CompareOptions {
  /** Receives a WARN entry per rejected replica. Defaults to a silent logger. */
  logger?: Logger;
}
