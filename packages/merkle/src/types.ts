import type { HashHex } from '@ledgerwork/crypto';

/** Which side of the running hash a sibling is concatenated on. */
export type SiblingSide = 'left' | 'right';

/** One step of an inclusion proof, from the leaf level upward. */
export interface MerkleProofStep {
  sibling: HashHex;
  side: SiblingSide;
}

/** Inclusion proof for the leaf at `index`. */
export interface MerkleProof {
  index: number;
  leafCount: number;
  path: MerkleProofStep[];
}
