/** Reference to a previously created output. `hash` is in display (big-endian) order. */
export type Outpoint = {
  hash: Buffer;
  index: number;
};

export type TxInput = {
  outpoint: Outpoint;
  unlockingScript: Buffer;
  sequence: number;
};

export type TxOutput = {
  /** satoshis */
  value: bigint;
  lockingScript: Buffer;
};

export type Transaction = {
  version: number;
  inputs: TxInput[];
  outputs: TxOutput[];
  locktime: number;
};

export type BlockHeader = {
  version: number;
  /** display order */
  parentHash: Buffer;
  /** display order */
  merkleRoot: Buffer;
  timestamp: number;
  nbits: number;
  nonce: number;
};

export type MerkleProof = {
  /** 0-based position of the leaf in the block */
  txIndex: number;
  /** sibling hashes in wire (little-endian) order, leaf level first */
  siblingHashes: Buffer[];
  treeDepth: number;
};

/**
 * Trusted, append-only ledger of canonical header hashes keyed by height.
 * Returns the display-order hash, or undefined when the height is unknown.
 */
export interface HeaderHashOracle {
  lookupHeaderHash(height: number): Buffer | undefined;
}
