// Bitcoin infrastructure shared constants

// Sizes (bytes)
export const SIZES = {
  UINT8: 1,
  UINT16: 2,
  UINT32: 4,
  UINT64: 8,
  HASH32: 32,
  LOCKTIME: 4,
  BLOCK_HEADER: 80,
} as const;

// Numeric thresholds
export const UINT32_MAX = 0xffffffff;

// VarInt markers (compactSize)
export const VARINT_MARKER = {
  UINT16: 0xfd,
  UINT32: 0xfe,
  UINT64: 0xff,
} as const;

// Transaction limits accepted by the parser
export const TX_LIMITS = {
  MAX_INPUTS: 8,
  MAX_OUTPUTS: 8,
  MAX_UNLOCKING_SCRIPT: 256,
  MAX_LOCKING_SCRIPT: 128,
} as const;

// Merkle proofs carry at most this many sibling hashes (tree depth 12, 4096 txs)
export const MAX_PROOF_HASHES = 12;
