export {
  createCursor,
  readBytes,
  readHash,
  readSlice,
  readUInt16LE,
  readUInt32LE,
  readUInt64LE,
  readUInt8,
  remaining,
  type Cursor,
  type Read,
} from "./ByteReader";
export { encodeVarInt, readVarInt, readVarSlice } from "./VarInt";
export {
  blockHeaderHash,
  doubleSha256,
  fromHex,
  reverseBytes32,
  reversedTransactionId,
  sha256d,
  sha256dMany,
  toHex,
  transactionId,
} from "./Hash";
export { parseTransaction } from "./TxParser";
export { parseBlockHeader, serializeBlockHeader } from "./HeaderParser";
export { buildMerkleProof, computeMerkleRoot, verifyMerkleProof } from "./MerkleProof";
