import { SpvError } from "@/shared/errors";
import type { MerkleProof } from "@/types/bitcoin";

import { MAX_PROOF_HASHES, SIZES } from "../constants";
import { sha256dMany } from "./Hash";

type WalkState = {
  currentHash: Buffer;
  verified: boolean;
};

function isBitSet(value: number, bit: number): boolean {
  // value may exceed 2^31, so stay out of 32-bit bitwise operators
  return Math.floor( value / 2 ** bit ) % 2 === 1;
}

function checkProofShape(proof: MerkleProof): void {
  if ( proof.treeDepth > proof.siblingHashes.length ) {
    throw new SpvError( "ProofTooShort", `tree depth ${ proof.treeDepth } needs more than ${ proof.siblingHashes.length } hashes` );
  }
  if ( !Number.isSafeInteger( proof.treeDepth ) || proof.treeDepth < 0 ) {
    throw new SpvError( "InvalidProof", `tree depth must be a non-negative integer, got ${ proof.treeDepth }` );
  }
  if ( !Number.isSafeInteger( proof.txIndex ) || proof.txIndex < 0 ) {
    throw new SpvError( "InvalidProof", `tx index must be a non-negative integer, got ${ proof.txIndex }` );
  }
  if ( proof.siblingHashes.length > MAX_PROOF_HASHES ) {
    throw new SpvError( "InvalidProof", `proof carries ${ proof.siblingHashes.length } hashes, at most ${ MAX_PROOF_HASHES } allowed` );
  }
  proof.siblingHashes.forEach( (hash, i) => {
    if ( hash.length !== SIZES.HASH32 ) {
      throw new SpvError( "InvalidProof", `sibling hash ${ i } is ${ hash.length } bytes` );
    }
  } );
}

function step(state: WalkState, i: number, root: Buffer, proof: MerkleProof): WalkState {
  if ( state.verified || i >= proof.treeDepth ) return state;
  const sibling = proof.siblingHashes[i];
  // bit set: current node is the right child
  const [ left, right ] = isBitSet( proof.txIndex, i ) ? [ sibling, state.currentHash ] : [ state.currentHash, sibling ];
  const next = sha256dMany( [ left, right ] );
  return {
    currentHash: next,
    verified: i + 1 === proof.siblingHashes.length && next.equals( root ),
  };
}

/**
 * Walk a Merkle branch from a leaf up to the root. All hashes are in wire order.
 *
 * The leaf position is encoded as `2^treeDepth + txIndex`; bit `i` picks the
 * side of the running hash at level `i`. Below `treeDepth` those are the bits
 * of `txIndex`, so they are read from it without forming the sum. The proof
 * verifies only when the last supplied sibling produces the root. A
 * zero-depth proof (single transaction block) verifies when no siblings are
 * given and the txid is the root itself.
 *
 * @throws SpvError `ProofTooShort` when `treeDepth` exceeds the sibling count,
 *   `InvalidProof` for other malformed proofs
 */
export function verifyMerkleProof(reversedTxid: Buffer, merkleRoot: Buffer, proof: MerkleProof): boolean {
  checkProofShape( proof );
  if ( proof.treeDepth === 0 ) {
    return proof.siblingHashes.length === 0 && reversedTxid.equals( merkleRoot );
  }

  let state: WalkState = { currentHash: reversedTxid, verified: false };
  for ( let i = 0; i < MAX_PROOF_HASHES; i++ ) {
    state = step( state, i, merkleRoot, proof );
  }
  return state.verified;
}

function nextLevel(level: Buffer[]): Buffer[] {
  const out: Buffer[] = [];
  for ( let i = 0; i < level.length; i += 2 ) {
    // odd count: the last node is paired with itself
    const right = i + 1 < level.length ? level[i + 1] : level[i];
    out.push( sha256dMany( [ level[i], right ] ) );
  }
  return out;
}

/** Merkle root over wire-order txids, in wire order. */
export function computeMerkleRoot(txids: Buffer[]): Buffer {
  if ( txids.length === 0 ) throw new RangeError( "cannot compute the merkle root of an empty block" );
  let level = txids;
  while ( level.length > 1 ) level = nextLevel( level );
  return Buffer.from( level[0] );
}

/** Inclusion proof for `txids[txIndex]` that `verifyMerkleProof` accepts. */
export function buildMerkleProof(txids: Buffer[], txIndex: number): MerkleProof {
  if ( !Number.isInteger( txIndex ) || txIndex < 0 || txIndex >= txids.length ) {
    throw new RangeError( `tx index ${ txIndex } outside block of ${ txids.length } transactions` );
  }
  const siblingHashes: Buffer[] = [];
  let level = txids;
  let index = txIndex;
  while ( level.length > 1 ) {
    const sibling = index ^ 1;
    siblingHashes.push( Buffer.from( sibling < level.length ? level[sibling] : level[index] ) );
    level = nextLevel( level );
    index = Math.floor( index / 2 );
  }
  return { txIndex, siblingHashes, treeDepth: siblingHashes.length };
}
