import { SpvError } from "@/shared/errors";
import type { BlockHeader } from "@/types/bitcoin";

import { SIZES, UINT32_MAX } from "../constants";
import { createCursor, readHash, readUInt32LE } from "./ByteReader";

/**
 * Decode an 80-byte header. Field widths are fixed and sum to 80, so once the
 * length check passes no field read can fail.
 */
export function parseBlockHeader(buffer: Buffer): BlockHeader {
  if ( buffer.length !== SIZES.BLOCK_HEADER ) {
    throw new SpvError( "BadHeader", `block header must be ${ SIZES.BLOCK_HEADER } bytes, got ${ buffer.length }` );
  }
  const version = readUInt32LE( createCursor( buffer ) );
  const parentHash = readHash( version.next );
  const merkleRoot = readHash( parentHash.next );
  const timestamp = readUInt32LE( merkleRoot.next );
  const nbits = readUInt32LE( timestamp.next );
  const nonce = readUInt32LE( nbits.next );

  return {
    version: version.value,
    parentHash: parentHash.value,
    merkleRoot: merkleRoot.value,
    timestamp: timestamp.value,
    nbits: nbits.value,
    nonce: nonce.value,
  };
}

function assertUInt32(name: string, value: number): void {
  if ( !Number.isInteger( value ) || value < 0 || value > UINT32_MAX ) {
    throw new SpvError( "BadHeader", `${ name } is not a uint32: ${ value }` );
  }
}

function assertHash(name: string, value: Buffer): void {
  if ( value.length !== SIZES.HASH32 ) {
    throw new SpvError( "BadHeader", `${ name } must be ${ SIZES.HASH32 } bytes, got ${ value.length }` );
  }
}

/**
 * Rebuild the serialized header from its fields; `parseBlockHeader` of the
 * result yields the same fields back.
 */
export function serializeBlockHeader(header: BlockHeader): Buffer {
  assertUInt32( "version", header.version );
  assertHash( "parentHash", header.parentHash );
  assertHash( "merkleRoot", header.merkleRoot );
  assertUInt32( "timestamp", header.timestamp );
  assertUInt32( "nbits", header.nbits );
  assertUInt32( "nonce", header.nonce );

  const out = Buffer.alloc( SIZES.BLOCK_HEADER );
  let offset = out.writeUInt32LE( header.version, 0 );
  offset += Buffer.from( header.parentHash ).reverse().copy( out, offset );
  offset += Buffer.from( header.merkleRoot ).reverse().copy( out, offset );
  offset = out.writeUInt32LE( header.timestamp, offset );
  offset = out.writeUInt32LE( header.nbits, offset );
  out.writeUInt32LE( header.nonce, offset );
  return out;
}
