import { SpvError } from "@/shared/errors";

import { VARINT_MARKER } from "../constants";
import {
  type Cursor,
  type Read,
  readBytes,
  readUInt16LE,
  readUInt32LE,
  readUInt64LE,
  readUInt8,
  remaining,
} from "./ByteReader";

/**
 * CompactSize: one prefix byte, optionally followed by a 2, 4 or 8 byte
 * little-endian payload. Non-minimal encodings are accepted as written.
 */
export function readVarInt(cursor: Cursor): Read<bigint> {
  const first = readUInt8( cursor );
  if ( first.value < VARINT_MARKER.UINT16 ) return { value: BigInt( first.value ), next: first.next };
  if ( first.value === VARINT_MARKER.UINT16 ) {
    const { value, next } = readUInt16LE( first.next );
    return { value: BigInt( value ), next };
  }
  if ( first.value === VARINT_MARKER.UINT32 ) {
    const { value, next } = readUInt32LE( first.next );
    return { value: BigInt( value ), next };
  }
  return readUInt64LE( first.next );
}

/**
 * Length-prefixed bytes. The slice is exactly as long as the declared length;
 * enforcing a maximum is up to the caller.
 */
export function readVarSlice(cursor: Cursor): Read<Buffer> {
  const length = readVarInt( cursor );
  const available = remaining( length.next );
  if ( length.value > BigInt( available ) ) {
    throw new SpvError( "OutOfBounds", `var slice of ${ length.value } bytes exceeds the ${ available } remaining` );
  }
  return readBytes( length.next, Number( length.value ) );
}

/** Minimal CompactSize encoding of a uint64. */
export function encodeVarInt(value: number | bigint): Buffer {
  const v = BigInt( value );
  if ( v < 0n || v > 0xffffffffffffffffn ) throw new RangeError( `varint out of range: ${ v }` );
  if ( v < BigInt( VARINT_MARKER.UINT16 ) ) return Buffer.from( [ Number( v ) ] );
  if ( v <= 0xffffn ) {
    const out = Buffer.alloc( 3 );
    out[0] = VARINT_MARKER.UINT16;
    out.writeUInt16LE( Number( v ), 1 );
    return out;
  }
  if ( v <= 0xffffffffn ) {
    const out = Buffer.alloc( 5 );
    out[0] = VARINT_MARKER.UINT32;
    out.writeUInt32LE( Number( v ), 1 );
    return out;
  }
  const out = Buffer.alloc( 9 );
  out[0] = VARINT_MARKER.UINT64;
  out.writeBigUInt64LE( v, 1 );
  return out;
}
