import { SpvError } from "@/shared/errors";

import { SIZES } from "../constants";

/**
 * Read position over an immutable buffer. Readers never move a cursor in place;
 * each one hands back the value together with the cursor that follows it.
 */
export type Cursor = {
  readonly buffer: Buffer;
  readonly offset: number;
};

export type Read<T> = {
  value: T;
  next: Cursor;
};

function isIndex(n: number): boolean {
  return Number.isSafeInteger( n ) && n >= 0;
}

export function createCursor(buffer: Buffer, offset = 0): Cursor {
  if ( !isIndex( offset ) || offset > buffer.length ) {
    throw new SpvError( "OutOfBounds", `cursor offset ${ offset } outside buffer of ${ buffer.length } bytes` );
  }
  return { buffer, offset };
}

export function remaining(cursor: Cursor): number {
  return cursor.buffer.length - cursor.offset;
}

/**
 * Copy of `buffer[offset, offset + size)`. The end may equal the buffer length;
 * one byte further is out of bounds.
 */
export function readSlice(buffer: Buffer, offset: number, size: number): Buffer {
  if ( !isIndex( offset ) || !isIndex( size ) || offset + size > buffer.length ) {
    throw new SpvError( "OutOfBounds", `readSlice out of range (offset ${ offset }, size ${ size }, length ${ buffer.length })` );
  }
  return Buffer.from( buffer.subarray( offset, offset + size ) );
}

export function readBytes(cursor: Cursor, size: number): Read<Buffer> {
  const value = readSlice( cursor.buffer, cursor.offset, size );
  return { value, next: { buffer: cursor.buffer, offset: cursor.offset + size } };
}

function ensureAvailable(cursor: Cursor, size: number, what: string): void {
  if ( cursor.offset + size > cursor.buffer.length ) {
    throw new SpvError( "OutOfBounds", `${ what } out of range at offset ${ cursor.offset }` );
  }
}

function advance(cursor: Cursor, size: number): Cursor {
  return { buffer: cursor.buffer, offset: cursor.offset + size };
}

export function readUInt8(cursor: Cursor): Read<number> {
  ensureAvailable( cursor, SIZES.UINT8, "readUInt8" );
  return { value: cursor.buffer.readUInt8( cursor.offset ), next: advance( cursor, SIZES.UINT8 ) };
}

export function readUInt16LE(cursor: Cursor): Read<number> {
  ensureAvailable( cursor, SIZES.UINT16, "readUInt16LE" );
  return { value: cursor.buffer.readUInt16LE( cursor.offset ), next: advance( cursor, SIZES.UINT16 ) };
}

export function readUInt32LE(cursor: Cursor): Read<number> {
  ensureAvailable( cursor, SIZES.UINT32, "readUInt32LE" );
  return { value: cursor.buffer.readUInt32LE( cursor.offset ), next: advance( cursor, SIZES.UINT32 ) };
}

export function readUInt64LE(cursor: Cursor): Read<bigint> {
  // BigInt keeps the full 64 bits; output values and CompactSize payloads can exceed 2^53
  ensureAvailable( cursor, SIZES.UINT64, "readUInt64LE" );
  const lo = BigInt( cursor.buffer.readUInt32LE( cursor.offset ) );
  const hi = BigInt( cursor.buffer.readUInt32LE( cursor.offset + 4 ) );
  return { value: (hi << 32n) | lo, next: advance( cursor, SIZES.UINT64 ) };
}

/** 32 bytes in wire order, returned reversed into display order. */
export function readHash(cursor: Cursor): Read<Buffer> {
  const { value, next } = readBytes( cursor, SIZES.HASH32 );
  return { value: value.reverse(), next };
}
