import { createHash } from "crypto";

import { SpvError } from "@/shared/errors";

import { SIZES } from "../constants";

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

export function sha256d(buffer: Buffer): Buffer {
  const h1 = createHash( "sha256" ).update( buffer ).digest();
  return createHash( "sha256" ).update( h1 ).digest();
}

export function sha256dMany(buffers: Buffer[]): Buffer {
  const h1 = createHash( "sha256" );
  for ( const buf of buffers ) h1.update( buf );
  const first = h1.digest();
  return createHash( "sha256" ).update( first ).digest();
}

/** Bitcoin's canonical hash: SHA-256 applied twice. */
export const doubleSha256 = sha256d;

/** Wire order <-> display order. Always returns a new buffer. */
export function reverseBytes32(hash: Buffer): Buffer {
  if ( hash.length !== SIZES.HASH32 ) {
    throw new SpvError( "OutOfBounds", `expected a 32-byte hash, got ${ hash.length } bytes` );
  }
  return Buffer.from( hash ).reverse();
}

/** Transaction id in display order, as explorers show it. */
export function transactionId(txBytes: Buffer): Buffer {
  return reverseBytes32( sha256d( txBytes ) );
}

/** Transaction id in wire order, the form Merkle proofs are built from. */
export function reversedTransactionId(txBytes: Buffer): Buffer {
  return sha256d( txBytes );
}

/** Block hash in display order. */
export function blockHeaderHash(headerBytes: Buffer): Buffer {
  return reverseBytes32( sha256d( headerBytes ) );
}

export function toHex(buffer: Buffer): string {
  return buffer.toString( "hex" );
}

export function fromHex(hex: string): Buffer {
  const trimmed = hex.trim();
  // Buffer.from(hex) silently stops at the first bad character
  if ( !HEX_PATTERN.test( trimmed ) ) throw new Error( "invalid hex string" );
  return Buffer.from( trimmed, "hex" );
}
