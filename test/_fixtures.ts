import { createHash } from "crypto";

import { Raw } from "@/infrastructure/bitcoin";
import type { BlockHeader } from "@/types/bitcoin";

export const GENESIS_HEADER_HEX =
  "01000000" +
  "0000000000000000000000000000000000000000000000000000000000000000" +
  "3ba3edfd7a7b12b27ac72c3e67768f617fc81bc3888a51323a9fb8aa4b1e5e4a" +
  "29ab5f49" +
  "ffff001d" +
  "1dac2b7c";
export const GENESIS_HASH_HEX = "000000000019d6689c085ae165831e934ff763ae46a2a6c172b3f1b60a8ce26f";
export const GENESIS_MERKLE_ROOT_HEX = "4a5e1e4baab89f3a32518a88c31bc87f618f76673e2cc77ab2127b7afdeda33b";

export function hexToBuf(hex: string): Buffer {
  return Buffer.from( hex, "hex" );
}

/** Independent double SHA-256, so tests do not check the library against itself. */
export function dsha(...parts: Buffer[]): Buffer {
  const first = createHash( "sha256" ).update( Buffer.concat( parts ) ).digest();
  return createHash( "sha256" ).update( first ).digest();
}

export type InputFields = { hash?: Buffer; index?: number; script?: Buffer; sequence?: number };
export type OutputFields = { value?: bigint; script?: Buffer };
export type TxFields = { version?: number; inputs?: InputFields[]; outputs?: OutputFields[]; locktime?: number };

function u32(n: number): Buffer {
  const b = Buffer.alloc( 4 );
  b.writeUInt32LE( n, 0 );
  return b;
}

function u64(n: bigint): Buffer {
  const b = Buffer.alloc( 8 );
  b.writeBigUInt64LE( n, 0 );
  return b;
}

/** Legacy serialization. Input hashes are written exactly as given (wire order). */
export function buildTx(fields: TxFields = {}): Buffer {
  const inputs = fields.inputs ?? [ {} ];
  const outputs = fields.outputs ?? [ {} ];
  const parts: Buffer[] = [ u32( fields.version ?? 1 ), Raw.encodeVarInt( inputs.length ) ];
  for ( const input of inputs ) {
    const script = input.script ?? Buffer.from( [ 0x51 ] );
    parts.push(
      input.hash ?? Buffer.alloc( 32, 0xaa ),
      u32( input.index ?? 0 ),
      Raw.encodeVarInt( script.length ),
      script,
      u32( input.sequence ?? 0xffffffff ),
    );
  }
  parts.push( Raw.encodeVarInt( outputs.length ) );
  for ( const output of outputs ) {
    const script = output.script ?? Buffer.from( [ 0x6a ] );
    parts.push( u64( output.value ?? 5000n ), Raw.encodeVarInt( script.length ), script );
  }
  parts.push( u32( fields.locktime ?? 0 ) );
  return Buffer.concat( parts );
}

export function makeHeader(merkleRootDisplay: Buffer, overrides: Partial<BlockHeader> = {}): BlockHeader {
  return {
    version: 0x20000000,
    parentHash: Buffer.alloc( 32, 0x11 ),
    merkleRoot: merkleRootDisplay,
    timestamp: 1_700_000_000,
    nbits: 0x1d00ffff,
    nonce: 42,
    ...overrides,
  };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch ( err ) {
    return err;
  }
  throw new Error( "expected function to throw" );
}
