import { SpvError } from "@/shared/errors";
import type { Transaction, TxInput, TxOutput } from "@/types/bitcoin";

import { TX_LIMITS } from "../constants";
import { createCursor, type Cursor, type Read, readHash, readUInt32LE, readUInt64LE } from "./ByteReader";
import { readVarInt, readVarSlice } from "./VarInt";

function readScript(cursor: Cursor, maxLength: number, what: string): Read<Buffer> {
  const script = readVarSlice( cursor );
  if ( script.value.length > maxLength ) {
    throw new SpvError( "VarSliceTooLong", `${ what } of ${ script.value.length } bytes exceeds ${ maxLength }` );
  }
  return script;
}

function readInput(cursor: Cursor): Read<TxInput> {
  const hash = readHash( cursor );
  const index = readUInt32LE( hash.next );
  const unlockingScript = readScript( index.next, TX_LIMITS.MAX_UNLOCKING_SCRIPT, "unlocking script" );
  const sequence = readUInt32LE( unlockingScript.next );
  return {
    value: {
      outpoint: { hash: hash.value, index: index.value },
      unlockingScript: unlockingScript.value,
      sequence: sequence.value,
    },
    next: sequence.next,
  };
}

function readOutput(cursor: Cursor): Read<TxOutput> {
  const value = readUInt64LE( cursor );
  const lockingScript = readScript( value.next, TX_LIMITS.MAX_LOCKING_SCRIPT, "locking script" );
  return {
    value: { value: value.value, lockingScript: lockingScript.value },
    next: lockingScript.next,
  };
}

/**
 * Count-prefixed list. The count is checked against the limit before any
 * element is read; the loop itself never runs more than `max` times.
 */
function readList<T>(
  cursor: Cursor,
  max: number,
  code: "TooManyInputs" | "TooManyOutputs",
  readItem: (c: Cursor) => Read<T>,
): Read<T[]> {
  const count = readVarInt( cursor );
  if ( count.value > BigInt( max ) ) {
    throw new SpvError( code, `declared ${ count.value } items, at most ${ max } supported` );
  }
  const items: T[] = [];
  let next = count.next;
  for ( let i = 0; i < Number( count.value ); i++ ) {
    const item = readItem( next );
    items.push( item.value );
    next = item.next;
  }
  return { value: items, next };
}

/**
 * Legacy (non-witness) serialization: version, inputs, outputs, locktime.
 * Bytes after the locktime are not examined.
 */
export function parseTransaction(buffer: Buffer): Transaction {
  const version = readUInt32LE( createCursor( buffer ) );
  const inputs = readList( version.next, TX_LIMITS.MAX_INPUTS, "TooManyInputs", readInput );
  const outputs = readList( inputs.next, TX_LIMITS.MAX_OUTPUTS, "TooManyOutputs", readOutput );
  const locktime = readUInt32LE( outputs.next );

  return {
    version: version.value,
    inputs: inputs.value,
    outputs: outputs.value,
    locktime: locktime.value,
  };
}
