import { describe, expect, test } from "vitest";

import { Raw } from "@/infrastructure/bitcoin";
import { isSpvError } from "@/shared/errors";

import { buildTx, catchError, hexToBuf } from "./_fixtures";

describe("parseTransaction", () => {
  test("decodes every field of a one-in one-out transaction", () => {
    const wireHash = Buffer.from( Array.from( { length: 32 }, (_, i) => i ) );
    const raw = buildTx( {
      version: 2,
      inputs: [ { hash: wireHash, index: 3, script: hexToBuf( "00aabb" ), sequence: 0xfffffffe } ],
      outputs: [ { value: 0xffffffffffffffffn, script: hexToBuf( "76a914" ) } ],
      locktime: 800_000,
    } );
    const tx = Raw.parseTransaction( raw );

    expect( tx.version ).toBe( 2 );
    expect( tx.inputs.length ).toBe( 1 );
    expect( tx.inputs[0].outpoint.hash.toString( "hex" ) ).toBe( Buffer.from( wireHash ).reverse().toString( "hex" ) );
    expect( tx.inputs[0].outpoint.index ).toBe( 3 );
    expect( tx.inputs[0].unlockingScript.toString( "hex" ) ).toBe( "00aabb" );
    expect( tx.inputs[0].sequence ).toBe( 0xfffffffe );
    expect( tx.outputs.length ).toBe( 1 );
    expect( tx.outputs[0].value ).toBe( 0xffffffffffffffffn );
    expect( tx.outputs[0].lockingScript.toString( "hex" ) ).toBe( "76a914" );
    expect( tx.locktime ).toBe( 800_000 );
  });

  test("accepts exactly 8 inputs and 8 outputs", () => {
    const raw = buildTx( {
      inputs: Array.from( { length: 8 }, (_, i) => ({ index: i }) ),
      outputs: Array.from( { length: 8 }, (_, i) => ({ value: BigInt( i ) }) ),
    } );
    const tx = Raw.parseTransaction( raw );
    expect( tx.inputs.map( (i) => i.outpoint.index ) ).toEqual( [ 0, 1, 2, 3, 4, 5, 6, 7 ] );
    expect( tx.outputs[7].value ).toBe( 7n );
  });

  test("9 declared inputs fail with TooManyInputs before any input is read", () => {
    // version followed by the count and nothing else
    const raw = hexToBuf( "01000000" + "09" );
    expect( isSpvError( catchError( () => Raw.parseTransaction( raw ) ), "TooManyInputs" ) ).toBe( true );
  });

  test("9 outputs fail with TooManyOutputs", () => {
    const raw = buildTx( { outputs: Array.from( { length: 9 }, () => ({}) ) } );
    expect( isSpvError( catchError( () => Raw.parseTransaction( raw ) ), "TooManyOutputs" ) ).toBe( true );
  });

  test("zero inputs and outputs parse", () => {
    const tx = Raw.parseTransaction( buildTx( { inputs: [], outputs: [] } ) );
    expect( tx.inputs ).toEqual( [] );
    expect( tx.outputs ).toEqual( [] );
  });

  test("unlocking scripts are capped at 256 bytes", () => {
    const ok = buildTx( { inputs: [ { script: Buffer.alloc( 256, 1 ) } ] } );
    expect( Raw.parseTransaction( ok ).inputs[0].unlockingScript.length ).toBe( 256 );

    const tooLong = buildTx( { inputs: [ { script: Buffer.alloc( 257, 1 ) } ] } );
    expect( isSpvError( catchError( () => Raw.parseTransaction( tooLong ) ), "VarSliceTooLong" ) ).toBe( true );
  });

  test("locking scripts are capped at 128 bytes", () => {
    const ok = buildTx( { outputs: [ { script: Buffer.alloc( 128, 2 ) } ] } );
    expect( Raw.parseTransaction( ok ).outputs[0].lockingScript.length ).toBe( 128 );

    const tooLong = buildTx( { outputs: [ { script: Buffer.alloc( 129, 2 ) } ] } );
    expect( isSpvError( catchError( () => Raw.parseTransaction( tooLong ) ), "VarSliceTooLong" ) ).toBe( true );
  });

  test("any truncation fails with OutOfBounds", () => {
    const raw = buildTx();
    for ( const cut of [ 0, 3, 4, 20, raw.length - 5, raw.length - 1 ] ) {
      const err = catchError( () => Raw.parseTransaction( raw.subarray( 0, cut ) ) );
      expect( isSpvError( err, "OutOfBounds" ) ).toBe( true );
    }
  });

  test("bytes after the locktime are ignored", () => {
    const raw = buildTx( { locktime: 7 } );
    const tx = Raw.parseTransaction( Buffer.concat( [ raw, hexToBuf( "deadbeef" ) ] ) );
    expect( tx.locktime ).toBe( 7 );
  });
});
