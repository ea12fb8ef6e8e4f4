import fs from "fs";
import os from "os";
import path from "path";
import { afterAll, afterEach, describe, expect, test, vi } from "vitest";

import { Raw } from "@/infrastructure/bitcoin";

import { EXIT, main } from "../scripts/verifyProof";
import { buildTx, makeHeader } from "./_fixtures";

describe("verifyProof script", () => {
  const tmpDir = fs.mkdtempSync( path.join( os.tmpdir(), "spv-cli-" ) );
  const tx = buildTx( { locktime: 21 } );
  const headerBytes = Raw.serializeBlockHeader( makeHeader( Raw.transactionId( tx ) ) );
  const hashesFile = path.join( tmpDir, "hashes.json" );
  fs.writeFileSync( hashesFile, JSON.stringify( { "5": Raw.toHex( Raw.blockHeaderHash( headerBytes ) ) } ) );

  function writeRequest(name: string, height: number): string {
    const file = path.join( tmpDir, name );
    fs.writeFileSync( file, JSON.stringify( {
      height,
      header: Raw.toHex( headerBytes ),
      tx: Raw.toHex( tx ),
      proof: { txIndex: 0, treeDepth: 0, hashes: [] },
    } ) );
    return file;
  }

  afterEach( () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  } );
  afterAll( () => fs.rmSync( tmpDir, { recursive: true, force: true } ) );

  test("prints the verdict and exits 0 when mined", () => {
    vi.stubEnv( "HEADER_HASHES_FILE", hashesFile );
    const writes: string[] = [];
    vi.spyOn( process.stdout, "write" ).mockImplementation( (chunk: string | Uint8Array) => {
      writes.push( chunk.toString() );
      return true;
    } );

    expect( main( [ writeRequest( "mined.json", 5 ) ] ) ).toBe( EXIT.MINED );
    expect( JSON.parse( writes[0] ) ).toEqual( { mined: true, txid: Raw.toHex( Raw.transactionId( tx ) ), height: 5 } );
  });

  test("exits 1 when the header is not the canonical one", () => {
    vi.stubEnv( "HEADER_HASHES_FILE", hashesFile );
    vi.spyOn( process.stdout, "write" ).mockImplementation( () => true );
    expect( main( [ writeRequest( "other-height.json", 6 ) ] ) ).toBe( EXIT.NOT_MINED );
  });

  test("requires a request path and a ledger", () => {
    expect( () => main( [] ) ).toThrow( "usage: verify <request.json>" );
    vi.stubEnv( "HEADER_HASHES_FILE", "" );
    expect( () => main( [ writeRequest( "any.json", 5 ) ] ) ).toThrow( "Environment validation failed" );
  });
});
