import { z } from "zod";

import { Raw } from "@/infrastructure/bitcoin";
import { getLogger } from "@/infrastructure/logger";
import { type FileStorageService, getFileStorage } from "@/infrastructure/storage/FileStorageService";
import type { HeaderHashOracle } from "@/types/bitcoin";

import { MemoryHeaderHashOracle } from "./MemoryHeaderHashOracle";

const ledgerSchema = z.record(
  z.string()
    // no leading zeros: "7" and "007" would name the same height
    .regex( /^(?:0|[1-9]\d*)$/, { message: "height keys must be non-negative integers without leading zeros" } )
    .refine( (key) => Number.isSafeInteger( Number( key ) ), { message: "height keys must be safe integers" } ),
  z.string().regex( /^[0-9a-fA-F]{64}$/, { message: "header hashes must be 64 hex characters" } ),
);

/**
 * Oracle backed by a JSON file of the form `{ "<height>": "<display-order hash hex>" }`.
 * The file is read once, at construction.
 */
export class FileHeaderHashOracle implements HeaderHashOracle {
  private readonly ledger: MemoryHeaderHashOracle;

  constructor(filePath: string, storage: FileStorageService = getFileStorage()) {
    const log = getLogger( "header_oracle" );
    let json: unknown;
    try {
      json = JSON.parse( storage.readFile( filePath, "utf-8" ) );
    } catch ( err ) {
      const message = err instanceof Error ? err.message : String( err );
      throw new Error( `Failed to read header hashes from ${ filePath }: ${ message }` );
    }
    const result = ledgerSchema.safeParse( json );
    if ( !result.success ) {
      const details = result.error.issues.map( (issue) => {
        // key failures carry the key schema's own messages one level down
        const message = issue.code === "invalid_key" ? issue.issues.map( (inner) => inner.message ).join( "; " ) : issue.message;
        return `- ${ issue.path.join( "." ) || "(root)" }: ${ message }`;
      } ).join( "\n" );
      throw new Error( `Invalid header hash file ${ filePath }:\n${ details }` );
    }
    this.ledger = new MemoryHeaderHashOracle(
      Object.entries( result.data ).map( ([ height, hex ]): [ number, Buffer ] => [ Number( height ), Raw.fromHex( hex ) ] ),
    );
    log.debug( { filePath, heights: this.ledger.size }, "header hash ledger loaded" );
  }

  lookupHeaderHash(height: number): Buffer | undefined {
    return this.ledger.lookupHeaderHash( height );
  }
}
