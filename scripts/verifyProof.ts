import path from "path";
import { fileURLToPath } from "url";

import { decodeProofRequest } from "@/application/helpers/proof";
import { SpvService } from "@/application/services";
import { loadConfig } from "@/config";
import { Raw } from "@/infrastructure/bitcoin";
import { getLogger } from "@/infrastructure/logger";
import { FileHeaderHashOracle } from "@/infrastructure/oracle";
import { getFileStorage, resolveUnderRepo } from "@/infrastructure/storage/FileStorageService";
import { errorMessage } from "@/shared/errors";

const logger = getLogger( "verify_proof" );

export const EXIT = { MINED: 0, NOT_MINED: 1, ERROR: 2 } as const;

export function main(argv: string[] = process.argv.slice( 2 )): number {
  const requestPath = argv[0];
  if ( !requestPath ) throw new Error( "usage: verify <request.json>" );

  const cfg = loadConfig();
  if ( !cfg.headerHashesFile ) throw new Error( "HEADER_HASHES_FILE is not set" );
  const oracle = new FileHeaderHashOracle( resolveUnderRepo( process.cwd(), cfg.headerHashesFile ) );
  const request = decodeProofRequest( JSON.parse( getFileStorage().readFile( path.resolve( requestPath ), "utf-8" ) ) );

  const spv = new SpvService( oracle );
  const mined = spv.wasTransactionMined( request.header, request.height, request.tx, request.proof );
  const verdict = { mined, txid: Raw.toHex( Raw.transactionId( request.tx ) ), height: request.height };
  logger.info( { type: "spv.verdict", ...verdict } );
  process.stdout.write( `${ JSON.stringify( verdict ) }\n` );
  return mined ? EXIT.MINED : EXIT.NOT_MINED;
}

if ( process.argv[1] && path.resolve( process.argv[1] ) === fileURLToPath( import.meta.url ) ) {
  try {
    process.exitCode = main();
  } catch ( err ) {
    logger.error( `verifyProof failed: ${ errorMessage( err ) }` );
    process.exitCode = EXIT.ERROR;
  }
}
