import { z } from "zod";

import { Raw } from "@/infrastructure/bitcoin";
import { MAX_PROOF_HASHES, SIZES } from "@/infrastructure/bitcoin/constants";
import type { MerkleProof } from "@/types/bitcoin";

const hex = z.string().trim().regex( /^(?:[0-9a-fA-F]{2})+$/, { message: "must be non-empty, even-length hex" } );
const hash32 = z.string().trim().regex( /^[0-9a-fA-F]{64}$/, { message: "must be 64 hex characters" } );

const proofRequestSchema = z.object( {
  height: z.number().int().min( 0 ),
  header: hex.refine( (s) => s.length === SIZES.BLOCK_HEADER * 2, { message: `must be ${ SIZES.BLOCK_HEADER } bytes` } ),
  tx: hex,
  proof: z.object( {
    txIndex: z.number().int().min( 0 ),
    treeDepth: z.number().int().min( 0 ),
    hashes: z.array( hash32 ).max( MAX_PROOF_HASHES ),
  } ),
} );

export type ProofRequestJson = z.input<typeof proofRequestSchema>;

export type ProofRequest = {
  height: number;
  header: Buffer;
  tx: Buffer;
  proof: MerkleProof;
};

export class ProofRequestError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super( `Invalid proof request:\n${ issues.join( "\n" ) }` );
    this.name = "ProofRequestError";
    this.issues = issues;
  }
}

/** Decode a JSON proof request. Sibling hashes are expected in wire order. */
export function decodeProofRequest(input: unknown): ProofRequest {
  const result = proofRequestSchema.safeParse( input );
  if ( !result.success ) {
    throw new ProofRequestError(
      result.error.issues.map( (issue) => `- ${ issue.path.join( "." ) || "(root)" }: ${ issue.message }` ),
    );
  }
  const { height, header, tx, proof } = result.data;
  return {
    height,
    header: Raw.fromHex( header ),
    tx: Raw.fromHex( tx ),
    proof: {
      txIndex: proof.txIndex,
      treeDepth: proof.treeDepth,
      siblingHashes: proof.hashes.map( (h) => Raw.fromHex( h ) ),
    },
  };
}
