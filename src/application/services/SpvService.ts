import { Raw } from "@/infrastructure/bitcoin";
import { type AppLogger, getLogger } from "@/infrastructure/logger";
import type { BlockHeader, HeaderHashOracle, MerkleProof, Transaction } from "@/types/bitcoin";

export type SpvServiceOptions = {
  logger?: AppLogger;
};

/**
 * Decides whether a transaction was mined in a block: the header must be the
 * one the oracle holds for the height, and the proof must lead from the
 * transaction to that header's merkle root.
 *
 * A header that does not match the oracle is a negative verdict, not an error.
 * Malformed proofs and headers surface as SpvError.
 */
export class SpvService {
  private readonly oracle: HeaderHashOracle;
  private readonly log: AppLogger;

  constructor(oracle: HeaderHashOracle, opts?: SpvServiceOptions) {
    this.oracle = oracle;
    this.log = opts?.logger ?? getLogger( "spv_service" );
  }

  verifyBlockHeader(headerBytes: Buffer, height: number): boolean {
    const expected = this.oracle.lookupHeaderHash( height );
    if ( !expected ) {
      this.log.info( { height }, "no header hash known for height" );
      return false;
    }
    const actual = Raw.blockHeaderHash( headerBytes );
    const matches = actual.equals( expected );
    if ( !matches ) {
      this.log.info( {
        height,
        expected: Raw.toHex( expected ),
        actual: Raw.toHex( actual ),
      }, "block header does not match canonical hash" );
    }
    return matches;
  }

  wasTransactionMined(headerBytes: Buffer, height: number, txBytes: Buffer, proof: MerkleProof): boolean {
    if ( !this.verifyBlockHeader( headerBytes, height ) ) return false;
    const header = Raw.parseBlockHeader( headerBytes );
    const mined = Raw.verifyMerkleProof(
      Raw.reversedTransactionId( txBytes ),
      Raw.reverseBytes32( header.merkleRoot ),
      proof,
    );
    this.log.debug( {
      height,
      txid: Raw.toHex( Raw.transactionId( txBytes ) ),
      txIndex: proof.txIndex,
      treeDepth: proof.treeDepth,
      mined,
    }, "merkle proof checked" );
    return mined;
  }

  /** Same verdict for a header that arrives already split into fields. */
  wasTransactionMinedCompact(header: BlockHeader, height: number, txBytes: Buffer, proof: MerkleProof): boolean {
    return this.wasTransactionMined( Raw.serializeBlockHeader( header ), height, txBytes, proof );
  }

  /** The decoded transaction when it was mined, otherwise undefined. */
  parseMinedTransaction(headerBytes: Buffer, height: number, txBytes: Buffer, proof: MerkleProof): Transaction | undefined {
    const tx = Raw.parseTransaction( txBytes );
    return this.wasTransactionMined( headerBytes, height, txBytes, proof ) ? tx : undefined;
  }
}
