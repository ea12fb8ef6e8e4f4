import { SIZES } from "@/infrastructure/bitcoin/constants";
import type { HeaderHashOracle } from "@/types/bitcoin";

/**
 * Append-only height -> header hash ledger kept in memory. Hashes are stored
 * and returned in display order.
 */
export class MemoryHeaderHashOracle implements HeaderHashOracle {
  private readonly hashes: Map<number, Buffer> = new Map();

  constructor(entries?: Iterable<[ number, Buffer ]>) {
    if ( entries ) {
      for ( const [ height, hash ] of entries ) this.record( height, hash );
    }
  }

  /** Record the canonical hash for a height. Re-recording the same hash is a no-op. */
  record(height: number, hash: Buffer): void {
    if ( !Number.isSafeInteger( height ) || height < 0 ) throw new RangeError( `invalid block height: ${ height }` );
    if ( hash.length !== SIZES.HASH32 ) throw new RangeError( `header hash must be ${ SIZES.HASH32 } bytes, got ${ hash.length }` );
    const existing = this.hashes.get( height );
    if ( existing ) {
      if ( existing.equals( hash ) ) return;
      throw new Error( `height ${ height } already has a different header hash` );
    }
    this.hashes.set( height, Buffer.from( hash ) );
  }

  lookupHeaderHash(height: number): Buffer | undefined {
    const hash = this.hashes.get( height );
    return hash ? Buffer.from( hash ) : undefined;
  }

  get size(): number {
    return this.hashes.size;
  }
}
