export { decodeProofRequest, ProofRequestError, type ProofRequest, type ProofRequestJson } from "@/application/helpers/proof";
export { SpvService, type SpvServiceOptions } from "@/application/services";
export { loadConfig, type AppConfig } from "@/config";
export { MAX_PROOF_HASHES, Raw, SIZES, TX_LIMITS } from "@/infrastructure/bitcoin";
export { getLogger, logger, type AppLogger } from "@/infrastructure/logger";
export { FileHeaderHashOracle, MemoryHeaderHashOracle } from "@/infrastructure/oracle";
export { isSpvError, SpvError, type SpvErrorCode } from "@/shared/errors";
export type {
  BlockHeader,
  HeaderHashOracle,
  MerkleProof,
  Outpoint,
  Transaction,
  TxInput,
  TxOutput,
} from "@/types/bitcoin";
