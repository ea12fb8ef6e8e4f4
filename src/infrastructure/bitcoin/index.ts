export * as Raw from "./raw";
export { MAX_PROOF_HASHES, SIZES, TX_LIMITS } from "./constants";
