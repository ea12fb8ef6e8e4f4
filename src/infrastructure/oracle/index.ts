export { FileHeaderHashOracle } from "./FileHeaderHashOracle";
export { MemoryHeaderHashOracle } from "./MemoryHeaderHashOracle";
