export { SpvService, type SpvServiceOptions } from "./SpvService";
