export { getLogger, logger, type AppLogger } from "./Logger";
export { getLoggingEnv, type LoggingEnv } from "./helpers";
