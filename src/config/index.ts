import { z } from "zod";

import { loadEnvFiles } from "./env";

export type AppConfig = {
  // path to the JSON height -> header hash ledger (if available)
  headerHashesFile?: string;
  // logger
  environment: string;
  serviceName: string;
  logLevel: string;
  logPretty: boolean;
  logFile?: string;
};

export const DEFAULT_SERVICE_NAME = "btc-spv-verifier";

const LOG_LEVELS = [ "fatal", "error", "warn", "info", "debug", "trace", "silent" ] as const;

const envSchema = z.object( {
  HEADER_HASHES_FILE: z.string().trim().min( 1 ).optional(),
  APP_ENV: z.string().optional(),
  NODE_ENV: z.string().optional(),
  LOG_SERVICE_NAME: z.string().optional().default( DEFAULT_SERVICE_NAME ),
  LOG_LEVEL: z.enum( LOG_LEVELS ).optional(),
  LOG_PRETTY: z.enum( [ "true", "false" ] ).optional(),
  LOG_FILE: z.string().trim().min( 1 ).optional(),
} );

const tips: Record<string, string> = {
  HEADER_HASHES_FILE: "Path to a JSON object mapping block heights to display-order header hashes",
  LOG_LEVEL: `One of ${ LOG_LEVELS.join( ", " ) }`,
  LOG_PRETTY: "Use true or false (defaults to true in development)",
  LOG_FILE: "Path of an NDJSON log file, e.g. logs/output.ndjson",
};

/**
 * Validate the environment into an AppConfig. When reading the real process
 * environment, .env files are loaded first.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  if ( source === process.env ) loadEnvFiles();

  const result = envSchema.safeParse( source );
  if ( !result.success ) {
    const details = result.error.issues.map( (issue) => {
      const keyName = String( issue.path[0] ?? issue.code );
      const tip = tips[keyName] ? ` Tip: ${ tips[keyName] }.` : "";
      return `- ${ keyName }: ${ issue.message }.${ tip }`;
    } ).join( "\n" );
    throw new Error( `Environment validation failed:\n${ details }` );
  }
  const env = result.data;
  const environment = (env.APP_ENV || env.NODE_ENV || "development").trim();
  const defaultLevel = environment === "development" ? "trace" : "info";
  const prettyDefault = environment === "development" ? "true" : "false";

  return {
    headerHashesFile: env.HEADER_HASHES_FILE,
    environment,
    serviceName: env.LOG_SERVICE_NAME.trim(),
    logLevel: env.LOG_LEVEL ?? defaultLevel,
    logPretty: (env.LOG_PRETTY ?? prettyDefault) === "true",
    logFile: env.LOG_FILE,
  };
}
