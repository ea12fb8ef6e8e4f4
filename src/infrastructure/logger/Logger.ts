import os from "os";
import path from "path";
import pino, { type Logger as PinoLogger } from "pino";

import { loadEnvFiles } from "@/config/env";
import { findRepoRoot } from "@/infrastructure/storage/FileStorageService";

import { buildStdoutStream, createFileDestination, getLoggingEnv } from "./helpers";

export type AppLogger = PinoLogger;

const cachedByKey: Map<string, AppLogger> = new Map();
let rootLogger: AppLogger | undefined;

function createRootLogger(): AppLogger {
  // Load .env files without validation so the logger works before loadConfig runs
  loadEnvFiles();
  const { environment, serviceName, logLevel, logPretty, logStdout, logFile } = getLoggingEnv();
  const projectRoot = findRepoRoot( process.cwd() );

  const streams: pino.StreamEntry[] = [];
  if ( logStdout ) streams.push( { stream: buildStdoutStream( logPretty ) } );
  if ( logFile ) {
    const filePath = path.isAbsolute( logFile ) ? logFile : path.join( projectRoot, logFile );
    streams.push( { stream: createFileDestination( filePath, environment === "development" ) } );
  }

  return pino(
    {
      level: logLevel,
      base: { service: serviceName, env: environment, pid: process.pid, hostname: os.hostname() },
      timestamp: pino.stdTimeFunctions.isoTime,
      messageKey: "msg",
      formatters: {
        level(label) {
          return { level: label };
        },
      },
      /* Redact common sensitive keys if accidentally logged */
      redact: {
        paths: [ "*.password", "*.apiKey", "*.token", "*.secret" ],
        censor: "[*****]",
      },
    },
    pino.multistream( streams ),
  );
}

function getRootLogger(): AppLogger {
  if ( !rootLogger ) rootLogger = createRootLogger();
  return rootLogger;
}

/** Child of the root logger bound to a component name; cached per name. */
export function getLogger(component?: string): AppLogger {
  const name = component?.trim();
  if ( !name ) return getRootLogger();
  const existing = cachedByKey.get( name );
  if ( existing ) return existing;
  const instance = getRootLogger().child( { component: name } );
  cachedByKey.set( name, instance );
  return instance;
}

export const logger: AppLogger = getRootLogger();
