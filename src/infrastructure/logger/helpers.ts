import pino from "pino";

import { DEFAULT_SERVICE_NAME } from "@/config";
import { getFileStorage } from "@/infrastructure/storage/FileStorageService";

export type LoggingEnv = {
  environment: string;
  serviceName: string;
  logLevel: string;
  logPretty: boolean;
  logStdout: boolean;
  logFile?: string;
};

const FALSY = [ "false", "0", "no", "off" ];

export function getLoggingEnv(env: NodeJS.ProcessEnv = process.env): LoggingEnv {
  const environment = (env.APP_ENV || env.NODE_ENV || "development").trim();
  const serviceName = env.LOG_SERVICE_NAME || DEFAULT_SERVICE_NAME;
  const defaultLevel = environment === "development" ? "trace" : "info";
  const logLevel = env.LOG_LEVEL || defaultLevel;
  const prettyDefault = environment === "development" ? "true" : "false";
  const logPretty = (env.LOG_PRETTY || prettyDefault).toLowerCase() === "true";
  const logStdout = !FALSY.includes( String( env.LOG_STDOUT ?? "true" ).trim().toLowerCase() );
  const logFile = env.LOG_FILE?.trim() || undefined;
  return { environment, serviceName, logLevel, logPretty, logStdout, logFile };
}

export function ensureFile(filePath: string, initialContent = ""): void {
  getFileStorage().ensureFile( filePath, initialContent );
}

export function createFileDestination(filePath: string, isSync: boolean): pino.DestinationStream {
  ensureFile( filePath, "" );
  return pino.destination( { dest: filePath, sync: isSync } );
}

export function buildStdoutStream(logPretty: boolean): pino.DestinationStream {
  if ( logPretty ) {
    return pino.transport( {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        singleLine: false,
        messageKey: "msg",
        ignore: "pid,hostname",
      },
    } );
  }
  return pino.destination( 1 );
}
