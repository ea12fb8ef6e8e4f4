import dotenv from "dotenv";
import path from "path";

import { getFileStorage } from "@/infrastructure/storage/FileStorageService";

function fileExists(p: string): boolean {
  return getFileStorage().fileExists( p );
}

function envFileNames(env: string): string[] {
  return [ ".env", ".env.local", `.env.${ env }`, `.env.${ env }.local` ];
}

// Nearest directory holding package.json or any .env* file, walking up from startDir
function findBaseDir(startDir: string, env: string): string {
  let current = startDir;
  while ( true ) {
    const hasPkg = fileExists( path.join( current, "package.json" ) );
    const hasAnyEnv = envFileNames( env ).some( (name) => fileExists( path.join( current, name ) ) );
    if ( hasPkg || hasAnyEnv ) return current;
    const parent = path.dirname( current );
    if ( parent === current ) return startDir;
    current = parent;
  }
}

/**
 * Load .env files into process.env, most generic first. Variables already set
 * in the process environment win over anything in a file.
 *
 * @returns the files that were loaded
 */
export function loadEnvFiles(cwd: string = process.cwd()): string[] {
  const env = (process.env.NODE_ENV || process.env.APP_ENV || "development").trim();
  const baseDir = findBaseDir( cwd, env );
  const loaded: string[] = [];

  for ( const name of envFileNames( env ) ) {
    const p = path.join( baseDir, name );
    if ( !fileExists( p ) ) continue;
    dotenv.config( { path: p, override: false } );
    loaded.push( p );
  }
  return loaded;
}
