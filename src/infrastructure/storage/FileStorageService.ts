import fs from "fs";
import path from "path";

export interface FileStorageService {
  fileExists(filePath: string): boolean;

  ensureDir(dirPath: string): void;

  ensureFile(filePath: string, initialContent?: string): void;

  readFile(filePath: string, encoding?: BufferEncoding): string;
}

/**
 * Find the repository root by looking for package.json or .git upwards.
 * Falls back to the provided startDir when nothing is found.
 */
export function findRepoRoot(startDir: string): string {
  let currentDir = startDir;
  while ( true ) {
    const hasPkg = fs.existsSync( path.join( currentDir, "package.json" ) );
    const hasGit = fs.existsSync( path.join( currentDir, ".git" ) );
    if ( hasPkg || hasGit ) return currentDir;

    const parent = path.dirname( currentDir );
    if ( parent === currentDir ) return startDir;
    currentDir = parent;
  }
}

/**
 * Resolve a path relative to the repo root discovered from startDir.
 * Absolute paths are returned unchanged.
 */
export function resolveUnderRepo(startDir: string, subPath: string): string {
  if ( path.isAbsolute( subPath ) ) return subPath;
  return path.join( findRepoRoot( startDir ), subPath );
}

class NodeFsFileStorageService implements FileStorageService {
  fileExists(filePath: string): boolean {
    try {
      fs.accessSync( filePath, fs.constants.F_OK );
      return true;
    } catch {
      return false;
    }
  }

  ensureDir(dirPath: string): void {
    fs.mkdirSync( dirPath, { recursive: true } );
  }

  ensureFile(filePath: string, initialContent: string = ""): void {
    this.ensureDir( path.dirname( filePath ) );
    if ( !this.fileExists( filePath ) ) {
      fs.writeFileSync( filePath, initialContent, { encoding: "utf-8" } );
    }
  }

  readFile(filePath: string, encoding: BufferEncoding = "utf-8"): string {
    return fs.readFileSync( filePath, encoding );
  }
}

const defaultStorage = new NodeFsFileStorageService();

export function getFileStorage(): FileStorageService {
  return defaultStorage;
}
