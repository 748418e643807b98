// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the directory path it was given.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

/**
 * Read a UTF-8 text file, wrapping any failure in an error that names
 * what the file was for.
 */
export function readTextFileSync(filePath: string, description: string): string {
   try {
      return fs.readFileSync(filePath, 'utf8');
   } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to read ${description} ${filePath}: ${reason}`, { cause: err });
   }
}

/**
 * Path of `absolutePath` relative to `baseDir`, POSIX style, or null when
 * it lies outside `baseDir`.
 */
export function relativeInside(baseDir: string, absolutePath: string): string | null {
   const rel = path.relative(path.resolve(baseDir), path.resolve(absolutePath));
   if (rel.startsWith('..') || path.isAbsolute(rel)) return null;
   return toPosixPath(rel);
}
