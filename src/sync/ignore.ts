/**
 * Exclude pattern matching for the local walk.
 * Supports a .metasync-ignore file at the walk root plus --exclude patterns.
 */
import fs from 'node:fs';
import path from 'node:path';
import { minimatch } from 'minimatch';

export const IGNORE_FILE_NAME = '.metasync-ignore';

/**
 * Load patterns from a .metasync-ignore file.
 * Returns an empty array if the file doesn't exist.
 */
export function loadIgnoreFile(localPath: string): string[] {
  const ignoreFile = path.join(localPath, IGNORE_FILE_NAME);
  if (!fs.existsSync(ignoreFile)) return [];
  return fs.readFileSync(ignoreFile, 'utf-8')
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Combine command-line patterns with the ignore file at the walk root.
 */
export function resolveIgnorePatterns(cliPatterns: string[], localPath: string): string[] {
  const isDir = fs.existsSync(localPath) && fs.statSync(localPath).isDirectory();
  const filePatterns = isDir ? loadIgnoreFile(localPath) : [];
  return [...new Set([...cliPatterns, ...filePatterns])];
}

/**
 * Check if a relative path (forward slashes) should be excluded.
 * Directory paths are passed with a trailing slash.
 */
export function shouldIgnore(docPath: string, patterns: string[]): boolean {
  const bare = docPath.endsWith('/') ? docPath.slice(0, -1) : docPath;
  for (const pattern of patterns) {
    if (pattern.endsWith('/')) {
      const dirPattern = pattern.slice(0, -1);
      if (bare === dirPattern || bare.startsWith(dirPattern + '/')) {
        return true;
      }
      continue;
    }
    if (minimatch(bare, pattern, { dot: true })) {
      return true;
    }
    // Basename match so "*.tmp" also excludes "sub/x.tmp"
    if (minimatch(path.posix.basename(bare), pattern, { dot: true })) {
      return true;
    }
  }
  return false;
}
