/**
 * Local tree walk.
 * Captures stat metadata for every directory and regular file under a root,
 * in lexicographic directory order with files grouped under their parent.
 */
import fs from 'node:fs';
import path from 'node:path';
import { NotFoundError } from './errors.js';
import { shouldIgnore } from './ignore.js';
import type { Entry } from './types.js';
import type { Logger } from '../utils/logger.js';

export interface WalkResult {
  root: string;
  /** False when the root itself is a regular file (single-file mode) */
  isDirectory: boolean;
  directories: Map<string, Entry>;
  files: Map<string, Entry>;
}

export interface WalkOptions {
  /** Glob patterns relative to the root */
  ignorePatterns?: string[];
  logger?: Logger;
}

/**
 * Capture an Entry from a stat result. mtime is truncated to whole seconds.
 */
export function toEntry(filePath: string, stat: fs.Stats): Entry {
  return {
    path: filePath,
    isDirectory: stat.isDirectory(),
    uid: stat.uid,
    gid: stat.gid,
    mode: stat.mode,
    mtime: Math.floor(stat.mtimeMs / 1000),
    size: stat.size,
  };
}

function statOrNull(filePath: string): fs.Stats | null {
  try {
    return fs.statSync(filePath);
  } catch {
    return null;
  }
}

const UNREADABLE_CODES: ReadonlySet<string> = new Set(['EACCES', 'EPERM', 'ENOENT', 'ENOTDIR']);

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function toDocPath(root: string, absPath: string): string {
  return path.relative(root, absPath).split(path.sep).join('/');
}

/**
 * Walk a local path. Throws NotFoundError when it does not exist.
 */
export function walkTree(root: string, options: WalkOptions = {}): WalkResult {
  const { ignorePatterns = [], logger } = options;
  const absRoot = path.resolve(root);
  const rootStat = statOrNull(absRoot);
  if (!rootStat) {
    throw new NotFoundError(absRoot);
  }

  const directories = new Map<string, Entry>();
  const files = new Map<string, Entry>();

  if (!rootStat.isDirectory()) {
    logger?.debug(`${absRoot} is a file`);
    files.set(absRoot, toEntry(absRoot, rootStat));
    return { root: absRoot, isDirectory: false, directories, files };
  }

  // dir path -> sorted file names, collected first so directories can be ordered globally
  const listing = new Map<string, string[]>();

  function collect(dir: string): void {
    let dirents: fs.Dirent[];
    try {
      dirents = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      const code = errorCode(err);
      if (dir === absRoot || code === undefined || !UNREADABLE_CODES.has(code)) throw err;
      logger?.warn('skipping unreadable directory', { path: dir, code });
      return;
    }
    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    const names: string[] = [];
    listing.set(dir, names);

    for (const dirent of dirents) {
      const absPath = path.join(dir, dirent.name);
      const docPath = toDocPath(absRoot, absPath);
      if (dirent.isDirectory()) {
        if (!shouldIgnore(docPath + '/', ignorePatterns)) {
          collect(absPath);
        }
      } else if (!shouldIgnore(docPath, ignorePatterns)) {
        names.push(dirent.name);
      }
    }
  }

  collect(absRoot);

  const orderedDirs = [...listing.keys()].sort();
  for (const dir of orderedDirs) {
    const dirStat = statOrNull(dir);
    if (!dirStat) {
      logger?.warn('directory vanished during walk', { path: dir });
      continue;
    }
    directories.set(dir, toEntry(dir, dirStat));
  }

  for (const dir of orderedDirs) {
    for (const name of listing.get(dir) ?? []) {
      const filePath = path.join(dir, name);
      const stat = statOrNull(filePath);
      if (!stat) {
        logger?.warn('skipping unreadable entry', { path: filePath });
      } else if (stat.isFile()) {
        files.set(filePath, toEntry(filePath, stat));
      } else {
        logger?.debug('skipping non-regular file', { path: filePath });
      }
    }
  }

  logger?.debug(`walked ${absRoot}`, { directories: directories.size, files: files.size });
  return { root: absRoot, isDirectory: true, directories, files };
}
