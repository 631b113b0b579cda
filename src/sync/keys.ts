/**
 * Mapping between local paths and remote keys.
 */
import path from 'node:path';
import { SetupError, UnsafeKeyError } from './errors.js';
import type { ObjectMetadata } from './metadata.js';
import type { Entry, KeyPrefix, RemotePath } from './types.js';

export const REMOTE_SCHEME = 's3://';

export function isRemotePath(value: string): boolean {
  return value.startsWith(REMOTE_SCHEME);
}

/**
 * Parse `s3://bucket/some/key` into its bucket and key.
 */
export function parseRemotePath(value: string): RemotePath {
  if (!isRemotePath(value)) {
    throw new SetupError(`Not a remote path: ${value}`);
  }
  const rest = value.slice(REMOTE_SCHEME.length);
  const slash = rest.indexOf('/');
  const bucket = slash === -1 ? rest : rest.slice(0, slash);
  const key = slash === -1 ? '' : rest.slice(slash + 1).replace(/^\/+/, '');
  if (!bucket) {
    throw new SetupError(`Remote path has no bucket: ${value}`);
  }
  return { bucket, key };
}

export function formatRemotePath(remote: RemotePath): string {
  return `${REMOTE_SCHEME}${remote.bucket}/${remote.key}`;
}

/**
 * Directory-style prefix: no leading slash, exactly one trailing slash,
 * empty string for the bucket root.
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed ? `${trimmed}/` : '';
}

/**
 * Key of `relativePath` under a directory-style prefix.
 */
export function joinKey(prefix: string, relativePath: string): string {
  return normalizePrefix(prefix) + relativePath;
}

/**
 * Relative path of a local entry under the walk root, with forward slashes.
 */
export function relativeDocPath(root: string, localPath: string): string {
  return path.relative(root, localPath).split(path.sep).join('/');
}

/**
 * Map walked entries to remote keys under `destinationPrefix`. Directory keys
 * get a trailing slash; the walk root itself is dropped since it would
 * collapse onto the destination prefix. Order is preserved.
 */
export function toRemoteKeys(
  entries: Map<string, Entry>,
  root: string,
  destinationPrefix: string,
  isDirectory: boolean,
): Map<string, Entry> {
  const keys = new Map<string, Entry>();
  for (const [localPath, entry] of entries) {
    const rel = relativeDocPath(root, localPath);
    if (isDirectory && rel === '') continue;
    const key = joinKey(destinationPrefix, rel) + (isDirectory ? '/' : '');
    keys.set(key, entry);
  }
  return keys;
}

/**
 * Inverse of toRemoteKeys: strip the destination prefix and any trailing
 * directory slash to recover the relative path.
 */
export function toRelativePath(key: string, destinationPrefix: string): string {
  const prefix = normalizePrefix(destinationPrefix);
  if (!key.startsWith(prefix)) {
    throw new Error(`Key "${key}" is not under prefix "${prefix}"`);
  }
  const rel = key.slice(prefix.length);
  return rel.endsWith('/') ? rel.slice(0, -1) : rel;
}

/**
 * Local path a downloaded key lands on. Throws UnsafeKeyError for keys whose
 * `..` segments would leave (or collapse onto) the local root.
 */
export function toLocalPath(key: string, destinationPrefix: string, localRoot: string): string {
  const rel = toRelativePath(key, destinationPrefix);
  if (!rel) return localRoot;
  const root = path.resolve(localRoot);
  const resolved = path.resolve(root, ...rel.split('/'));
  const inside = path.relative(root, resolved);
  if (inside === '' || inside === '..' || inside.startsWith('..' + path.sep) || path.isAbsolute(inside)) {
    throw new UnsafeKeyError(key);
  }
  return resolved;
}

/**
 * Key for a single uploaded file: the destination key itself unless it names
 * a directory (trailing slash or bucket root), in which case the file's
 * basename is appended.
 */
export function resolveFileKey(destinationKey: string, localFile: string): string {
  if (destinationKey === '' || destinationKey.endsWith('/')) {
    return destinationKey.replace(/^\/+/, '') + path.basename(localFile);
  }
  return destinationKey.replace(/^\/+/, '');
}

/**
 * Ancestor prefixes of a destination key, shallowest first.
 * `home/user/` -> [`home/`, `home/user/`]; `home/a.txt` -> [`home/`].
 */
export function derivePrefixes(destinationKey: string, metadata: ObjectMetadata): KeyPrefix[] {
  const prefixes: KeyPrefix[] = [];
  let remaining = destinationKey.replace(/^\/+/, '');
  while (remaining.includes('/')) {
    remaining = remaining.slice(0, remaining.lastIndexOf('/'));
    if (remaining) {
      prefixes.push({ key: `${remaining}/`, metadata });
    }
  }
  return prefixes.reverse();
}
