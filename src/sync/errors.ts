/**
 * Error taxonomy for sync operations.
 */

export type ErrorCode =
  | 'SETUP'
  | 'NOT_FOUND'
  | 'PREFIX_DENIED'
  | 'PERMISSION_DENIED'
  | 'CACHE_CORRUPT'
  | 'UNSAFE_KEY'
  | 'REMOTE';

export class MetasyncError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'MetasyncError';
    this.code = code;
  }
}

/**
 * Errors that abort the run. The CLI logs them and exits non-zero.
 */
export class FatalSyncError extends MetasyncError {
  constructor(message: string, code: ErrorCode, cause?: unknown) {
    super(message, code, cause);
    this.name = 'FatalSyncError';
  }
}

export class SetupError extends FatalSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SETUP', cause);
    this.name = 'SetupError';
  }
}

export class NotFoundError extends FatalSyncError {
  readonly path: string;

  constructor(path: string) {
    super(`No such file or directory: ${path}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.path = path;
  }
}

/**
 * An ancestor prefix could not be created; everything below it would fail.
 */
export class PrefixCreationError extends FatalSyncError {
  readonly key: string;

  constructor(key: string, cause?: unknown) {
    super(`Unable to create prefix "${key}"`, 'PREFIX_DENIED', cause);
    this.name = 'PrefixCreationError';
    this.key = key;
  }
}

export class PermissionDeniedError extends MetasyncError {
  readonly key: string;

  constructor(key: string, cause?: unknown) {
    super(`Permission denied for "${key}"`, 'PERMISSION_DENIED', cause);
    this.name = 'PermissionDeniedError';
    this.key = key;
  }
}

export class CacheCorruptionError extends MetasyncError {
  readonly file: string;

  constructor(file: string, cause?: unknown) {
    super(`Fingerprint cache is unreadable: ${file}`, 'CACHE_CORRUPT', cause);
    this.name = 'CacheCorruptionError';
    this.file = file;
  }
}

/**
 * A remote key whose local path would land outside the sync root.
 */
export class UnsafeKeyError extends MetasyncError {
  readonly key: string;

  constructor(key: string) {
    super(`Key "${key}" resolves outside the local root`, 'UNSAFE_KEY');
    this.name = 'UnsafeKeyError';
    this.key = key;
  }
}

export class RemoteStoreError extends MetasyncError {
  readonly key: string;

  constructor(message: string, key: string, cause?: unknown) {
    super(message, 'REMOTE', cause);
    this.name = 'RemoteStoreError';
    this.key = key;
  }
}

export function isFatal(err: unknown): err is FatalSyncError {
  return err instanceof FatalSyncError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
