/**
 * Type definitions for the sync engine.
 */
import type { Readable } from 'node:stream';
import type { ObjectMetadata } from './metadata.js';

export type SyncDirection = 'upload' | 'download';

/**
 * One local filesystem node captured during a tree walk.
 * A fresh walk recreates entries; they are never mutated afterwards.
 */
export interface Entry {
  /** Absolute local path */
  readonly path: string;
  readonly isDirectory: boolean;
  readonly uid: number;
  readonly gid: number;
  /** Raw st_mode (type and permission bits) */
  readonly mode: number;
  /** Modification time in whole seconds */
  readonly mtime: number;
  readonly size: number;
  /** Content fingerprint, filled in lazily by the cache or fingerprint engine */
  readonly fingerprint?: string;
}

/**
 * One remote key as reported by a listing or a head lookup.
 */
export interface RemoteObject {
  key: string;
  /** Fingerprint as reported by the store (usually quoted) */
  fingerprint: string;
  metadata: Record<string, string>;
  size: number;
}

/**
 * Anything that carries a comparable fingerprint.
 */
export interface Fingerprinted {
  readonly fingerprint?: string;
}

/**
 * Persisted cache record for a single local path.
 */
export interface CacheRecord {
  fingerprint: string;
  mtime: number;
}

/**
 * An ancestor directory key paired with the metadata it must carry.
 */
export interface KeyPrefix {
  key: string;
  metadata: ObjectMetadata;
}

export type SyncAction = 'upload' | 'download' | 'create-prefix' | 'skip';

export interface SyncPlanEntry {
  key: string;
  action: SyncAction;
  metadata: ObjectMetadata;
  localPath?: string;
  fingerprint?: string;
  size: number;
}

export type SyncPhase =
  | 'idle'
  | 'scanning'
  | 'diffing'
  | 'reconciling-prefixes'
  | 'transferring'
  | 'verifying'
  | 'sleeping'
  | 'done';

/**
 * Explicit outcome of a keyed lookup against the remote store.
 */
export type LookupResult<T> =
  | { status: 'found'; value: T }
  | { status: 'not-found' }
  | { status: 'error'; error: Error };

export interface TransferProgress {
  key: string;
  bytesTransferred: number;
  totalBytes: number;
}

/**
 * Receives cumulative byte counts for a single streamed transfer.
 */
export interface ProgressObserver {
  onProgress(progress: TransferProgress): void;
  onComplete?(key: string): void;
}

/**
 * Remote object store the engine talks to. Keys are flat strings; keys
 * ending in `/` are treated as directory placeholders.
 */
export interface RemoteStore {
  headObject(key: string): Promise<LookupResult<RemoteObject>>;
  /** Write a small object (or an empty placeholder when body is omitted). */
  putObject(
    key: string,
    body: Buffer | undefined,
    metadata: Record<string, string>,
    contentType?: string,
  ): Promise<void>;
  /** Replace the metadata of an existing object in place. */
  copyObjectMetadata(key: string, metadata: Record<string, string>): Promise<void>;
  /** Yield one page of objects at a time; pages may be empty. */
  listObjects(prefix: string): AsyncIterable<RemoteObject[]>;
  getObject(key: string): Promise<Readable>;
  putObjectStreamed(key: string, body: Readable, options: StreamedPutOptions): Promise<void>;
}

export interface StreamedPutOptions {
  metadata: Record<string, string>;
  contentType: string;
  /** Total body length, when known, for progress reporting */
  size?: number;
  observer?: ProgressObserver;
}

/**
 * Parsed `s3://bucket/key` location.
 */
export interface RemotePath {
  bucket: string;
  key: string;
}

export interface SyncFailure {
  key: string;
  path?: string;
  error: string;
}

export interface SyncResult {
  direction: SyncDirection;
  /** Keys in the sync plan, in plan order */
  planned: string[];
  transferred: number;
  bytesTransferred: number;
  failed: SyncFailure[];
  /** Keys whose fingerprint did not match after transfer */
  mismatched: string[];
  prefixesCreated: number;
  prefixesUpdated: number;
  dryRun: boolean;
}
