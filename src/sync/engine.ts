/**
 * Sync orchestrator: one pass is Scanning -> Diffing -> ReconcilingPrefixes
 * -> Transferring -> Verifying, in either direction, for a single file or a
 * whole tree.
 */
import fs from 'node:fs';
import path from 'node:path';
import { randomBytes } from 'node:crypto';
import { pipeline } from 'node:stream/promises';
import {
  CacheCorruptionError,
  NotFoundError,
  SetupError,
  UnsafeKeyError,
  errorMessage,
  isFatal,
} from './errors.js';
import {
  DEFAULT_PART_SIZE,
  EMPTY_FINGERPRINT,
  fingerprint as defaultFingerprint,
  type FingerprintFn,
} from './fingerprint.js';
import { LocalCache, fingerprintEntries } from './cache.js';
import { toEntry, walkTree, type WalkResult } from './walker.js';
import {
  derivePrefixes,
  formatRemotePath,
  normalizePrefix,
  resolveFileKey,
  toLocalPath,
  toRelativePath,
  toRemoteKeys,
} from './keys.js';
import { shouldIgnore } from './ignore.js';
import { listRemote } from './remote-index.js';
import { diffFingerprints } from './diff.js';
import { verifyPrefixes } from './reconciler.js';
import {
  entryMetadata,
  fromMetadataRecord,
  toMetadataRecord,
  type MetadataTemplates,
  type OwnerOverrides,
} from './metadata.js';
import { DIRECTORY_CONTENT_TYPE, sniffContentType, type ContentTypeSniffer } from '../lib/content-type.js';
import { createNullLogger, type Logger } from '../utils/logger.js';
import type {
  Entry,
  Fingerprinted,
  ProgressObserver,
  RemoteObject,
  RemotePath,
  RemoteStore,
  SyncDirection,
  SyncPhase,
  SyncFailure,
  SyncPlanEntry,
  SyncResult,
} from './types.js';

export interface SyncOptions {
  /** Local file or directory */
  local: string;
  remote: RemotePath;
  direction: SyncDirection;
  store: RemoteStore;
  templates: MetadataTemplates;
  overrides?: OwnerOverrides;
  /** Transfer everything; skip the cache and the remote listing */
  force?: boolean;
  /** Stop after Diffing */
  dryRun?: boolean;
  /** Fingerprint cache document; no cache when omitted */
  cacheFile?: string;
  /** Glob patterns relative to the local root */
  ignorePatterns?: string[];
  partSize?: number;
  fingerprint?: FingerprintFn;
  sniff?: ContentTypeSniffer;
  logger?: Logger;
  observer?: ProgressObserver;
  onPhase?: (phase: SyncPhase) => void;
  /** Receives the computed plan after Diffing, before anything is written */
  onPlan?: (plan: SyncPlanEntry[]) => void;
}

/** Where a pass reads and writes on each side. */
interface PassTarget {
  /** Single key vs. a whole prefix */
  isDirectory: boolean;
  /** Listing prefix on the remote side */
  listPrefix: string;
  /** Resolved local root (directory mode) or file path (single-file mode) */
  localPath: string;
}

interface PassPlan {
  target: PassTarget;
  entries: SyncPlanEntry[];
  /** Keys refused while planning; reported as failures */
  rejected: SyncFailure[];
}

function isDirectoryKey(key: string): boolean {
  return key.endsWith('/');
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class SyncOrchestrator {
  private readonly options: SyncOptions;
  private readonly logger: Logger;
  private readonly fingerprintFn: FingerprintFn;
  private readonly partSize: number;
  private readonly sniff: ContentTypeSniffer;
  private readonly overrides: OwnerOverrides;
  private currentPhase: SyncPhase = 'idle';

  constructor(options: SyncOptions) {
    this.options = options;
    this.logger = options.logger ?? createNullLogger();
    this.fingerprintFn = options.fingerprint ?? defaultFingerprint;
    this.partSize = options.partSize ?? DEFAULT_PART_SIZE;
    this.sniff = options.sniff ?? sniffContentType;
    this.overrides = options.overrides ?? {};
  }

  get phase(): SyncPhase {
    return this.currentPhase;
  }

  /**
   * Report a phase change. Used by the autosync loop for `sleeping`.
   */
  setPhase(phase: SyncPhase): void {
    this.currentPhase = phase;
    this.options.onPhase?.(phase);
  }

  /**
   * Run one complete pass. Fatal errors propagate; per-key transfer errors
   * are collected in the result.
   */
  async runPass(): Promise<SyncResult> {
    const { direction, remote, dryRun = false } = this.options;
    this.logger.info(`preparing to sync ${direction === 'upload' ? 'TO' : 'FROM'} ${formatRemotePath(remote)}`);

    const result: SyncResult = {
      direction,
      planned: [],
      transferred: 0,
      bytesTransferred: 0,
      failed: [],
      mismatched: [],
      prefixesCreated: 0,
      prefixesUpdated: 0,
      dryRun,
    };

    const cache = this.openCache();

    this.setPhase('scanning');
    const plan = direction === 'upload'
      ? await this.planUpload(cache)
      : await this.planDownload(cache);
    result.planned = plan.entries.map(entry => entry.key);
    result.failed.push(...plan.rejected);
    this.options.onPlan?.(plan.entries);

    if (dryRun) {
      this.logger.info(`dry run: ${plan.entries.length} key(s) would be transferred`);
      this.setPhase('done');
      return result;
    }

    if (plan.entries.length === 0) {
      this.logger.info(direction === 'upload'
        ? `${formatRemotePath(remote)} is up to date`
        : `${plan.target.localPath} is up to date`);
      this.saveCache(cache);
      this.setPhase('done');
      return result;
    }

    if (direction === 'upload') {
      this.setPhase('reconciling-prefixes');
      const reconciled = await verifyPrefixes(
        this.options.store,
        derivePrefixes(plan.target.listPrefix, this.options.templates.directory),
        this.logger.child('reconciler'),
      );
      result.prefixesCreated = reconciled.created.length;
      result.prefixesUpdated = reconciled.updated.length;
    }

    this.setPhase('transferring');
    const done: SyncPlanEntry[] = [];
    for (const entry of plan.entries) {
      try {
        const bytes = direction === 'upload'
          ? await this.upload(entry)
          : await this.download(entry);
        result.transferred++;
        result.bytesTransferred += bytes;
        done.push(entry);
      } catch (err) {
        if (isFatal(err)) throw err;
        this.logger.error(`${direction} failed`, { key: entry.key, path: entry.localPath, error: errorMessage(err) });
        result.failed.push({ key: entry.key, path: entry.localPath, error: errorMessage(err) });
      }
    }

    this.setPhase('verifying');
    result.mismatched = await this.verify(done, plan.target, cache);

    this.saveCache(cache);
    this.setPhase('done');
    return result;
  }

  private openCache(): LocalCache | undefined {
    const { cacheFile, force } = this.options;
    if (!cacheFile) return undefined;
    if (force) {
      this.logger.warn('using force, ignoring local cache');
      return undefined;
    }
    const cache = new LocalCache({
      file: cacheFile,
      fingerprint: this.fingerprintFn,
      partSize: this.partSize,
      logger: this.logger.child('cache'),
    });
    try {
      cache.load();
    } catch (err) {
      if (!(err instanceof CacheCorruptionError)) throw err;
      this.logger.warn(`${err.message}, treating every entry as a cache miss`);
    }
    return cache;
  }

  private saveCache(cache: LocalCache | undefined): void {
    if (!cache) return;
    try {
      cache.save();
    } catch (err) {
      this.logger.error('unable to write fingerprint cache', { file: cache.file, error: errorMessage(err) });
    }
  }

  /** Fingerprint file entries, through the cache when one is open. */
  private async fingerprintFiles(
    entries: Map<string, Entry>,
    cache: LocalCache | undefined,
  ): Promise<Map<string, Entry>> {
    if (cache) {
      return cache.reconcile(entries);
    }
    return fingerprintEntries(entries, this.fingerprintFn, this.partSize);
  }

  // ---------------------------------------------------------------------
  // Upload
  // ---------------------------------------------------------------------

  private async planUpload(cache: LocalCache | undefined): Promise<PassPlan> {
    const { local, remote, ignorePatterns, force } = this.options;
    const walk = walkTree(local, { ignorePatterns, logger: this.logger.child('walker') });

    let keyed: Map<string, Entry>;
    let target: PassTarget;
    if (walk.isDirectory) {
      const prefix = normalizePrefix(remote.key);
      target = { isDirectory: true, listPrefix: prefix, localPath: walk.root };
      keyed = this.keyLocalTree(walk, prefix);
    } else {
      const file = walk.files.get(walk.root);
      if (!file) throw new NotFoundError(walk.root);
      const key = resolveFileKey(remote.key, file.path);
      target = { isDirectory: false, listPrefix: key, localPath: file.path };
      keyed = new Map([[key, file]]);
    }

    const files = new Map<string, Entry>();
    for (const [key, entry] of keyed) {
      if (!entry.isDirectory) files.set(key, entry);
    }
    const fingerprinted = await this.fingerprintFiles(files, cache);
    const localEntries = new Map<string, Entry>();
    for (const [key, entry] of keyed) {
      localEntries.set(key, entry.isDirectory ? { ...entry, fingerprint: EMPTY_FINGERPRINT } : fingerprinted.get(key) ?? entry);
    }

    let needsSync: Map<string, Entry>;
    if (force) {
      this.logger.warn('using force, uploading every local entry');
      needsSync = localEntries;
    } else {
      const remoteObjects = await listRemote(this.options.store, target.listPrefix, {
        targetKeys: new Set(localEntries.keys()),
        logger: this.logger.child('index'),
      });
      this.setPhase('diffing');
      needsSync = diffFingerprints(localEntries, remoteObjects, { direction: 'upload', logger: this.logger.child('diff') });
    }

    const entries: SyncPlanEntry[] = [];
    for (const [key, entry] of needsSync) {
      const template = entry.isDirectory ? this.options.templates.directory : this.options.templates.file;
      entries.push({
        key,
        action: entry.isDirectory ? 'create-prefix' : 'upload',
        metadata: entryMetadata(entry, this.overrides, template),
        localPath: entry.path,
        fingerprint: entry.fingerprint,
        size: entry.isDirectory ? 0 : entry.size,
      });
    }
    return { target, entries, rejected: [] };
  }

  /** Directories first (shallowest first), then files grouped by directory. */
  private keyLocalTree(walk: WalkResult, prefix: string): Map<string, Entry> {
    const keyed = new Map<string, Entry>();
    for (const [key, entry] of toRemoteKeys(walk.directories, walk.root, prefix, true)) {
      keyed.set(key, entry);
    }
    for (const [key, entry] of toRemoteKeys(walk.files, walk.root, prefix, false)) {
      keyed.set(key, entry);
    }
    return keyed;
  }

  private async upload(entry: SyncPlanEntry): Promise<number> {
    const { store } = this.options;
    const localPath = entry.localPath;
    if (!localPath) {
      throw new SetupError(`No local path for "${entry.key}"`);
    }
    const metadata = toMetadataRecord(entry.metadata);

    if (entry.action === 'create-prefix') {
      this.logger.info(`creating key '${entry.key}'`);
      await store.putObject(entry.key, undefined, metadata, DIRECTORY_CONTENT_TYPE);
      return 0;
    }

    this.logger.info(`upload: ${localPath} to ${entry.key}`);
    const body = fs.createReadStream(localPath);
    body.on('error', (err) => {
      this.logger.debug('read stream failed', { path: localPath, error: err.message });
    });
    try {
      await store.putObjectStreamed(entry.key, body, {
        metadata,
        contentType: this.sniff(localPath),
        size: entry.size,
        observer: this.options.observer,
      });
    } finally {
      body.destroy();
    }
    return entry.size;
  }

  // ---------------------------------------------------------------------
  // Download
  // ---------------------------------------------------------------------

  private async planDownload(cache: LocalCache | undefined): Promise<PassPlan> {
    const { remote, force } = this.options;
    const local = path.resolve(this.options.local);
    const isDirectory = remote.key === '' || isDirectoryKey(remote.key);

    let target: PassTarget;
    let source: Map<string, RemoteObject>;
    if (isDirectory) {
      const prefix = normalizePrefix(remote.key);
      target = { isDirectory: true, listPrefix: prefix, localPath: local };
      source = await this.listDownloadSource(prefix);
    } else {
      const lookup = await this.options.store.headObject(remote.key);
      if (lookup.status === 'not-found') {
        throw new NotFoundError(formatRemotePath(remote));
      }
      if (lookup.status === 'error') {
        throw new SetupError(`Unable to read ${formatRemotePath(remote)}: ${lookup.error.message}`, lookup.error);
      }
      const isExistingDir = fs.existsSync(local) && fs.statSync(local).isDirectory();
      const localPath = isExistingDir ? this.singleFileTarget(remote.key, local) : local;
      target = { isDirectory: false, listPrefix: remote.key, localPath };
      source = new Map([[remote.key, lookup.value]]);
    }

    let needsSync: Map<string, RemoteObject>;
    if (force) {
      this.logger.warn('using force, downloading every remote object');
      needsSync = source;
    } else {
      const existing = await this.scanDownloadTarget(target, cache);
      this.setPhase('diffing');
      needsSync = diffFingerprints(source, existing, { direction: 'download', logger: this.logger.child('diff') });
    }

    const entries: SyncPlanEntry[] = [];
    const rejected: SyncFailure[] = [];
    for (const [key, object] of needsSync) {
      let localPath = target.localPath;
      if (target.isDirectory) {
        try {
          localPath = toLocalPath(key, target.listPrefix, target.localPath);
        } catch (err) {
          if (!(err instanceof UnsafeKeyError)) throw err;
          this.logger.error('refusing key outside the local root', { key });
          rejected.push({ key, error: err.message });
          continue;
        }
      }
      entries.push({
        key,
        action: isDirectoryKey(key) ? 'create-prefix' : 'download',
        metadata: fromMetadataRecord(object.metadata),
        localPath,
        fingerprint: object.fingerprint,
        size: object.size,
      });
    }
    return { target, entries, rejected };
  }

  /** `<dir>/<basename of key>`, refusing basenames that leave `dir`. */
  private singleFileTarget(key: string, dir: string): string {
    const parent = key.slice(0, key.lastIndexOf('/') + 1);
    try {
      return toLocalPath(key, parent, dir);
    } catch (err) {
      if (err instanceof UnsafeKeyError) {
        throw new SetupError(err.message, err);
      }
      throw err;
    }
  }

  private async listDownloadSource(prefix: string): Promise<Map<string, RemoteObject>> {
    const listed = await listRemote(this.options.store, prefix, { logger: this.logger.child('index') });
    const patterns = this.options.ignorePatterns ?? [];
    const source = new Map<string, RemoteObject>();
    for (const [key, object] of listed) {
      // The prefix placeholder is the local root itself
      if (key === prefix) continue;
      const rel = toRelativePath(key, prefix);
      if (patterns.length > 0 && shouldIgnore(isDirectoryKey(key) ? `${rel}/` : rel, patterns)) {
        this.logger.debug('excluded', { key });
        continue;
      }
      source.set(key, object);
    }
    return source;
  }

  /** Fingerprints of what already exists locally, keyed as remote keys. */
  private async scanDownloadTarget(
    target: PassTarget,
    cache: LocalCache | undefined,
  ): Promise<Map<string, Fingerprinted>> {
    const existing = new Map<string, Fingerprinted>();
    if (!fs.existsSync(target.localPath)) {
      this.logger.debug(`${target.localPath} does not exist yet`);
      return existing;
    }

    let walk: WalkResult;
    try {
      walk = walkTree(target.localPath, {
        ignorePatterns: this.options.ignorePatterns,
        logger: this.logger.child('walker'),
      });
    } catch (err) {
      if (err instanceof NotFoundError) return existing;
      throw err;
    }

    if (!target.isDirectory) {
      if (walk.isDirectory) {
        throw new SetupError(`${target.localPath} is a directory`);
      }
      const file = walk.files.get(walk.root);
      if (!file) return existing;
      return this.fingerprintFiles(new Map([[target.listPrefix, file]]), cache);
    }

    if (!walk.isDirectory) {
      throw new SetupError(`${target.localPath} is not a directory`);
    }
    for (const key of toRemoteKeys(walk.directories, walk.root, target.listPrefix, true).keys()) {
      existing.set(key, { fingerprint: EMPTY_FINGERPRINT });
    }
    const files = await this.fingerprintFiles(
      toRemoteKeys(walk.files, walk.root, target.listPrefix, false),
      cache,
    );
    for (const [key, entry] of files) {
      existing.set(key, entry);
    }
    return existing;
  }

  private async download(entry: SyncPlanEntry): Promise<number> {
    const localPath = entry.localPath;
    if (!localPath) {
      throw new SetupError(`No local path for "${entry.key}"`);
    }

    if (entry.action === 'create-prefix') {
      this.logger.info(`making local directory ${localPath}`);
      await fs.promises.mkdir(localPath, { recursive: true });
      return 0;
    }

    await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
    this.logger.info(`download: ${entry.key} to ${localPath}`);

    const body = await this.options.store.getObject(entry.key);
    const observer = this.options.observer;
    let received = 0;
    const tmpFile = localPath + '.tmp.' + randomBytes(4).toString('hex');
    try {
      await pipeline(
        body,
        async function* (source: AsyncIterable<Buffer>) {
          for await (const chunk of source) {
            received += chunk.length;
            observer?.onProgress({ key: entry.key, bytesTransferred: received, totalBytes: entry.size });
            yield chunk;
          }
        },
        fs.createWriteStream(tmpFile),
      );
      await fs.promises.rename(tmpFile, localPath);
    } catch (err) {
      await fs.promises.rm(tmpFile, { force: true });
      throw err;
    }
    observer?.onComplete?.(entry.key);
    return received;
  }

  // ---------------------------------------------------------------------
  // Verify
  // ---------------------------------------------------------------------

  /**
   * Re-list the keys just written and diff them against what was meant to
   * land. Returns the mismatched keys; nothing is retried.
   */
  private async verify(
    done: SyncPlanEntry[],
    target: PassTarget,
    cache: LocalCache | undefined,
  ): Promise<string[]> {
    if (done.length === 0) return [];
    const { direction, store } = this.options;
    this.logger.info('verifying sync');

    const fresh = await listRemote(store, target.listPrefix, {
      targetKeys: new Set(done.map(entry => entry.key)),
      logger: this.logger.child('index'),
    });

    let expected: Map<string, Fingerprinted>;
    if (direction === 'upload') {
      expected = new Map(done.map(entry => [entry.key, { fingerprint: entry.fingerprint }]));
    } else {
      expected = await this.fingerprintDownloaded(done, cache);
    }

    const mismatched = [...diffFingerprints(expected, fresh, { direction }).keys()];
    for (const key of mismatched) {
      const entry = done.find(item => item.key === key);
      this.logger.error(`bad ${direction}: ${entry?.localPath ?? key}`, { key });
    }
    if (mismatched.length === 0) {
      this.logger.info('sync verified');
    }
    return mismatched;
  }

  private async fingerprintDownloaded(
    done: SyncPlanEntry[],
    cache: LocalCache | undefined,
  ): Promise<Map<string, Fingerprinted>> {
    const result = new Map<string, Fingerprinted>();
    const files = new Map<string, Entry>();
    for (const entry of done) {
      if (!entry.localPath) continue;
      if (entry.action === 'create-prefix') {
        result.set(entry.key, { fingerprint: EMPTY_FINGERPRINT });
        continue;
      }
      try {
        files.set(entry.key, toEntry(entry.localPath, await fs.promises.stat(entry.localPath)));
      } catch (err) {
        if (!isMissing(err)) throw err;
        this.logger.warn('downloaded file vanished before verification', { path: entry.localPath });
      }
    }
    for (const [key, entry] of await this.fingerprintFiles(files, cache)) {
      result.set(key, entry);
    }
    return result;
  }
}
