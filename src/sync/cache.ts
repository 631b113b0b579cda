/**
 * Persistent fingerprint cache.
 * Maps absolute local paths to {fingerprint, mtime} in a gzipped JSON
 * document so unchanged files are not re-hashed on every pass.
 */
import fs from 'node:fs';
import path from 'node:path';
import zlib from 'node:zlib';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { CacheCorruptionError } from './errors.js';
import { fingerprint as defaultFingerprint, DEFAULT_PART_SIZE, type FingerprintFn } from './fingerprint.js';
import type { CacheRecord, Entry } from './types.js';
import type { Logger } from '../utils/logger.js';

export const DEFAULT_CACHE_FILE = 'fingerprint-cache.json.gz';

const cacheDocumentSchema = z.record(
  z.object({
    fingerprint: z.string(),
    mtime: z.number().int(),
  }),
);

export interface LocalCacheOptions {
  /** Path of the gzipped cache document */
  file: string;
  fingerprint?: FingerprintFn;
  partSize?: number;
  logger?: Logger;
}

/**
 * Fingerprint every entry directly, without consulting a cache.
 */
export async function fingerprintEntries<K>(
  entries: Map<K, Entry>,
  fingerprintFn: FingerprintFn = defaultFingerprint,
  partSize: number = DEFAULT_PART_SIZE,
): Promise<Map<K, Entry>> {
  const result = new Map<K, Entry>();
  for (const [key, entry] of entries) {
    result.set(key, { ...entry, fingerprint: await fingerprintFn(entry.path, partSize) });
  }
  return result;
}

export class LocalCache {
  readonly file: string;
  private records = new Map<string, CacheRecord>();
  private readonly fingerprintFn: FingerprintFn;
  private readonly partSize: number;
  private readonly logger?: Logger;

  constructor(options: LocalCacheOptions) {
    this.file = options.file;
    this.fingerprintFn = options.fingerprint ?? defaultFingerprint;
    this.partSize = options.partSize ?? DEFAULT_PART_SIZE;
    this.logger = options.logger;
  }

  get size(): number {
    return this.records.size;
  }

  get(localPath: string): CacheRecord | undefined {
    return this.records.get(localPath);
  }

  /**
   * Load the cache document. A missing file yields an empty cache; anything
   * unreadable throws CacheCorruptionError and leaves the cache empty.
   */
  load(): void {
    this.records = new Map();
    if (!fs.existsSync(this.file)) {
      this.logger?.info('no fingerprint cache found, starting empty', { file: this.file });
      return;
    }

    let parsed: unknown;
    try {
      const raw = zlib.gunzipSync(fs.readFileSync(this.file)).toString('utf-8');
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new CacheCorruptionError(this.file, err);
    }

    const result = cacheDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new CacheCorruptionError(this.file, result.error);
    }
    for (const [localPath, record] of Object.entries(result.data)) {
      this.records.set(localPath, record);
    }
    this.logger?.debug(`loaded ${this.records.size} cache record(s)`, { file: this.file });
  }

  /**
   * Attach a fingerprint to every entry. Records whose mtime matches the
   * entry are reused; everything else is recomputed and upserted.
   */
  async reconcile<K>(entries: Map<K, Entry>): Promise<Map<K, Entry>> {
    const result = new Map<K, Entry>();
    let hits = 0;
    for (const [key, entry] of entries) {
      const record = this.records.get(entry.path);
      if (record && record.mtime === entry.mtime) {
        hits++;
        result.set(key, { ...entry, fingerprint: record.fingerprint });
        continue;
      }
      const value = await this.fingerprintFn(entry.path, this.partSize);
      this.records.set(entry.path, { fingerprint: value, mtime: entry.mtime });
      this.logger?.debug('fingerprint computed', { path: entry.path, fingerprint: value });
      result.set(key, { ...entry, fingerprint: value });
    }
    this.logger?.debug(`cache hits: ${hits}/${entries.size}`);
    return result;
  }

  /**
   * Write the whole cache back, compressed. Temp file + rename so a crash
   * mid-write never leaves a truncated document behind.
   */
  save(): void {
    const dir = path.dirname(this.file);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const document: Record<string, CacheRecord> = {};
    for (const [localPath, record] of this.records) {
      document[localPath] = record;
    }
    const tmpFile = this.file + '.tmp.' + randomBytes(4).toString('hex');
    fs.writeFileSync(tmpFile, zlib.gzipSync(JSON.stringify(document)));
    fs.renameSync(tmpFile, this.file);
    this.logger?.debug(`saved ${this.records.size} cache record(s)`, { file: this.file });
  }
}
