import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { makeTempDir, writeTree } from '../__tests__/setup.js';
import { MemoryStore } from '../__tests__/mocks/memory-store.js';
import { NotFoundError, PrefixCreationError, SetupError } from './errors.js';
import { fingerprint } from './fingerprint.js';
import { buildTemplates } from './metadata.js';
import { SyncOrchestrator, type SyncOptions } from './engine.js';
import type { StreamedPutOptions, SyncPhase } from './types.js';

const templates = buildTemplates({
  dirMode: 509,
  fileMode: 33204,
  overrides: {},
  defaultUid: 501,
  defaultGid: 20,
  now: 1700000000,
});

const HELLO_MD5 = '5d41402abc4b2a76b9719d911017c592';
const EMPTY_MD5 = 'd41d8cd98f00b204e9800998ecf8427e';

class CorruptingStore extends MemoryStore {
  async putObjectStreamed(key: string, body: Readable, options: StreamedPutOptions): Promise<void> {
    await super.putObjectStreamed(key, body, options);
    const stored = this.objects.get(key);
    if (stored) stored.etag = '"00000000000000000000000000000000"';
  }
}

/** Removes the local file between opening it and reading it. */
class VanishingFileStore extends MemoryStore {
  constructor(private readonly file: string) {
    super();
  }

  async putObjectStreamed(key: string, body: Readable, options: StreamedPutOptions): Promise<void> {
    fs.rmSync(this.file);
    await super.putObjectStreamed(key, body, options);
  }
}

describe('SyncOrchestrator', () => {
  let tmp: ReturnType<typeof makeTempDir>;
  let store: MemoryStore;

  beforeEach(() => {
    tmp = makeTempDir();
    store = new MemoryStore();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    tmp.cleanup();
  });

  function uploadOptions(overrides: Partial<SyncOptions> = {}): SyncOptions {
    return {
      local: path.join(tmp.dir, 'root'),
      remote: { bucket: 'test-bucket', key: 'home/' },
      direction: 'upload',
      store,
      templates,
      ...overrides,
    };
  }

  function downloadOptions(overrides: Partial<SyncOptions> = {}): SyncOptions {
    return {
      local: path.join(tmp.dir, 'out'),
      remote: { bucket: 'test-bucket', key: 'home/' },
      direction: 'download',
      store,
      templates,
      ...overrides,
    };
  }

  describe('directory upload', () => {
    beforeEach(() => {
      writeTree(path.join(tmp.dir, 'root'), { 'a/b.txt': 'hello' });
    });

    it('should create the destination prefix, the directory key and the file key', async () => {
      const result = await new SyncOrchestrator(uploadOptions()).runPass();

      expect(result.planned).toEqual(['home/a/', 'home/a/b.txt']);
      expect(result.transferred).toBe(2);
      expect(result.bytesTransferred).toBe(5);
      expect(result.prefixesCreated).toBe(1);
      expect(result.failed).toEqual([]);
      expect(result.mismatched).toEqual([]);
      expect([...store.objects.keys()].sort()).toEqual(['home/', 'home/a/', 'home/a/b.txt']);
      expect(store.objects.get('home/a/b.txt')?.etag).toBe(`"${HELLO_MD5}"`);
      expect(store.objects.get('home/a/')?.etag).toBe(`"${EMPTY_MD5}"`);
    });

    it('should attach stat metadata and sniffed content types', async () => {
      await new SyncOrchestrator(uploadOptions()).runPass();

      const stat = fs.statSync(path.join(tmp.dir, 'root', 'a', 'b.txt'));
      const file = store.objects.get('home/a/b.txt');
      expect(file?.metadata).toEqual({
        uid: String(stat.uid),
        gid: String(stat.gid),
        mode: String(stat.mode),
        mtime: String(Math.floor(stat.mtimeMs / 1000)),
      });
      expect(file?.contentType).toBe('text/plain');
      expect(store.objects.get('home/a/')?.contentType).toBe('application/x-directory');
      expect(store.objects.get('home/')?.metadata).toEqual({
        uid: '501',
        gid: '20',
        mode: '509',
        mtime: '1700000000',
      });
    });

    it('should apply owner overrides and metadata extras to uploaded keys', async () => {
      const withExtras = buildTemplates({
        json: '{"team": "ops"}',
        dirMode: 509,
        fileMode: 33204,
        overrides: { uid: 0, gid: 0 },
        defaultUid: 501,
        defaultGid: 20,
        now: 1700000000,
      });

      await new SyncOrchestrator(uploadOptions({ templates: withExtras, overrides: { uid: 0, gid: 0 } })).runPass();

      const file = store.objects.get('home/a/b.txt');
      expect(file?.metadata.uid).toBe('0');
      expect(file?.metadata.gid).toBe('0');
      expect(file?.metadata.team).toBe('ops');
      expect(store.objects.get('home/a/')?.metadata.uid).toBe('0');
    });

    it('should fall back to the file template mode when stat reports none', async () => {
      const file = path.join(tmp.dir, 'root', 'a', 'b.txt');
      const realStatSync = fs.statSync;
      vi.spyOn(fs, 'statSync').mockImplementation((target: fs.PathLike) => {
        const stat = realStatSync(target);
        if (String(target) === file) stat.mode = 0;
        return stat;
      });

      await new SyncOrchestrator(uploadOptions()).runPass();

      expect(store.objects.get('home/a/b.txt')?.metadata.mode).toBe('33204');
    });

    it('should transfer nothing on a second pass over an unchanged tree', async () => {
      await new SyncOrchestrator(uploadOptions()).runPass();
      store.resetCalls();

      const result = await new SyncOrchestrator(uploadOptions()).runPass();

      expect(result.planned).toEqual([]);
      expect(result.transferred).toBe(0);
      expect(store.calls.put).toEqual([]);
      expect(store.calls.putStreamed).toEqual([]);
      expect(store.calls.head).toEqual([]);
    });

    it('should upload only what changed', async () => {
      await new SyncOrchestrator(uploadOptions()).runPass();
      writeTree(path.join(tmp.dir, 'root'), { 'a/b.txt': 'hello again', 'c.txt': 'c' });
      store.resetCalls();

      const result = await new SyncOrchestrator(uploadOptions()).runPass();

      expect(result.planned).toEqual(['home/c.txt', 'home/a/b.txt']);
      expect(store.calls.putStreamed).toEqual(['home/c.txt', 'home/a/b.txt']);
    });

    it('should upload everything under force without listing first', async () => {
      await new SyncOrchestrator(uploadOptions()).runPass();
      store.resetCalls();

      const result = await new SyncOrchestrator(uploadOptions({ force: true })).runPass();

      expect(result.planned).toEqual(['home/a/', 'home/a/b.txt']);
      expect(result.transferred).toBe(2);
      // The only listing is the verification one
      expect(store.calls.list).toEqual(['home/']);
    });

    it('should report phases in order', async () => {
      const phases: SyncPhase[] = [];
      const orchestrator = new SyncOrchestrator(uploadOptions({ onPhase: phase => phases.push(phase) }));
      expect(orchestrator.phase).toBe('idle');

      await orchestrator.runPass();

      expect(phases).toEqual(['scanning', 'diffing', 'reconciling-prefixes', 'transferring', 'verifying', 'done']);
      expect(orchestrator.phase).toBe('done');
    });

    it('should stop after diffing on a dry run', async () => {
      const onPlan = vi.fn();
      const result = await new SyncOrchestrator(uploadOptions({ dryRun: true, onPlan })).runPass();

      expect(result.dryRun).toBe(true);
      expect(result.planned).toEqual(['home/a/', 'home/a/b.txt']);
      expect(result.transferred).toBe(0);
      expect(store.objects.size).toBe(0);
      expect(onPlan).toHaveBeenCalledTimes(1);
    });

    it('should log a per-key failure and carry on', async () => {
      store.fail('putStreamed', 'home/a/b.txt');

      const result = await new SyncOrchestrator(uploadOptions()).runPass();

      expect(result.transferred).toBe(1);
      expect(result.failed).toEqual([
        { key: 'home/a/b.txt', path: path.join(tmp.dir, 'root', 'a', 'b.txt'), error: 'injected failure' },
      ]);
      expect(result.mismatched).toEqual([]);
    });

    it('should close the read stream when the upload fails', async () => {
      const realCreateReadStream = fs.createReadStream;
      const streams: fs.ReadStream[] = [];
      vi.spyOn(fs, 'createReadStream').mockImplementation((...args: Parameters<typeof fs.createReadStream>) => {
        const stream = realCreateReadStream(...args);
        streams.push(stream);
        return stream;
      });
      store.fail('putStreamed', 'home/a/b.txt');

      await new SyncOrchestrator(uploadOptions()).runPass();

      expect(streams).toHaveLength(1);
      expect(streams[0].destroyed).toBe(true);
    });

    it('should record a file that disappears mid-upload as a per-key failure', async () => {
      const file = path.join(tmp.dir, 'root', 'a', 'b.txt');
      store = new VanishingFileStore(file);

      const result = await new SyncOrchestrator(uploadOptions()).runPass();

      expect(result.failed.map(failure => failure.key)).toEqual(['home/a/b.txt']);
      expect(result.failed[0].error).toContain('ENOENT');
      expect(store.objects.has('home/a/b.txt')).toBe(false);
    });

    it('should abort when the destination prefix cannot be created', async () => {
      store.deny('put', 'home/');

      await expect(new SyncOrchestrator(uploadOptions()).runPass()).rejects.toThrow(PrefixCreationError);
      expect(store.calls.putStreamed).toEqual([]);
    });

    it('should flag keys whose stored fingerprint does not match after upload', async () => {
      store = new CorruptingStore();

      const result = await new SyncOrchestrator(uploadOptions()).runPass();

      expect(result.mismatched).toEqual(['home/a/b.txt']);
    });

    it('should report streamed progress to the observer', async () => {
      const observer = { onProgress: vi.fn(), onComplete: vi.fn() };

      await new SyncOrchestrator(uploadOptions({ observer })).runPass();

      expect(observer.onProgress).toHaveBeenLastCalledWith({ key: 'home/a/b.txt', bytesTransferred: 5, totalBytes: 5 });
      expect(observer.onComplete).toHaveBeenCalledWith('home/a/b.txt');
    });

    it('should skip excluded paths', async () => {
      writeTree(path.join(tmp.dir, 'root'), { 'a/skip.tmp': 'x' });

      const result = await new SyncOrchestrator(uploadOptions({ ignorePatterns: ['*.tmp'] })).runPass();

      expect(result.planned).toEqual(['home/a/', 'home/a/b.txt']);
    });

    it('should throw NotFoundError when the local root is missing', async () => {
      const options = uploadOptions({ local: path.join(tmp.dir, 'missing') });
      await expect(new SyncOrchestrator(options).runPass()).rejects.toThrow(NotFoundError);
    });
  });

  describe('fingerprint cache', () => {
    let cacheFile: string;

    beforeEach(() => {
      writeTree(path.join(tmp.dir, 'root'), { 'a/b.txt': 'hello', 'c.txt': 'c' });
      cacheFile = path.join(tmp.dir, 'cache', 'fingerprints.json.gz');
    });

    it('should fingerprint unchanged files only once across passes', async () => {
      const spy = vi.fn(fingerprint);

      await new SyncOrchestrator(uploadOptions({ cacheFile, fingerprint: spy })).runPass();
      await new SyncOrchestrator(uploadOptions({ cacheFile, fingerprint: spy })).runPass();

      expect(spy).toHaveBeenCalledTimes(2);
      expect(fs.existsSync(cacheFile)).toBe(true);
    });

    it('should treat a corrupt cache as a full miss', async () => {
      fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
      fs.writeFileSync(cacheFile, 'garbage');
      const spy = vi.fn(fingerprint);

      const result = await new SyncOrchestrator(uploadOptions({ cacheFile, fingerprint: spy })).runPass();

      expect(result.transferred).toBe(3);
      expect(spy).toHaveBeenCalledTimes(2);
    });

    it('should neither read nor write the cache under force', async () => {
      await new SyncOrchestrator(uploadOptions({ force: true, cacheFile })).runPass();
      expect(fs.existsSync(cacheFile)).toBe(false);
    });
  });

  describe('single-file upload', () => {
    it('should append the basename to a directory-style key and create its ancestors', async () => {
      writeTree(tmp.dir, { 'notes.txt': 'hello' });

      const result = await new SyncOrchestrator(uploadOptions({
        local: path.join(tmp.dir, 'notes.txt'),
        remote: { bucket: 'test-bucket', key: 'home/user/' },
      })).runPass();

      expect(result.planned).toEqual(['home/user/notes.txt']);
      expect(result.prefixesCreated).toBe(2);
      expect([...store.objects.keys()].sort()).toEqual(['home/', 'home/user/', 'home/user/notes.txt']);
    });

    it('should upload to a file-style key as given', async () => {
      writeTree(tmp.dir, { 'notes.txt': 'hello' });

      const result = await new SyncOrchestrator(uploadOptions({
        local: path.join(tmp.dir, 'notes.txt'),
        remote: { bucket: 'test-bucket', key: 'home/renamed.txt' },
      })).runPass();

      expect(result.planned).toEqual(['home/renamed.txt']);
      expect(result.mismatched).toEqual([]);
    });
  });

  describe('directory download', () => {
    beforeEach(() => {
      store.seed('home/', '');
      store.seed('home/a/', '');
      store.seed('home/a/b.txt', 'hello');
      store.seed('home/c.txt', 'c');
    });

    it('should recreate directories and files under the local root', async () => {
      const result = await new SyncOrchestrator(downloadOptions()).runPass();
      const out = path.join(tmp.dir, 'out');

      expect(result.planned).toEqual(['home/a/', 'home/a/b.txt', 'home/c.txt']);
      expect(result.transferred).toBe(3);
      expect(result.bytesTransferred).toBe(6);
      expect(result.mismatched).toEqual([]);
      expect(fs.readFileSync(path.join(out, 'a', 'b.txt'), 'utf-8')).toBe('hello');
      expect(fs.readFileSync(path.join(out, 'c.txt'), 'utf-8')).toBe('c');
      expect(fs.readdirSync(out).sort()).toEqual(['a', 'c.txt']);
    });

    it('should download nothing when the local tree already matches', async () => {
      await new SyncOrchestrator(downloadOptions()).runPass();
      store.resetCalls();

      const result = await new SyncOrchestrator(downloadOptions()).runPass();

      expect(result.planned).toEqual([]);
      expect(store.calls.get).toEqual([]);
    });

    it('should download only changed objects', async () => {
      await new SyncOrchestrator(downloadOptions()).runPass();
      store.seed('home/c.txt', 'changed');
      store.resetCalls();

      const result = await new SyncOrchestrator(downloadOptions()).runPass();

      expect(result.planned).toEqual(['home/c.txt']);
      expect(fs.readFileSync(path.join(tmp.dir, 'out', 'c.txt'), 'utf-8')).toBe('changed');
    });

    it('should never touch the remote side with writes', async () => {
      await new SyncOrchestrator(downloadOptions()).runPass();

      expect(store.calls.put).toEqual([]);
      expect(store.calls.copy).toEqual([]);
      expect(store.calls.putStreamed).toEqual([]);
    });

    it('should keep going after a failed download', async () => {
      store.fail('get', 'home/a/b.txt');

      const result = await new SyncOrchestrator(downloadOptions()).runPass();

      expect(result.failed.map(failure => failure.key)).toEqual(['home/a/b.txt']);
      expect(result.transferred).toBe(2);
      expect(fs.existsSync(path.join(tmp.dir, 'out', 'a', 'b.txt'))).toBe(false);
    });

    it('should refuse keys that would land outside the local root', async () => {
      store.seed('home/../../escaped.txt', 'x');
      const out = path.join(tmp.dir, 'deep', 'out');

      const result = await new SyncOrchestrator(downloadOptions({ local: out })).runPass();

      expect(result.failed).toEqual([
        { key: 'home/../../escaped.txt', error: 'Key "home/../../escaped.txt" resolves outside the local root' },
      ]);
      expect(result.planned).toEqual(['home/a/', 'home/a/b.txt', 'home/c.txt']);
      expect(fs.existsSync(path.join(tmp.dir, 'escaped.txt'))).toBe(false);
      expect(fs.readFileSync(path.join(out, 'c.txt'), 'utf-8')).toBe('c');
    });
  });

  describe('single-file download', () => {
    beforeEach(() => {
      store.seed('home/c.txt', 'hello');
    });

    it('should land in an existing directory under the key basename', async () => {
      const result = await new SyncOrchestrator(downloadOptions({
        local: tmp.dir,
        remote: { bucket: 'test-bucket', key: 'home/c.txt' },
      })).runPass();

      expect(result.planned).toEqual(['home/c.txt']);
      expect(fs.readFileSync(path.join(tmp.dir, 'c.txt'), 'utf-8')).toBe('hello');
    });

    it('should skip a local file that already matches', async () => {
      writeTree(tmp.dir, { 'copy.txt': 'hello' });

      const result = await new SyncOrchestrator(downloadOptions({
        local: path.join(tmp.dir, 'copy.txt'),
        remote: { bucket: 'test-bucket', key: 'home/c.txt' },
      })).runPass();

      expect(result.planned).toEqual([]);
      expect(store.calls.get).toEqual([]);
    });

    it('should refuse a key whose basename leaves the target directory', async () => {
      store.seed('home/..', 'x');
      const options = downloadOptions({ local: tmp.dir, remote: { bucket: 'test-bucket', key: 'home/..' } });

      await expect(new SyncOrchestrator(options).runPass()).rejects.toThrow(SetupError);
      expect(store.calls.get).toEqual([]);
    });

    it('should throw NotFoundError for a missing key', async () => {
      const options = downloadOptions({ remote: { bucket: 'test-bucket', key: 'home/missing.txt' } });
      await expect(new SyncOrchestrator(options).runPass()).rejects.toThrow(NotFoundError);
    });
  });
});
