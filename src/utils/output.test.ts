import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { spyOutput } from '../__tests__/setup.js';
import { createOutput, formatProgress, handleError } from './output.js';
import type { GlobalFlags } from './flags.js';

function makeFlags(overrides: Partial<GlobalFlags> = {}): GlobalFlags {
  return {
    output: 'text',
    quiet: false,
    noColor: true,
    dryRun: false,
    ...overrides,
  };
}

describe('output', () => {
  let io: ReturnType<typeof spyOutput>;
  const originalIsTTY = process.stderr.isTTY;

  function setStderrTTY(value: boolean): void {
    Object.defineProperty(process.stderr, 'isTTY', { value, configurable: true });
  }

  beforeEach(() => {
    io = spyOutput();
    setStderrTTY(false);
  });

  afterEach(() => {
    io.restore();
    Object.defineProperty(process.stderr, 'isTTY', { value: originalIsTTY, configurable: true });
    process.exitCode = undefined;
  });

  describe('record', () => {
    it('should output aligned key-value lines in text mode', () => {
      createOutput(makeFlags()).record({ transferred: 3, failed: 0 });
      expect(io.stdout).toEqual(['Transferred: 3\n', 'Failed:      0\n']);
    });

    it('should join arrays in text mode', () => {
      createOutput(makeFlags()).record({ mismatched: ['a', 'b'] });
      expect(io.stdout).toEqual(['Mismatched: a, b\n']);
    });

    it('should output one JSON object in json mode', () => {
      createOutput(makeFlags({ output: 'json' })).record({ transferred: 3, mismatched: [] });
      expect(JSON.parse(io.stdout.join(''))).toEqual({ transferred: 3, mismatched: [] });
    });

    it('should stay silent in quiet text mode but still emit json', () => {
      createOutput(makeFlags({ quiet: true })).record({ transferred: 1 });
      expect(io.stdout).toEqual([]);
      createOutput(makeFlags({ quiet: true, output: 'json' })).record({ transferred: 1 });
      expect(io.stdout).toEqual(['{"transferred":1}\n']);
    });
  });

  describe('status and error', () => {
    it('should write status to stderr unless quiet', () => {
      createOutput(makeFlags()).status('scanning');
      createOutput(makeFlags({ quiet: true })).status('hidden');
      expect(io.stderr).toEqual(['scanning\n']);
    });

    it('should write errors to stderr even when quiet', () => {
      createOutput(makeFlags({ quiet: true })).error('bucket missing');
      expect(io.stderr.join('')).toContain('bucket missing');
    });
  });

  describe('spinner fallbacks', () => {
    it('should print a success line when no spinner is running', () => {
      const out = createOutput(makeFlags());
      out.startSpinner('working');
      out.succeedSpinner('done');
      expect(io.stderr.join('')).toContain('done');
    });

    it('should print a failure line when no spinner is running', () => {
      createOutput(makeFlags()).failSpinner('broken');
      expect(io.stderr.join('')).toContain('broken');
    });
  });

  describe('progressObserver', () => {
    it('should be inert when stderr is not a terminal', () => {
      const observer = createOutput(makeFlags()).progressObserver();
      observer.onProgress({ key: 'a.txt', bytesTransferred: 1, totalBytes: 2 });
      observer.onComplete?.('a.txt');
      expect(io.stderr).toEqual([]);
    });

    it('should render carriage-return lines on a terminal', () => {
      setStderrTTY(true);
      const observer = createOutput(makeFlags()).progressObserver();
      observer.onProgress({ key: 'a.txt', bytesTransferred: 1, totalBytes: 4 });
      observer.onComplete?.('a.txt');
      expect(io.stderr).toEqual(['\ra.txt  1 / 4  (25.00%)', '\n']);
    });
  });

  describe('formatProgress', () => {
    it('should show a percentage when the total is known', () => {
      expect(formatProgress({ key: 'k', bytesTransferred: 512, totalBytes: 1024 })).toBe('k  512 / 1024  (50.00%)');
    });

    it('should show only bytes when the total is unknown', () => {
      expect(formatProgress({ key: 'k', bytesTransferred: 10, totalBytes: 0 })).toBe('k  10 bytes');
    });
  });

  describe('handleError', () => {
    it('should print the message and set the exit code', () => {
      handleError(createOutput(makeFlags()), new Error('nope'));
      expect(io.stderr.join('')).toContain('nope');
      expect(process.exitCode).toBe(1);
    });
  });
});
