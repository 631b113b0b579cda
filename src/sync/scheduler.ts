/**
 * Autosync: repeat passes at a fixed interval until aborted.
 */
import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage, isFatal } from './errors.js';
import type { SyncPhase, SyncResult } from './types.js';
import { createNullLogger, type Logger } from '../utils/logger.js';

/** The part of the orchestrator the loop drives. */
export interface PassRunner {
  runPass(): Promise<SyncResult>;
  setPhase(phase: SyncPhase): void;
}

export interface AutosyncOptions {
  /** Minutes between the end of one pass and the start of the next */
  intervalMinutes: number;
  signal?: AbortSignal;
  logger?: Logger;
  onResult?: (result: SyncResult) => void;
  /** Called when the loop starts sleeping, with the wake-up time */
  onSleep?: (until: Date) => void;
  onWake?: () => void;
}

/**
 * Parse an interval in minutes. Zero, empty or absent means no autosync.
 */
export function parseInterval(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const minutes = Number(value);
  if (!Number.isFinite(minutes) || minutes < 0) {
    throw new RangeError(`Invalid interval: ${value} (expected minutes >= 0)`);
  }
  return minutes > 0 ? minutes : undefined;
}

/**
 * Resolves false when the signal fired before the delay elapsed.
 */
export async function cancellableSleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') return false;
    throw err;
  }
}

/**
 * Run passes until the signal aborts. Fatal errors end the loop; anything
 * else is logged and the next pass is scheduled as usual.
 * Returns the number of passes that completed.
 */
export async function runAutosync(runner: PassRunner, options: AutosyncOptions): Promise<number> {
  const { intervalMinutes, signal, onResult, onSleep, onWake } = options;
  const logger = options.logger ?? createNullLogger();
  const intervalMs = intervalMinutes * 60 * 1000;
  let passes = 0;

  while (!signal?.aborted) {
    try {
      const result = await runner.runPass();
      passes++;
      onResult?.(result);
    } catch (err) {
      if (isFatal(err)) throw err;
      logger.error('sync pass failed, will retry after the interval', { error: errorMessage(err) });
    }

    if (signal?.aborted) break;
    runner.setPhase('sleeping');
    onSleep?.(new Date(Date.now() + intervalMs));
    const slept = await cancellableSleep(intervalMs, signal);
    onWake?.();
    if (!slept) break;
  }

  logger.info('autosync stopped', { passes });
  runner.setPhase('done');
  return passes;
}
