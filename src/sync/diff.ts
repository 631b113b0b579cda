/**
 * Fingerprint diff between a source and a destination key set.
 */
import { normalizeFingerprint } from './fingerprint.js';
import type { Fingerprinted, SyncDirection, SyncPlanEntry } from './types.js';
import type { Logger } from '../utils/logger.js';

export interface DiffOptions {
  /** Only changes log wording */
  direction?: SyncDirection;
  logger?: Logger;
}

/**
 * Keys of `source` that are missing from `destination` or whose fingerprints
 * differ once quotes are stripped. Source insertion order is preserved.
 */
export function diffFingerprints<T extends Fingerprinted>(
  source: Map<string, T>,
  destination: Map<string, Fingerprinted> | undefined,
  options: DiffOptions = {},
): Map<string, T> {
  const { direction = 'upload', logger } = options;
  const needsSync = new Map<string, T>();

  for (const [key, value] of source) {
    const sourceFp = normalizeFingerprint(value.fingerprint);
    const match = destination?.get(key);
    if (!match) {
      logger?.debug(`${key} needs ${direction}`, { reason: 'missing', fingerprint: sourceFp });
      needsSync.set(key, value);
      continue;
    }
    const destFp = normalizeFingerprint(match.fingerprint);
    if (sourceFp === destFp) {
      logger?.debug('match found', { key, fingerprint: sourceFp });
    } else {
      logger?.debug(`${key} needs ${direction}`, { reason: 'changed', source: sourceFp, destination: destFp });
      needsSync.set(key, value);
    }
  }

  return needsSync;
}

/**
 * Format a sync plan for human-readable display.
 */
export function formatPlan(plan: SyncPlanEntry[]): string {
  if (plan.length === 0) {
    return 'Everything is up to date.';
  }

  const symbols: Record<SyncPlanEntry['action'], string> = {
    'upload': '↑',
    'download': '↓',
    'create-prefix': '+',
    'skip': ' ',
  };
  const lines = plan.map(entry => `  ${symbols[entry.action]} ${entry.key}`);
  const totalBytes = plan.reduce((sum, entry) => sum + entry.size, 0);
  lines.push('');
  lines.push(`${plan.length} key(s), ${Math.ceil(totalBytes / 1024)} KB to transfer`);
  return lines.join('\n');
}
