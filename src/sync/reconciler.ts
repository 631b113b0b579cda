/**
 * Ensures every ancestor prefix exists remotely with the expected metadata
 * before anything beneath it is written.
 */
import { PermissionDeniedError, PrefixCreationError, errorMessage } from './errors.js';
import { metadataEquals, toMetadataRecord } from './metadata.js';
import type { KeyPrefix, RemoteStore } from './types.js';
import type { Logger } from '../utils/logger.js';

export interface ReconcileResult {
  created: string[];
  updated: string[];
  /** Existing prefixes whose metadata could not be rewritten */
  skipped: string[];
}

/**
 * Walk the prefixes shallowest first. Missing prefixes are created as empty
 * placeholders (failure is fatal). Existing prefixes with empty or different
 * metadata have it replaced in place; failures there are logged and skipped,
 * since such keys may be structural objects owned by bucket policy.
 */
export async function verifyPrefixes(
  store: RemoteStore,
  prefixes: KeyPrefix[],
  logger?: Logger,
): Promise<ReconcileResult> {
  const result: ReconcileResult = { created: [], updated: [], skipped: [] };

  for (const prefix of prefixes) {
    const expected = toMetadataRecord(prefix.metadata);
    const lookup = await store.headObject(prefix.key);

    if (lookup.status === 'found') {
      const actual = lookup.value.metadata;
      if (metadataEquals(actual, expected)) {
        logger?.debug('prefix metadata ok', { key: prefix.key });
        continue;
      }
      const reason = Object.keys(actual).length === 0 ? 'no metadata found' : 'bad metadata found';
      logger?.info(`${reason} for ${prefix.key}, updating...`);
      try {
        await store.copyObjectMetadata(prefix.key, expected);
        result.updated.push(prefix.key);
      } catch (err) {
        const label = err instanceof PermissionDeniedError ? 'permission denied' : 'update failed';
        logger?.error(`${label} while updating prefix metadata, skipping`, {
          key: prefix.key,
          error: errorMessage(err),
        });
        result.skipped.push(prefix.key);
      }
      continue;
    }

    if (lookup.status === 'error') {
      logger?.warn('prefix lookup failed, attempting to create it', {
        key: prefix.key,
        error: lookup.error.message,
      });
    }

    logger?.info(`creating key '${prefix.key}'`);
    try {
      await store.putObject(prefix.key, undefined, expected);
      result.created.push(prefix.key);
    } catch (err) {
      throw new PrefixCreationError(prefix.key, err);
    }
  }

  return result;
}
