/**
 * Paginated enumeration of remote keys under a prefix.
 */
import type { RemoteObject, RemoteStore } from './types.js';
import type { Logger } from '../utils/logger.js';

export interface ListOptions {
  /**
   * Stop paginating once every key in this set has been seen. Keys that were
   * never seen are simply absent from the result.
   */
  targetKeys?: Set<string>;
  logger?: Logger;
}

/**
 * List every object under `prefix`, keyed by object key in listing order.
 * A prefix with no objects yields an empty map.
 */
export async function listRemote(
  store: RemoteStore,
  prefix: string,
  options: ListOptions = {},
): Promise<Map<string, RemoteObject>> {
  const { targetKeys, logger } = options;
  const objects = new Map<string, RemoteObject>();
  let pages = 0;
  let found = 0;

  for await (const page of store.listObjects(prefix)) {
    pages++;
    for (const object of page) {
      if (targetKeys) {
        if (!targetKeys.has(object.key)) continue;
        if (!objects.has(object.key)) found++;
      }
      objects.set(object.key, object);
    }
    if (targetKeys && found >= targetKeys.size) {
      logger?.debug(`all ${targetKeys.size} target key(s) found after ${pages} page(s)`, { prefix });
      return objects;
    }
  }

  if (pages === 0 || objects.size === 0) {
    logger?.info(`${prefix || '(bucket root)'} has no matching objects yet`);
  } else {
    logger?.debug(`listed ${objects.size} object(s) in ${pages} page(s)`, { prefix });
  }
  return objects;
}
