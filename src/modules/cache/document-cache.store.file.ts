import { z } from 'zod';
import { cacheEntrySchema } from '../../common/schemas.js';
import type { CacheEntry } from '../../common/types.js';
import { moduleLogger } from '../../common/logger.js';
import { describeError } from '../../common/errors.js';
import { JsonStore } from '../../infrastructure/json-store.js';
import type { DocumentCacheStore } from './document-cache.store.js';

const log = moduleLogger('cache');

const cacheFileSchema = z.record(cacheEntrySchema);

/**
 * All entries live in one JSON file keyed by URL. The file is read once;
 * writes are serialized so each rewrite contains every earlier put.
 */
export function createFileDocumentCacheStore(filePath: string): DocumentCacheStore {
  const store = new JsonStore<Record<string, CacheEntry>>(cacheFileSchema, filePath);
  let entries: Promise<Map<string, CacheEntry>> | undefined;
  let writes: Promise<void> = Promise.resolve();

  function loadEntries(): Promise<Map<string, CacheEntry>> {
    if (!entries) {
      entries = store.read().then(
        snapshot => new Map(Object.entries(snapshot?.data ?? {})),
        error => {
          log.warn({ filePath, err: describeError(error) }, 'cache file unreadable; starting empty');
          return new Map<string, CacheEntry>();
        },
      );
    }
    return entries;
  }

  function persist(mutate: (current: Map<string, CacheEntry>) => void): Promise<void> {
    const next = writes.then(async () => {
      const current = await loadEntries();
      mutate(current);
      await store.write(Object.fromEntries(current));
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    writes = next.catch(error => {
      log.warn({ filePath, err: describeError(error) }, 'cache file write failed');
    });
    return next;
  }

  return {
    kind: 'file',
    async get(url) {
      const current = await loadEntries();
      return current.get(url);
    },
    put(entry) {
      return persist(current => {
        current.set(entry.url, entry);
      });
    },
    delete(url) {
      return persist(current => {
        current.delete(url);
      });
    },
  };
}
