import type { CacheEntry } from '../../common/types.js';
import type { DocumentCacheStore } from './document-cache.store.js';

export function createInMemoryDocumentCacheStore(): DocumentCacheStore {
  const entries = new Map<string, CacheEntry>();
  return {
    kind: 'memory',
    async get(url) {
      const entry = entries.get(url);
      return entry ? { ...entry } : undefined;
    },
    async put(entry) {
      entries.set(entry.url, { ...entry });
    },
    async delete(url) {
      entries.delete(url);
    },
  };
}
