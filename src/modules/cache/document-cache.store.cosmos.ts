import { createHash } from 'node:crypto';
import { cacheEntrySchema } from '../../common/schemas.js';
import type { CacheEntry } from '../../common/types.js';
import { isCosmosNotFound, type CosmosContainerProvider } from '../../infrastructure/cosmos/client.js';
import type { DocumentCacheStore } from './document-cache.store.js';

type CacheDocument = CacheEntry & { id: string };

/** Cosmos ids may not contain `/`, `?` or `#`, so documents are keyed by a URL hash. */
export function cacheDocumentId(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}

export function createCosmosDocumentCacheStore(getContainer: CosmosContainerProvider): DocumentCacheStore {
  return {
    kind: 'cosmos',
    async get(url) {
      const container = await getContainer();
      const id = cacheDocumentId(url);
      try {
        const { resource } = await container.item(id, id).read();
        if (!resource) {
          return undefined;
        }
        const parsed = cacheEntrySchema.safeParse(resource);
        return parsed.success && parsed.data.url === url ? parsed.data : undefined;
      } catch (error) {
        if (isCosmosNotFound(error)) {
          return undefined;
        }
        throw error;
      }
    },
    async put(entry) {
      const container = await getContainer();
      const document: CacheDocument = { ...entry, id: cacheDocumentId(entry.url) };
      await container.items.upsert(document);
    },
    async delete(url) {
      const container = await getContainer();
      const id = cacheDocumentId(url);
      try {
        await container.item(id, id).delete();
      } catch (error) {
        if (!isCosmosNotFound(error)) {
          throw error;
        }
      }
    },
  };
}
