import type { AppConfig } from '../../config/index.js';
import type { CacheEntry } from '../../common/types.js';
import { createCosmosContainerProvider } from '../../infrastructure/cosmos/client.js';
import { createCosmosDocumentCacheStore } from './document-cache.store.cosmos.js';
import { createFileDocumentCacheStore } from './document-cache.store.file.js';
import { createInMemoryDocumentCacheStore } from './document-cache.store.memory.js';

export interface DocumentCacheStore {
  readonly kind: string;
  get(url: string): Promise<CacheEntry | undefined>;
  put(entry: CacheEntry): Promise<void>;
  delete(url: string): Promise<void>;
}

export { createCosmosDocumentCacheStore, createFileDocumentCacheStore, createInMemoryDocumentCacheStore };

export function createDocumentCacheStoreFromConfig(config: AppConfig): DocumentCacheStore {
  switch (config.cache.provider) {
    case 'cosmos':
      if (!config.cosmos) {
        throw new Error('CACHE_PROVIDER=cosmos requires COSMOS_ENDPOINT and COSMOS_KEY');
      }
      return createCosmosDocumentCacheStore(
        createCosmosContainerProvider(config.cosmos, config.cosmos.cacheContainer, '/id'),
      );
    case 'memory':
      return createInMemoryDocumentCacheStore();
    case 'file':
    default:
      return createFileDocumentCacheStore(config.cache.filePath);
  }
}
