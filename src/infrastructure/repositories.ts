import type { AppConfig } from '../config/index.js';
import {
  createDocumentCacheStoreFromConfig,
  createInMemoryDocumentCacheStore,
  type DocumentCacheStore,
} from '../modules/cache/document-cache.store.js';
import {
  StateStore,
  createInMemoryStateBackend,
  createStateStoreFromConfig,
} from '../modules/state/state.repository.js';

/** Storage chosen once at boot: the student-state chain and the document cache store. */
export interface PersistenceBundle {
  stateStore: StateStore;
  documentStore: DocumentCacheStore;
  dispose: () => Promise<void>;
}

export function createInMemoryPersistenceBundle(): PersistenceBundle {
  const stateStore = new StateStore([createInMemoryStateBackend()]);
  return {
    stateStore,
    documentStore: createInMemoryDocumentCacheStore(),
    dispose: () => stateStore.dispose(),
  };
}

export function createPersistenceBundleFromConfig(config: AppConfig): PersistenceBundle {
  const stateStore = createStateStoreFromConfig(config);
  return {
    stateStore,
    documentStore: createDocumentCacheStoreFromConfig(config),
    dispose: () => stateStore.dispose(),
  };
}
