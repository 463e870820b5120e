import { isCosmosNotFound, type CosmosContainerProvider } from '../../infrastructure/cosmos/client.js';
import type { StudentState } from '../../common/types.js';
import { parseStoredState } from './student-state.model.js';
import type { StateBackend } from './state.repository.js';

type StateDocument = {
  id: string;
  state: StudentState;
  updatedAt: string;
};

export function createCosmosStateBackend(getContainer: CosmosContainerProvider): StateBackend {
  return {
    kind: 'cosmos',
    async load(key) {
      const container = await getContainer();
      try {
        const { resource } = await container.item(key, key).read();
        return resource ? parseStoredState(resource.state, { backend: 'cosmos', key }) : undefined;
      } catch (error) {
        if (isCosmosNotFound(error)) {
          return undefined;
        }
        throw error;
      }
    },
    async save(key, state) {
      const container = await getContainer();
      const document: StateDocument = { id: key, state, updatedAt: new Date().toISOString() };
      await container.items.upsert(document);
    },
  };
}
