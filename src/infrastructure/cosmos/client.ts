import { CosmosClient, type ItemDefinition } from '@azure/cosmos';
import type { CosmosConfig } from '../../config/index.js';

/**
 * The slice of a Cosmos container the stores use. `Container` from
 * @azure/cosmos satisfies it; tests supply an in-memory stand-in.
 */
export interface CosmosItemHandle {
  read(): Promise<{ resource?: ItemDefinition }>;
  delete(): Promise<unknown>;
}

export interface CosmosContainerLike {
  item(id: string, partitionKey: string): CosmosItemHandle;
  items: {
    upsert(body: ItemDefinition): Promise<unknown>;
  };
}

export type CosmosContainerProvider = () => Promise<CosmosContainerLike>;

export function isCosmosNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 404;
}

/**
 * Lazily creates the database and container on first use. A failed init is
 * forgotten so the next call retries it.
 */
export function createCosmosContainerProvider(
  config: CosmosConfig,
  containerId: string,
  partitionKeyPath: string,
): CosmosContainerProvider {
  const client = new CosmosClient({ endpoint: config.endpoint, key: config.key });
  let initPromise: Promise<CosmosContainerLike> | undefined;

  return () => {
    if (!initPromise) {
      initPromise = (async () => {
        const { database } = await client.databases.createIfNotExists({ id: config.databaseId });
        const { container } = await database.containers.createIfNotExists({
          id: containerId,
          partitionKey: { paths: [partitionKeyPath], version: 2 },
        });
        return container;
      })().catch(error => {
        initPromise = undefined;
        throw error;
      });
    }
    return initPromise;
  };
}
