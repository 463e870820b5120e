import type { AuthConfig } from '../../config/index.js';

export interface ApiKeyRecord {
  key: string;
  identity: string;
}

export interface ApiKeyStore {
  /** Number of configured keys; zero means the gate is open. */
  readonly size: number;
  get(key: string): Promise<ApiKeyRecord | undefined>;
}

export class InMemoryApiKeyStore implements ApiKeyStore {
  private readonly records = new Map<string, ApiKeyRecord>();

  constructor(seed: ApiKeyRecord[] = []) {
    for (const record of seed) {
      this.records.set(record.key, { ...record });
    }
  }

  get size(): number {
    return this.records.size;
  }

  async get(key: string): Promise<ApiKeyRecord | undefined> {
    const stored = this.records.get(key);
    return stored ? { ...stored } : undefined;
  }
}

export function createApiKeyStoreFromConfig(config: AuthConfig): ApiKeyStore {
  return new InMemoryApiKeyStore(config.apiKeys);
}
