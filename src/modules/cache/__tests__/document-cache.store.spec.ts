import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../../../config/index.js';
import { FakeCosmosContainer } from '../../../infrastructure/cosmos/__tests__/fake-container.js';
import { cacheDocumentId } from '../document-cache.store.cosmos.js';
import {
  createCosmosDocumentCacheStore,
  createDocumentCacheStoreFromConfig,
  createFileDocumentCacheStore,
} from '../document-cache.store.js';

const entryA = {
  url: 'https://learn.microsoft.com/azure/governance/policy/overview',
  content: 'Azure Policy evaluates resources against rules.',
  fetchedAt: '2026-02-10T09:00:00.000Z',
};
const entryB = {
  url: 'https://learn.microsoft.com/azure/cost-management-billing/costs/overview',
  content: 'Cost Management tracks spending.',
  fetchedAt: '2026-02-10T09:05:00.000Z',
};

describe('file document cache store', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'exam-coach-cache-'));
    filePath = path.join(dir, 'nested', 'documents.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('persists entries across store instances', async () => {
    const store = createFileDocumentCacheStore(filePath);
    await Promise.all([store.put(entryA), store.put(entryB)]);

    const reopened = createFileDocumentCacheStore(filePath);
    await expect(reopened.get(entryA.url)).resolves.toEqual(entryA);
    await expect(reopened.get(entryB.url)).resolves.toEqual(entryB);
  });

  it('returns undefined for unknown URLs and after delete', async () => {
    const store = createFileDocumentCacheStore(filePath);
    await expect(store.get(entryA.url)).resolves.toBeUndefined();

    await store.put(entryA);
    await store.delete(entryA.url);

    const reopened = createFileDocumentCacheStore(filePath);
    await expect(reopened.get(entryA.url)).resolves.toBeUndefined();
  });

  it('starts empty when the file is corrupt', async () => {
    const corruptPath = path.join(dir, 'corrupt.json');
    await writeFile(corruptPath, '{"version": "1.0", "data": ');
    const store = createFileDocumentCacheStore(corruptPath);

    await expect(store.get(entryA.url)).resolves.toBeUndefined();
    await store.put(entryA);
    await expect(createFileDocumentCacheStore(corruptPath).get(entryA.url)).resolves.toEqual(entryA);
  });
});

describe('cosmos document cache store', () => {
  it('stores entries under a hash of the URL', async () => {
    const container = new FakeCosmosContainer();
    const store = createCosmosDocumentCacheStore(container.provider());

    await store.put(entryA);

    expect(container.documents.has(cacheDocumentId(entryA.url))).toBe(true);
    await expect(store.get(entryA.url)).resolves.toEqual(entryA);
  });

  it('maps missing documents to undefined', async () => {
    const store = createCosmosDocumentCacheStore(new FakeCosmosContainer().provider());
    await expect(store.get(entryB.url)).resolves.toBeUndefined();
    await expect(store.delete(entryB.url)).resolves.toBeUndefined();
  });

  it('propagates connectivity failures', async () => {
    const container = new FakeCosmosContainer();
    container.failing = true;
    const store = createCosmosDocumentCacheStore(container.provider());
    await expect(store.get(entryA.url)).rejects.toThrow('ECONNREFUSED');
  });
});

describe('createDocumentCacheStoreFromConfig', () => {
  const base = loadConfig();

  it('selects the configured provider', () => {
    expect(createDocumentCacheStoreFromConfig({ ...base, cache: { provider: 'memory', filePath: 'unused.json' } }).kind).toBe(
      'memory',
    );
    expect(createDocumentCacheStoreFromConfig({ ...base, cache: { provider: 'file', filePath: 'unused.json' } }).kind).toBe(
      'file',
    );
  });

  it('requires cosmos settings for the cosmos provider', () => {
    expect(() =>
      createDocumentCacheStoreFromConfig({ ...base, cosmos: undefined, cache: { provider: 'cosmos', filePath: 'unused.json' } }),
    ).toThrow('CACHE_PROVIDER=cosmos requires COSMOS_ENDPOINT and COSMOS_KEY');
  });
});
