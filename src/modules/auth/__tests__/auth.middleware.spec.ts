import type { IncomingHttpHeaders } from 'node:http';
import { describe, expect, it, vi } from 'vitest';
import { AuthError } from '../../../common/errors.js';
import { InMemoryApiKeyStore, createApiKeyStoreFromConfig, type ApiKeyStore } from '../api-key.store.js';
import { authenticate, registerAuth, type AuthTarget } from '../auth.middleware.js';

function createRequest(headers: IncomingHttpHeaders = {}) {
  const error = vi.fn();
  const request: AuthTarget = { headers, log: { error } };
  return { request, error };
}

describe('authenticate', () => {
  it('is open when no keys are configured', async () => {
    await expect(authenticate(new InMemoryApiKeyStore(), undefined)).resolves.toEqual({ authorized: true });
  });

  it('seeds the store from configured keys', async () => {
    const store = createApiKeyStoreFromConfig({
      apiKeys: [
        { key: 'test-key', identity: 'alice' },
        { key: 'second-key', identity: 'bob' },
      ],
    });
    expect(store.size).toBe(2);
    await expect(store.get('second-key')).resolves.toEqual({ key: 'second-key', identity: 'bob' });
  });

  it('maps a known key to its identity', async () => {
    const store = new InMemoryApiKeyStore([{ key: 'test-key', identity: 'alice' }]);
    await expect(authenticate(store, 'test-key')).resolves.toEqual({ authorized: true, identity: 'alice' });
    await expect(authenticate(store, 'other')).resolves.toEqual({ authorized: false });
    await expect(authenticate(store, ['test-key', 'test-key'])).resolves.toEqual({ authorized: false });
  });
});

describe('registerAuth', () => {
  const store = new InMemoryApiKeyStore([{ key: 'test-key', identity: 'alice' }]);

  it('rejects a missing key with 401', async () => {
    const { request } = createRequest();
    const rejection = registerAuth(request, store);
    await expect(rejection).rejects.toBeInstanceOf(AuthError);
    await expect(rejection).rejects.toMatchObject({ statusCode: 401, message: 'Missing API key' });
  });

  it('rejects an unknown key with 401', async () => {
    const { request } = createRequest({ 'x-api-key': 'bad-key' });
    await expect(registerAuth(request, store)).rejects.toMatchObject({ statusCode: 401, message: 'Invalid API key' });
  });

  it('attaches the identity for a valid key', async () => {
    const { request } = createRequest({ 'x-api-key': 'test-key' });
    await registerAuth(request, store);
    expect(request.identity).toBe('alice');
  });

  it('answers 503 when the key store fails', async () => {
    const failing: ApiKeyStore = {
      size: 1,
      get: async () => {
        throw new Error('store offline');
      },
    };
    const { request, error } = createRequest({ 'x-api-key': 'test-key' });

    await expect(registerAuth(request, failing)).rejects.toMatchObject({
      statusCode: 503,
      message: 'Unable to validate API key',
    });
    expect(error).toHaveBeenCalledTimes(1);
  });
});
