import type { FastifyRequest } from 'fastify';
import { AuthError } from '../../common/errors.js';
import type { ApiKeyStore } from './api-key.store.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** Caller identity resolved from `x-api-key`, when keys are configured. */
    identity?: string;
  }
}

export interface AuthResult {
  authorized: boolean;
  identity?: string;
}

/**
 * Resolves `x-api-key` to an identity. With no keys configured every caller
 * is authorized anonymously.
 */
export async function authenticate(store: ApiKeyStore, apiKey: string | string[] | undefined): Promise<AuthResult> {
  if (store.size === 0) {
    return { authorized: true };
  }
  if (!apiKey || typeof apiKey !== 'string') {
    return { authorized: false };
  }
  const record = await store.get(apiKey);
  return record ? { authorized: true, identity: record.identity } : { authorized: false };
}

/** The parts of a request the gate reads and writes. */
export interface AuthTarget {
  headers: FastifyRequest['headers'];
  identity?: string;
  log: { error(obj: object, msg: string): void };
}

export async function registerAuth(req: AuthTarget, store: ApiKeyStore): Promise<void> {
  const apiKey = req.headers['x-api-key'];
  let result: AuthResult;
  try {
    result = await authenticate(store, apiKey);
  } catch (err) {
    req.log.error({ err }, 'Failed to resolve API key');
    throw new AuthError('Unable to validate API key', 503);
  }
  if (!result.authorized) {
    throw new AuthError(apiKey ? 'Invalid API key' : 'Missing API key');
  }
  req.identity = result.identity;
}
