import path from 'node:path';
import { z } from 'zod';
import { JsonStore } from '../../infrastructure/json-store.js';
import { parseStoredState } from './student-state.model.js';
import type { StateBackend } from './state.repository.js';

/** One JSON file per user under `dir`, replaced atomically on save; saves for one user run in order. */
export function createFileStateBackend(dir: string): StateBackend {
  const storeFor = (key: string) => new JsonStore<unknown>(z.unknown(), path.join(dir, `${key}.json`));
  const pending = new Map<string, Promise<void>>();
  return {
    kind: 'file',
    async load(key) {
      try {
        const snapshot = await storeFor(key).read();
        return snapshot ? parseStoredState(snapshot.data, { backend: 'file', key }) : undefined;
      } catch (error) {
        if (error instanceof SyntaxError || error instanceof z.ZodError) {
          return parseStoredState(undefined, { backend: 'file', key });
        }
        throw error;
      }
    },
    save(key, state) {
      const previous = pending.get(key) ?? Promise.resolve();
      const next = previous.then(() => storeFor(key).write(state));
      // The caller sees the rejection through `next`; the chain itself keeps going.
      const tail: Promise<void> = next
        .catch(() => undefined)
        .then(() => {
          if (pending.get(key) === tail) pending.delete(key);
        });
      pending.set(key, tail);
      return next;
    },
  };
}
