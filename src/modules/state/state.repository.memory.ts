import type { StudentState } from '../../common/types.js';
import type { StateBackend } from './state.repository.js';

export function createInMemoryStateBackend(): StateBackend {
  const records = new Map<string, StudentState>();
  return {
    kind: 'memory',
    async load(key) {
      const stored = records.get(key);
      return stored ? structuredClone(stored) : undefined;
    },
    async save(key, state) {
      records.set(key, structuredClone(state));
    },
  };
}
