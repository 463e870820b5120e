import type { AppConfig } from '../../config/index.js';
import type { StudentState } from '../../common/types.js';
import { studentStateSchema } from '../../common/schemas.js';
import { StoreUnavailableError, describeError } from '../../common/errors.js';
import { moduleLogger } from '../../common/logger.js';
import { createCosmosContainerProvider } from '../../infrastructure/cosmos/client.js';
import { openSQLiteDatabase } from '../../infrastructure/sqlite/client.js';
import { createStudentState, sanitizeUserId } from './student-state.model.js';
import { createCosmosStateBackend } from './state.repository.cosmos.js';
import { createFileStateBackend } from './state.repository.file.js';
import { createInMemoryStateBackend } from './state.repository.memory.js';
import { createSQLiteStateBackend } from './state.repository.sqlite.js';

/**
 * One storage target. `load` resolves undefined when the key has no valid
 * record and rejects only when the backend itself cannot be reached.
 */
export interface StateBackend {
  readonly kind: string;
  load(key: string): Promise<StudentState | undefined>;
  save(key: string, state: StudentState): Promise<void>;
  dispose?(): Promise<void>;
}

export { createCosmosStateBackend, createFileStateBackend, createInMemoryStateBackend, createSQLiteStateBackend };

const log = moduleLogger('state');

/**
 * Backend chain fixed at construction, highest priority first. Each call is
 * served by the first backend that answers.
 */
export class StateStore {
  constructor(private readonly backends: StateBackend[]) {
    if (backends.length === 0) {
      throw new Error('StateStore requires at least one backend');
    }
  }

  get kinds(): string[] {
    return this.backends.map(backend => backend.kind);
  }

  async load(userId: string): Promise<StudentState> {
    const key = sanitizeUserId(userId);
    const failures: string[] = [];
    for (const backend of this.backends) {
      try {
        const state = await backend.load(key);
        return state ?? createStudentState();
      } catch (error) {
        failures.push(`${backend.kind}: ${describeError(error)}`);
        log.warn({ backend: backend.kind, key, err: describeError(error) }, 'state load failed; trying next backend');
      }
    }
    throw new StoreUnavailableError('load', failures);
  }

  async save(userId: string, state: StudentState): Promise<void> {
    const key = sanitizeUserId(userId);
    const record = studentStateSchema.parse(state);
    const failures: string[] = [];
    for (const backend of this.backends) {
      try {
        await backend.save(key, record);
        return;
      } catch (error) {
        failures.push(`${backend.kind}: ${describeError(error)}`);
        log.warn({ backend: backend.kind, key, err: describeError(error) }, 'state save failed; trying next backend');
      }
    }
    throw new StoreUnavailableError('save', failures);
  }

  async dispose(): Promise<void> {
    for (const backend of this.backends) {
      await backend.dispose?.();
    }
  }
}

/** Relational store if configured, then Cosmos if configured, then local disk. */
export function createStateStoreFromConfig(config: AppConfig): StateStore {
  const backends: StateBackend[] = [];
  const { sqlite } = config.state;
  if (sqlite) {
    backends.push(createSQLiteStateBackend(() => openSQLiteDatabase(sqlite)));
  }
  if (config.cosmos) {
    backends.push(createCosmosStateBackend(createCosmosContainerProvider(config.cosmos, config.cosmos.stateContainer, '/id')));
  }
  backends.push(createFileStateBackend(config.state.localDir));
  const store = new StateStore(backends);
  log.info({ backends: store.kinds }, 'state store ready');
  return store;
}
