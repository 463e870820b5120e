import type { SQLiteDatabase } from '../../infrastructure/sqlite/client.js';
import { parseStoredState } from './student-state.model.js';
import type { StateBackend } from './state.repository.js';

/** Opens the database on first use; a failed open is retried on the next call. */
export function createSQLiteStateBackend(open: () => Promise<SQLiteDatabase>): StateBackend {
  let connection: Promise<SQLiteDatabase> | undefined;

  function getDatabase(): Promise<SQLiteDatabase> {
    if (!connection) {
      connection = open().catch(error => {
        connection = undefined;
        throw error;
      });
    }
    return connection;
  }

  return {
    kind: 'sqlite',
    async load(key) {
      const db = await getDatabase();
      const row = db.prepare('SELECT payload FROM student_state WHERE user_id = ?').get([key]);
      if (!row) {
        return undefined;
      }
      const payload = row.payload;
      if (typeof payload !== 'string') {
        return parseStoredState(undefined, { backend: 'sqlite', key });
      }
      let decoded: unknown;
      try {
        decoded = JSON.parse(payload);
      } catch {
        decoded = undefined;
      }
      return parseStoredState(decoded, { backend: 'sqlite', key });
    },
    async save(key, state) {
      const db = await getDatabase();
      db.prepare(
        `INSERT INTO student_state (user_id, payload, updated_at)
         VALUES (@userId, @payload, @updatedAt)
         ON CONFLICT(user_id) DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at`,
      ).run({ userId: key, payload: JSON.stringify(state), updatedAt: new Date().toISOString() });
    },
    async dispose() {
      if (!connection) {
        return;
      }
      const db = await connection;
      connection = undefined;
      db.close();
    },
  };
}
