import fs from 'node:fs';
import path from 'node:path';
import { createRequire } from 'node:module';
import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic, type SqlValue, type Statement } from 'sql.js';
import type { SqliteConfig } from '../../config/index.js';
import { runMigrations } from './migrator.js';

const require = createRequire(import.meta.url);
const sqlJsRoot = path.dirname(require.resolve('sql.js/dist/sql-wasm.wasm'));

let sqlJs: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs({ locateFile: (file: string) => path.join(sqlJsRoot, file) });
  }
  return sqlJs;
}

export type SqlRow = Record<string, SqlValue>;
export type SqlParams = SqlValue[] | Record<string, SqlValue>;

export interface SQLiteStatement {
  run(params?: SqlParams): void;
  get(params?: SqlParams): SqlRow | undefined;
  all(params?: SqlParams): SqlRow[];
}

export interface SQLiteDatabase {
  readonly filePath: string;
  prepare(sql: string): SQLiteStatement;
  exec(sql: string): void;
  close(): void;
}

function normalizeParams(params: SqlParams | undefined): SqlParams | undefined {
  if (params === undefined || Array.isArray(params)) {
    return params;
  }
  const normalized: Record<string, SqlValue> = {};
  for (const [key, value] of Object.entries(params)) {
    normalized[`@${key}`] = value;
  }
  return normalized;
}

function createStatement(db: SqlJsDatabase, sql: string, persist: () => void): SQLiteStatement {
  const withStatement = <T>(params: SqlParams | undefined, body: (stmt: Statement) => T): T => {
    const stmt = db.prepare(sql);
    try {
      const binding = normalizeParams(params);
      if (binding !== undefined) stmt.bind(binding);
      return body(stmt);
    } finally {
      stmt.free();
    }
  };
  return {
    run: params => {
      withStatement(params, stmt => stmt.step());
      persist();
    },
    get: params => withStatement(params, stmt => (stmt.step() ? stmt.getAsObject() : undefined)),
    all: params =>
      withStatement(params, stmt => {
        const rows: SqlRow[] = [];
        while (stmt.step()) {
          rows.push(stmt.getAsObject());
        }
        return rows;
      }),
  };
}

function exportDatabase(db: SqlJsDatabase, filePath: string) {
  const buffer = Buffer.from(db.export());
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, buffer);
}

/**
 * Opens (or creates) a single-file database, applies pending migrations and
 * returns an adapter that writes the file back after every mutation.
 */
export async function openSQLiteDatabase(config: SqliteConfig): Promise<SQLiteDatabase> {
  const SQL = await loadSqlJs();
  const filePath = path.resolve(config.dbPath);
  const db = fs.existsSync(filePath) ? new SQL.Database(fs.readFileSync(filePath)) : new SQL.Database();
  let closed = false;
  const persist = () => exportDatabase(db, filePath);

  const adapter: SQLiteDatabase = {
    filePath,
    prepare(sql: string) {
      if (closed) throw new Error(`SQLite database ${filePath} is closed`);
      return createStatement(db, sql, persist);
    },
    exec(sql: string) {
      if (closed) throw new Error(`SQLite database ${filePath} is closed`);
      db.exec(sql);
      persist();
    },
    close() {
      if (closed) return;
      persist();
      db.close();
      closed = true;
    },
  };

  runMigrations(adapter, config.migrationsDir);
  persist();
  return adapter;
}
