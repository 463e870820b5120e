import fs from 'node:fs';
import path from 'node:path';
import type { SQLiteDatabase } from './client.js';

function ensureLedger(db: SQLiteDatabase) {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL
  )`);
}

/** Applies every `*.sql` file in `migrationsDir` not yet recorded, in name order. */
export function runMigrations(db: SQLiteDatabase, migrationsDir: string): string[] {
  if (!migrationsDir) {
    throw new Error('SQLite migrations directory not configured');
  }
  const resolvedDir = path.resolve(migrationsDir);
  if (!fs.existsSync(resolvedDir)) {
    throw new Error(`SQLite migrations directory not found: ${resolvedDir}`);
  }
  ensureLedger(db);
  const files = fs
    .readdirSync(resolvedDir)
    .filter(name => name.endsWith('.sql'))
    .sort();
  const applied: string[] = [];
  for (const file of files) {
    const alreadyApplied = db.prepare('SELECT 1 FROM schema_migrations WHERE name = ? LIMIT 1').get([file]);
    if (alreadyApplied) {
      continue;
    }
    // Strip UTF-8 BOM if present
    const sql = fs.readFileSync(path.join(resolvedDir, file), 'utf8').replace(/\ufeff/g, '');
    db.exec(sql);
    db.prepare('INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)').run([file, new Date().toISOString()]);
    applied.push(file);
  }
  return applied;
}
