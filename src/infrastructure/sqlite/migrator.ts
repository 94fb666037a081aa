import fs from 'node:fs';
import path from 'node:path';
import type { SQLiteDatabase } from './client.js';

function ensureMigrationsTable(db: SQLiteDatabase) {
  db.exec(`CREATE TABLE IF NOT EXISTS __migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL
  )`);
}

function readMigration(fullPath: string): string {
  const sql = fs.readFileSync(fullPath).toString('utf8');
  // Editors on some platforms prepend a BOM that SQLite rejects.
  return sql.replace(/\ufeff/g, '');
}

/** Applies every `*.sql` file in name order, each one exactly once and atomically. */
export function runMigrations(db: SQLiteDatabase, migrationsDir: string): string[] {
  if (!migrationsDir) {
    throw new Error('SQLite migrations directory not configured');
  }
  const resolvedDir = path.resolve(migrationsDir);
  if (!fs.existsSync(resolvedDir)) {
    throw new Error(`SQLite migrations directory ${resolvedDir} does not exist`);
  }
  ensureMigrationsTable(db);
  const files = fs
    .readdirSync(resolvedDir)
    .filter(name => name.endsWith('.sql'))
    .sort();
  const applied: string[] = [];
  for (const file of files) {
    const alreadyApplied = db.prepare('SELECT 1 FROM __migrations WHERE name = ? LIMIT 1').get(file);
    if (alreadyApplied) {
      continue;
    }
    const sql = readMigration(path.join(resolvedDir, file));
    db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO __migrations (name, applied_at) VALUES (?, ?)').run(file, new Date().toISOString());
    });
    applied.push(file);
  }
  return applied;
}
