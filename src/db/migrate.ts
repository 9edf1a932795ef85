// Idempotent migration runner with _migrations tracking.
import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import type { Logger } from '../log.js';
import { silentLogger } from '../log.js';

export function migrationsDir(): string {
  return process.env.MIGRATIONS_DIR ?? path.resolve(process.cwd(), 'src', 'db', 'migrations');
}

function stripOuterTransactions(sql: string): string {
  return sql
    .replace(/\bBEGIN(?:\s+TRANSACTION)?\s*;?/gi, '')
    .replace(/\bCOMMIT\s*;?/gi, '');
}

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir).filter((f) => /^\d+.*\.sql$/.test(f)).sort();
}

/**
 * Apply every not-yet-applied `NNN_name.sql` file in order, each in its own
 * transaction. Returns the names applied by this call.
 */
export function migrate(db: Database.Database, log: Logger = silentLogger, dir: string = migrationsDir()): string[] {
  db.exec('CREATE TABLE IF NOT EXISTS _migrations(name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL);');
  const files = listMigrationFiles(dir);
  if (!files.length) {
    log.warn({ msg: 'migrations_dir_missing', dir });
    return [];
  }

  const applied = new Set(
    db.prepare<[], { name: string }>('SELECT name FROM _migrations').all().map((r) => r.name),
  );
  const record = db.prepare<[string, number]>('INSERT INTO _migrations(name, applied_at) VALUES (?, ?)');
  const done: string[] = [];

  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = stripOuterTransactions(fs.readFileSync(path.join(dir, file), 'utf8')).trim();
    db.transaction(() => {
      if (sql) db.exec(sql);
      record.run(file, Date.now());
    })();
    log.info({ msg: 'migration_applied', file });
    done.push(file);
  }
  return done;
}
