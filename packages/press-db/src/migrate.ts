import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Db, Queryable } from './db.js';

export interface Migration {
  version: string;
  sql: string;
}

// Arbitrary, but shared by every process that migrates this database
const MIGRATION_LOCK_KEY = 0x70726573;

const MIGRATION_FILE = /^(\d{3}_[a-z0-9_]+)\.sql$/;

export async function loadMigrations(migrationsDir: string): Promise<Migration[]> {
  const files = (await readdir(migrationsDir)).filter(f => f.endsWith('.sql')).sort();

  const migrations: Migration[] = [];
  for (const file of files) {
    const version = MIGRATION_FILE.exec(file)?.[1];
    if (!version) {
      throw new Error(`Migration file name must look like 001_name.sql: ${file}`);
    }
    migrations.push({ version, sql: await readFile(join(migrationsDir, file), 'utf-8') });
  }
  return migrations;
}

export async function getAppliedMigrations(db: Queryable): Promise<Set<string>> {
  const { present } = await db.one<{ present: boolean }>(
    `SELECT to_regclass('public.schema_migrations') IS NOT NULL AS present`
  );
  if (!present) {
    return new Set();
  }
  const rows = await db.manyOrNone<{ version: string }>('SELECT version FROM schema_migrations');
  return new Set(rows.map(r => r.version));
}

export async function applyMigration(db: Queryable, migration: Migration): Promise<void> {
  await db.none(migration.sql);
  await db.none('INSERT INTO schema_migrations (version, applied_at) VALUES ($1, now())', [migration.version]);
}

/**
 * Apply pending migrations in one transaction. Workers that start together
 * serialize on an advisory lock, so each version is applied once.
 */
export async function migrate(db: Db, migrationsDir: string): Promise<string[]> {
  const migrations = await loadMigrations(migrationsDir);

  return db.tx('migrate', async t => {
    await t.none('SELECT pg_advisory_xact_lock($1)', [MIGRATION_LOCK_KEY]);
    const applied = await getAppliedMigrations(t);
    const pending = migrations.filter(m => !applied.has(m.version));
    for (const migration of pending) {
      await applyMigration(t, migration);
    }
    return pending.map(m => m.version);
  });
}

/** The migrations shipped with this package. */
export function defaultMigrationsDir(): string {
  return fileURLToPath(new URL('../migrations', import.meta.url));
}
