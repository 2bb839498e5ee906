#!/usr/bin/env node
/**
 * Apply the ledger schema.
 *
 * Usage:
 *   npm run press:migrate [-- <migrations dir>]
 */
import { config } from 'dotenv';
import { createDb } from './db.js';
import { defaultMigrationsDir, migrate } from './migrate.js';

config();

async function main(): Promise<void> {
  const migrationsDir = process.argv[2] ?? defaultMigrationsDir();
  const db = createDb();

  try {
    const applied = await migrate(db, migrationsDir);
    console.log(
      applied.length === 0
        ? `Schema is current (${migrationsDir})`
        : `Applied ${applied.length} migration(s) from ${migrationsDir}: ${applied.join(', ')}`
    );
  } finally {
    await db.$pool.end();
  }
}

main().catch(e => {
  console.error(e);
  process.exit(1);
});
