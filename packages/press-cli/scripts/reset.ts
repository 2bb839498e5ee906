#!/usr/bin/env node
/**
 * Reset one stage record so it runs again
 *
 * Usage:
 *   npm run press:reset -- --item <id> --stage <name>
 *
 * A DONE record is recomputed and its downstream stages follow; a terminal
 * FAILED record becomes eligible again with a fresh attempt budget.
 */

import { createDb, createPgLedger } from '@pressline/press-db';
import { loadEnv, resetStageRecord } from '@pressline/press-engine';
import { EXIT_OK, formatRecordTable, parseResetArgs, runCli } from '../src/index.js';

function showHelp() {
  console.log(`
Usage: npm run press:reset -- --item <id> --stage <name>

Start a new PENDING generation for a DONE or FAILED stage record.

Options:
  --item <id>      Work item id (sha256:...)
  --stage <name>   Stage to reset
  --help           Show this help message

Environment:
  DATABASE_URL     PostgreSQL connection string (required)
`);
}

async function main(): Promise<number> {
  const args = parseResetArgs(process.argv.slice(2));
  if (args.help) {
    showHelp();
    return EXIT_OK;
  }

  const env = loadEnv();
  const db = createDb(env.DATABASE_URL);

  try {
    const record = await resetStageRecord(createPgLedger(db), args.itemId, args.stage);
    console.log(formatRecordTable([record]));
    return EXIT_OK;
  } finally {
    await db.$pool.end();
  }
}

runCli(main, showHelp);
