#!/usr/bin/env node
/**
 * List current stage records from the ledger
 *
 * Usage:
 *   npm run press:list -- [--stage <name>] [--status <status>] [--item <id>] [--limit <n>]
 */

import { createDb, createPgLedger } from '@pressline/press-db';
import { loadEnv } from '@pressline/press-engine';
import { EXIT_OK, formatRecordTable, parseListArgs, runCli } from '../src/index.js';

function showHelp() {
  console.log(`
Usage: npm run press:list -- [options]

List current stage records, most recently updated first.

Options:
  --stage <name>     Filter by stage
  --status <status>  Filter by status (PENDING, RUNNING, DONE, FAILED)
  --item <id>        Filter by item id
  --limit <n>        Number of records to show (default: 20)
  --help             Show this help message

Environment:
  DATABASE_URL       PostgreSQL connection string (required)
`);
}

async function main(): Promise<number> {
  const args = parseListArgs(process.argv.slice(2));
  if (args.help) {
    showHelp();
    return EXIT_OK;
  }

  const env = loadEnv();
  const db = createDb(env.DATABASE_URL);

  try {
    const records = await createPgLedger(db).list({
      stage: args.stage,
      status: args.status,
      itemId: args.itemId,
      limit: args.limit,
    });

    if (records.length === 0) {
      console.log('No records found.');
      return EXIT_OK;
    }
    console.log(formatRecordTable(records));
    console.log(`\nShowing ${records.length} record(s)`);
    return EXIT_OK;
  } finally {
    await db.$pool.end();
  }
}

runCli(main, showHelp);
