#!/usr/bin/env node
/**
 * Run one stage over its eligible items
 *
 * Usage:
 *   npm run press:run-stage -- --stage <name> [--limit <n>] [--config <path>]
 *
 * Exits 0 when the batch completed, whatever happened to individual items;
 * 1 on ledger, lease or artifact store failure; 2 on bad usage or config.
 */

import { STAGES } from '@pressline/press-db';
import { createLogger, loadConfig, loadEnv, openRuntime, stageBatchSize } from '@pressline/press-engine';
import { EXIT_OK, formatStageTable, parseRunStageArgs, runCli, shutdownSignal } from '../src/index.js';

function showHelp() {
  console.log(`
Usage: npm run press:run-stage -- --stage <name> [options]

Run one pipeline stage over up to <limit> eligible items.

Options:
  --stage <name>   One of: ${STAGES.join(', ')}
  --limit <n>      Batch size (default: from config)
  --config <path>  Pipeline config (default: pressline.config.yaml)
  --help           Show this help message

Environment:
  DATABASE_URL     PostgreSQL connection string (required)
  LOG_LEVEL        pino log level (default: info)
`);
}

async function main(): Promise<number> {
  const args = parseRunStageArgs(process.argv.slice(2));
  if (args.help) {
    showHelp();
    return EXIT_OK;
  }

  const env = loadEnv();
  const config = await loadConfig(args.configPath);
  const logger = createLogger({ level: env.LOG_LEVEL });
  const runtime = await openRuntime(config, env, logger);

  try {
    const limit = args.limit ?? stageBatchSize(config, args.stage);
    const summary = await runtime.runners[args.stage].run(limit, shutdownSignal());
    console.log(formatStageTable([summary]));
    if (summary.aborted) {
      console.log('Stopped early on signal');
    }
    return EXIT_OK;
  } finally {
    await runtime.close();
  }
}

runCli(main, showHelp);
