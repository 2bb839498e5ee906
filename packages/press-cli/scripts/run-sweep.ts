#!/usr/bin/env node
/**
 * Run a full sweep: intake sync, every stage in order, status write-back
 *
 * Usage:
 *   npm run press:sweep -- [--config <path>] [--no-intake] [--limit <n>]
 *
 * Exit codes: 0 clean sweep, 1 infrastructure failure, 2 usage/config,
 * 75 another sweep holds the lease.
 */

import { createLogger, loadConfig, loadEnv, openRuntime } from '@pressline/press-engine';
import { EXIT_OK, formatSweep, parseRunSweepArgs, runCli, shutdownSignal } from '../src/index.js';

function showHelp() {
  console.log(`
Usage: npm run press:sweep -- [options]

Run one sweep of the pipeline under the deployment's sweep lease.

Options:
  --config <path>  Pipeline config (default: pressline.config.yaml)
  --no-intake      Skip the intake sync
  --limit <n>      Batch size for every stage (default: from config)
  --help           Show this help message

Environment:
  DATABASE_URL     PostgreSQL connection string (required)
  LOG_LEVEL        pino log level (default: info)
`);
}

async function main(): Promise<number> {
  const args = parseRunSweepArgs(process.argv.slice(2));
  if (args.help) {
    showHelp();
    return EXIT_OK;
  }

  const env = loadEnv();
  const config = await loadConfig(args.configPath);
  const logger = createLogger({ level: env.LOG_LEVEL });
  const runtime = await openRuntime(config, env, logger);

  try {
    const result = await runtime.scheduler.sweep({
      syncIntake: args.intake,
      limit: args.limit,
      signal: shutdownSignal(),
      timeoutMs: config.pipeline.sweepTimeoutMs,
    });
    console.log(formatSweep(result));
    return EXIT_OK;
  } finally {
    await runtime.close();
  }
}

runCli(main, showHelp);
