import { errorMessage } from '@pressline/press-engine';
import { UsageError } from './args.js';
import { exitCodeFor } from './exit-codes.js';

/** Run a CLI entry point and exit with the code it returns or its error's code. */
export function runCli(main: () => Promise<number>, showHelp: () => void): void {
  main().then(
    code => process.exit(code),
    (error: unknown) => {
      console.error(`Error: ${errorMessage(error)}`);
      if (error instanceof UsageError) {
        showHelp();
      }
      process.exit(exitCodeFor(error));
    }
  );
}

/** An abort signal that fires on SIGINT or SIGTERM so a sweep stops between items. */
export function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return controller.signal;
}
