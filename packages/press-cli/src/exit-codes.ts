import { ConfigError, SweepBusyError } from '@pressline/press-engine';
import { UsageError } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
/** EX_TEMPFAIL: another sweep holds the lease; try again later. */
export const EXIT_BUSY = 75;

export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError || error instanceof ConfigError) return EXIT_USAGE;
  if (error instanceof SweepBusyError) return EXIT_BUSY;
  // Infrastructure failures and anything unexpected
  return EXIT_FAILURE;
}
