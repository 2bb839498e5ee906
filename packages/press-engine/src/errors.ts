import type { StageName } from '@pressline/press-db';

export type PipelineErrorKind =
  | 'transient'
  | 'validation'
  | 'conflict'
  | 'infrastructure'
  | 'sweep_busy'
  | 'config';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
}

/** Rate limits, timeouts, connectivity: retried within the attempt budget. */
export class TransientError extends PipelineError {
  readonly kind = 'transient';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientError';
  }
}

/** Output that fails its contract. Retrying the same input reproduces it. */
export class ValidationError extends PipelineError {
  readonly kind = 'validation';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends PipelineError {
  readonly kind = 'conflict';

  constructor(readonly itemId: string, readonly stage: StageName, message?: string) {
    super(message ?? `Ledger conflict for ${itemId}/${stage}`);
    this.name = 'ConflictError';
  }
}

/** Ledger, lease or artifact backend failure. Fatal to the current sweep. */
export class InfrastructureError extends PipelineError {
  readonly kind = 'infrastructure';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InfrastructureError';
  }
}

export class SweepBusyError extends PipelineError {
  readonly kind = 'sweep_busy';

  constructor(readonly heldBy: string | null, readonly expiresAt: Date | null) {
    super(`Another sweep holds the lease${heldBy ? ` (${heldBy})` : ''}`);
    this.name = 'SweepBusyError';
  }
}

export class ConfigError extends PipelineError {
  readonly kind = 'config';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.join('\n')}` : message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface AdapterFailure {
  kind: 'transient' | 'validation';
  message: string;
}

/**
 * Map whatever an adapter failed with onto the retry taxonomy. Anything not
 * explicitly a validation failure is transient and bounded by maxAttempts.
 */
export function classifyAdapterError(error: unknown): AdapterFailure {
  if (error instanceof ValidationError) {
    return { kind: 'validation', message: error.message };
  }
  return { kind: 'transient', message: errorMessage(error) };
}

/** Format zod-style issues as `path: message` lines. */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
}
