import { IllegalTransitionError } from './errors.js';
import type { StageRecord, StageStatus, TransitionInput } from './types.js';

export type TransitionPlan =
  | { kind: 'conflict' }
  | { kind: 'insert'; record: StageRecord; supersede: StageRecord | null }
  | { kind: 'update'; record: StageRecord };

export interface PlanContext {
  now: Date;
  /**
   * Artifact ref of the upstream stage's current DONE record (the item id for
   * the first stage), or null when the upstream is not DONE. Only consulted
   * for DONE transitions.
   */
  upstreamRef: string | null;
}

const SAME_GENERATION: Record<StageStatus, readonly StageStatus[]> = {
  PENDING: ['RUNNING'],
  // RUNNING -> RUNNING is orphan recovery; callers hold the item lease.
  // RUNNING -> PENDING releases an interrupted run and returns its attempt.
  RUNNING: ['RUNNING', 'PENDING', 'DONE', 'FAILED'],
  DONE: [],
  FAILED: ['RUNNING'],
};

function illegal(current: StageRecord | null, input: TransitionInput): IllegalTransitionError {
  return new IllegalTransitionError(input.itemId, input.stage, current?.status ?? null, input.status);
}

function attemptsAfter(current: StageRecord, status: StageStatus): number {
  if (status === 'RUNNING') return current.attempts + 1;
  if (status === 'PENDING') return Math.max(current.attempts - 1, 0);
  return current.attempts;
}

/**
 * Decide how a requested transition applies to the current record. Pure:
 * both ledger backends run the same rules and only differ in how they
 * persist the plan.
 */
export function planTransition(
  current: StageRecord | null,
  input: TransitionInput,
  ctx: PlanContext
): TransitionPlan {
  if ((current?.revision ?? null) !== input.expectedRevision) {
    return { kind: 'conflict' };
  }

  if (input.status === 'DONE') {
    if (!input.artifactRef) {
      throw new TypeError('DONE transition requires an artifactRef');
    }
    if (ctx.upstreamRef === null || ctx.upstreamRef !== input.inputHash) {
      return { kind: 'conflict' };
    }
  }
  if (input.status === 'FAILED' && !input.error) {
    throw new TypeError('FAILED transition requires an error');
  }

  // New input: a fresh generation supersedes whatever was there
  if (current === null || current.input_hash !== input.inputHash) {
    if (input.status !== 'PENDING' && input.status !== 'RUNNING') {
      throw illegal(current, input);
    }
    const record: StageRecord = {
      item_id: input.itemId,
      stage: input.stage,
      generation: (current?.generation ?? 0) + 1,
      revision: (current?.revision ?? 0) + 1,
      status: input.status,
      input_hash: input.inputHash,
      artifact_ref: null,
      error_kind: null,
      error_message: null,
      retryable: false,
      attempts: input.status === 'RUNNING' ? 1 : 0,
      next_attempt_at: null,
      created_at: ctx.now,
      updated_at: ctx.now,
      superseded_at: null,
    };
    return { kind: 'insert', record, supersede: current };
  }

  if (!SAME_GENERATION[current.status].includes(input.status)) {
    throw illegal(current, input);
  }
  if (current.status === 'FAILED' && !current.retryable) {
    throw illegal(current, input);
  }

  const failed = input.status === 'FAILED';
  const record: StageRecord = {
    ...current,
    revision: current.revision + 1,
    status: input.status,
    artifact_ref: input.status === 'DONE' ? input.artifactRef ?? null : null,
    error_kind: failed ? input.error?.kind ?? null : null,
    error_message: failed ? input.error?.message ?? null : null,
    retryable: failed ? input.retryable ?? false : false,
    attempts: attemptsAfter(current, input.status),
    next_attempt_at: failed ? input.nextAttemptAt ?? null : null,
    updated_at: ctx.now,
  };
  return { kind: 'update', record };
}

/**
 * Operator reset: start a new PENDING generation over the same input so a
 * terminal failure becomes eligible again, or a DONE stage is recomputed.
 */
export function planReset(
  current: StageRecord | null,
  itemId: string,
  expectedRevision: number,
  now: Date
): TransitionPlan {
  if (current === null || current.revision !== expectedRevision) {
    return { kind: 'conflict' };
  }
  if (current.status !== 'DONE' && current.status !== 'FAILED') {
    throw new IllegalTransitionError(itemId, current.stage, current.status, 'PENDING');
  }
  const record: StageRecord = {
    ...current,
    generation: current.generation + 1,
    revision: current.revision + 1,
    status: 'PENDING',
    artifact_ref: null,
    error_kind: null,
    error_message: null,
    retryable: false,
    attempts: 0,
    next_attempt_at: null,
    created_at: now,
    updated_at: now,
    superseded_at: null,
  };
  return { kind: 'insert', record, supersede: current };
}

/** Shared eligibility predicate for the in-memory ledger; mirrors the SQL in store.ledger.ts. */
export function isEligible(
  current: StageRecord | null,
  inputHash: string,
  now: Date,
  options: { maxAttempts: number; orphanAfterMs: number }
): boolean {
  if (current === null || current.status === 'PENDING' || current.input_hash !== inputHash) {
    return true;
  }
  if (current.status === 'FAILED') {
    return (
      current.retryable &&
      current.attempts < options.maxAttempts &&
      (current.next_attempt_at === null || current.next_attempt_at.getTime() <= now.getTime())
    );
  }
  if (current.status === 'RUNNING') {
    return current.updated_at.getTime() <= now.getTime() - options.orphanAfterMs;
  }
  return false;
}
