import { describe, it, expect } from 'vitest';
import {
  IllegalTransitionError,
  isEligible,
  planReset,
  planTransition,
  type StageRecord,
  type TransitionInput,
} from '@pressline/press-db';

const NOW = new Date('2026-03-02T09:00:00.000Z');
const ITEM = 'sha256:' + 'a'.repeat(64);
const INPUT = 'sha256:' + 'b'.repeat(64);
const OTHER_INPUT = 'sha256:' + 'c'.repeat(64);
const ARTIFACT = 'sha256:' + 'd'.repeat(64);

function record(overrides: Partial<StageRecord> = {}): StageRecord {
  return {
    item_id: ITEM,
    stage: 'reduce',
    generation: 1,
    revision: 3,
    status: 'RUNNING',
    input_hash: INPUT,
    artifact_ref: null,
    error_kind: null,
    error_message: null,
    retryable: false,
    attempts: 1,
    next_attempt_at: null,
    created_at: new Date('2026-03-01T00:00:00.000Z'),
    updated_at: new Date('2026-03-01T00:00:00.000Z'),
    superseded_at: null,
    ...overrides,
  };
}

function input(overrides: Partial<TransitionInput> = {}): TransitionInput {
  return {
    itemId: ITEM,
    stage: 'reduce',
    expectedRevision: 3,
    inputHash: INPUT,
    status: 'RUNNING',
    ...overrides,
  };
}

const ctx = { now: NOW, upstreamRef: INPUT };

describe('planTransition', () => {
  it('creates generation 1 in RUNNING with one attempt when no record exists', () => {
    const plan = planTransition(null, input({ expectedRevision: null }), ctx);

    expect(plan.kind).toBe('insert');
    if (plan.kind !== 'insert') return;
    expect(plan.supersede).toBeNull();
    expect(plan.record).toMatchObject({ generation: 1, revision: 1, status: 'RUNNING', attempts: 1, created_at: NOW });
  });

  it('reports a conflict when the revision moved', () => {
    expect(planTransition(record(), input({ expectedRevision: 2 }), ctx)).toEqual({ kind: 'conflict' });
    expect(planTransition(null, input({ expectedRevision: 3 }), ctx)).toEqual({ kind: 'conflict' });
    expect(planTransition(record(), input({ expectedRevision: null }), ctx)).toEqual({ kind: 'conflict' });
  });

  it('completes RUNNING to DONE when the upstream artifact matches', () => {
    const plan = planTransition(record(), input({ status: 'DONE', artifactRef: ARTIFACT }), ctx);

    expect(plan).toEqual({
      kind: 'update',
      record: record({ status: 'DONE', artifact_ref: ARTIFACT, revision: 4, updated_at: NOW }),
    });
  });

  it('refuses DONE when the upstream is not DONE for this input', () => {
    const done = input({ status: 'DONE', artifactRef: ARTIFACT });

    expect(planTransition(record(), done, { now: NOW, upstreamRef: null })).toEqual({ kind: 'conflict' });
    expect(planTransition(record(), done, { now: NOW, upstreamRef: OTHER_INPUT })).toEqual({ kind: 'conflict' });
  });

  it('records the error and retry schedule on FAILED', () => {
    const retryAt = new Date('2026-03-02T09:01:00.000Z');
    const plan = planTransition(
      record(),
      input({ status: 'FAILED', error: { kind: 'transient', message: 'rate limited' }, retryable: true, nextAttemptAt: retryAt }),
      ctx
    );

    expect(plan.kind).toBe('update');
    if (plan.kind !== 'update') return;
    expect(plan.record).toMatchObject({
      status: 'FAILED',
      error_kind: 'transient',
      error_message: 'rate limited',
      retryable: true,
      next_attempt_at: retryAt,
      attempts: 1,
    });
  });

  it('retries a retryable FAILED record and counts the attempt', () => {
    const failed = record({ status: 'FAILED', retryable: true, error_kind: 'transient', error_message: 'x' });
    const plan = planTransition(failed, input(), ctx);

    expect(plan.kind).toBe('update');
    if (plan.kind !== 'update') return;
    expect(plan.record).toMatchObject({ status: 'RUNNING', attempts: 2, error_kind: null, error_message: null, retryable: false });
  });

  it('releases a RUNNING record back to PENDING and returns its attempt', () => {
    const plan = planTransition(record({ attempts: 2 }), input({ status: 'PENDING' }), ctx);

    expect(plan).toEqual({
      kind: 'update',
      record: record({ status: 'PENDING', attempts: 1, revision: 4, updated_at: NOW }),
    });
  });

  it('rejects moves the state machine does not allow', () => {
    const terminal = record({ status: 'FAILED', retryable: false });
    const done = record({ status: 'DONE', artifact_ref: ARTIFACT });

    expect(() => planTransition(terminal, input(), ctx)).toThrow(IllegalTransitionError);
    expect(() => planTransition(done, input(), ctx)).toThrow(IllegalTransitionError);
    expect(() => planTransition(record({ status: 'PENDING' }), input({ status: 'FAILED', error: { kind: 'transient', message: 'x' } }), ctx)).toThrow(
      IllegalTransitionError
    );
    expect(() => planTransition(null, input({ expectedRevision: null, status: 'DONE', artifactRef: ARTIFACT }), ctx)).toThrow(
      IllegalTransitionError
    );
  });

  it('starts a new generation when the input changes, superseding the old one', () => {
    const done = record({ status: 'DONE', artifact_ref: ARTIFACT, attempts: 2 });
    const plan = planTransition(done, input({ inputHash: OTHER_INPUT }), ctx);

    expect(plan.kind).toBe('insert');
    if (plan.kind !== 'insert') return;
    expect(plan.supersede).toEqual(done);
    expect(plan.record).toMatchObject({ generation: 2, revision: 4, input_hash: OTHER_INPUT, attempts: 1, artifact_ref: null });
  });

  it('requires an artifactRef for DONE and an error for FAILED', () => {
    expect(() => planTransition(record(), input({ status: 'DONE' }), ctx)).toThrow(TypeError);
    expect(() => planTransition(record(), input({ status: 'FAILED' }), ctx)).toThrow(TypeError);
  });
});

describe('planReset', () => {
  it('opens a PENDING generation over the same input', () => {
    const done = record({ status: 'DONE', artifact_ref: ARTIFACT, attempts: 2 });
    const plan = planReset(done, ITEM, 3, NOW);

    expect(plan.kind).toBe('insert');
    if (plan.kind !== 'insert') return;
    expect(plan.record).toMatchObject({
      generation: 2,
      revision: 4,
      status: 'PENDING',
      input_hash: INPUT,
      attempts: 0,
      artifact_ref: null,
    });
  });

  it('only resets DONE or FAILED records', () => {
    expect(() => planReset(record(), ITEM, 3, NOW)).toThrow(IllegalTransitionError);
    expect(planReset(null, ITEM, 3, NOW)).toEqual({ kind: 'conflict' });
    expect(planReset(record({ status: 'DONE', artifact_ref: ARTIFACT }), ITEM, 1, NOW)).toEqual({ kind: 'conflict' });
  });
});

describe('isEligible', () => {
  const options = { maxAttempts: 3, orphanAfterMs: 60_000 };

  it('selects missing, pending and changed-input records', () => {
    expect(isEligible(null, INPUT, NOW, options)).toBe(true);
    expect(isEligible(record({ status: 'PENDING' }), INPUT, NOW, options)).toBe(true);
    expect(isEligible(record({ status: 'DONE', artifact_ref: ARTIFACT }), OTHER_INPUT, NOW, options)).toBe(true);
    expect(isEligible(record({ status: 'DONE', artifact_ref: ARTIFACT }), INPUT, NOW, options)).toBe(false);
  });

  it('selects retryable failures whose backoff has elapsed', () => {
    const failed = record({ status: 'FAILED', retryable: true, attempts: 1, next_attempt_at: NOW });

    expect(isEligible(failed, INPUT, NOW, options)).toBe(true);
    expect(isEligible({ ...failed, next_attempt_at: new Date(NOW.getTime() + 1) }, INPUT, NOW, options)).toBe(false);
    expect(isEligible({ ...failed, attempts: 3 }, INPUT, NOW, options)).toBe(false);
    expect(isEligible({ ...failed, retryable: false }, INPUT, NOW, options)).toBe(false);
  });

  it('selects RUNNING records only once they look orphaned', () => {
    const running = record({ updated_at: new Date(NOW.getTime() - 59_999) });

    expect(isEligible(running, INPUT, NOW, options)).toBe(false);
    expect(isEligible({ ...running, updated_at: new Date(NOW.getTime() - 60_000) }, INPUT, NOW, options)).toBe(true);
  });
});
