import { Db, Queryable, isUniqueViolation } from './db.js';
import { upstreamOf, type StageName } from './stages.js';
import { planReset, planTransition, type TransitionPlan } from './transitions.js';
import {
  systemClock,
  type Clock,
  type EligibleItem,
  type ListEligibleOptions,
  type ListRecordsFilter,
  type StageRecord,
  type StateLedger,
  type TransitionInput,
  type TransitionResult,
} from './types.js';

const CURRENT = `superseded_at IS NULL`;

export async function getStageRecord(
  db: Queryable,
  itemId: string,
  stage: StageName
): Promise<StageRecord | null> {
  return db.oneOrNone<StageRecord>(
    `SELECT * FROM stage_records WHERE item_id = $1 AND stage = $2 AND ${CURRENT}`,
    [itemId, stage]
  );
}

export async function getStageHistory(
  db: Queryable,
  itemId: string,
  stage: StageName
): Promise<StageRecord[]> {
  return db.manyOrNone<StageRecord>(
    `SELECT * FROM stage_records WHERE item_id = $1 AND stage = $2 ORDER BY generation ASC`,
    [itemId, stage]
  );
}

/**
 * The ref a DONE transition must consume: the upstream stage's current DONE
 * artifact, or the item id itself for the first stage.
 */
async function readUpstreamRef(t: Queryable, itemId: string, stage: StageName): Promise<string | null> {
  const upstream = upstreamOf(stage);
  if (upstream === null) {
    const row = await t.oneOrNone<{ item_id: string }>(
      `SELECT item_id FROM work_items WHERE item_id = $1`,
      [itemId]
    );
    return row?.item_id ?? null;
  }
  const row = await t.oneOrNone<{ artifact_ref: string | null }>(
    `SELECT artifact_ref FROM stage_records
     WHERE item_id = $1 AND stage = $2 AND ${CURRENT} AND status = 'DONE'
     FOR SHARE`,
    [itemId, upstream]
  );
  return row?.artifact_ref ?? null;
}

async function persistPlan(
  t: Queryable,
  plan: Exclude<TransitionPlan, { kind: 'conflict' }>,
  expectedRevision: number | null
): Promise<StageRecord | null> {
  const r = plan.record;

  if (plan.kind === 'insert') {
    if (plan.supersede) {
      await t.none(
        `UPDATE stage_records SET superseded_at = $4
         WHERE item_id = $1 AND stage = $2 AND generation = $3 AND ${CURRENT}`,
        [r.item_id, r.stage, plan.supersede.generation, r.created_at]
      );
    }
    return t.one<StageRecord>(
      `INSERT INTO stage_records(
        item_id, stage, generation, revision, status, input_hash, artifact_ref,
        error_kind, error_message, retryable, attempts, next_attempt_at,
        created_at, updated_at
      ) VALUES($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
      RETURNING *`,
      [
        r.item_id, r.stage, r.generation, r.revision, r.status, r.input_hash, r.artifact_ref,
        r.error_kind, r.error_message, r.retryable, r.attempts, r.next_attempt_at,
        r.created_at, r.updated_at
      ]
    );
  }

  return t.oneOrNone<StageRecord>(
    `UPDATE stage_records
     SET revision = $5, status = $6, artifact_ref = $7, error_kind = $8, error_message = $9,
         retryable = $10, attempts = $11, next_attempt_at = $12, updated_at = $13
     WHERE item_id = $1 AND stage = $2 AND generation = $3 AND revision = $4 AND ${CURRENT}
     RETURNING *`,
    [
      r.item_id, r.stage, r.generation, expectedRevision,
      r.revision, r.status, r.artifact_ref, r.error_kind, r.error_message,
      r.retryable, r.attempts, r.next_attempt_at, r.updated_at
    ]
  );
}

async function applyPlanned(
  db: Db,
  itemId: string,
  stage: StageName,
  expectedRevision: number | null,
  plan: (current: StageRecord | null, t: Queryable) => Promise<TransitionPlan>
): Promise<TransitionResult> {
  try {
    return await db.tx(async t => {
      const current = await t.oneOrNone<StageRecord>(
        `SELECT * FROM stage_records WHERE item_id = $1 AND stage = $2 AND ${CURRENT} FOR UPDATE`,
        [itemId, stage]
      );
      const planned = await plan(current, t);
      if (planned.kind === 'conflict') {
        return { ok: false, reason: 'conflict', current } as const;
      }
      const record = await persistPlan(t, planned, expectedRevision);
      if (!record) {
        return { ok: false, reason: 'conflict', current } as const;
      }
      return { ok: true, record } as const;
    });
  } catch (e) {
    // Two writers both saw no record and raced on the first insert
    if (isUniqueViolation(e)) {
      return { ok: false, reason: 'conflict', current: await getStageRecord(db, itemId, stage) };
    }
    throw e;
  }
}

export async function transitionStage(
  db: Db,
  input: TransitionInput,
  now: Date = new Date()
): Promise<TransitionResult> {
  return applyPlanned(db, input.itemId, input.stage, input.expectedRevision, async (current, t) => {
    const upstreamRef = input.status === 'DONE' ? await readUpstreamRef(t, input.itemId, input.stage) : null;
    return planTransition(current, input, { now, upstreamRef });
  });
}

export async function resetStage(
  db: Db,
  itemId: string,
  stage: StageName,
  expectedRevision: number,
  now: Date = new Date()
): Promise<TransitionResult> {
  return applyPlanned(db, itemId, stage, expectedRevision, async current =>
    planReset(current, itemId, expectedRevision, now)
  );
}

interface EligibleRow {
  item_id: string;
  input_hash: string;
  ready_at: Date;
}

const ELIGIBLE_CURRENT = `
  s.item_id IS NULL
  OR s.status = 'PENDING'
  OR s.input_hash <> u.input_hash
  OR (s.status = 'FAILED' AND s.retryable AND s.attempts < $(maxAttempts)
      AND (s.next_attempt_at IS NULL OR s.next_attempt_at <= $(now)))
  OR (s.status = 'RUNNING' AND s.updated_at <= $(orphanBefore))`;

export async function listEligibleItems(
  db: Queryable,
  stage: StageName,
  upstreamStage: StageName | null,
  limit: number,
  options: ListEligibleOptions,
  now: Date = new Date()
): Promise<EligibleItem[]> {
  const params = {
    stage,
    upstreamStage,
    limit,
    maxAttempts: options.maxAttempts,
    now,
    orphanBefore: new Date(now.getTime() - options.orphanAfterMs),
  };

  // The first stage consumes the work item itself
  const upstream = upstreamStage === null
    ? `SELECT item_id, item_id AS input_hash, created_at AS ready_at FROM work_items`
    : `SELECT item_id, artifact_ref AS input_hash, updated_at AS ready_at
       FROM stage_records
       WHERE stage = $(upstreamStage) AND ${CURRENT} AND status = 'DONE'`;

  const rows = await db.manyOrNone<EligibleRow>(
    `SELECT u.item_id, u.input_hash, u.ready_at
     FROM (${upstream}) u
     LEFT JOIN stage_records s
       ON s.item_id = u.item_id AND s.stage = $(stage) AND s.superseded_at IS NULL
     WHERE ${ELIGIBLE_CURRENT}
     ORDER BY u.ready_at ASC, u.item_id ASC
     LIMIT $(limit)`,
    params
  );

  return rows.map(row => ({ itemId: row.item_id, inputHash: row.input_hash, readyAt: row.ready_at }));
}

export async function listStageRecords(db: Queryable, filter: ListRecordsFilter = {}): Promise<StageRecord[]> {
  return db.manyOrNone<StageRecord>(
    `SELECT * FROM stage_records
     WHERE ${CURRENT}
       AND ($(stage) IS NULL OR stage = $(stage))
       AND ($(status) IS NULL OR status = $(status))
       AND ($(itemId) IS NULL OR item_id = $(itemId))
     ORDER BY updated_at DESC, item_id
     LIMIT $(limit)`,
    {
      stage: filter.stage ?? null,
      status: filter.status ?? null,
      itemId: filter.itemId ?? null,
      limit: filter.limit ?? 50,
    }
  );
}

export interface PgLedgerOptions {
  clock?: Clock;
}

export function createPgLedger(db: Db, options: PgLedgerOptions = {}): StateLedger {
  const clock = options.clock ?? systemClock;
  return {
    get: (itemId, stage) => getStageRecord(db, itemId, stage),
    history: (itemId, stage) => getStageHistory(db, itemId, stage),
    transition: input => transitionStage(db, input, clock()),
    reset: (itemId, stage, expectedRevision) => resetStage(db, itemId, stage, expectedRevision, clock()),
    listEligible: (stage, upstreamStage, limit, eligibleOptions) =>
      listEligibleItems(db, stage, upstreamStage, limit, eligibleOptions, clock()),
    list: filter => listStageRecords(db, filter),
  };
}
