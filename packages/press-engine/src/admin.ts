import type { StageName, StageRecord, StateLedger } from '@pressline/press-db';
import { ConflictError } from './errors.js';

export class RecordNotFoundError extends Error {
  readonly type = 'record_not_found';

  constructor(readonly itemId: string, readonly stage: StageName) {
    super(`No ${stage} record for ${itemId}`);
    this.name = 'RecordNotFoundError';
  }
}

/**
 * Operator reset of the current record: a DONE stage is recomputed, a terminal
 * failure becomes eligible again. Downstream stages follow by input-hash.
 */
export async function resetStageRecord(
  ledger: StateLedger,
  itemId: string,
  stage: StageName,
  expectedRevision?: number
): Promise<StageRecord> {
  const current = await ledger.get(itemId, stage);
  if (!current) {
    throw new RecordNotFoundError(itemId, stage);
  }
  const result = await ledger.reset(itemId, stage, expectedRevision ?? current.revision);
  if (!result.ok) {
    throw new ConflictError(itemId, stage, `Record ${itemId}/${stage} changed; re-read and retry`);
  }
  return result.record;
}
