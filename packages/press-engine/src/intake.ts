import { isHttpUrl, normalizeUrl, type RegisterItemResult, type WorkItemStore } from '@pressline/press-db';
import type { IntakeSource, IntakeStatus } from './adapter.js';
import { InfrastructureError, PipelineError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';

export interface IntakeSyncResult {
  seen: number;
  registered: number;
  existing: number;
  rejected: number;
}

async function markEntry(
  intake: IntakeSource,
  externalId: string,
  status: IntakeStatus,
  logger: Logger,
  detail?: string
): Promise<void> {
  try {
    await intake.markStatus(externalId, status, detail);
  } catch (e) {
    logger.warn({ err: e, externalId, status }, 'intake_status_failed');
  }
}

/**
 * Register every new intake entry as a work item and mark it QUEUED. Entries
 * whose URL is not http(s) are marked FAILED and never registered.
 */
export async function syncIntake(
  intake: IntakeSource,
  items: WorkItemStore,
  logger: Logger
): Promise<IntakeSyncResult> {
  const entries = await intake.listNewItems();
  const result: IntakeSyncResult = { seen: entries.length, registered: 0, existing: 0, rejected: 0 };

  for (const entry of entries) {
    if (!isHttpUrl(entry.sourceUrl)) {
      result.rejected++;
      logger.warn({ externalId: entry.externalId, sourceUrl: entry.sourceUrl }, 'intake_rejected');
      await markEntry(intake, entry.externalId, 'FAILED', logger, 'source URL must be http(s)');
      continue;
    }

    let registered: RegisterItemResult;
    try {
      registered = await items.register({
        canonicalKey: normalizeUrl(entry.canonicalKey),
        sourceUrl: entry.sourceUrl,
        externalId: entry.externalId,
      });
    } catch (e) {
      if (e instanceof PipelineError) throw e;
      throw new InfrastructureError(`intake: register failed: ${errorMessage(e)}`, { cause: e });
    }

    if (registered.created) {
      result.registered++;
      logger.info({ itemId: registered.item.item_id, externalId: entry.externalId }, 'intake_registered');
    } else {
      result.existing++;
    }
    await markEntry(intake, entry.externalId, 'QUEUED', logger);
  }

  logger.info(result, 'intake_synced');
  return result;
}
