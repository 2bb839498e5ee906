import {
  STAGES,
  sweepLeaseKey,
  ulid,
  type Lease,
  type LeaseManager,
  type StageName,
  type WorkItemStore,
} from '@pressline/press-db';
import type { IntakeSource, IntakeStatus } from './adapter.js';
import { linkSignal } from './abort.js';
import { InfrastructureError, PipelineError, SweepBusyError, errorMessage } from './errors.js';
import { syncIntake, type IntakeSyncResult } from './intake.js';
import type { Logger } from './logger.js';
import type { StageRunSummary, StageRunner } from './stage-runner.js';

export interface SchedulerDeps {
  runners: StageRunner[];
  leases: LeaseManager;
  items: WorkItemStore;
  intake?: IntakeSource;
  logger: Logger;
  holder: string;
  /** Resource name of the sweep lease; one sweep per deployment at a time. */
  deployment: string;
  sweepLeaseTtlMs: number;
  batchSize(stage: StageName): number;
}

export interface SweepOptions {
  /** Run only these stages; defaults to all, in pipeline order. */
  stages?: StageName[];
  /** Per-stage batch limit overriding the configured batch size. */
  limit?: number;
  syncIntake?: boolean;
  signal?: AbortSignal;
  /** Stop between items once this much time has passed. */
  timeoutMs?: number;
}

export type SweepAbortReason = 'signal' | 'timeout' | 'lease_lost';

export interface SweepResult {
  runId: string;
  startedAt: Date;
  elapsedMs: number;
  intake: IntakeSyncResult | null;
  stages: StageRunSummary[];
  aborted: boolean;
  abortReason?: SweepAbortReason;
}

function stageIndex(stage: StageName): number {
  return STAGES.indexOf(stage);
}

/**
 * Runs sweeps under the global sweep lease: intake sync, every stage in
 * pipeline order, then intake status write-back.
 */
export class Scheduler {
  private readonly runners: StageRunner[];

  constructor(private readonly deps: SchedulerDeps) {
    this.runners = [...deps.runners].sort((a, b) => stageIndex(a.stage) - stageIndex(b.stage));
  }

  async sweep(options: SweepOptions = {}): Promise<SweepResult> {
    const { leases, logger, holder, deployment, sweepLeaseTtlMs } = this.deps;
    const runId = ulid();
    const log = logger.child({ runId });
    const startedAt = new Date();

    const acquired = await this.infra('sweep lease acquire', () =>
      leases.acquire(sweepLeaseKey(deployment), sweepLeaseTtlMs, holder)
    );
    if (!acquired.acquired) {
      log.warn({ heldBy: acquired.heldBy, expiresAt: acquired.expiresAt }, 'sweep_busy');
      throw new SweepBusyError(acquired.heldBy, acquired.expiresAt);
    }

    let lease: Lease = acquired.lease;
    const result: SweepResult = {
      runId,
      startedAt,
      elapsedMs: 0,
      intake: null,
      stages: [],
      aborted: false,
    };
    log.info({ deployment, holder, stages: options.stages ?? 'all' }, 'sweep_started');

    const abort = linkSignal(options.signal, options.timeoutMs);
    const stopped = (): SweepAbortReason => (abort.timedOut() ? 'timeout' : 'signal');

    try {
      if (options.syncIntake !== false && this.deps.intake) {
        result.intake = await this.syncIntake(this.deps.intake, log);
      }

      for (const runner of this.selectRunners(options.stages)) {
        if (abort.signal.aborted) {
          result.aborted = true;
          result.abortReason = stopped();
          break;
        }
        const renewed = await this.infra('sweep lease renew', () => leases.renew(lease, sweepLeaseTtlMs));
        if (!renewed) {
          log.error({ stage: runner.stage }, 'sweep_lease_lost');
          result.aborted = true;
          result.abortReason = 'lease_lost';
          break;
        }
        lease = renewed;

        const summary = await runner.run(options.limit ?? this.deps.batchSize(runner.stage), abort.signal);
        result.stages.push(summary);
        if (summary.aborted) {
          result.aborted = true;
          result.abortReason = stopped();
          break;
        }
      }

      if (this.deps.intake) {
        await this.writeBack(this.deps.intake, result.stages, log);
      }
    } catch (e) {
      log.error({ err: e }, 'sweep_failed');
      throw e;
    } finally {
      abort.dispose();
      try {
        await leases.release(lease);
      } catch (e) {
        log.warn({ err: e }, 'lease_release_failed');
      }
    }

    result.elapsedMs = Date.now() - startedAt.getTime();
    log.info(
      {
        elapsedMs: result.elapsedMs,
        aborted: result.aborted,
        abortReason: result.abortReason,
        stages: result.stages.map(s => ({ stage: s.stage, selected: s.selected, ...s.counts })),
      },
      'sweep_finished'
    );
    return result;
  }

  private selectRunners(stages: StageName[] | undefined): StageRunner[] {
    if (!stages) return this.runners;
    const missing = stages.filter(stage => !this.runners.some(r => r.stage === stage));
    if (missing.length > 0) {
      throw new InfrastructureError(`No runner configured for stage(s): ${missing.join(', ')}`);
    }
    return this.runners.filter(r => stages.includes(r.stage));
  }

  /** Intake failures are logged and the sweep continues on registered items. */
  private async syncIntake(intake: IntakeSource, log: Logger): Promise<IntakeSyncResult | null> {
    try {
      return await syncIntake(intake, this.deps.items, log);
    } catch (e) {
      if (e instanceof InfrastructureError) throw e;
      log.error({ err: e }, 'intake_sync_failed');
      return null;
    }
  }

  private async writeBack(intake: IntakeSource, stages: StageRunSummary[], log: Logger): Promise<void> {
    const updates: Array<{ itemId: string; status: IntakeStatus; detail?: string }> = [];
    for (const summary of stages) {
      for (const report of summary.items) {
        if (summary.stage === 'publish' && report.outcome === 'done') {
          updates.push({ itemId: report.itemId, status: 'PUBLISHED' });
        } else if (report.outcome === 'failed_terminal') {
          updates.push({
            itemId: report.itemId,
            status: 'FAILED',
            detail: `${summary.stage}: ${report.error ?? 'failed'}`,
          });
        }
      }
    }

    for (const update of updates) {
      const item = await this.infra('item read', () => this.deps.items.get(update.itemId));
      if (!item?.external_id) continue;
      try {
        await intake.markStatus(item.external_id, update.status, update.detail);
      } catch (e) {
        log.warn({ err: e, itemId: update.itemId, status: update.status }, 'intake_status_failed');
      }
    }
  }

  private async infra<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof PipelineError) throw e;
      throw new InfrastructureError(`${operation} failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
