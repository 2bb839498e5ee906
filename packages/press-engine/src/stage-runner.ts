import {
  itemLeaseKey,
  systemClock,
  upstreamOf,
  type ArtifactStore,
  type Clock,
  type EligibleItem,
  type Lease,
  type LeaseManager,
  type StageName,
  type StageRecord,
  type StateLedger,
  type WorkItemStore,
} from '@pressline/press-db';
import type { AdapterResult, StageAdapter, StageInput } from './adapter.js';
import { buildEnvelope, parseEnvelope, type Lineage } from './envelope.js';
import {
  InfrastructureError,
  PipelineError,
  ValidationError,
  classifyAdapterError,
  errorMessage,
  formatIssues,
} from './errors.js';
import type { Logger } from './logger.js';
import { nextAttemptAt, type BackoffPolicy } from './retry.js';

export interface RunnerPolicy {
  maxAttempts: number;
  leaseTtlMs: number;
  orphanAfterMs: number;
  backoff: BackoffPolicy;
}

export type ItemOutcome =
  | 'done'
  | 'skipped'
  | 'busy'
  | 'conflict'
  | 'failed_retryable'
  | 'failed_terminal'
  | 'lost_lease'
  | 'aborted';

export const ITEM_OUTCOMES: readonly ItemOutcome[] = [
  'done',
  'skipped',
  'busy',
  'conflict',
  'failed_retryable',
  'failed_terminal',
  'lost_lease',
  'aborted',
];

export interface ItemReport {
  itemId: string;
  outcome: ItemOutcome;
  artifactRef?: string;
  attempts?: number;
  error?: string;
}

export interface StageRunSummary {
  stage: StageName;
  selected: number;
  counts: Record<ItemOutcome, number>;
  items: ItemReport[];
  aborted: boolean;
  elapsedMs: number;
}

export interface StageRunnerDeps {
  ledger: StateLedger;
  leases: LeaseManager;
  artifacts: ArtifactStore;
  items: WorkItemStore;
  policy: RunnerPolicy;
  logger: Logger;
  /** Identifies this process in lease rows. */
  holder: string;
  clock?: Clock;
}

function emptyCounts(): Record<ItemOutcome, number> {
  return {
    done: 0,
    skipped: 0,
    busy: 0,
    conflict: 0,
    failed_retryable: 0,
    failed_terminal: 0,
    lost_lease: 0,
    aborted: 0,
  };
}

/**
 * Drives one stage: select eligible items, lease each, run the adapter and
 * record the outcome in the ledger. Item failures are recorded and the batch
 * continues; backend failures throw InfrastructureError.
 */
export class StageRunner {
  readonly stage: StageName;
  private readonly upstream: StageName | null;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly adapter: StageAdapter, private readonly deps: StageRunnerDeps) {
    this.stage = adapter.stage;
    this.upstream = upstreamOf(adapter.stage);
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger.child({ stage: adapter.stage });
  }

  async run(limit: number, signal?: AbortSignal): Promise<StageRunSummary> {
    const started = Date.now();
    const { ledger, policy } = this.deps;

    const eligible = await this.infra('list eligible', () =>
      ledger.listEligible(this.stage, this.upstream, limit, {
        maxAttempts: policy.maxAttempts,
        orphanAfterMs: policy.orphanAfterMs,
      })
    );
    this.log.debug({ selected: eligible.length, limit }, 'stage_selected');

    const counts = emptyCounts();
    const items: ItemReport[] = [];
    let aborted = false;

    for (const candidate of eligible) {
      if (signal?.aborted) {
        aborted = true;
        break;
      }
      const report = await this.runItem(candidate, signal);
      counts[report.outcome]++;
      items.push(report);
      if (report.outcome === 'aborted') {
        aborted = true;
        break;
      }
    }

    const summary: StageRunSummary = {
      stage: this.stage,
      selected: eligible.length,
      counts,
      items,
      aborted,
      elapsedMs: Date.now() - started,
    };
    this.log.info({ selected: summary.selected, counts, aborted, elapsedMs: summary.elapsedMs }, 'stage_finished');
    return summary;
  }

  /** Process one eligible item under its lease. */
  async runItem(candidate: EligibleItem, signal?: AbortSignal): Promise<ItemReport> {
    const { leases, policy, holder } = this.deps;
    const log = this.log.child({ itemId: candidate.itemId });

    const acquired = await this.infra('lease acquire', () =>
      leases.acquire(itemLeaseKey(candidate.itemId, this.stage), policy.leaseTtlMs, holder)
    );
    if (!acquired.acquired) {
      log.debug({ heldBy: acquired.heldBy, expiresAt: acquired.expiresAt }, 'stage_item_busy');
      return { itemId: candidate.itemId, outcome: 'busy' };
    }

    const held = { lease: acquired.lease };
    try {
      return await this.processLeased(candidate, held, log, signal);
    } finally {
      try {
        await leases.release(held.lease);
      } catch (e) {
        // The lease still expires on its own
        log.warn({ err: e }, 'lease_release_failed');
      }
    }
  }

  private async processLeased(
    candidate: EligibleItem,
    held: { lease: Lease },
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<ItemReport> {
    const { ledger, leases, policy } = this.deps;
    const { itemId, inputHash } = candidate;

    const current = await this.infra('ledger read', () => ledger.get(itemId, this.stage));
    if (current && current.input_hash === inputHash) {
      if (current.status === 'DONE') {
        log.debug({ artifactRef: current.artifact_ref }, 'stage_item_skipped');
        return { itemId, outcome: 'skipped', artifactRef: current.artifact_ref ?? undefined };
      }
      if (current.status === 'FAILED' && (!current.retryable || current.attempts >= policy.maxAttempts)) {
        log.debug({ attempts: current.attempts }, 'stage_item_skipped_terminal');
        return { itemId, outcome: 'skipped', attempts: current.attempts };
      }
      if (current.status === 'RUNNING' && current.attempts >= policy.maxAttempts) {
        return this.abandon(current, log);
      }
    }

    const started = await this.infra('ledger transition', () =>
      ledger.transition({
        itemId,
        stage: this.stage,
        expectedRevision: current?.revision ?? null,
        inputHash,
        status: 'RUNNING',
      })
    );
    if (!started.ok) {
      log.info({ expectedRevision: current?.revision ?? null }, 'stage_item_conflict');
      return { itemId, outcome: 'conflict' };
    }
    const running = started.record;
    log.debug({ attempt: running.attempts, generation: running.generation }, 'stage_item_running');

    const { input, lineage } = await this.loadInput(candidate, running, log, signal);
    const result = await this.invoke(input);

    const renewed = await this.infra('lease renew', () => leases.renew(held.lease, policy.leaseTtlMs));
    if (!renewed) {
      log.warn({ attempt: running.attempts }, 'stage_item_lost_lease');
      return { itemId, outcome: 'lost_lease', attempts: running.attempts };
    }
    held.lease = renewed;

    const outcome = this.validate(result);
    if (!outcome.ok && outcome.error instanceof InfrastructureError) {
      throw outcome.error;
    }
    if (!outcome.ok && signal?.aborted) {
      return this.release(running, 'aborted', log);
    }
    if (outcome.ok) {
      return this.complete(running, lineage, outcome.output, log);
    }
    return this.fail(running, outcome.error, log);
  }

  private async invoke(input: StageInput): Promise<AdapterResult> {
    try {
      return await this.adapter.transform(input);
    } catch (error) {
      return { ok: false, error };
    }
  }

  private validate(result: AdapterResult): AdapterResult {
    if (!result.ok || !this.adapter.outputSchema) return result;
    const parsed = this.adapter.outputSchema.safeParse(result.output);
    if (!parsed.success) {
      return {
        ok: false,
        error: new ValidationError(`${this.stage} output failed validation`, formatIssues(parsed.error.issues)),
      };
    }
    return { ok: true, output: parsed.data };
  }

  private async complete(running: StageRecord, lineage: Lineage, output: unknown, log: Logger): Promise<ItemReport> {
    const { ledger, artifacts } = this.deps;
    const itemId = running.item_id;

    const stored = await this.infra('artifact put', () => artifacts.put(buildEnvelope(this.stage, lineage, output)));
    const done = await this.infra('ledger transition', () =>
      ledger.transition({
        itemId,
        stage: this.stage,
        expectedRevision: running.revision,
        inputHash: running.input_hash,
        status: 'DONE',
        artifactRef: stored.artifactId,
      })
    );
    if (!done.ok) {
      log.info({ artifactRef: stored.artifactId }, 'stage_item_conflict');
      return this.release(running, 'conflict', log);
    }
    await this.infra('artifact name', () => artifacts.name(this.stage, itemId, stored.artifactId));

    log.info(
      { artifactRef: stored.artifactId, inserted: stored.inserted, sizeBytes: stored.sizeBytes, attempt: running.attempts },
      'stage_item_done'
    );
    return { itemId, outcome: 'done', artifactRef: stored.artifactId, attempts: running.attempts };
  }

  private async fail(running: StageRecord, error: unknown, log: Logger): Promise<ItemReport> {
    const { ledger, policy } = this.deps;
    const itemId = running.item_id;
    const failure = classifyAdapterError(error);
    const retryable = failure.kind === 'transient' && running.attempts < policy.maxAttempts;

    const failed = await this.infra('ledger transition', () =>
      ledger.transition({
        itemId,
        stage: this.stage,
        expectedRevision: running.revision,
        inputHash: running.input_hash,
        status: 'FAILED',
        error: failure,
        retryable,
        nextAttemptAt: retryable ? nextAttemptAt(this.clock(), running.attempts, policy.backoff) : null,
      })
    );
    if (!failed.ok) {
      log.info({ error: failure.message }, 'stage_item_conflict');
      return { itemId, outcome: 'conflict', attempts: running.attempts };
    }

    const outcome: ItemOutcome = retryable ? 'failed_retryable' : 'failed_terminal';
    log.warn(
      { kind: failure.kind, error: failure.message, attempt: running.attempts, retryable, nextAttemptAt: failed.record.next_attempt_at },
      outcome === 'failed_terminal' ? 'stage_item_terminal' : 'stage_item_failed'
    );
    return { itemId, outcome, attempts: running.attempts, error: failure.message };
  }

  /**
   * Put an interrupted run back to PENDING and return its attempt. When the
   * record moved meanwhile it is left to whoever moved it.
   */
  private async release(running: StageRecord, outcome: 'aborted' | 'conflict', log: Logger): Promise<ItemReport> {
    const itemId = running.item_id;
    const released = await this.infra('ledger transition', () =>
      this.deps.ledger.transition({
        itemId,
        stage: this.stage,
        expectedRevision: running.revision,
        inputHash: running.input_hash,
        status: 'PENDING',
      })
    );
    log.info({ attempt: running.attempts, released: released.ok }, `stage_item_${outcome}`);
    return { itemId, outcome, attempts: released.ok ? released.record.attempts : running.attempts };
  }

  /** An orphan that already used every attempt becomes a terminal failure. */
  private async abandon(current: StageRecord, log: Logger): Promise<ItemReport> {
    const itemId = current.item_id;
    const message = `abandoned after ${current.attempts} attempts`;
    const failed = await this.infra('ledger transition', () =>
      this.deps.ledger.transition({
        itemId,
        stage: this.stage,
        expectedRevision: current.revision,
        inputHash: current.input_hash,
        status: 'FAILED',
        error: { kind: 'transient', message },
        retryable: false,
        nextAttemptAt: null,
      })
    );
    if (!failed.ok) {
      log.info({ attempts: current.attempts }, 'stage_item_conflict');
      return { itemId, outcome: 'conflict', attempts: current.attempts };
    }
    log.warn({ attempts: current.attempts }, 'stage_item_abandoned');
    return { itemId, outcome: 'failed_terminal', attempts: current.attempts, error: message };
  }

  private async loadInput(
    candidate: EligibleItem,
    running: StageRecord,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<{ input: StageInput; lineage: Lineage }> {
    const { items } = this.deps;
    const item = await this.infra('item read', () => items.get(candidate.itemId));
    if (!item) {
      throw new InfrastructureError(`Work item ${candidate.itemId} is not registered`);
    }

    let payload: unknown;
    let lineage: Lineage = {};
    if (this.upstream === null) {
      payload = { canonicalKey: item.canonical_key, sourceUrl: item.source_url };
    } else {
      const envelope = await this.readEnvelope(candidate.inputHash);
      payload = envelope.payload;
      lineage = { ...envelope.lineage, [this.upstream]: candidate.inputHash };
    }

    const input: StageInput = {
      item,
      payload,
      context: {
        itemId: item.item_id,
        stage: this.stage,
        inputHash: candidate.inputHash,
        attempt: running.attempts,
        lineage,
        loadArtifact: async stage => {
          const ref = lineage[stage];
          if (!ref) {
            throw new ValidationError(`No ${stage} artifact in the lineage of ${item.item_id}/${this.stage}`);
          }
          return (await this.readEnvelope(ref)).payload;
        },
        logger: log,
        signal,
      },
    };
    return { input, lineage };
  }

  private async readEnvelope(artifactRef: string) {
    const document = await this.infra('artifact read', () => this.deps.artifacts.get(artifactRef));
    const envelope = parseEnvelope(document);
    if (!envelope) {
      throw new InfrastructureError(`Artifact ${artifactRef} is not a stage envelope`);
    }
    return envelope;
  }

  private async infra<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof PipelineError) throw e;
      throw new InfrastructureError(`${this.stage}: ${operation} failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
