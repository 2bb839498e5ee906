import { hostname } from 'os';
import {
  STAGES,
  ulid,
  type ArtifactStore,
  type Clock,
  type LeaseManager,
  type StageName,
  type StateLedger,
  type WorkItemStore,
} from '@pressline/press-db';
import type { IntakeSource, StageAdapter } from './adapter.js';
import { stageBatchSize, stagePolicy, type PipelineConfig } from './config.js';
import type { Logger } from './logger.js';
import { Scheduler } from './scheduler.js';
import { StageRunner } from './stage-runner.js';

export interface PipelineStores {
  items: WorkItemStore;
  ledger: StateLedger;
  leases: LeaseManager;
  artifacts: ArtifactStore;
}

export interface PipelineServices {
  adapters: Record<StageName, StageAdapter>;
  intake?: IntakeSource;
  logger: Logger;
  holder?: string;
  clock?: Clock;
}

export interface Pipeline {
  holder: string;
  runners: Record<StageName, StageRunner>;
  scheduler: Scheduler;
}

/** Lease holder name for this process. */
export function defaultHolder(): string {
  return `${hostname()}:${process.pid}:${ulid()}`;
}

/** Wire one runner per stage and a scheduler over them. */
export function createPipeline(config: PipelineConfig, stores: PipelineStores, services: PipelineServices): Pipeline {
  const holder = services.holder ?? defaultHolder();

  const runner = (stage: StageName) =>
    new StageRunner(services.adapters[stage], {
      ...stores,
      policy: stagePolicy(config, stage),
      logger: services.logger,
      holder,
      clock: services.clock,
    });

  const runners: Record<StageName, StageRunner> = {
    capture: runner('capture'),
    reduce: runner('reduce'),
    meta: runner('meta'),
    claims: runner('claims'),
    merge: runner('merge'),
    publish: runner('publish'),
  };

  const scheduler = new Scheduler({
    runners: STAGES.map(stage => runners[stage]),
    leases: stores.leases,
    items: stores.items,
    intake: services.intake,
    logger: services.logger,
    holder,
    deployment: config.deployment,
    sweepLeaseTtlMs: config.pipeline.sweepLeaseTtlMs,
    batchSize: stage => stageBatchSize(config, stage),
  });

  return { holder, runners, scheduler };
}
