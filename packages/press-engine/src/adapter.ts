import type { ZodType } from 'zod';
import type { StageName, WorkItem } from '@pressline/press-db';
import type { Logger } from './logger.js';
import type { Lineage } from './envelope.js';
import type { CapturedDocument, FinalRecord } from './documents.js';

export interface StageContext {
  itemId: string;
  stage: StageName;
  inputHash: string;
  /** 1-based number of this execution, including the current one. */
  attempt: number;
  lineage: Lineage;
  /** Payload of an earlier stage's artifact this item was derived from. */
  loadArtifact(stage: StageName): Promise<unknown>;
  logger: Logger;
  signal?: AbortSignal;
}

export interface StageInput {
  item: WorkItem;
  /** Upstream payload; for capture, `{ canonicalKey, sourceUrl }`. */
  payload: unknown;
  context: StageContext;
}

export type AdapterResult =
  | { ok: true; output: unknown }
  | { ok: false; error: unknown };

export interface StageAdapter {
  readonly stage: StageName;
  /** When set, output failing this schema is a ValidationError. */
  readonly outputSchema?: ZodType;
  transform(input: StageInput): Promise<AdapterResult>;
}

/**
 * Build an adapter from a function that returns the output or throws.
 * Thrown errors become `{ ok: false }` results for the runner to classify.
 */
export function defineStageAdapter(def: {
  stage: StageName;
  outputSchema?: ZodType;
  run(input: StageInput): Promise<unknown>;
}): StageAdapter {
  return {
    stage: def.stage,
    outputSchema: def.outputSchema,
    async transform(input) {
      try {
        return { ok: true, output: await def.run(input) };
      } catch (error) {
        return { ok: false, error };
      }
    },
  };
}

/* External collaborators */

export interface IntakeEntry {
  externalId: string;
  canonicalKey: string;
  sourceUrl: string;
}

export type IntakeStatus = 'QUEUED' | 'PUBLISHED' | 'FAILED';

export interface IntakeSource {
  listNewItems(): Promise<IntakeEntry[]>;
  markStatus(externalId: string, status: IntakeStatus, detail?: string): Promise<void>;
}

export interface Fetcher {
  capture(canonicalKey: string, signal?: AbortSignal): Promise<CapturedDocument>;
}

export interface AiTransform {
  run(promptSetId: string, input: unknown, signal?: AbortSignal): Promise<unknown>;
}

export interface Publisher {
  upsert(record: FinalRecord, signal?: AbortSignal): Promise<{ externalPublishId: string }>;
}
