import type { StageName } from './stages.js';

export type StageStatus = 'PENDING' | 'RUNNING' | 'DONE' | 'FAILED';

export const STAGE_STATUSES: readonly StageStatus[] = ['PENDING', 'RUNNING', 'DONE', 'FAILED'];

export type ErrorKind = 'transient' | 'validation' | 'conflict' | 'infrastructure';

export interface WorkItem {
  item_id: string;
  canonical_key: string;
  source_url: string;
  external_id: string | null;
  created_at: Date;
}

export interface StageRecord {
  item_id: string;
  stage: StageName;
  generation: number;
  revision: number;
  status: StageStatus;
  input_hash: string;
  artifact_ref: string | null;
  error_kind: ErrorKind | null;
  error_message: string | null;
  retryable: boolean;
  attempts: number;
  next_attempt_at: Date | null;
  created_at: Date;
  updated_at: Date;
  superseded_at: Date | null;
}

export interface Artifact {
  artifact_id: string;
  size_bytes: number;
  storage: 'inline' | 's3';
  created_at: Date;
}

export interface Lease {
  scope: string;
  resource: string;
  token: string;
  holder: string;
  acquired_at: Date;
  expires_at: Date;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/* Work item registry */

export interface RegisterItemInput {
  canonicalKey: string;
  sourceUrl: string;
  externalId?: string | null;
}

export interface RegisterItemResult {
  item: WorkItem;
  created: boolean;
}

export interface WorkItemStore {
  register(input: RegisterItemInput): Promise<RegisterItemResult>;
  get(itemId: string): Promise<WorkItem | null>;
  list(options?: { limit?: number }): Promise<WorkItem[]>;
}

/* State ledger */

export interface StageError {
  kind: ErrorKind;
  message: string;
}

export interface TransitionInput {
  itemId: string;
  stage: StageName;
  /** Revision of the record the caller observed, null when it saw none. */
  expectedRevision: number | null;
  /** Hash of the upstream artifact (or item id, for the first stage) being consumed. */
  inputHash: string;
  status: StageStatus;
  artifactRef?: string;
  error?: StageError;
  retryable?: boolean;
  nextAttemptAt?: Date | null;
}

export type TransitionResult =
  | { ok: true; record: StageRecord }
  | { ok: false; reason: 'conflict'; current: StageRecord | null };

export interface EligibleItem {
  itemId: string;
  inputHash: string;
  readyAt: Date;
}

export interface ListEligibleOptions {
  maxAttempts: number;
  /** RUNNING records untouched for this long are treated as orphaned. */
  orphanAfterMs: number;
}

export interface ListRecordsFilter {
  stage?: StageName;
  status?: StageStatus;
  itemId?: string;
  limit?: number;
}

export interface StateLedger {
  get(itemId: string, stage: StageName): Promise<StageRecord | null>;
  history(itemId: string, stage: StageName): Promise<StageRecord[]>;
  transition(input: TransitionInput): Promise<TransitionResult>;
  reset(itemId: string, stage: StageName, expectedRevision: number): Promise<TransitionResult>;
  listEligible(
    stage: StageName,
    upstreamStage: StageName | null,
    limit: number,
    options: ListEligibleOptions
  ): Promise<EligibleItem[]>;
  list(filter?: ListRecordsFilter): Promise<StageRecord[]>;
}

/* Leases */

export interface LeaseKey {
  scope: string;
  resource: string;
}

export type AcquireResult =
  | { acquired: true; lease: Lease }
  | { acquired: false; heldBy: string | null; expiresAt: Date | null };

export interface LeaseManager {
  acquire(key: LeaseKey, ttlMs: number, holder: string): Promise<AcquireResult>;
  /** Returns false when the lease had already expired or been taken over. */
  release(lease: Lease): Promise<boolean>;
  /** Returns the extended lease, or null when it is no longer held. */
  renew(lease: Lease, ttlMs: number): Promise<Lease | null>;
  /** Unexpired leases, optionally restricted to one scope. */
  active(scope?: string): Promise<Lease[]>;
}

export function itemLeaseKey(itemId: string, stage: StageName): LeaseKey {
  return { scope: stage, resource: itemId };
}

export function sweepLeaseKey(deployment: string): LeaseKey {
  return { scope: 'sweep', resource: deployment };
}

/* Artifacts */

export interface PutArtifactResult {
  artifactId: string;
  inserted: boolean;
  sizeBytes: number;
}

export interface ArtifactStore {
  /** Store a JSON document under the hash of its canonical bytes; a repeat put is a no-op. */
  put(document: unknown): Promise<PutArtifactResult>;
  /** Parsed document; throws ArtifactNotFoundError when absent. */
  get(artifactId: string): Promise<unknown>;
  has(artifactId: string): Promise<boolean>;
  /** Point the `<stage>/<itemId>.<stage>.json` view at an existing artifact. */
  name(stage: StageName, itemId: string, artifactId: string): Promise<void>;
  resolveName(stage: StageName, itemId: string): Promise<string | null>;
}

export function artifactViewName(stage: StageName, itemId: string): string {
  return `${stage}/${itemId}.${stage}.json`;
}
