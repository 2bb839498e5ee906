import type { StageName } from '@pressline/press-db';
import type { AiTransform, Fetcher, Publisher, StageAdapter } from '../adapter.js';
import { createCaptureAdapter } from './capture.js';
import { createClaimsAdapter } from './claims.js';
import { createMergeAdapter } from './merge.js';
import { createMetaAdapter } from './meta.js';
import { createPublishAdapter } from './publish.js';
import { createReduceAdapter } from './reduce.js';

export interface AdapterServices {
  fetcher: Fetcher;
  ai: AiTransform;
  publisher: Publisher;
  promptSets: { meta: string; claims: string };
}

export function createStageAdapters(services: AdapterServices): Record<StageName, StageAdapter> {
  return {
    capture: createCaptureAdapter(services.fetcher),
    reduce: createReduceAdapter(),
    meta: createMetaAdapter(services.ai, services.promptSets.meta),
    claims: createClaimsAdapter(services.ai, services.promptSets.claims),
    merge: createMergeAdapter(),
    publish: createPublishAdapter(services.publisher),
  };
}

export { createCaptureAdapter, createClaimsAdapter, createMergeAdapter, createMetaAdapter, createPublishAdapter, createReduceAdapter };
export { reduceCapture } from './reduce.js';
export { buildMetaInput } from './meta.js';
export { mergeRecord } from './merge.js';
