import { defineStageAdapter, type Fetcher, type StageAdapter } from '../adapter.js';
import { CaptureInputSchema, CapturedDocumentSchema } from '../documents.js';
import { parsePayload } from './input.js';

export function createCaptureAdapter(fetcher: Fetcher): StageAdapter {
  return defineStageAdapter({
    stage: 'capture',
    outputSchema: CapturedDocumentSchema,
    async run({ payload, context }) {
      const { canonicalKey } = parsePayload(CaptureInputSchema, payload, 'work item');
      return fetcher.capture(canonicalKey, context.signal);
    },
  });
}
