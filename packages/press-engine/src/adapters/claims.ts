import { defineStageAdapter, type AiTransform, type StageAdapter } from '../adapter.js';
import { ClaimsOutputSchema, MetaOutputSchema, ReducedDocumentSchema } from '../documents.js';
import { loadPayload, parsePayload } from './input.js';

export function createClaimsAdapter(ai: AiTransform, promptSetId: string): StageAdapter {
  return defineStageAdapter({
    stage: 'claims',
    outputSchema: ClaimsOutputSchema,
    async run({ payload, context }) {
      const meta = parsePayload(MetaOutputSchema, payload, 'meta');
      const document = await loadPayload(context.loadArtifact, 'reduce', ReducedDocumentSchema);
      return ai.run(promptSetId, { document, meta }, context.signal);
    },
  });
}
