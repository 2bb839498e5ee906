import { defineStageAdapter, type AiTransform, type StageAdapter } from '../adapter.js';
import { MetaOutputSchema, ReducedDocumentSchema, type MetaInput, type ReducedDocument } from '../documents.js';
import { parsePayload } from './input.js';

/** The meta prompt gets everything but the full text. */
export function buildMetaInput(reduced: ReducedDocument): MetaInput {
  const { extracted_text_full: _text, ...content } = reduced.content;
  return { url: reduced.url, meta: reduced.meta, content };
}

export function createMetaAdapter(ai: AiTransform, promptSetId: string): StageAdapter {
  return defineStageAdapter({
    stage: 'meta',
    outputSchema: MetaOutputSchema,
    async run({ payload, context }) {
      const reduced = parsePayload(ReducedDocumentSchema, payload, 'reduce');
      return ai.run(promptSetId, buildMetaInput(reduced), context.signal);
    },
  });
}
