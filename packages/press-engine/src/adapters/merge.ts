import { defineStageAdapter, type StageAdapter } from '../adapter.js';
import {
  ClaimsOutputSchema,
  MergedRecordSchema,
  MetaOutputSchema,
  ReducedDocumentSchema,
  type ClaimsOutput,
  type MergedRecord,
  type MetaOutput,
  type ReducedDocument,
} from '../documents.js';
import { loadPayload, parsePayload } from './input.js';

/** Meta fields first, then claims, full text and counts from the reduced page. */
export function mergeRecord(reduced: ReducedDocument, meta: MetaOutput, claims: ClaimsOutput): MergedRecord {
  return {
    ...meta,
    canonical_url: reduced.url.canonical,
    domain: reduced.url.domain,
    site_name: reduced.meta.site_name,
    claims: claims.claims,
    extracted_text_full: reduced.content.extracted_text_full,
    char_count: reduced.content.char_count,
    word_count: reduced.content.word_count,
  };
}

export function createMergeAdapter(): StageAdapter {
  return defineStageAdapter({
    stage: 'merge',
    outputSchema: MergedRecordSchema,
    async run({ payload, context }) {
      const claims = parsePayload(ClaimsOutputSchema, payload, 'claims');
      const reduced = await loadPayload(context.loadArtifact, 'reduce', ReducedDocumentSchema);
      const meta = await loadPayload(context.loadArtifact, 'meta', MetaOutputSchema);
      return mergeRecord(reduced, meta, claims);
    },
  });
}
