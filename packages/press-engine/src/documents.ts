import { z } from 'zod';

/** Input to the first stage: the registered work item. */
export const CaptureInputSchema = z.object({
  canonicalKey: z.string().min(1),
  sourceUrl: z.string().min(1),
});

export type CaptureInput = z.infer<typeof CaptureInputSchema>;

export const CapturedDocumentSchema = z.object({
  requested_url: z.string(),
  final_url: z.string(),
  http_status: z.number().int(),
  content_type: z.string().nullable(),
  fetched_at: z.string(),
  html: z.string(),
});

export type CapturedDocument = z.infer<typeof CapturedDocumentSchema>;

export const ReducedDocumentSchema = z.object({
  url: z.object({
    original: z.string(),
    final: z.string(),
    canonical: z.string(),
    domain: z.string(),
  }),
  meta: z.object({
    title: z.string().nullable(),
    description: z.string().nullable(),
    site_name: z.string().nullable(),
    published_at_hint: z.string().nullable(),
  }),
  content: z.object({
    sha256: z.string(),
    extracted_text_full: z.string(),
    char_count: z.number().int().nonnegative(),
    word_count: z.number().int().nonnegative(),
  }),
});

export type ReducedDocument = z.infer<typeof ReducedDocumentSchema>;

/** What the meta prompt sees: the reduced document without the full text. */
export type MetaInput = Omit<ReducedDocument, 'content'> & {
  content: Omit<ReducedDocument['content'], 'extracted_text_full'>;
};

export const MetaOutputSchema = z
  .object({
    title: z.string().min(1),
    summary: z.string().optional(),
    topics: z.array(z.string()).optional(),
    contributor_name: z.string().optional(),
    org_name: z.string().optional(),
    content_mode: z.string().optional(),
  })
  .passthrough();

export type MetaOutput = z.infer<typeof MetaOutputSchema>;

export const ClaimSchema = z
  .object({
    text: z.string().min(1),
  })
  .passthrough();

export const ClaimsOutputSchema = z.object({
  claims: z.array(ClaimSchema),
});

export type ClaimsOutput = z.infer<typeof ClaimsOutputSchema>;

export const MergedRecordSchema = MetaOutputSchema.extend({
  canonical_url: z.string(),
  domain: z.string(),
  site_name: z.string().nullable(),
  claims: z.array(ClaimSchema),
  extracted_text_full: z.string(),
  char_count: z.number().int().nonnegative(),
  word_count: z.number().int().nonnegative(),
});

export type MergedRecord = z.infer<typeof MergedRecordSchema>;

/** The record handed to the publisher. */
export type FinalRecord = MergedRecord & { item_id: string };

export const PublishReceiptSchema = z.object({
  external_publish_id: z.string().min(1),
});

export type PublishReceipt = z.infer<typeof PublishReceiptSchema>;
