import { z } from 'zod';
import { STAGES, type StageName } from '@pressline/press-db';

/** Artifact refs of every earlier stage a payload was derived from. */
export type Lineage = Partial<Record<StageName, string>>;

export const EnvelopeSchema = z.object({
  stage: z.enum(STAGES),
  lineage: z.record(z.enum(STAGES), z.string()),
  payload: z.unknown(),
});

export interface Envelope {
  stage: StageName;
  lineage: Lineage;
  payload: unknown;
}

export function buildEnvelope(stage: StageName, lineage: Lineage, payload: unknown): Envelope {
  return { stage, lineage, payload };
}

/** Returns null when the document is not an envelope. */
export function parseEnvelope(document: unknown): Envelope | null {
  const parsed = EnvelopeSchema.safeParse(document);
  if (!parsed.success) return null;
  return { stage: parsed.data.stage, lineage: parsed.data.lineage, payload: parsed.data.payload };
}
