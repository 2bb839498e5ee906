import type { ZodType, ZodTypeDef } from 'zod';
import type { StageName } from '@pressline/press-db';
import { ValidationError, formatIssues } from '../errors.js';

/** Parse an upstream payload; a mismatch is terminal for this input. */
export function parsePayload<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Unexpected ${what} payload`, formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

export async function loadPayload<T>(
  load: (stage: StageName) => Promise<unknown>,
  stage: StageName,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T> {
  return parsePayload(schema, await load(stage), stage);
}
