import { z } from 'zod';
import type { AiTransform } from '../adapter.js';
import { ValidationError, formatIssues } from '../errors.js';
import { defaultFetch, postJson, type FetchFn } from './http.js';

export interface HttpAiTransformOptions {
  endpoint: string;
  model: string;
  timeoutMs: number;
  apiKey?: string;
  fetchFn?: FetchFn;
}

const AiResponseSchema = z.object({
  output: z.record(z.string(), z.unknown()),
});

/** POSTs `{ promptSetId, model, input }` and expects `{ output }` back. */
export function createHttpAiTransform(options: HttpAiTransformOptions): AiTransform {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const headers: Record<string, string> = options.apiKey ? { authorization: `Bearer ${options.apiKey}` } : {};

  return {
    async run(promptSetId, input, signal) {
      const what = `ai ${promptSetId}`;
      const body = await postJson(
        fetchFn,
        options.endpoint,
        { promptSetId, model: options.model, input },
        { headers, timeoutMs: options.timeoutMs, what, signal }
      );
      const parsed = AiResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ValidationError(`${what}: unexpected response`, formatIssues(parsed.error.issues));
      }
      return parsed.data.output;
    },
  };
}
