import { z } from 'zod';
import type { Publisher } from '../adapter.js';
import { ValidationError, formatIssues } from '../errors.js';
import { defaultFetch, postJson, type FetchFn } from './http.js';

export interface HttpPublisherOptions {
  endpoint: string;
  timeoutMs: number;
  token?: string;
  fetchFn?: FetchFn;
}

const PublishResponseSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]),
});

/**
 * Upserts the final record keyed by its item id; the CMS side makes a repeat
 * upsert of the same item update in place.
 */
export function createHttpPublisher(options: HttpPublisherOptions): Publisher {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const headers: Record<string, string> = options.token ? { authorization: `Bearer ${options.token}` } : {};

  return {
    async upsert(record, signal) {
      const what = `publish ${record.item_id}`;
      const body = await postJson(fetchFn, options.endpoint, record, {
        headers,
        timeoutMs: options.timeoutMs,
        what,
        signal,
      });
      const parsed = PublishResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ValidationError(`${what}: unexpected response`, formatIssues(parsed.error.issues));
      }
      return { externalPublishId: String(parsed.data.id) };
    },
  };
}
