import type { Fetcher } from '../adapter.js';
import type { CapturedDocument } from '../documents.js';
import { defaultFetch, request, type FetchFn } from './http.js';

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
  fetchFn?: FetchFn;
  clock?: () => Date;
}

export function createHttpFetcher(options: HttpFetcherOptions): Fetcher {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const clock = options.clock ?? (() => new Date());

  return {
    async capture(canonicalKey, signal): Promise<CapturedDocument> {
      const response = await request(fetchFn, canonicalKey, {
        headers: {
          'user-agent': options.userAgent,
          accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        },
        timeoutMs: options.timeoutMs,
        what: `capture ${canonicalKey}`,
        signal,
      });
      return {
        requested_url: canonicalKey,
        final_url: response.url,
        http_status: response.status,
        content_type: response.headers['content-type'] ?? null,
        fetched_at: clock().toISOString(),
        html: response.body.toString('utf-8'),
      };
    },
  };
}
