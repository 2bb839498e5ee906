import { collapseWhitespace, computeContentSha256, countWords, extractTextFromHtml } from '@pressline/press-db';
import { defineStageAdapter, type StageAdapter } from '../adapter.js';
import {
  CapturedDocumentSchema,
  ReducedDocumentSchema,
  type CapturedDocument,
  type ReducedDocument,
} from '../documents.js';
import { parsePayload } from './input.js';

function decode(value: string): string {
  return collapseWhitespace(extractTextFromHtml(value));
}

function firstMatch(html: string, pattern: RegExp): string | null {
  const value = pattern.exec(html)?.[1];
  if (value === undefined) return null;
  const text = decode(value);
  return text === '' ? null : text;
}

/** Content of `<meta name|property="...">`, in either attribute order. */
function metaContent(html: string, key: string): string | null {
  const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return (
    firstMatch(html, new RegExp(`<meta[^>]+(?:name|property)=["']${escaped}["'][^>]*content=["']([^"']*)["']`, 'i')) ??
    firstMatch(html, new RegExp(`<meta[^>]+content=["']([^"']*)["'][^>]*(?:name|property)=["']${escaped}["']`, 'i'))
  );
}

function canonicalLink(html: string, base: string): string | null {
  const href =
    /<link[^>]+rel=["']canonical["'][^>]*href=["']([^"']+)["']/i.exec(html)?.[1] ??
    /<link[^>]+href=["']([^"']+)["'][^>]*rel=["']canonical["']/i.exec(html)?.[1];
  if (!href) return null;
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

function domainOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}

/** Strip markup from a captured page and derive the fields later stages read. */
export function reduceCapture(doc: CapturedDocument): ReducedDocument {
  const body = /<body[^>]*>([\s\S]*)<\/body>/i.exec(doc.html)?.[1] ?? doc.html;
  const text = collapseWhitespace(extractTextFromHtml(body));
  const canonical = canonicalLink(doc.html, doc.final_url) ?? doc.final_url;

  return {
    url: {
      original: doc.requested_url,
      final: doc.final_url,
      canonical,
      domain: domainOf(canonical),
    },
    meta: {
      title: metaContent(doc.html, 'og:title') ?? firstMatch(doc.html, /<title[^>]*>([\s\S]*?)<\/title>/i),
      description: metaContent(doc.html, 'description') ?? metaContent(doc.html, 'og:description'),
      site_name: metaContent(doc.html, 'og:site_name'),
      published_at_hint: metaContent(doc.html, 'article:published_time'),
    },
    content: {
      sha256: computeContentSha256(text, false),
      extracted_text_full: text,
      char_count: text.length,
      word_count: countWords(text),
    },
  };
}

export function createReduceAdapter(): StageAdapter {
  return defineStageAdapter({
    stage: 'reduce',
    outputSchema: ReducedDocumentSchema,
    async run({ payload }) {
      return reduceCapture(parsePayload(CapturedDocumentSchema, payload, 'capture'));
    },
  });
}
