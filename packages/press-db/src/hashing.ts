import { createHash } from 'crypto';

export function sha256(bytes: Buffer): string {
  return 'sha256:' + createHash('sha256').update(bytes).digest('hex');
}

export function isSha256Ref(value: string): boolean {
  return /^sha256:[a-f0-9]{64}$/.test(value);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, inner] of entries) {
      sorted[key] = sortKeys(inner);
    }
    return sorted;
  }
  return value;
}

/**
 * Serialize a JSON value with object keys sorted at every depth and no
 * whitespace, so equal documents always produce equal bytes.
 */
export function canonicalJson(value: unknown): string {
  const json = JSON.stringify(sortKeys(value));
  if (json === undefined) {
    throw new TypeError('Value is not JSON-serializable');
  }
  return json;
}

export interface HashedDocument {
  artifactId: string;
  bytes: Buffer;
}

export function hashDocument(document: unknown): HashedDocument {
  const bytes = Buffer.from(canonicalJson(document), 'utf-8');
  return { artifactId: sha256(bytes), bytes };
}

/** Work item ids are derived from the canonical key, never assigned. */
export function itemIdFor(canonicalKey: string): string {
  return sha256(Buffer.from(canonicalKey, 'utf-8'));
}
