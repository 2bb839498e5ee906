import { describe, it, expect } from 'vitest';
import {
  ArtifactNotFoundError,
  artifactViewName,
  canonicalJson,
  createMemoryArtifactStore,
  hashDocument,
  isSha256Ref,
  itemIdFor,
  sha256,
} from '@pressline/press-db';

describe('Canonical JSON', () => {
  it('sorts keys at every depth and drops whitespace', () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: [3, { f: 1, e: 2 }] } })).toBe('{"a":{"c":[3,{"e":2,"f":1}],"d":2},"b":1}');
  });

  it('hashes equal documents to the same id regardless of key order', () => {
    const one = hashDocument({ title: 'x', claims: [{ text: 'a' }] });
    const two = hashDocument({ claims: [{ text: 'a' }], title: 'x' });

    expect(one.artifactId).toBe(two.artifactId);
    expect(isSha256Ref(one.artifactId)).toBe(true);
    expect(one.artifactId).toBe(sha256(Buffer.from('{"claims":[{"text":"a"}],"title":"x"}', 'utf-8')));
  });

  it('serializes dates as ISO strings', () => {
    expect(canonicalJson({ at: new Date('2026-03-02T09:00:00.000Z') })).toBe('{"at":"2026-03-02T09:00:00.000Z"}');
  });

  it('rejects values JSON cannot represent', () => {
    expect(() => canonicalJson(undefined)).toThrow(TypeError);
  });

  it('derives item ids from the canonical key', () => {
    expect(itemIdFor('https://example.com/a')).toBe(sha256(Buffer.from('https://example.com/a', 'utf-8')));
    expect(itemIdFor('https://example.com/a')).not.toBe(itemIdFor('https://example.com/b'));
  });
});

describe('Artifact store (in-memory)', () => {
  it('stores a document once under its content hash', async () => {
    const store = createMemoryArtifactStore();

    const first = await store.put({ b: 2, a: 1 });
    const second = await store.put({ a: 1, b: 2 });

    expect(first).toEqual({ artifactId: hashDocument({ a: 1, b: 2 }).artifactId, inserted: true, sizeBytes: 13 });
    expect(second.inserted).toBe(false);
    expect(store.size()).toBe(1);
    expect(await store.get(first.artifactId)).toEqual({ a: 1, b: 2 });
    expect(await store.has(first.artifactId)).toBe(true);
  });

  it('throws ArtifactNotFoundError for unknown ids', async () => {
    const store = createMemoryArtifactStore();

    await expect(store.get(hashDocument({}).artifactId)).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it('points the named view at the latest artifact', async () => {
    const store = createMemoryArtifactStore();
    const one = await store.put({ v: 1 });
    const two = await store.put({ v: 2 });

    await store.name('meta', 'sha256:item', one.artifactId);
    await store.name('meta', 'sha256:item', two.artifactId);

    expect(await store.resolveName('meta', 'sha256:item')).toBe(two.artifactId);
    expect(await store.resolveName('claims', 'sha256:item')).toBeNull();
    expect(artifactViewName('meta', 'sha256:item')).toBe('meta/sha256:item.meta.json');
  });
});
