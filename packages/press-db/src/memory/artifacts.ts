import { ArtifactNotFoundError } from '../errors.js';
import { hashDocument } from '../hashing.js';
import { artifactViewName, type ArtifactStore } from '../types.js';

export interface MemoryArtifactStore extends ArtifactStore {
  /** Number of distinct artifacts stored. */
  size(): number;
}

export function createMemoryArtifactStore(): MemoryArtifactStore {
  const objects = new Map<string, Buffer>();
  const names = new Map<string, string>();

  return {
    async put(document) {
      const { artifactId, bytes } = hashDocument(document);
      const inserted = !objects.has(artifactId);
      if (inserted) {
        objects.set(artifactId, bytes);
      }
      return { artifactId, inserted, sizeBytes: bytes.length };
    },

    async get(artifactId) {
      const bytes = objects.get(artifactId);
      if (!bytes) {
        throw new ArtifactNotFoundError(artifactId);
      }
      return JSON.parse(bytes.toString('utf-8'));
    },

    async has(artifactId) {
      return objects.has(artifactId);
    },

    async name(stage, itemId, artifactId) {
      if (!objects.has(artifactId)) {
        throw new ArtifactNotFoundError(artifactId);
      }
      names.set(artifactViewName(stage, itemId), artifactId);
    },

    async resolveName(stage, itemId) {
      return names.get(artifactViewName(stage, itemId)) ?? null;
    },

    size() {
      return objects.size;
    },
  };
}
