import { Db, isUniqueViolation } from './db.js';
import { ArtifactIntegrityError, ArtifactNotFoundError } from './errors.js';
import { hashDocument, sha256 } from './hashing.js';
import type { S3Api } from './s3.js';
import type { StageName } from './stages.js';
import { artifactViewName, type Artifact, type ArtifactStore, type PutArtifactResult } from './types.js';

const JSON_CONTENT_TYPE = 'application/json';

function parseVerified(artifactId: string, bytes: Buffer): unknown {
  const actual = sha256(bytes);
  if (actual !== artifactId) {
    throw new ArtifactIntegrityError(artifactId, actual);
  }
  return JSON.parse(bytes.toString('utf-8'));
}

async function insertArtifactRow(
  db: Db,
  artifactId: string,
  sizeBytes: number,
  storage: Artifact['storage'],
  body: Buffer | null
): Promise<boolean> {
  try {
    await db.none(
      `INSERT INTO artifacts(artifact_id, size_bytes, storage, body) VALUES($1, $2, $3, $4)`,
      [artifactId, sizeBytes, storage, body]
    );
    return true;
  } catch (e) {
    // Same bytes already stored
    if (isUniqueViolation(e)) {
      return false;
    }
    throw e;
  }
}

export async function getArtifactMeta(db: Db, artifactId: string): Promise<Artifact | null> {
  return db.oneOrNone<Artifact>(
    `SELECT artifact_id, size_bytes, storage, created_at FROM artifacts WHERE artifact_id = $1`,
    [artifactId]
  );
}

async function upsertName(db: Db, name: string, artifactId: string): Promise<void> {
  await db.none(
    `INSERT INTO artifact_names(name, artifact_id, updated_at) VALUES($1, $2, now())
     ON CONFLICT (name) DO UPDATE SET artifact_id = EXCLUDED.artifact_id, updated_at = now()`,
    [name, artifactId]
  );
}

async function resolveName(db: Db, stage: StageName, itemId: string): Promise<string | null> {
  const row = await db.oneOrNone<{ artifact_id: string }>(
    `SELECT artifact_id FROM artifact_names WHERE name = $1`,
    [artifactViewName(stage, itemId)]
  );
  return row?.artifact_id ?? null;
}

/** Artifacts with their bytes inline in PostgreSQL. */
export function createPgArtifactStore(db: Db): ArtifactStore {
  return {
    async put(document): Promise<PutArtifactResult> {
      const { artifactId, bytes } = hashDocument(document);
      const inserted = await insertArtifactRow(db, artifactId, bytes.length, 'inline', bytes);
      return { artifactId, inserted, sizeBytes: bytes.length };
    },

    async get(artifactId) {
      const row = await db.oneOrNone<{ body: Buffer | null }>(
        `SELECT body FROM artifacts WHERE artifact_id = $1`,
        [artifactId]
      );
      if (!row?.body) {
        throw new ArtifactNotFoundError(artifactId);
      }
      return parseVerified(artifactId, row.body);
    },

    async has(artifactId) {
      return (await getArtifactMeta(db, artifactId)) !== null;
    },

    async name(stage, itemId, artifactId) {
      await upsertName(db, artifactViewName(stage, itemId), artifactId);
    },

    resolveName: (stage, itemId) => resolveName(db, stage, itemId),
  };
}

export interface S3ArtifactSettings {
  bucket: string;
  prefix: string;
}

/**
 * Artifact bytes in S3 under `<prefix>/objects/<artifactId>.json`, metadata in
 * PostgreSQL. Named views are object copies under `<prefix>/<stage>/`.
 */
export function createS3ArtifactStore(db: Db, s3: S3Api, settings: S3ArtifactSettings): ArtifactStore {
  const objectKey = (artifactId: string) => `${settings.prefix}/objects/${artifactId}.json`;

  return {
    async put(document): Promise<PutArtifactResult> {
      const { artifactId, bytes } = hashDocument(document);
      if (await getArtifactMeta(db, artifactId)) {
        return { artifactId, inserted: false, sizeBytes: bytes.length };
      }
      // Bytes first: a metadata row never points at a missing object
      await s3.putObject(settings.bucket, objectKey(artifactId), bytes, JSON_CONTENT_TYPE);
      const inserted = await insertArtifactRow(db, artifactId, bytes.length, 's3', null);
      return { artifactId, inserted, sizeBytes: bytes.length };
    },

    async get(artifactId) {
      const meta = await getArtifactMeta(db, artifactId);
      if (!meta) {
        throw new ArtifactNotFoundError(artifactId);
      }
      return parseVerified(artifactId, await s3.getObjectBytes(settings.bucket, objectKey(artifactId)));
    },

    async has(artifactId) {
      return (await getArtifactMeta(db, artifactId)) !== null;
    },

    async name(stage, itemId, artifactId) {
      const view = artifactViewName(stage, itemId);
      await s3.copyObject(settings.bucket, objectKey(artifactId), `${settings.prefix}/${view}`);
      await upsertName(db, view, artifactId);
    },

    resolveName: (stage, itemId) => resolveName(db, stage, itemId),
  };
}
