import {
  createDb,
  createPgArtifactStore,
  createPgItemStore,
  createPgLeaseManager,
  createPgLedger,
  createS3,
  createS3ArtifactStore,
  type ArtifactStore,
  type Db,
} from '@pressline/press-db';
import type { IntakeSource } from './adapter.js';
import { createStageAdapters } from './adapters/index.js';
import { createHttpAiTransform } from './clients/http-ai.js';
import { createHttpFetcher } from './clients/http-fetcher.js';
import { createHttpPublisher } from './clients/http-publisher.js';
import { SheetIntakeSource, createJsonSheetClient } from './clients/sheet-intake.js';
import type { PipelineConfig } from './config.js';
import type { Env } from './env.js';
import { ConfigError } from './errors.js';
import type { Logger } from './logger.js';
import { createPipeline, type Pipeline, type PipelineStores } from './pipeline.js';

export interface Runtime extends Pipeline {
  db: Db;
  stores: PipelineStores;
  intake: IntakeSource | undefined;
  close(): Promise<void>;
}

async function openArtifactStore(db: Db, config: PipelineConfig, env: Env): Promise<ArtifactStore> {
  const artifacts = config.artifacts;
  if (artifacts.backend === 'postgres') {
    return createPgArtifactStore(db);
  }
  if (!env.S3_ACCESS_KEY || !env.S3_SECRET_KEY) {
    throw new ConfigError('S3_ACCESS_KEY and S3_SECRET_KEY are required for the s3 artifact backend');
  }
  const s3 = createS3({
    endpoint: env.S3_ENDPOINT,
    region: env.S3_REGION,
    accessKeyId: env.S3_ACCESS_KEY,
    secretAccessKey: env.S3_SECRET_KEY,
    forcePathStyle: env.S3_FORCE_PATH_STYLE,
  });
  await s3.ensureBucket(artifacts.bucket);
  return createS3ArtifactStore(db, s3, { bucket: artifacts.bucket, prefix: artifacts.prefix });
}

/** PostgreSQL-backed stores, the HTTP service clients and the sheet intake. */
export async function openRuntime(config: PipelineConfig, env: Env, logger: Logger): Promise<Runtime> {
  const db = createDb(env.DATABASE_URL);
  try {
    const stores: PipelineStores = {
      items: createPgItemStore(db),
      ledger: createPgLedger(db),
      leases: createPgLeaseManager(db),
      artifacts: await openArtifactStore(db, config, env),
    };

    const { services } = config;
    const adapters = createStageAdapters({
      fetcher: createHttpFetcher(services.fetch),
      ai: createHttpAiTransform({ ...services.ai, apiKey: env.AI_API_KEY }),
      publisher: createHttpPublisher({ ...services.publish, token: env.PUBLISH_TOKEN }),
      promptSets: services.ai.promptSets,
    });

    const intake = config.intake
      ? new SheetIntakeSource(createJsonSheetClient(config.intake.sheetPath), {
          columns: config.intake.columns,
          firstDataRow: config.intake.firstDataRow,
        })
      : undefined;

    const pipeline = createPipeline(config, stores, { adapters, intake, logger });
    return {
      ...pipeline,
      db,
      stores,
      intake,
      close: () => db.$pool.end(),
    };
  } catch (e) {
    await db.$pool.end();
    throw e;
  }
}
