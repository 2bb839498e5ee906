import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { STAGES, type StageName } from '@pressline/press-db';
import { ConfigError, errorMessage, formatIssues } from './errors.js';
import type { RunnerPolicy } from './stage-runner.js';

/** Convert a spreadsheet column letter ("A", "AB") to a 0-based index. */
export function columnIndex(letters: string): number {
  let index = 0;
  for (const ch of letters.toUpperCase()) {
    index = index * 26 + (ch.charCodeAt(0) - 64);
  }
  return index - 1;
}

/** Lease TTLs are bound as a PostgreSQL int. */
const MAX_TTL_MS = 2_147_483_647;

const ColumnSchema = z
  .string()
  .regex(/^[A-Za-z]{1,3}$/, 'must be a column letter such as "A" or "AB"')
  .transform(columnIndex);

const StageOverridesSchema = z
  .object({
    batchSize: z.number().int().positive().optional(),
    maxAttempts: z.number().int().positive().optional(),
    leaseTtlMs: z.number().int().positive().max(MAX_TTL_MS).optional(),
  })
  .strict();

const PipelineSchema = z
  .object({
    batchSize: z.number().int().positive().default(25),
    maxAttempts: z.number().int().positive().default(3),
    leaseTtlMs: z.number().int().positive().max(MAX_TTL_MS).default(5 * 60_000),
    orphanAfterMs: z.number().int().positive().optional(),
    sweepLeaseTtlMs: z.number().int().positive().max(MAX_TTL_MS).default(60 * 60_000),
    sweepTimeoutMs: z.number().int().positive().optional(),
    backoff: z
      .object({
        baseMs: z.number().int().nonnegative().default(60_000),
        maxMs: z.number().int().nonnegative().default(60 * 60_000),
      })
      .strict()
      .default({}),
    stages: z.record(z.enum(STAGES), StageOverridesSchema).default({}),
  })
  .strict();

const IntakeSchema = z
  .object({
    sheetPath: z.string().min(1),
    firstDataRow: z.number().int().positive().default(2),
    columns: z
      .object({
        url: ColumnSchema,
        status: ColumnSchema,
        error: ColumnSchema.optional(),
      })
      .strict()
      .superRefine((cols, ctx) => {
        const used = [cols.url, cols.status, cols.error].filter((c): c is number => c !== undefined);
        if (new Set(used).size !== used.length) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'columns must be distinct' });
        }
      }),
  })
  .strict();

const ServicesSchema = z
  .object({
    fetch: z
      .object({
        timeoutMs: z.number().int().positive().default(20_000),
        userAgent: z.string().min(1).default('pressline/0.1'),
      })
      .strict()
      .default({}),
    ai: z
      .object({
        endpoint: z.string().url(),
        model: z.string().min(1),
        timeoutMs: z.number().int().positive().default(120_000),
        promptSets: z
          .object({
            meta: z.string().min(1),
            claims: z.string().min(1),
          })
          .strict(),
      })
      .strict(),
    publish: z
      .object({
        endpoint: z.string().url(),
        timeoutMs: z.number().int().positive().default(30_000),
      })
      .strict(),
  })
  .strict();

const ArtifactsSchema = z.discriminatedUnion('backend', [
  z.object({ backend: z.literal('postgres') }).strict(),
  z
    .object({
      backend: z.literal('s3'),
      bucket: z.string().min(1),
      prefix: z.string().min(1).default('artifacts'),
    })
    .strict(),
]);

export const PipelineConfigSchema = z
  .object({
    deployment: z.string().min(1).default('default'),
    pipeline: PipelineSchema.default({}),
    artifacts: ArtifactsSchema.default({ backend: 'postgres' }),
    intake: IntakeSchema.optional(),
    services: ServicesSchema,
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type IntakeConfig = z.infer<typeof IntakeSchema>;
export type ServicesConfig = z.infer<typeof ServicesSchema>;
export type ArtifactsConfig = z.infer<typeof ArtifactsSchema>;

export function parseConfig(raw: unknown, source = 'config'): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}`, formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

export async function loadConfig(path: string): Promise<PipelineConfig> {
  const fullPath = resolve(path);
  let content: string;
  try {
    content = await readFile(fullPath, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Failed to read config from ${path}: ${errorMessage(e)}`);
  }

  let raw: unknown;
  try {
    raw = load(content);
  } catch (e) {
    throw new ConfigError(`Failed to parse YAML in ${path}: ${errorMessage(e)}`);
  }
  return parseConfig(raw, path);
}

/** Runner policy for one stage: pipeline defaults with stage overrides applied. */
export function stagePolicy(config: PipelineConfig, stage: StageName): RunnerPolicy {
  const { pipeline } = config;
  const overrides = pipeline.stages[stage] ?? {};
  const leaseTtlMs = overrides.leaseTtlMs ?? pipeline.leaseTtlMs;
  return {
    maxAttempts: overrides.maxAttempts ?? pipeline.maxAttempts,
    leaseTtlMs,
    orphanAfterMs: pipeline.orphanAfterMs ?? leaseTtlMs,
    backoff: pipeline.backoff,
  };
}

export function stageBatchSize(config: PipelineConfig, stage: StageName): number {
  return config.pipeline.stages[stage]?.batchSize ?? config.pipeline.batchSize;
}
