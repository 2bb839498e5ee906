import { config } from 'dotenv';
import { z } from 'zod';
import { ConfigError, formatIssues } from './errors.js';

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  GATEWAY_PORT: z.coerce.number().int().positive().default(8787),

  S3_ENDPOINT: z.string().url().optional(),
  S3_REGION: z.string().min(1).default('us-east-1'),
  S3_ACCESS_KEY: z.string().min(1).optional(),
  S3_SECRET_KEY: z.string().min(1).optional(),
  S3_FORCE_PATH_STYLE: z
    .string()
    .optional()
    .transform(v => (v === 'true' ? true : v === 'false' ? false : true)),

  AI_API_KEY: z.string().min(1).optional(),
  PUBLISH_TOKEN: z.string().min(1).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/** Validate an environment; loads `.env` first when reading process.env. */
export function loadEnv(source?: NodeJS.ProcessEnv): Env {
  if (!source) config();
  const parsed = EnvSchema.safeParse(source ?? process.env);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment', formatIssues(parsed.error.issues));
  }
  return parsed.data;
}
