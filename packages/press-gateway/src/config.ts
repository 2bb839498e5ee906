import crypto from "node:crypto";
import { z } from "zod";
import { ConfigError, formatIssues, type Env, type PipelineConfig } from "@pressline/press-engine";

export const GatewayConfigSchema = z.object({
  http: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1)
  }),
  deployment: z.string().min(1),
  artifacts: z.enum(["postgres", "s3"])
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

/** What the gateway serves and where, from the environment and the pipeline config it reads from. */
export function resolveGatewayConfig(
  env: Env,
  pipeline: PipelineConfig,
  source: NodeJS.ProcessEnv = process.env
): GatewayConfig {
  const parsed = GatewayConfigSchema.safeParse({
    http: { port: env.GATEWAY_PORT, host: source.GATEWAY_HOST ?? "0.0.0.0" },
    deployment: pipeline.deployment,
    artifacts: pipeline.artifacts.backend
  });
  if (!parsed.success) {
    throw new ConfigError("Invalid gateway config", formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

/** Short fingerprint logged at startup, to tell deployments apart. */
export function configHash(cfg: GatewayConfig): string {
  return crypto.createHash("sha256").update(JSON.stringify(cfg)).digest("hex").slice(0, 12);
}
