import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { ArtifactNotFoundError, STAGES, isSha256Ref } from "@pressline/press-db";
import type { GatewayDeps } from "../deps.js";

export async function registerArtifacts(app: FastifyInstance, deps: Pick<GatewayDeps, "artifacts">) {
  app.get("/v1/artifacts/:artifactId", async (req, reply) => {
    const parsed = z.object({ artifactId: z.string().refine(isSha256Ref, "expected sha256:<hex>") }).safeParse(req.params);
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_params", issues: parsed.error.issues };
    }

    try {
      const document = await deps.artifacts.get(parsed.data.artifactId);
      reply.header("cache-control", "public, max-age=31536000, immutable");
      return { artifactId: parsed.data.artifactId, document };
    } catch (err) {
      if (err instanceof ArtifactNotFoundError) {
        reply.code(404);
        return { error: "artifact_not_found" };
      }
      throw err;
    }
  });

  app.get("/v1/views/:stage/:itemId", async (req, reply) => {
    const parsed = z.object({ stage: z.enum(STAGES), itemId: z.string().min(1) }).safeParse(req.params);
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_params", issues: parsed.error.issues };
    }

    const artifactId = await deps.artifacts.resolveName(parsed.data.stage, parsed.data.itemId);
    if (!artifactId) {
      reply.code(404);
      return { error: "view_not_found" };
    }
    return { artifactId, document: await deps.artifacts.get(artifactId) };
  });
}
