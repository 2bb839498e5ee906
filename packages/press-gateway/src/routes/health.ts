import type { FastifyInstance } from "fastify";
import type { GatewayDeps } from "../deps.js";

export async function registerHealth(app: FastifyInstance, deps: Pick<GatewayDeps, "leases">) {
  app.get("/health", async () => {
    return { ok: true };
  });

  // Touches the lease table, so a broken database shows up here
  app.get("/health/ready", async (_req, reply) => {
    try {
      const sweeps = await deps.leases.active("sweep");
      return { ok: true, sweeping: sweeps.length > 0 };
    } catch (err) {
      app.log.error({ err }, "readiness_failed");
      reply.code(503);
      return { ok: false };
    }
  });
}
