import Fastify, { type FastifyServerOptions } from "fastify";
import type { GatewayDeps } from "./deps.js";
import { registerArtifacts } from "./routes/artifacts.js";
import { registerHealth } from "./routes/health.js";
import { registerItems } from "./routes/items.js";
import { registerRecords } from "./routes/records.js";

export async function buildApp(deps: GatewayDeps, options: Pick<FastifyServerOptions, "logger"> = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  await registerHealth(app, deps);
  await registerItems(app, deps);
  await registerRecords(app, deps);
  await registerArtifacts(app, deps);

  return app;
}
