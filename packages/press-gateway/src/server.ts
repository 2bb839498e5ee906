import { createLogger, loadConfig, loadEnv, openRuntime } from "@pressline/press-engine";
import { buildApp } from "./app.js";
import { configHash, resolveGatewayConfig } from "./config.js";

async function main() {
  const env = loadEnv();
  const pipelineConfig = await loadConfig(process.env.PRESSLINE_CONFIG ?? "pressline.config.yaml");
  const cfg = resolveGatewayConfig(env, pipelineConfig);

  const logger = createLogger({ level: env.LOG_LEVEL, name: "pressline-gateway" });
  const runtime = await openRuntime(pipelineConfig, env, logger);

  const app = await buildApp(runtime.stores, { logger: { level: env.LOG_LEVEL } });
  app.addHook("onClose", async () => {
    await runtime.close();
  });
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "shutdown_failed");
          process.exit(1);
        }
      );
    });
  }

  app.log.info({ config: { hash: configHash(cfg), ...cfg } }, "gateway_config");

  await app.listen({ port: cfg.http.port, host: cfg.http.host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
