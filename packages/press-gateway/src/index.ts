export { buildApp } from "./app.js";
export type { GatewayDeps } from "./deps.js";
export { GatewayConfigSchema, configHash, resolveGatewayConfig, type GatewayConfig } from "./config.js";
