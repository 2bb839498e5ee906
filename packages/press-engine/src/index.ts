export * from './errors.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';
export { linkSignal, type LinkedSignal } from './abort.js';
export * from './adapter.js';
export * from './documents.js';
export { EnvelopeSchema, buildEnvelope, parseEnvelope, type Envelope, type Lineage } from './envelope.js';
export { backoffDelay, nextAttemptAt, type BackoffPolicy } from './retry.js';
export * from './stage-runner.js';
export * from './scheduler.js';
export { syncIntake, type IntakeSyncResult } from './intake.js';
export {
  PipelineConfigSchema,
  columnIndex,
  loadConfig,
  parseConfig,
  stageBatchSize,
  stagePolicy,
  type ArtifactsConfig,
  type IntakeConfig,
  type PipelineConfig,
  type ServicesConfig,
} from './config.js';
export { loadEnv, type Env } from './env.js';
export * from './adapters/index.js';
export { defaultFetch, isRetryableStatus, type FetchFn, type FetchOptions, type FetchResponse } from './clients/http.js';
export { createHttpFetcher, type HttpFetcherOptions } from './clients/http-fetcher.js';
export { createHttpAiTransform, type HttpAiTransformOptions } from './clients/http-ai.js';
export { createHttpPublisher, type HttpPublisherOptions } from './clients/http-publisher.js';
export {
  SheetIntakeSource,
  createJsonSheetClient,
  type SheetClient,
  type SheetColumns,
  type SheetIntakeOptions,
} from './clients/sheet-intake.js';
export { createPipeline, defaultHolder, type Pipeline, type PipelineServices, type PipelineStores } from './pipeline.js';
export { openRuntime, type Runtime } from './runtime.js';
export { RecordNotFoundError, resetStageRecord } from './admin.js';
