export { createDb, isUniqueViolation, type Db, type Queryable } from './db.js';
export { migrate, loadMigrations, getAppliedMigrations, applyMigration, defaultMigrationsDir } from './migrate.js';
export { ulid } from './ulid.js';
export { sha256, isSha256Ref, canonicalJson, hashDocument, itemIdFor, type HashedDocument } from './hashing.js';
export { STAGES, isStageName, upstreamOf, ancestorsOf, type StageName } from './stages.js';
export * from './types.js';
export * from './errors.js';
export { planTransition, planReset, isEligible, type TransitionPlan, type PlanContext } from './transitions.js';
export * from './store.items.js';
export * from './store.ledger.js';
export * from './store.leases.js';
export * from './store.artifacts.js';
export { createS3, type S3Api, type S3Settings } from './s3.js';
export {
  normalizeUrl,
  isHttpUrl,
  extractTextFromHtml,
  collapseWhitespace,
  normalizeText,
  computeContentSha256,
  countWords,
} from './normalize.js';
export * from './memory/index.js';
