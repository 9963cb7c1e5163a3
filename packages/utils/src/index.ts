// ──────────────────────────────────────────────
// Nodeplate - Utils Package
// ──────────────────────────────────────────────

export { rootLogger, createLogger, createCorrelationId, createDocumentLogger } from "./logger.js";
export {
  loadConfig,
  getEnvOrThrow,
  getEnvOrDefault,
  getEnvAsNumber,
  STORE_DRIVERS,
} from "./config.js";
export type { AppConfig, StoreDriver } from "./config.js";
export {
  sanitizeErrorMessage,
  isPlainObject,
  dedupeAndSortStrings,
  formatIssues,
  readOwn,
  writeOwn,
} from "./helpers.js";
