// ──────────────────────────────────────────────
// Nodeplate - Templates Package
// ──────────────────────────────────────────────

export type { TemplateStore, StoredDocument, DocumentSummary } from "./store.js";
export { createMemoryStore } from "./stores/memory-store.js";
export type { MemoryStoreOptions } from "./stores/memory-store.js";
export { createDatabaseStore } from "./stores/database-store.js";
export { createTemplateStore } from "./store-factory.js";
export { createSnapshotCache } from "./snapshot-cache.js";
export type { SnapshotCache, SnapshotCacheOptions } from "./snapshot-cache.js";
export { createCatalogService } from "./catalog.service.js";
export type { CatalogService, CacheOptions } from "./catalog.service.js";
export { createStyleService } from "./style.service.js";
export type { StyleService } from "./style.service.js";
export { createTemplateService } from "./template.service.js";
export type { TemplateService, RenderOptions, SaveFieldsResult } from "./template.service.js";
export { createServices } from "./runtime.js";
export type { Services } from "./runtime.js";
