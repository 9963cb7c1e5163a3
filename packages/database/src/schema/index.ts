// ──────────────────────────────────────────────
// Nodeplate - Database Schema Index
// ──────────────────────────────────────────────

export { templateDocuments } from "./template-documents.js";
export { templateSettings } from "./template-settings.js";
export { placeholderCatalog, PLACEHOLDER_CATALOG_ROW_ID } from "./placeholder-catalog.js";
export { promptStyles } from "./prompt-styles.js";
