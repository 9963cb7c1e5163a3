// ──────────────────────────────────────────────
// Nodeplate - Shared Types
// ──────────────────────────────────────────────

export * from "./graph.js";
export * from "./field.js";
export * from "./settings.js";
export * from "./placeholder.js";
