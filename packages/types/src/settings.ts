// ──────────────────────────────────────────────
// Nodeplate - Template Settings Types
// ──────────────────────────────────────────────

import type { FieldValue } from "./field.js";

export type PlaceholderDefaults = Record<string, FieldValue>;

// Field Storage Key -> stored value. `null` keeps the key (and the node
// order it encodes) when no value could be resolved.
export type FieldValueMap = Record<string, FieldValue | null>;

export interface TemplateSettings {
  placeholders: PlaceholderDefaults;
  fields: FieldValueMap;
}

export type PlaceholderCatalog = readonly string[];

export type RenderOverrideValue = string | number | bigint | null | undefined;

export type RenderOverrides = Record<string, RenderOverrideValue>;

export interface PromptStyle {
  name: string;
  pre: string;
  post: string;
}

export type PromptStyleMap = Record<string, { pre: string; post: string }>;
