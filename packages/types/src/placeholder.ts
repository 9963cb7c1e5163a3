// ──────────────────────────────────────────────
// Nodeplate - Placeholder Usage Types
// ──────────────────────────────────────────────

import type { FieldValue } from "./field.js";
import type { FieldValueType } from "./graph.js";

export interface PlaceholderUsage {
  name: string;
  valueType: FieldValueType;
  nodeTitles: string[];
  inputNames: string[];
  value: FieldValue | null;
  order: number;
}

export interface PlaceholderDefaultEdit {
  name: string;
  valueType: FieldValueType;
  value: FieldValue | null;
}
