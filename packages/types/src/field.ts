// ──────────────────────────────────────────────
// Nodeplate - Field Types
// ──────────────────────────────────────────────

import type { FieldValueType, Graph } from "./graph.js";

// Integers beyond the safe range are bigint
export type FieldValue = string | number | bigint;

export interface Field {
  readonly nodeId: string;
  readonly nodeTitle: string;
  readonly inputName: string;
  readonly classType: string;
  readonly valueType: FieldValueType;
  /** Empty when the field holds a literal value. */
  readonly placeholder: string;
  readonly storedValue: FieldValue;
  /** Exactly `%<placeholder>%` while bound. */
  readonly textValue: string;
  readonly order: number;
  readonly isPrimary: boolean;
  readonly displayTitle: string;
}

export interface FieldKeyParts {
  order: number | null;
  nodeId: string | null;
  inputName: string | null;
}

export interface FieldExtraction {
  fields: Field[];
  graph: Graph;
}
