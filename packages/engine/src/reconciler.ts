// ──────────────────────────────────────────────
// Nodeplate - Field Reconciler
// Merges an edited Field list with previously persisted settings
// ──────────────────────────────────────────────

import type {
  Field,
  FieldValue,
  FieldValueMap,
  Graph,
  PlaceholderDefaults,
  TemplateSettings,
} from "@nodeplate/types";
import { createDocumentLogger, readOwn, writeOwn } from "@nodeplate/utils";
import { coerce, isPlaceholderToken } from "./coercion.js";
import { ParseError, ValidationError } from "./errors.js";
import { encodeFieldKey, findFieldValue, normalizeFieldOrder } from "./field-key.js";
import { findNode, setNodeInput, toScalarValue } from "./graph.js";
import { placeholderToken } from "./tokenizer.js";

export function fieldLabel(field: Field): string {
  return `${field.nodeTitle || field.nodeId} → ${field.inputName}`;
}

// ── Applying fields to the graph ──────────────

export interface ApplyFieldsResult {
  graph: Graph;
  placeholderValues: PlaceholderDefaults;
  fieldValues: FieldValueMap;
  activePlaceholders: Set<string>;
  errors: ParseError[];
}

/**
 * Writes each field into its node: bound fields become `%name%`, literal
 * fields their coerced value. Coercion failures are collected, not thrown.
 */
export function applyFields(graph: Graph, fields: readonly Field[]): ApplyFieldsResult {
  let current = graph;
  const placeholderValues: PlaceholderDefaults = {};
  const fieldValues: FieldValueMap = {};
  const activePlaceholders = new Set<string>();
  const errors: ParseError[] = [];

  fields.forEach((field, index) => {
    if (!findNode(current, field.nodeId)) return;

    const key = encodeFieldKey(field.nodeId, field.inputName, normalizeFieldOrder(field.order, index + 1));

    if (field.placeholder) {
      activePlaceholders.add(field.placeholder);

      let value: FieldValue | null = null;
      if (!isPlaceholderToken(field.storedValue) && field.storedValue !== "") {
        const result = coerce(field.storedValue, field.valueType);
        if (!result.success) {
          errors.push(result.error.forField(fieldLabel(field)));
          return;
        }
        value = result.value;
      }

      current = setNodeInput(current, field.nodeId, field.inputName, {
        kind: "text",
        value: placeholderToken(field.placeholder),
      });
      if (value !== null) {
        writeOwn(placeholderValues, field.placeholder, value);
        fieldValues[key] = value;
      }
      return;
    }

    const result = coerce(field.textValue, field.valueType);
    if (!result.success) {
      errors.push(result.error.forField(fieldLabel(field)));
      return;
    }
    current = setNodeInput(
      current,
      field.nodeId,
      field.inputName,
      toScalarValue(result.value, field.valueType)
    );
    fieldValues[key] = result.value;
  });

  return { graph: current, placeholderValues, fieldValues, activePlaceholders, errors };
}

// ── Stored value fallback chain ───────────────

export interface FieldValueContext {
  field: Field;
  key: string;
  freshValues: FieldValueMap;
  previousValues: FieldValueMap;
  placeholderDefaults: PlaceholderDefaults;
}

/** Returns `undefined` to defer to the next provider. */
export type FieldValueProvider = (context: FieldValueContext) => FieldValue | null | undefined;

export const freshValueProvider: FieldValueProvider = ({ key, freshValues }) =>
  Object.hasOwn(freshValues, key) ? freshValues[key] : undefined;

// Identity match: survives a change of the order encoded in the key
export const previousValueProvider: FieldValueProvider = ({ field, previousValues }) => {
  const match = findFieldValue(previousValues, field.nodeId, field.inputName);
  return match?.value ?? undefined;
};

export const placeholderDefaultProvider: FieldValueProvider = ({ field, placeholderDefaults }) =>
  field.placeholder ? readOwn(placeholderDefaults, field.placeholder) ?? null : undefined;

export const literalTextProvider: FieldValueProvider = ({ field }) => {
  const result = coerce(field.textValue, field.valueType);
  return result.success ? result.value : null;
};

export const FIELD_VALUE_PROVIDERS: readonly FieldValueProvider[] = [
  freshValueProvider,
  previousValueProvider,
  placeholderDefaultProvider,
  literalTextProvider,
];

export function resolveFieldValue(
  context: FieldValueContext,
  providers: readonly FieldValueProvider[] = FIELD_VALUE_PROVIDERS
): FieldValue | null {
  for (const provider of providers) {
    const value = provider(context);
    if (value !== undefined) return value;
  }
  return null;
}

// ── Reconciliation ────────────────────────────

export interface ReconcileInput {
  documentId: string;
  graph: Graph;
  fields: readonly Field[];
  previousSettings: TemplateSettings;
}

export interface ReconcileResult {
  settings: TemplateSettings;
  graph: Graph;
  fields: Field[];
  errors: ParseError[];
  activePlaceholders: string[];
}

/**
 * Computes the settings and graph to persist for an edited Field list.
 * Throws {@link ValidationError} when two nodes share an order; parse
 * failures are returned in `errors` and the result must not be persisted.
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
  const { documentId, graph, previousSettings } = input;
  const logger = createDocumentLogger("reconciler", documentId);

  const fields = assignNodeOrders(input.fields);
  assertUniqueNodeOrders(fields);

  const sorted = fields
    .map((field, index) => ({ field, index }))
    .sort((a, b) => a.field.order - b.field.order || a.index - b.index)
    .map(({ field }, index) => ({ ...field, order: normalizeFieldOrder(field.order, index + 1) }));

  const applied = applyFields(graph, sorted);

  const placeholders: PlaceholderDefaults = {};
  for (const [name, value] of Object.entries(previousSettings.placeholders)) {
    if (applied.activePlaceholders.has(name)) {
      writeOwn(placeholders, name, value);
    }
  }
  for (const [name, value] of Object.entries(applied.placeholderValues)) {
    writeOwn(placeholders, name, value);
  }

  const fieldMap: FieldValueMap = {};
  sorted.forEach((field, index) => {
    const key = encodeFieldKey(field.nodeId, field.inputName, normalizeFieldOrder(field.order, index + 1));
    fieldMap[key] = resolveFieldValue({
      field,
      key,
      freshValues: applied.fieldValues,
      previousValues: previousSettings.fields,
      placeholderDefaults: placeholders,
    });
  });

  logger.debug(
    {
      fieldCount: sorted.length,
      activePlaceholders: applied.activePlaceholders.size,
      errorCount: applied.errors.length,
    },
    "Fields reconciled"
  );

  return {
    settings: { placeholders, fields: fieldMap },
    graph: applied.graph,
    fields: sorted,
    errors: applied.errors,
    activePlaceholders: Array.from(applied.activePlaceholders),
  };
}

// The first field seen for a node decides the order of all its fields
function assignNodeOrders(fields: readonly Field[]): Field[] {
  const nodeOrders = new Map<string, number>();
  return fields.map((field) => {
    let order = nodeOrders.get(field.nodeId);
    if (order === undefined) {
      order = normalizeFieldOrder(field.order, nodeOrders.size + 1);
      nodeOrders.set(field.nodeId, order);
    }
    return order === field.order ? field : { ...field, order };
  });
}

function assertUniqueNodeOrders(fields: readonly Field[]): void {
  const nodesByOrder = new Map<number, string[]>();
  for (const field of fields) {
    const nodes = nodesByOrder.get(field.order) ?? [];
    if (!nodes.includes(field.nodeId)) {
      nodes.push(field.nodeId);
    }
    nodesByOrder.set(field.order, nodes);
  }

  const issues: string[] = [];
  for (const [order, nodes] of nodesByOrder) {
    if (nodes.length > 1) {
      issues.push(`Row ${order} is used by nodes ${nodes.map((id) => `"${id}"`).join(", ")}`);
    }
  }
  if (issues.length > 0) {
    throw new ValidationError("Duplicate row numbers detected. Changes not saved", issues);
  }
}
