// ──────────────────────────────────────────────
// Nodeplate - Field Extractor
// Derives the ordered, editable Field list of a graph
// ──────────────────────────────────────────────

import type {
  Field,
  FieldExtraction,
  FieldValue,
  FieldValueType,
  Graph,
  PlaceholderCatalog,
  ScalarValue,
  TemplateSettings,
} from "@nodeplate/types";
import { createLogger, readOwn } from "@nodeplate/utils";
import { FIELD_ORDER_MAX } from "./constants.js";
import { isPlaceholderToken } from "./coercion.js";
import { decodeFieldKey, fieldIdentity, normalizeFieldOrder } from "./field-key.js";
import { parseDocument, scalarText } from "./graph.js";
import { parsePlaceholderToken } from "./tokenizer.js";

const logger = createLogger("field-extractor");

type NodeFieldDraft = Omit<Field, "order" | "isPrimary" | "displayTitle">;

interface NodeEntry {
  nodeId: string;
  nodeTitle: string;
  order: number | null;
  sequence: number;
  fields: NodeFieldDraft[];
}

export function extractFields(
  document: string | Graph,
  settings: TemplateSettings,
  catalog: PlaceholderCatalog
): FieldExtraction {
  const graph = typeof document === "string" ? parseDocument(document) : document;
  const knownPlaceholders = new Set(catalog);
  const { storedValues, nodeOrders } = indexStoredFields(settings);

  const entries: NodeEntry[] = [];
  let skipped = 0;

  for (const node of graph.nodes) {
    const fields: NodeFieldDraft[] = [];

    for (const input of node.inputs) {
      if (input.value.kind === "opaque") {
        skipped += 1;
        continue;
      }

      const scalar: ScalarValue = input.value;
      const graphValue: FieldValue = scalar.value;
      let storedValue: FieldValue | undefined =
        storedValues.get(fieldIdentity(node.id, input.name)) ?? undefined;
      let placeholder = "";

      const tokenName = scalar.kind === "text" ? parsePlaceholderToken(scalar.value) : null;
      if (tokenName !== null && knownPlaceholders.has(tokenName)) {
        placeholder = tokenName;
        storedValue = readOwn(settings.placeholders, tokenName) ?? storedValue;
      }

      if (storedValue === undefined) {
        storedValue = graphValue;
      }
      if (placeholder && isPlaceholderToken(storedValue)) {
        storedValue = "";
      }

      fields.push({
        nodeId: node.id,
        nodeTitle: node.title,
        inputName: input.name,
        classType: node.classType,
        valueType: placeholder ? boundValueType(storedValue, scalar) : scalar.kind,
        placeholder,
        storedValue,
        textValue: placeholder ? scalarText(scalar) : String(storedValue),
      });
    }

    if (fields.length > 0) {
      entries.push({
        nodeId: node.id,
        nodeTitle: node.title,
        order: nodeOrders.get(node.id) ?? null,
        sequence: entries.length,
        fields,
      });
    }
  }

  if (skipped > 0) {
    logger.debug({ skipped }, "Skipped non-scalar node inputs");
  }

  entries.forEach((entry, index) => {
    entry.order = normalizeFieldOrder(entry.order, index + 1);
  });
  entries.sort(
    (a, b) =>
      (a.order ?? FIELD_ORDER_MAX + 1) - (b.order ?? FIELD_ORDER_MAX + 1) ||
      a.sequence - b.sequence
  );

  const fields: Field[] = [];
  entries.forEach((entry, index) => {
    const order = normalizeFieldOrder(entry.order, index + 1);
    entry.fields.forEach((draft, fieldIndex) => {
      const isPrimary = fieldIndex === 0;
      fields.push({
        ...draft,
        order,
        isPrimary,
        displayTitle: isPrimary ? entry.nodeTitle : "",
      });
    });
  });

  return { fields, graph };
}

// A bound slot holds the token text; a numeric default keeps the field numeric
function boundValueType(storedValue: FieldValue, scalar: ScalarValue): FieldValueType {
  if (typeof storedValue === "bigint") return "integer";
  if (typeof storedValue !== "number") return scalar.kind;
  return Number.isInteger(storedValue) ? "integer" : "float";
}

// Stored values keyed by identity, and the first order recorded per node
function indexStoredFields(settings: TemplateSettings): {
  storedValues: Map<string, FieldValue | null>;
  nodeOrders: Map<string, number>;
} {
  const storedValues = new Map<string, FieldValue | null>();
  const nodeOrders = new Map<string, number>();

  for (const [key, value] of Object.entries(settings.fields)) {
    const { order, nodeId, inputName } = decodeFieldKey(key);
    if (!nodeId || !inputName) continue;

    storedValues.set(fieldIdentity(nodeId, inputName), value);
    if (order !== null && !nodeOrders.has(nodeId)) {
      nodeOrders.set(nodeId, normalizeFieldOrder(order, nodeOrders.size + 1));
    }
  }

  return { storedValues, nodeOrders };
}
