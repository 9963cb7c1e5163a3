// ──────────────────────────────────────────────
// Nodeplate - Graph Model
// Lossless parse/serialize of node-graph documents
// ──────────────────────────────────────────────

import { parse, stringify, isLosslessNumber, LosslessNumber } from "lossless-json";
import type {
  FieldValue,
  FieldValueType,
  Graph,
  GraphNode,
  NodeInput,
  NodeInputValue,
  ScalarValue,
} from "@nodeplate/types";
import { isPlainObject } from "@nodeplate/utils";
import { ValidationError } from "./errors.js";
import { documentSchema, describeIssues } from "./schemas.js";

export type DocumentParseResult =
  | { success: true; graph: Graph }
  | { success: false; diagnostic: string };

/**
 * Parses document text. Numbers keep their literal text, so `1.0` stays a
 * float and 64-bit seeds survive a round trip.
 */
export function safeParseDocument(text: string): DocumentParseResult {
  let value: unknown;
  try {
    value = parse(text);
  } catch (err) {
    return {
      success: false,
      diagnostic: err instanceof Error ? err.message : "Invalid JSON",
    };
  }
  return safeBuildGraph(value);
}

export function parseDocument(text: string): Graph {
  const result = safeParseDocument(text);
  if (!result.success) {
    throw new ValidationError("Document is not a valid node graph", [result.diagnostic]);
  }
  return result.graph;
}

export function safeBuildGraph(value: unknown): DocumentParseResult {
  if (!isPlainObject(value)) {
    return { success: false, diagnostic: "Document must be an object keyed by node id" };
  }

  const parsed = documentSchema.safeParse(value);
  if (!parsed.success) {
    return { success: false, diagnostic: describeIssues(parsed.error).join("; ") };
  }

  const nodes: GraphNode[] = [];
  for (const [id, source] of Object.entries(value)) {
    const node = parsed.data[id];
    if (!node || !isPlainObject(source)) continue;

    const rawInputs = isPlainObject(source["inputs"]) ? source["inputs"] : {};
    const inputs: NodeInput[] = Object.entries(rawInputs).map(([name, raw]) => ({
      name,
      value: classifyInputValue(raw),
    }));

    nodes.push({
      id,
      classType: node.class_type,
      title: node._meta?.title ?? id,
      inputs,
      source,
    });
  }

  return { success: true, graph: { nodes } };
}

export function buildGraph(value: unknown): Graph {
  const result = safeBuildGraph(value);
  if (!result.success) {
    throw new ValidationError("Document is not a valid node graph", [result.diagnostic]);
  }
  return result.graph;
}

export function serializeGraph(graph: Graph, space?: number): string {
  const document: Record<string, unknown> = {};
  for (const node of graph.nodes) {
    const inputs: Record<string, unknown> = {};
    for (const input of node.inputs) {
      inputs[input.name] = toRawValue(input.value);
    }
    document[node.id] = { ...node.source, inputs };
  }

  const text = stringify(document, undefined, space);
  if (text === undefined) {
    throw new Error("Graph could not be serialized");
  }
  return text;
}

export function classifyInputValue(raw: unknown): NodeInputValue {
  if (typeof raw === "string") {
    return { kind: "text", value: raw };
  }
  if (isLosslessNumber(raw)) {
    return classifyNumberLiteral(raw.value) ?? { kind: "opaque", raw };
  }
  if (typeof raw === "number" && Number.isFinite(raw)) {
    return classifyNumberLiteral(String(raw)) ?? { kind: "opaque", raw };
  }
  return { kind: "opaque", raw };
}

function classifyNumberLiteral(literal: string): ScalarValue | null {
  const value = Number(literal);
  if (!Number.isFinite(value)) return null;

  if (/[.eE]/.test(literal)) {
    return { kind: "float", value, literal };
  }
  return { kind: "integer", value: Number.isSafeInteger(value) ? value : BigInt(literal), literal };
}

/** Builds the scalar a field of the given type writes back into the graph. */
export function toScalarValue(value: FieldValue, valueType: FieldValueType): ScalarValue {
  if (valueType === "text" || typeof value === "string") {
    return { kind: "text", value: String(value) };
  }
  if (typeof value === "bigint") {
    return valueType === "integer"
      ? { kind: "integer", value, literal: value.toString() }
      : { kind: "float", value: Number(value), literal: `${value}.0` };
  }
  if (valueType === "integer") {
    return { kind: "integer", value, literal: String(value) };
  }
  return { kind: "float", value, literal: formatFloatLiteral(value) };
}

// Integral floats keep a fraction so the slot is read back as a float
export function formatFloatLiteral(value: number): string {
  const text = String(value);
  if (Number.isInteger(value) && !/[eE]/.test(text)) {
    return `${text}.0`;
  }
  return text;
}

export function scalarText(value: ScalarValue): string {
  if (value.kind === "text") return value.value;
  return value.literal;
}

export function findNode(graph: Graph, nodeId: string): GraphNode | undefined {
  return graph.nodes.find((node) => node.id === nodeId);
}

export function setNodeInput(
  graph: Graph,
  nodeId: string,
  inputName: string,
  value: NodeInputValue
): Graph {
  return {
    nodes: graph.nodes.map((node) => {
      if (node.id !== nodeId) return node;

      const exists = node.inputs.some((input) => input.name === inputName);
      const inputs = exists
        ? node.inputs.map((input) => (input.name === inputName ? { name: inputName, value } : input))
        : [...node.inputs, { name: inputName, value }];
      return { ...node, inputs };
    }),
  };
}

function toRawValue(value: NodeInputValue): unknown {
  switch (value.kind) {
    case "text":
      return value.value;
    case "integer":
    case "float":
      return new LosslessNumber(value.literal);
    case "opaque":
      return value.raw;
  }
}
