// ──────────────────────────────────────────────
// Nodeplate - Graph Types
// ──────────────────────────────────────────────

export type FieldValueType = "text" | "integer" | "float";

export type ScalarValue =
  | { kind: "text"; value: string }
  | { kind: "integer"; value: number | bigint; literal: string }
  | { kind: "float"; value: number; literal: string };

// Booleans, node links, nested objects and null. Kept verbatim so the document re-serializes unchanged.
export interface OpaqueValue {
  kind: "opaque";
  raw: unknown;
}

export type NodeInputValue = ScalarValue | OpaqueValue;

export interface NodeInput {
  name: string;
  value: NodeInputValue;
}

export interface GraphNode {
  id: string;
  classType: string;
  title: string;
  inputs: NodeInput[];
  // Every property of the node object as it appeared in the document
  source: Record<string, unknown>;
}

export interface Graph {
  nodes: GraphNode[];
}

export interface ResolvedDocument {
  text: string;
  graph: Graph;
}
