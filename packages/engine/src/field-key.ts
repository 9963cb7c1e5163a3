// ──────────────────────────────────────────────
// Nodeplate - Field Key Codec
// "<order>!<nodeId>|<inputName>" storage identity
// ──────────────────────────────────────────────

import type { FieldKeyParts, FieldValue, FieldValueMap } from "@nodeplate/types";
import {
  FIELD_KEY_SEPARATOR,
  FIELD_ORDER_MAX,
  FIELD_ORDER_MIN,
  FIELD_ORDER_SEPARATOR,
} from "./constants.js";

export function clampFieldOrder(order: number): number {
  return Math.max(FIELD_ORDER_MIN, Math.min(FIELD_ORDER_MAX, order));
}

/**
 * Reads an integer order from user or stored input, falling back when the
 * value is not an integer. The result is always within [1, 99].
 */
export function normalizeFieldOrder(value: unknown, fallback: number): number {
  return clampFieldOrder(parseOrder(value) ?? Math.trunc(fallback));
}

function parseOrder(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

export function fieldIdentity(nodeId: string, inputName: string): string {
  return `${nodeId}${FIELD_KEY_SEPARATOR}${inputName}`;
}

export function encodeFieldKey(nodeId: string, inputName: string, order?: number | null): string {
  const base = fieldIdentity(nodeId, inputName);
  if (order === undefined || order === null) return base;

  const parsed = parseOrder(order);
  if (parsed === null) return base;
  return `${clampFieldOrder(parsed)}${FIELD_ORDER_SEPARATOR}${base}`;
}

export function decodeFieldKey(key: unknown): FieldKeyParts {
  if (typeof key !== "string") {
    return { order: null, nodeId: null, inputName: null };
  }

  let rest = key;
  let order: number | null = null;

  const orderIndex = rest.indexOf(FIELD_ORDER_SEPARATOR);
  if (orderIndex !== -1) {
    const orderPart = rest.slice(0, orderIndex);
    rest = rest.slice(orderIndex + FIELD_ORDER_SEPARATOR.length);
    order = /^\s*[+-]?\d+\s*$/.test(orderPart) ? parseInt(orderPart, 10) : null;
  }

  const fieldIndex = rest.indexOf(FIELD_KEY_SEPARATOR);
  if (fieldIndex === -1) {
    return { order: null, nodeId: null, inputName: null };
  }

  return {
    order,
    nodeId: rest.slice(0, fieldIndex),
    inputName: rest.slice(fieldIndex + FIELD_KEY_SEPARATOR.length),
  };
}

/** Looks a value up by (nodeId, inputName) whatever order its key encodes. */
export function findFieldValue(
  fieldMap: FieldValueMap,
  nodeId: string,
  inputName: string
): { key: string; value: FieldValue | null } | null {
  for (const [key, value] of Object.entries(fieldMap)) {
    const parts = decodeFieldKey(key);
    if (parts.nodeId === nodeId && parts.inputName === inputName) {
      return { key, value };
    }
  }
  return null;
}
