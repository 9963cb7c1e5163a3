// ──────────────────────────────────────────────
// Nodeplate - Type Coercion
// text ⇄ integer ⇄ float conversion for field storage
// ──────────────────────────────────────────────

import type { FieldValue, FieldValueType } from "@nodeplate/types";
import { ParseError } from "./errors.js";

export type CoercionResult =
  | { success: true; value: FieldValue }
  | { success: false; error: ParseError };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts a textual (or already numeric) value to the field's declared type.
 * Never throws: failures come back as a {@link ParseError}.
 */
export function coerce(value: FieldValue, valueType: FieldValueType): CoercionResult {
  switch (valueType) {
    case "text":
      return { success: true, value: String(value) };
    case "integer":
      return coerceInteger(value);
    case "float":
      return coerceFloat(value);
  }
}

function coerceInteger(value: FieldValue): CoercionResult {
  if (typeof value === "bigint") {
    return { success: true, value };
  }
  if (typeof value === "number") {
    if (Number.isSafeInteger(value)) {
      return { success: true, value };
    }
    return failure(String(value), "integer", "Enter a valid integer");
  }

  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return failure(value, "integer", "Enter a valid integer");
  }

  const parsed = parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    return { success: true, value: BigInt(trimmed) };
  }
  return { success: true, value: parsed };
}

function coerceFloat(value: FieldValue): CoercionResult {
  if (typeof value !== "string") {
    const number = Number(value);
    if (Number.isFinite(number)) {
      return { success: true, value: number };
    }
    return failure(String(value), "float", "Enter a valid number");
  }

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return failure(value, "float", "Enter a valid number");
  }

  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    return failure(value, "float", "Number is out of range");
  }
  return { success: true, value: parsed };
}

export type PlaceholderDefaultResult =
  | { success: true; value: FieldValue | null }
  | { success: false; error: ParseError };

/**
 * Coerces an edited placeholder default. Empty numeric input clears the
 * default instead of failing.
 */
export function coercePlaceholderDefault(
  name: string,
  value: FieldValue | null,
  valueType: FieldValueType
): PlaceholderDefaultResult {
  if (valueType === "text") {
    return { success: true, value: value === null ? "" : String(value) };
  }
  if (value === null || (typeof value === "string" && value.trim() === "")) {
    return { success: true, value: null };
  }

  const result = coerce(value, valueType);
  if (result.success) return result;
  return { success: false, error: result.error.forField(`\`${name}\``) };
}

export function isPlaceholderToken(value: unknown): boolean {
  if (typeof value !== "string") return false;
  const trimmed = value.trim();
  return trimmed.length >= 2 && trimmed.startsWith("%") && trimmed.endsWith("%");
}

function failure(input: string, valueType: FieldValueType, reason: string): CoercionResult {
  return { success: false, error: new ParseError(reason, { input, valueType }) };
}
