// ──────────────────────────────────────────────
// Nodeplate - Field Editing
// Immutable edits applied by a configuration surface
// ──────────────────────────────────────────────

import type { Field } from "@nodeplate/types";
import { normalizeFieldOrder } from "./field-key.js";
import { placeholderToken } from "./tokenizer.js";

function replaceAt(fields: readonly Field[], index: number, field: Field): Field[] {
  const next = fields.slice();
  next[index] = field;
  return next;
}

/** A bound field keeps its token text; only the remembered value changes. */
export function updateFieldValue(fields: readonly Field[], index: number, text: string): Field[] {
  const field = fields[index];
  if (!field) return fields.slice();
  if (field.placeholder) {
    return replaceAt(fields, index, {
      ...field,
      storedValue: text,
      textValue: placeholderToken(field.placeholder),
    });
  }
  return replaceAt(fields, index, { ...field, textValue: text, storedValue: text });
}

/**
 * Binds the field to `placeholder`, or unbinds it when `placeholder` is
 * empty. Binding an unbound field remembers its literal so unbinding can
 * restore it.
 */
export function updateFieldPlaceholder(
  fields: readonly Field[],
  index: number,
  placeholder: string
): Field[] {
  const field = fields[index];
  if (!field) return fields.slice();

  if (placeholder) {
    return replaceAt(fields, index, {
      ...field,
      storedValue: field.placeholder === "" ? field.textValue : field.storedValue,
      placeholder,
      textValue: placeholderToken(placeholder),
    });
  }

  return replaceAt(fields, index, unbindField(field));
}

export function unbindField(field: Field): Field {
  return {
    ...field,
    placeholder: "",
    textValue: String(field.storedValue),
  };
}

/** Moves every field of the edited field's node to `order`. */
export function updateFieldOrder(fields: readonly Field[], index: number, order: unknown): Field[] {
  const target = fields[index];
  if (!target) return fields.slice();

  const nextOrder = normalizeFieldOrder(order, index + 1);
  return fields.map((field) =>
    field.nodeId === target.nodeId ? { ...field, order: nextOrder } : field
  );
}
