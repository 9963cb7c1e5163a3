// ──────────────────────────────────────────────
// Nodeplate - Placeholder Defaults
// ──────────────────────────────────────────────

import type {
  Field,
  FieldValueType,
  PlaceholderCatalog,
  PlaceholderDefaultEdit,
  PlaceholderDefaults,
  PlaceholderUsage,
  TemplateSettings,
} from "@nodeplate/types";
import { readOwn, writeOwn } from "@nodeplate/utils";
import { coercePlaceholderDefault } from "./coercion.js";
import { ParseError } from "./errors.js";

const VALUE_TYPE_HINTS: ReadonlyMap<string, FieldValueType> = new Map<string, FieldValueType>([
  ["steps", "integer"],
  ["seed", "integer"],
  ["width", "integer"],
  ["height", "integer"],
  ["clip_skip", "integer"],
  ["cfg", "float"],
  ["denoise", "float"],
]);

export function inferPlaceholderValueType(name: string, bound: readonly Field[]): FieldValueType {
  const hinted = VALUE_TYPE_HINTS.get(name);
  if (hinted) return hinted;
  if (bound.some((field) => field.valueType === "integer")) return "integer";
  if (bound.some((field) => field.valueType === "float")) return "float";
  return "text";
}

/**
 * Lists every catalog placeholder bound by at least one field, ordered by
 * the first bound field's order.
 */
export function summarizePlaceholderUsage(
  fields: readonly Field[],
  settings: TemplateSettings,
  catalog: PlaceholderCatalog
): PlaceholderUsage[] {
  const bound = new Map<string, Field[]>();
  for (const field of fields) {
    if (!field.placeholder || !catalog.includes(field.placeholder)) continue;
    const group = bound.get(field.placeholder) ?? [];
    group.push(field);
    bound.set(field.placeholder, group);
  }

  const usages: PlaceholderUsage[] = [];
  for (const [name, group] of bound) {
    usages.push({
      name,
      valueType: inferPlaceholderValueType(name, group),
      nodeTitles: unique(group.map((field) => field.nodeTitle)),
      inputNames: unique(group.map((field) => field.inputName)),
      value: readOwn(settings.placeholders, name) ?? null,
      order: Math.min(...group.map((field) => field.order)),
    });
  }

  return usages.sort((a, b) => a.order - b.order || a.name.localeCompare(b.name));
}

export interface PlaceholderDefaultsUpdate {
  placeholders: PlaceholderDefaults;
  errors: ParseError[];
}

/** Applies edits on top of `previous`. An empty numeric edit drops the default. */
export function applyPlaceholderDefaults(
  previous: PlaceholderDefaults,
  edits: readonly PlaceholderDefaultEdit[]
): PlaceholderDefaultsUpdate {
  const placeholders: PlaceholderDefaults = { ...previous };
  const errors: ParseError[] = [];

  for (const edit of edits) {
    const result = coercePlaceholderDefault(edit.name, edit.value, edit.valueType);
    if (!result.success) {
      errors.push(result.error);
      continue;
    }
    if (result.value === null) {
      delete placeholders[edit.name];
    } else {
      writeOwn(placeholders, edit.name, result.value);
    }
  }

  return { placeholders, errors };
}

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}
