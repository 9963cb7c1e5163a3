// ──────────────────────────────────────────────
// Nodeplate - Placeholder Registry
// Catalog operations over caller-supplied snapshots
// ──────────────────────────────────────────────

import type { Field, PlaceholderCatalog } from "@nodeplate/types";
import { dedupeAndSortStrings } from "@nodeplate/utils";
import { DEFAULT_PLACEHOLDERS } from "./constants.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { unbindField } from "./field-editing.js";
import { placeholderCatalogSchema } from "./schemas.js";

/**
 * Reads a persisted catalog (a list, or `{ placeholders: [...] }`). Falls
 * back to the built-in names when nothing usable remains.
 */
export function normalizePlaceholderCatalog(raw: unknown): string[] {
  const parsed = placeholderCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    return [...DEFAULT_PLACEHOLDERS];
  }

  const candidates = Array.isArray(parsed.data) ? parsed.data : parsed.data.placeholders;
  const names: string[] = [];
  for (const candidate of candidates) {
    if (typeof candidate !== "string") continue;
    const trimmed = candidate.trim();
    if (trimmed && !names.includes(trimmed)) {
      names.push(trimmed);
    }
  }

  return names.length > 0 ? names : [...DEFAULT_PLACEHOLDERS];
}

export function serializePlaceholderCatalog(catalog: PlaceholderCatalog): {
  placeholders: string[];
} {
  return { placeholders: [...catalog] };
}

export function listPlaceholders(catalog: PlaceholderCatalog): string[] {
  return dedupeAndSortStrings(catalog);
}

export function addPlaceholder(catalog: PlaceholderCatalog, name: string): string[] {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError("Enter a placeholder name");
  }
  if (catalog.includes(trimmed)) {
    throw new ValidationError(`Placeholder \`${trimmed}\` already exists`);
  }
  return dedupeAndSortStrings([...catalog, trimmed]);
}

export interface PlaceholderRemoval {
  catalog: string[];
  fields: Field[];
  unbound: number;
}

/**
 * Removes a name from the catalog. Fields bound to it fall back to their
 * stored literal value.
 */
export function removePlaceholder(
  catalog: PlaceholderCatalog,
  name: string,
  fields: readonly Field[] = []
): PlaceholderRemoval {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError("Select a placeholder to delete");
  }
  if (!catalog.includes(trimmed)) {
    throw new NotFoundError("placeholder", trimmed);
  }

  let unbound = 0;
  const nextFields = fields.map((field) => {
    if (field.placeholder !== trimmed) return field;
    unbound += 1;
    return unbindField(field);
  });

  return {
    catalog: catalog.filter((entry) => entry !== trimmed),
    fields: nextFields,
    unbound,
  };
}
