// ──────────────────────────────────────────────
// Nodeplate - Template Settings Persistence Form
// { ...placeholderDefaults, "__fields": { <key>: value } }
// ──────────────────────────────────────────────

import type { FieldValue, FieldValueMap, PlaceholderDefaults, TemplateSettings } from "@nodeplate/types";
import { isPlainObject, writeOwn } from "@nodeplate/utils";
import { SETTINGS_FIELDS_KEY } from "./constants.js";
import { storedFieldValueSchema } from "./schemas.js";

export function emptyTemplateSettings(): TemplateSettings {
  return { placeholders: {}, fields: {} };
}

/**
 * Reads the persisted settings object. Anything unreadable degrades to
 * empty settings; stored values that are not text, numbers or null are
 * dropped.
 */
export function parseTemplateSettings(raw: unknown): TemplateSettings {
  if (!isPlainObject(raw)) {
    return emptyTemplateSettings();
  }

  const placeholders: PlaceholderDefaults = {};
  for (const [name, value] of Object.entries(raw)) {
    if (name === SETTINGS_FIELDS_KEY) continue;
    if (typeof value === "string" || (typeof value === "number" && Number.isFinite(value))) {
      writeOwn<FieldValue>(placeholders, name, value);
    }
  }

  const fields: FieldValueMap = {};
  const rawFields = raw[SETTINGS_FIELDS_KEY];
  if (isPlainObject(rawFields)) {
    for (const [key, value] of Object.entries(rawFields)) {
      const parsed = storedFieldValueSchema.safeParse(value);
      if (parsed.success) {
        writeOwn<FieldValue | null>(fields, key, parsed.data);
      }
    }
  }

  return { placeholders, fields };
}

/** Integers beyond the safe range are written as their decimal text. */
export function serializeTemplateSettings(settings: TemplateSettings): Record<string, unknown> {
  const placeholders: Record<string, string | number> = {};
  for (const [name, value] of Object.entries(settings.placeholders)) {
    writeOwn(placeholders, name, toJsonValue(value));
  }

  const fields: Record<string, string | number | null> = {};
  for (const [key, value] of Object.entries(settings.fields)) {
    writeOwn(fields, key, value === null ? null : toJsonValue(value));
  }

  return { ...placeholders, [SETTINGS_FIELDS_KEY]: fields };
}

function toJsonValue(value: FieldValue): string | number {
  return typeof value === "bigint" ? value.toString() : value;
}
