// ──────────────────────────────────────────────
// Nodeplate - Template Renderer
// Text-level `%name%` substitution over the serialized graph
// ──────────────────────────────────────────────

import type {
  Graph,
  PlaceholderCatalog,
  RenderOverrides,
  RenderOverrideValue,
  ResolvedDocument,
  TemplateSettings,
} from "@nodeplate/types";
import { createLogger } from "@nodeplate/utils";
import { RenderError } from "./errors.js";
import { safeParseDocument, serializeGraph } from "./graph.js";
import { escapeForDocumentString, findPlaceholderTokens, substituteTokens } from "./tokenizer.js";

const logger = createLogger("renderer");

/**
 * Call-time overrides win; settings defaults fill in every other name.
 * An override set to `undefined` counts as not provided.
 */
export function buildReplacementMap(
  overrides: RenderOverrides,
  settings: TemplateSettings
): Map<string, RenderOverrideValue> {
  const replacements = new Map<string, RenderOverrideValue>();

  for (const [name, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      replacements.set(name, value);
    }
  }
  for (const [name, value] of Object.entries(settings.placeholders)) {
    if (!replacements.has(name)) {
      replacements.set(name, value);
    }
  }

  return replacements;
}

export function formatReplacement(value: RenderOverrideValue): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return escapeForDocumentString(value);
  return String(value);
}

export function renderDocument(
  document: string | Graph,
  overrides: RenderOverrides,
  settings: TemplateSettings,
  catalog: PlaceholderCatalog
): ResolvedDocument {
  const template = serializeTemplate(document);
  const replacements = buildReplacementMap(overrides, settings);

  const candidates = new Map<string, string>();
  for (const name of catalog) {
    candidates.set(name, formatReplacement(replacements.get(name)));
  }
  for (const [name, value] of replacements) {
    candidates.set(name, formatReplacement(value));
  }

  const substituted = findPlaceholderTokens(template, candidates.keys());
  const text = substituteTokens(template, candidates);

  const parsed = safeParseDocument(text);
  if (!parsed.success) {
    logger.warn({ substituted, diagnostic: parsed.diagnostic }, "Rendered document failed to parse");
    throw new RenderError("Rendered document is not a valid node graph", parsed.diagnostic);
  }

  logger.debug({ substituted }, "Document rendered");
  return { text, graph: parsed.graph };
}

function serializeTemplate(document: string | Graph): string {
  if (typeof document !== "string") {
    return serializeGraph(document);
  }

  const parsed = safeParseDocument(document);
  if (!parsed.success) {
    throw new RenderError("Template document is not a valid node graph", parsed.diagnostic);
  }
  return serializeGraph(parsed.graph);
}
