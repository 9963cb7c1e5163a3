// ──────────────────────────────────────────────
// Nodeplate - Placeholder Tokenizer
// `%name%` tokens inside serialized documents
// ──────────────────────────────────────────────

import type { PlaceholderCatalog } from "@nodeplate/types";
import { writeOwn } from "@nodeplate/utils";
import { PLACEHOLDER_TOKEN_DELIMITER } from "./constants.js";

export function placeholderToken(name: string): string {
  return `${PLACEHOLDER_TOKEN_DELIMITER}${name}${PLACEHOLDER_TOKEN_DELIMITER}`;
}

/** Returns `name` when the whole value is exactly `%name%`. */
export function parsePlaceholderToken(value: string): string | null {
  if (
    value.length < 2 ||
    !value.startsWith(PLACEHOLDER_TOKEN_DELIMITER) ||
    !value.endsWith(PLACEHOLDER_TOKEN_DELIMITER)
  ) {
    return null;
  }
  return value.slice(1, -1);
}

/**
 * Substitution order. Longer names go first so a name that overlaps another
 * token's delimiters cannot consume part of it; ties are broken by name.
 */
export function orderSubstitutionCandidates(names: Iterable<string>): string[] {
  return Array.from(new Set(names))
    .filter((name) => name.length > 0)
    .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
}

export function findPlaceholderTokens(text: string, names: Iterable<string>): string[] {
  return orderSubstitutionCandidates(names).filter((name) => text.includes(placeholderToken(name)));
}

/**
 * Replaces every token in one left-to-right scan. At a given position the
 * first matching name in substitution order wins, and inserted text is never
 * scanned again, so replacements cannot expand further tokens.
 */
export function substituteTokens(text: string, replacements: ReadonlyMap<string, string>): string {
  const names = findPlaceholderTokens(text, replacements.keys());
  if (names.length === 0) return text;

  const pattern = new RegExp(names.map((name) => escapeRegExp(placeholderToken(name))).join("|"), "g");
  const byToken = new Map(
    names.map((name): [string, string] => [placeholderToken(name), replacements.get(name) ?? ""])
  );
  return text.replace(pattern, (token) => byToken.get(token) ?? token);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Escapes text for insertion between the quotes of an existing JSON string
 * literal. The surrounding quotes are not part of the result.
 */
export function escapeForDocumentString(value: string): string {
  return JSON.stringify(value).slice(1, -1);
}

export function detectPlaceholderUsage(
  text: string,
  catalog: PlaceholderCatalog
): Record<string, boolean> {
  const usage: Record<string, boolean> = {};
  for (const name of catalog) {
    writeOwn(usage, name, text.includes(placeholderToken(name)));
  }
  return usage;
}
