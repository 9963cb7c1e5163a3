// ──────────────────────────────────────────────
// Nodeplate - Prompt Styles
// ──────────────────────────────────────────────

import type { PromptStyle, PromptStyleMap } from "@nodeplate/types";
import { isPlainObject, writeOwn } from "@nodeplate/utils";
import { DEFAULT_STYLE_NAME } from "./constants.js";
import { promptStyleSchema } from "./schemas.js";

/** `"<pre> <prompt>, <post>"`, leaving out empty parts. The prompt is always trimmed. */
export function applyStyle(prompt: string, style: Pick<PromptStyle, "pre" | "post"> | undefined): string {
  const trimmed = prompt.trim();
  const pre = style?.pre.trim() ?? "";
  const post = style?.post.trim() ?? "";

  const head = [pre, trimmed].filter(Boolean).join(" ");
  return [head, post].filter(Boolean).join(", ");
}

export function normalizeStyles(raw: unknown): PromptStyleMap {
  const styles: PromptStyleMap = {};
  if (isPlainObject(raw)) {
    for (const [name, value] of Object.entries(raw)) {
      const trimmed = name.trim();
      const parsed = promptStyleSchema.safeParse(value);
      if (trimmed && parsed.success) {
        writeOwn(styles, trimmed, parsed.data);
      }
    }
  }
  styles[DEFAULT_STYLE_NAME] = { pre: "", post: "" };
  return styles;
}

// `none` first, then by name
export function listStyles(styles: PromptStyleMap): PromptStyle[] {
  return Object.entries(styles)
    .map(([name, style]) => ({ name, pre: style.pre, post: style.post }))
    .sort((a, b) => {
      if (a.name === DEFAULT_STYLE_NAME) return -1;
      if (b.name === DEFAULT_STYLE_NAME) return 1;
      return a.name.localeCompare(b.name);
    });
}

export function resolveStyle(styles: PromptStyleMap, name: string | undefined): PromptStyle {
  const key = name && Object.hasOwn(styles, name) ? name : DEFAULT_STYLE_NAME;
  const style = styles[key] ?? { pre: "", post: "" };
  return { name: key, pre: style.pre, post: style.post };
}
