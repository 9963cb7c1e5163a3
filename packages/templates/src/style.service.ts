// ──────────────────────────────────────────────
// Nodeplate - Prompt Style Service
// ──────────────────────────────────────────────

import {
  DEFAULT_STYLE_NAME,
  NotFoundError,
  ValidationError,
  listStyles,
  normalizeStyles,
  resolveStyle,
} from "@nodeplate/engine";
import type { PromptStyle } from "@nodeplate/types";
import { createLogger } from "@nodeplate/utils";
import type { CacheOptions } from "./catalog.service.js";
import { createSnapshotCache } from "./snapshot-cache.js";
import type { TemplateStore } from "./store.js";

const logger = createLogger("style-service");

export interface StyleService {
  list(): Promise<PromptStyle[]>;
  get(name: string): Promise<PromptStyle>;
  /** Like `get`, but unknown or missing names resolve to `none`. */
  resolve(name?: string): Promise<PromptStyle>;
  save(style: PromptStyle): Promise<PromptStyle>;
  remove(name: string): Promise<void>;
}

export function createStyleService(store: TemplateStore, options: CacheOptions): StyleService {
  const cache = createSnapshotCache({
    name: "prompt-styles",
    ttlMs: options.ttlMs,
    now: options.now,
    load: async () => normalizeStyles(await store.getStyles()),
    modifiedAt: () => store.getStylesModifiedAt(),
  });

  return {
    async list() {
      return listStyles(await cache.get());
    },

    async get(name) {
      const styles = await cache.get();
      const style = Object.hasOwn(styles, name) ? styles[name] : undefined;
      if (!style) {
        throw new NotFoundError("style", name);
      }
      return { name, pre: style.pre, post: style.post };
    },

    async resolve(name) {
      return resolveStyle(await cache.get(), name);
    },

    async save(style) {
      const name = style.name.trim();
      if (!name) {
        throw new ValidationError("Enter a style name");
      }
      if (name === DEFAULT_STYLE_NAME) {
        throw new ValidationError(`Style \`${DEFAULT_STYLE_NAME}\` cannot be changed`);
      }

      const saved: PromptStyle = { name, pre: style.pre.trim(), post: style.post.trim() };
      await store.saveStyle(name, { pre: saved.pre, post: saved.post });
      cache.invalidate();

      logger.info({ style: name }, "Style saved");
      return saved;
    },

    async remove(name) {
      const trimmed = name.trim();
      if (trimmed === DEFAULT_STYLE_NAME) {
        throw new ValidationError(`Style \`${DEFAULT_STYLE_NAME}\` cannot be removed`);
      }
      if (!(await store.deleteStyle(trimmed))) {
        throw new NotFoundError("style", trimmed);
      }
      cache.invalidate();

      logger.info({ style: trimmed }, "Style removed");
    },
  };
}
