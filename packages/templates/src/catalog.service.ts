// ──────────────────────────────────────────────
// Nodeplate - Placeholder Catalog Service
// ──────────────────────────────────────────────

import {
  addPlaceholder,
  listPlaceholders,
  normalizePlaceholderCatalog,
  removePlaceholder,
  serializePlaceholderCatalog,
} from "@nodeplate/engine";
import type { PlaceholderRemoval } from "@nodeplate/engine";
import type { Field } from "@nodeplate/types";
import { createLogger } from "@nodeplate/utils";
import { createSnapshotCache } from "./snapshot-cache.js";
import type { TemplateStore } from "./store.js";

const logger = createLogger("catalog-service");

export interface CatalogService {
  /** Catalog names in stored order. */
  snapshot(): Promise<string[]>;
  /** Catalog names sorted for display. */
  list(): Promise<string[]>;
  add(name: string): Promise<string[]>;
  remove(name: string, fields?: readonly Field[]): Promise<PlaceholderRemoval>;
}

export interface CacheOptions {
  ttlMs: number;
  now?: () => number;
}

export function createCatalogService(store: TemplateStore, options: CacheOptions): CatalogService {
  const cache = createSnapshotCache({
    name: "placeholder-catalog",
    ttlMs: options.ttlMs,
    now: options.now,
    load: async () => normalizePlaceholderCatalog(await store.getCatalog()),
    modifiedAt: () => store.getCatalogModifiedAt(),
  });

  return {
    async snapshot() {
      return [...(await cache.get())];
    },

    async list() {
      return listPlaceholders(await cache.get());
    },

    async add(name) {
      const next = addPlaceholder(await cache.get(), name);
      await store.saveCatalog(serializePlaceholderCatalog(next));
      cache.invalidate();

      logger.info({ placeholder: name.trim(), count: next.length }, "Placeholder added");
      return next;
    },

    async remove(name, fields = []) {
      const result = removePlaceholder(await cache.get(), name, fields);
      await store.saveCatalog(serializePlaceholderCatalog(result.catalog));
      cache.invalidate();

      logger.info({ placeholder: name.trim(), unbound: result.unbound }, "Placeholder removed");
      return result;
    },
  };
}
