// ──────────────────────────────────────────────
// Nodeplate - Service Wiring
// ──────────────────────────────────────────────

import { closeConnection } from "@nodeplate/database";
import type { AppConfig } from "@nodeplate/utils";
import { createCatalogService } from "./catalog.service.js";
import type { CatalogService } from "./catalog.service.js";
import { createStyleService } from "./style.service.js";
import type { StyleService } from "./style.service.js";
import { createTemplateService } from "./template.service.js";
import type { TemplateService } from "./template.service.js";
import { createTemplateStore } from "./store-factory.js";
import type { TemplateStore } from "./store.js";

export interface Services {
  store: TemplateStore;
  catalog: CatalogService;
  styles: StyleService;
  templates: TemplateService;
  /** Releases the shared database pool when the postgres driver is in use. */
  close(): Promise<void>;
}

export function createServices(
  config: AppConfig,
  store: TemplateStore = createTemplateStore(config)
): Services {
  const cacheOptions = { ttlMs: config.cache.ttlMs };
  const catalog = createCatalogService(store, cacheOptions);
  const styles = createStyleService(store, cacheOptions);

  return {
    store,
    catalog,
    styles,
    templates: createTemplateService(store, catalog, styles),
    async close() {
      if (config.store.driver === "postgres") {
        await closeConnection();
      }
    },
  };
}
