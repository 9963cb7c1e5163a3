// ──────────────────────────────────────────────
// Nodeplate - Store Selection
// ──────────────────────────────────────────────

import { getDatabase } from "@nodeplate/database";
import type { AppConfig } from "@nodeplate/utils";
import { createLogger } from "@nodeplate/utils";
import { createDatabaseStore } from "./stores/database-store.js";
import { createMemoryStore } from "./stores/memory-store.js";
import type { TemplateStore } from "./store.js";

const logger = createLogger("store-factory");

export function createTemplateStore(config: AppConfig): TemplateStore {
  switch (config.store.driver) {
    case "memory":
      logger.info("Using in-memory template store");
      return createMemoryStore();
    case "postgres": {
      if (!config.store.databaseUrl) {
        throw new Error("DATABASE_URL is required for the postgres store");
      }
      logger.info("Using postgres template store");
      return createDatabaseStore(getDatabase(config.store.databaseUrl));
    }
  }
}
