// ──────────────────────────────────────────────
// Nodeplate - Placeholder Catalog Table Schema
// ──────────────────────────────────────────────

import { pgTable, varchar, jsonb, timestamp } from "drizzle-orm/pg-core";

export const PLACEHOLDER_CATALOG_ROW_ID = "default";

export const placeholderCatalog = pgTable("placeholder_catalog", {
  id: varchar("id", { length: 32 }).default(PLACEHOLDER_CATALOG_ROW_ID).primaryKey(),
  payload: jsonb("payload").default({ placeholders: [] }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});
