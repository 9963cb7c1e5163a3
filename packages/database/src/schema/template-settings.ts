// ──────────────────────────────────────────────
// Nodeplate - Template Settings Table Schema
// ──────────────────────────────────────────────

import { pgTable, varchar, jsonb, timestamp } from "drizzle-orm/pg-core";
import { templateDocuments } from "./template-documents.js";

export const templateSettings = pgTable("template_settings", {
  documentId: varchar("document_id", { length: 255 })
    .primaryKey()
    .references(() => templateDocuments.id, { onDelete: "cascade" }),
  payload: jsonb("payload").default({}).notNull(), // { ...placeholders, __fields: {...} }
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});
