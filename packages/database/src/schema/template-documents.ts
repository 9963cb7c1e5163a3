// ──────────────────────────────────────────────
// Nodeplate - Template Documents Table Schema
// ──────────────────────────────────────────────

import { pgTable, varchar, text, timestamp } from "drizzle-orm/pg-core";

export const templateDocuments = pgTable("template_documents", {
  id: varchar("id", { length: 255 }).primaryKey(),
  content: text("content").notNull(),
  // First imported content; restored by "restore original"
  originalContent: text("original_content").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});
