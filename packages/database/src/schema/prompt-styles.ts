// ──────────────────────────────────────────────
// Nodeplate - Prompt Styles Table Schema
// ──────────────────────────────────────────────

import { pgTable, varchar, text, timestamp, index } from "drizzle-orm/pg-core";

export const promptStyles = pgTable(
  "prompt_styles",
  {
    name: varchar("name", { length: 255 }).primaryKey(),
    pre: text("pre").default("").notNull(),
    post: text("post").default("").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    updatedAtIdx: index("prompt_styles_updated_at_idx").on(table.updatedAt),
  })
);
