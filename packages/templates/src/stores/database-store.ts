// ──────────────────────────────────────────────
// Nodeplate - Postgres Template Store (Drizzle)
// ──────────────────────────────────────────────

import { asc, eq, max } from "drizzle-orm";
import type { Database } from "@nodeplate/database";
import {
  templateDocuments,
  templateSettings,
  placeholderCatalog,
  promptStyles,
  PLACEHOLDER_CATALOG_ROW_ID,
} from "@nodeplate/database";
import type { PromptStyleMap } from "@nodeplate/types";
import { createLogger } from "@nodeplate/utils";
import type { TemplateStore } from "../store.js";

const logger = createLogger("database-store");

export function createDatabaseStore(db: Database): TemplateStore {
  return {
    async listDocuments() {
      return db
        .select({ id: templateDocuments.id, updatedAt: templateDocuments.updatedAt })
        .from(templateDocuments)
        .orderBy(asc(templateDocuments.id));
    },

    async getDocument(id) {
      const [document] = await db
        .select()
        .from(templateDocuments)
        .where(eq(templateDocuments.id, id))
        .limit(1);

      return document ?? null;
    },

    async saveDocument(id, content) {
      const [document] = await db
        .insert(templateDocuments)
        .values({ id, content, originalContent: content })
        .onConflictDoUpdate({
          target: templateDocuments.id,
          set: { content, updatedAt: new Date() },
        })
        .returning();

      if (!document) {
        throw new Error(`Failed to save document "${id}"`);
      }
      return document;
    },

    async deleteDocument(id) {
      const deleted = await db
        .delete(templateDocuments)
        .where(eq(templateDocuments.id, id))
        .returning({ id: templateDocuments.id });

      return deleted.length > 0;
    },

    async getSettings(documentId) {
      const [row] = await db
        .select({ payload: templateSettings.payload })
        .from(templateSettings)
        .where(eq(templateSettings.documentId, documentId))
        .limit(1);

      return row?.payload ?? null;
    },

    async saveSettings(documentId, payload) {
      await db
        .insert(templateSettings)
        .values({ documentId, payload })
        .onConflictDoUpdate({
          target: templateSettings.documentId,
          set: { payload, updatedAt: new Date() },
        });
    },

    async saveDocumentWithSettings(id, content, payload) {
      return db.transaction(async (tx) => {
        const updatedAt = new Date();
        const [document] = await tx
          .insert(templateDocuments)
          .values({ id, content, originalContent: content })
          .onConflictDoUpdate({
            target: templateDocuments.id,
            set: { content, updatedAt },
          })
          .returning();

        if (!document) {
          throw new Error(`Failed to save document "${id}"`);
        }

        await tx
          .insert(templateSettings)
          .values({ documentId: id, payload })
          .onConflictDoUpdate({
            target: templateSettings.documentId,
            set: { payload, updatedAt },
          });

        logger.debug({ documentId: id }, "Document and settings written");
        return document;
      });
    },

    async getCatalog() {
      const [row] = await db
        .select({ payload: placeholderCatalog.payload })
        .from(placeholderCatalog)
        .where(eq(placeholderCatalog.id, PLACEHOLDER_CATALOG_ROW_ID))
        .limit(1);

      return row?.payload ?? null;
    },

    async saveCatalog(payload) {
      await db
        .insert(placeholderCatalog)
        .values({ id: PLACEHOLDER_CATALOG_ROW_ID, payload })
        .onConflictDoUpdate({
          target: placeholderCatalog.id,
          set: { payload, updatedAt: new Date() },
        });
    },

    async getCatalogModifiedAt() {
      const [row] = await db
        .select({ updatedAt: placeholderCatalog.updatedAt })
        .from(placeholderCatalog)
        .where(eq(placeholderCatalog.id, PLACEHOLDER_CATALOG_ROW_ID))
        .limit(1);

      return row?.updatedAt ?? null;
    },

    async getStyles() {
      const rows = await db.select().from(promptStyles).orderBy(asc(promptStyles.name));

      const styles: PromptStyleMap = {};
      for (const row of rows) {
        styles[row.name] = { pre: row.pre, post: row.post };
      }
      return styles;
    },

    async saveStyle(name, style) {
      await db
        .insert(promptStyles)
        .values({ name, pre: style.pre, post: style.post })
        .onConflictDoUpdate({
          target: promptStyles.name,
          set: { pre: style.pre, post: style.post, updatedAt: new Date() },
        });
    },

    async deleteStyle(name) {
      const deleted = await db
        .delete(promptStyles)
        .where(eq(promptStyles.name, name))
        .returning({ name: promptStyles.name });

      return deleted.length > 0;
    },

    // Deletions from another process are only seen once the cache TTL expires
    async getStylesModifiedAt() {
      const [row] = await db.select({ updatedAt: max(promptStyles.updatedAt) }).from(promptStyles);
      return row?.updatedAt ?? null;
    },
  };
}
