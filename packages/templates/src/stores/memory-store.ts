// ──────────────────────────────────────────────
// Nodeplate - In-Memory Template Store
// Used by tests and the "memory" store driver
// ──────────────────────────────────────────────

import type { PromptStyleMap } from "@nodeplate/types";
import type { DocumentSummary, StoredDocument, TemplateStore } from "../store.js";

export interface MemoryStoreOptions {
  now?: () => Date;
}

export function createMemoryStore(options: MemoryStoreOptions = {}): TemplateStore {
  const now = options.now ?? (() => new Date());

  const documents = new Map<string, StoredDocument>();
  const settings = new Map<string, Record<string, unknown>>();
  let catalog: { payload: { placeholders: string[] }; updatedAt: Date } | null = null;
  const styles = new Map<string, { pre: string; post: string }>();
  let stylesModifiedAt: Date | null = null;

  function writeDocument(id: string, content: string): StoredDocument {
    const timestamp = now();
    const existing = documents.get(id);
    const document: StoredDocument = existing
      ? { ...existing, content, updatedAt: timestamp }
      : { id, content, originalContent: content, createdAt: timestamp, updatedAt: timestamp };
    documents.set(id, document);
    return { ...document };
  }

  return {
    async listDocuments(): Promise<DocumentSummary[]> {
      return Array.from(documents.values())
        .map(({ id, updatedAt }) => ({ id, updatedAt }))
        .sort((a, b) => a.id.localeCompare(b.id));
    },

    async getDocument(id) {
      const document = documents.get(id);
      return document ? { ...document } : null;
    },

    async saveDocument(id, content) {
      return writeDocument(id, content);
    },

    async deleteDocument(id) {
      settings.delete(id);
      return documents.delete(id);
    },

    async getSettings(documentId) {
      const payload = settings.get(documentId);
      return payload ? structuredClone(payload) : null;
    },

    async saveSettings(documentId, payload) {
      if (!documents.has(documentId)) {
        throw new Error(`Cannot save settings for unknown document "${documentId}"`);
      }
      settings.set(documentId, structuredClone(payload));
    },

    async saveDocumentWithSettings(id, content, payload) {
      const copy = structuredClone(payload);
      const document = writeDocument(id, content);
      settings.set(id, copy);
      return document;
    },

    async getCatalog() {
      return catalog ? structuredClone(catalog.payload) : null;
    },

    async saveCatalog(payload) {
      catalog = { payload: structuredClone(payload), updatedAt: now() };
    },

    async getCatalogModifiedAt() {
      return catalog?.updatedAt ?? null;
    },

    async getStyles(): Promise<PromptStyleMap> {
      return Object.fromEntries(
        Array.from(styles.entries()).map(([name, style]) => [name, { ...style }])
      );
    },

    async saveStyle(name, style) {
      styles.set(name, { pre: style.pre, post: style.post });
      stylesModifiedAt = now();
    },

    async deleteStyle(name) {
      const deleted = styles.delete(name);
      if (deleted) stylesModifiedAt = now();
      return deleted;
    },

    async getStylesModifiedAt() {
      return stylesModifiedAt;
    },
  };
}
