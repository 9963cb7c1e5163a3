// ──────────────────────────────────────────────
// Nodeplate - Template Store
// Persistence seam shared by the services
// ──────────────────────────────────────────────

import type { PromptStyleMap } from "@nodeplate/types";

export interface StoredDocument {
  id: string;
  content: string;
  originalContent: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface DocumentSummary {
  id: string;
  updatedAt: Date;
}

export interface TemplateStore {
  listDocuments(): Promise<DocumentSummary[]>;
  getDocument(id: string): Promise<StoredDocument | null>;
  /** Inserts or replaces the content; the first saved content is kept as the original. */
  saveDocument(id: string, content: string): Promise<StoredDocument>;
  deleteDocument(id: string): Promise<boolean>;

  /** Persisted settings object, or `null` when none was saved. */
  getSettings(documentId: string): Promise<unknown>;
  saveSettings(documentId: string, payload: Record<string, unknown>): Promise<void>;
  /** Writes both or neither. */
  saveDocumentWithSettings(
    id: string,
    content: string,
    payload: Record<string, unknown>
  ): Promise<StoredDocument>;

  getCatalog(): Promise<unknown>;
  saveCatalog(payload: { placeholders: string[] }): Promise<void>;
  getCatalogModifiedAt(): Promise<Date | null>;

  getStyles(): Promise<PromptStyleMap>;
  saveStyle(name: string, style: { pre: string; post: string }): Promise<void>;
  deleteStyle(name: string): Promise<boolean>;
  getStylesModifiedAt(): Promise<Date | null>;
}
