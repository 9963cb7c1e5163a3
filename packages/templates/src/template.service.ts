// ──────────────────────────────────────────────
// Nodeplate - Template Service
// Documents, field editing, placeholder defaults and rendering
// ──────────────────────────────────────────────

import {
  NotFoundError,
  STYLED_PLACEHOLDER,
  ValidationError,
  applyPlaceholderDefaults,
  applyStyle,
  detectPlaceholderUsage,
  extractFields,
  isTemplateError,
  parseDocument,
  parseTemplateSettings,
  reconcile,
  renderDocument,
  serializeGraph,
  serializeTemplateSettings,
  summarizePlaceholderUsage,
} from "@nodeplate/engine";
import type { ReconcileResult } from "@nodeplate/engine";
import type {
  Field,
  FieldExtraction,
  PlaceholderDefaultEdit,
  PlaceholderDefaults,
  PlaceholderUsage,
  RenderOverrides,
  ResolvedDocument,
  TemplateSettings,
} from "@nodeplate/types";
import { createDocumentLogger, createLogger, sanitizeErrorMessage } from "@nodeplate/utils";
import type { CatalogService } from "./catalog.service.js";
import type { StyleService } from "./style.service.js";
import type { DocumentSummary, StoredDocument, TemplateStore } from "./store.js";

const logger = createLogger("template-service");

export interface RenderOptions {
  style?: string;
}

export interface SaveFieldsResult {
  document: StoredDocument;
  settings: TemplateSettings;
  fields: Field[];
}

export interface TemplateService {
  listDocuments(): Promise<DocumentSummary[]>;
  importDocument(id: string, content: string): Promise<StoredDocument>;
  getDocument(id: string): Promise<StoredDocument>;
  deleteDocument(id: string): Promise<void>;
  restoreOriginal(id: string): Promise<StoredDocument>;
  getSettings(id: string): Promise<TemplateSettings>;
  loadFields(id: string): Promise<FieldExtraction>;
  saveFields(id: string, fields: readonly Field[]): Promise<SaveFieldsResult>;
  render(id: string, overrides?: RenderOverrides, options?: RenderOptions): Promise<ResolvedDocument>;
  detectPlaceholders(id: string): Promise<Record<string, boolean>>;
  getPlaceholderDefaults(id: string): Promise<PlaceholderUsage[]>;
  savePlaceholderDefaults(
    id: string,
    edits: readonly PlaceholderDefaultEdit[]
  ): Promise<PlaceholderDefaults>;
}

// Saved documents are indented for readability
const DOCUMENT_INDENT = 2;

export function createTemplateService(
  store: TemplateStore,
  catalog: CatalogService,
  styles: StyleService
): TemplateService {
  async function requireDocument(id: string): Promise<StoredDocument> {
    const document = await store.getDocument(id);
    if (!document) {
      throw new NotFoundError("document", id);
    }
    return document;
  }

  async function loadSettings(id: string): Promise<TemplateSettings> {
    return parseTemplateSettings(await store.getSettings(id));
  }

  return {
    async listDocuments() {
      return store.listDocuments();
    },

    async importDocument(id, content) {
      const documentId = id.trim();
      if (!documentId) {
        throw new ValidationError("Enter a document id");
      }

      try {
        parseDocument(content);
      } catch (err) {
        logger.warn(
          { documentId, error: sanitizeErrorMessage(err) },
          "Rejected document import"
        );
        throw err;
      }

      const document = await store.saveDocument(documentId, content);
      logger.info({ documentId }, "Document imported");
      return document;
    },

    async getDocument(id) {
      return requireDocument(id);
    },

    async deleteDocument(id) {
      if (!(await store.deleteDocument(id))) {
        throw new NotFoundError("document", id);
      }
      logger.info({ documentId: id }, "Document deleted");
    },

    async restoreOriginal(id) {
      const current = await requireDocument(id);
      const document = await store.saveDocument(id, current.originalContent);
      logger.info({ documentId: id }, "Document restored to its original content");
      return document;
    },

    async getSettings(id) {
      await requireDocument(id);
      return loadSettings(id);
    },

    async loadFields(id) {
      const document = await requireDocument(id);
      return extractFields(document.content, await loadSettings(id), await catalog.snapshot());
    },

    async saveFields(id, fields) {
      const docLogger = createDocumentLogger("template-service", id);
      const document = await requireDocument(id);

      let result: ReconcileResult;
      try {
        result = reconcile({
          documentId: id,
          graph: parseDocument(document.content),
          fields,
          previousSettings: await loadSettings(id),
        });
      } catch (err) {
        if (isTemplateError(err)) {
          docLogger.warn({ error: err.message }, "Rejected field save");
        }
        throw err;
      }

      if (result.errors.length > 0) {
        const issues = result.errors.map((error) => error.message);
        docLogger.warn({ issues }, "Rejected field save");
        throw new ValidationError("Changes not saved", issues);
      }

      const saved = await store.saveDocumentWithSettings(
        id,
        serializeGraph(result.graph, DOCUMENT_INDENT),
        serializeTemplateSettings(result.settings)
      );

      docLogger.info(
        { fieldCount: result.fields.length, placeholders: result.activePlaceholders },
        "Fields saved"
      );
      return { document: saved, settings: result.settings, fields: result.fields };
    },

    async render(id, overrides = {}, options = {}) {
      const document = await requireDocument(id);
      const values: RenderOverrides = { ...overrides };

      const prompt = values[STYLED_PLACEHOLDER];
      if (typeof prompt === "string") {
        values[STYLED_PLACEHOLDER] = applyStyle(prompt, await styles.resolve(options.style));
      }

      return renderDocument(document.content, values, await loadSettings(id), await catalog.snapshot());
    },

    async detectPlaceholders(id) {
      const document = await requireDocument(id);
      return detectPlaceholderUsage(document.content, await catalog.snapshot());
    },

    async getPlaceholderDefaults(id) {
      const document = await requireDocument(id);
      const settings = await loadSettings(id);
      const names = await catalog.snapshot();
      const { fields } = extractFields(document.content, settings, names);
      return summarizePlaceholderUsage(fields, settings, names);
    },

    async savePlaceholderDefaults(id, edits) {
      await requireDocument(id);
      const previous = await loadSettings(id);
      const { placeholders, errors } = applyPlaceholderDefaults(previous.placeholders, edits);

      if (errors.length > 0) {
        const issues = errors.map((error) => error.message);
        logger.warn({ documentId: id, issues }, "Rejected placeholder defaults");
        throw new ValidationError("Defaults not saved", issues);
      }

      await store.saveSettings(id, serializeTemplateSettings({ placeholders, fields: previous.fields }));
      logger.info({ documentId: id, count: Object.keys(placeholders).length }, "Placeholder defaults saved");
      return placeholders;
    },
  };
}
