// ──────────────────────────────────────────────
// Nodeplate - Engine Package
// ──────────────────────────────────────────────

export * from "./constants.js";
export {
  TemplateError,
  ParseError,
  RenderError,
  ValidationError,
  NotFoundError,
  isTemplateError,
} from "./errors.js";
export type { TemplateErrorCode, ParseErrorDetails, NotFoundResource } from "./errors.js";
export {
  documentSchema,
  documentNodeSchema,
  placeholderCatalogSchema,
  promptStyleSchema,
  describeIssues,
} from "./schemas.js";
export type { DocumentNode } from "./schemas.js";
export {
  safeParseDocument,
  parseDocument,
  safeBuildGraph,
  buildGraph,
  serializeGraph,
  classifyInputValue,
  toScalarValue,
  formatFloatLiteral,
  scalarText,
  findNode,
  setNodeInput,
} from "./graph.js";
export type { DocumentParseResult } from "./graph.js";
export {
  clampFieldOrder,
  normalizeFieldOrder,
  fieldIdentity,
  encodeFieldKey,
  decodeFieldKey,
  findFieldValue,
} from "./field-key.js";
export { coerce, coercePlaceholderDefault, isPlaceholderToken } from "./coercion.js";
export type { CoercionResult, PlaceholderDefaultResult } from "./coercion.js";
export {
  placeholderToken,
  parsePlaceholderToken,
  orderSubstitutionCandidates,
  findPlaceholderTokens,
  substituteTokens,
  escapeForDocumentString,
  detectPlaceholderUsage,
} from "./tokenizer.js";
export { extractFields } from "./field-extractor.js";
export { updateFieldValue, updateFieldPlaceholder, updateFieldOrder, unbindField } from "./field-editing.js";
export {
  normalizePlaceholderCatalog,
  serializePlaceholderCatalog,
  listPlaceholders,
  addPlaceholder,
  removePlaceholder,
} from "./placeholder-registry.js";
export type { PlaceholderRemoval } from "./placeholder-registry.js";
export { emptyTemplateSettings, parseTemplateSettings, serializeTemplateSettings } from "./settings.js";
export { buildReplacementMap, formatReplacement, renderDocument } from "./renderer.js";
export {
  applyFields,
  reconcile,
  resolveFieldValue,
  fieldLabel,
  FIELD_VALUE_PROVIDERS,
  freshValueProvider,
  previousValueProvider,
  placeholderDefaultProvider,
  literalTextProvider,
} from "./reconciler.js";
export type {
  ApplyFieldsResult,
  FieldValueContext,
  FieldValueProvider,
  ReconcileInput,
  ReconcileResult,
} from "./reconciler.js";
export {
  inferPlaceholderValueType,
  summarizePlaceholderUsage,
  applyPlaceholderDefaults,
} from "./placeholder-defaults.js";
export type { PlaceholderDefaultsUpdate } from "./placeholder-defaults.js";
export { applyStyle, normalizeStyles, listStyles, resolveStyle } from "./styles.js";
