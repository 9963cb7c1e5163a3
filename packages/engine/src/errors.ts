// ──────────────────────────────────────────────
// Nodeplate - Engine Errors
// ──────────────────────────────────────────────

import type { FieldValueType } from "@nodeplate/types";
import { formatIssues } from "@nodeplate/utils";

export type TemplateErrorCode =
  | "PARSE_ERROR"
  | "RENDER_ERROR"
  | "VALIDATION_ERROR"
  | "NOT_FOUND";

export abstract class TemplateError extends Error {
  abstract readonly code: TemplateErrorCode;
}

export interface ParseErrorDetails {
  input: string;
  valueType: FieldValueType;
  /** `"<node title> → <input name>"` once attached to a field. */
  fieldLabel?: string;
}

/**
 * A value could not be coerced to its declared type. Collected per field,
 * never thrown by the core.
 */
export class ParseError extends TemplateError {
  override readonly code = "PARSE_ERROR";

  constructor(
    readonly reason: string,
    readonly details: ParseErrorDetails
  ) {
    super(details.fieldLabel ? `${details.fieldLabel}: ${reason}` : reason);
    this.name = "ParseError";
  }

  forField(fieldLabel: string): ParseError {
    return new ParseError(this.reason, { ...this.details, fieldLabel });
  }
}

export class RenderError extends TemplateError {
  override readonly code = "RENDER_ERROR";

  constructor(
    message: string,
    readonly diagnostic: string
  ) {
    super(`${message}: ${diagnostic}`);
    this.name = "RenderError";
  }
}

export class ValidationError extends TemplateError {
  override readonly code = "VALIDATION_ERROR";

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${formatIssues(issues)}` : message);
    this.name = "ValidationError";
  }
}

export type NotFoundResource = "document" | "placeholder" | "style";

export class NotFoundError extends TemplateError {
  override readonly code = "NOT_FOUND";

  constructor(
    readonly resource: NotFoundResource,
    readonly id: string
  ) {
    super(`${capitalize(resource)} "${id}" not found`);
    this.name = "NotFoundError";
  }
}

export function isTemplateError(error: unknown): error is TemplateError {
  return error instanceof TemplateError;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
