// ──────────────────────────────────────────────
// Nodeplate - Zod Schemas
// Boundary validation for documents and persisted state
// ──────────────────────────────────────────────

import { z } from "zod";

export const documentNodeSchema = z
  .object({
    inputs: z.record(z.unknown()).default({}),
    class_type: z.string().default(""),
    _meta: z
      .object({
        title: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const documentSchema = z.record(documentNodeSchema);

export type DocumentNode = z.infer<typeof documentNodeSchema>;

export const storedFieldValueSchema = z.union([z.string(), z.number().finite()]).nullable();

export const placeholderCatalogSchema = z.union([
  z.array(z.unknown()),
  z.object({ placeholders: z.array(z.unknown()) }).passthrough(),
]);

export const promptStyleSchema = z.object({
  pre: z.string().default(""),
  post: z.string().default(""),
});

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
