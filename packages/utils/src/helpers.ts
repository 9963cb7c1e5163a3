// ──────────────────────────────────────────────
// Nodeplate - Utility Helpers
// ──────────────────────────────────────────────

export function sanitizeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    // Connection strings carry credentials
    return error.message.replace(/(postgres(?:ql)?:\/\/)[^@\s]+@/gi, "$1[REDACTED]@");
  }
  return "An unexpected error occurred";
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deduplicates (first occurrence wins) and sorts case-insensitively. */
export function dedupeAndSortStrings(items: readonly string[]): string[] {
  return Array.from(new Set(items)).sort((left, right) => {
    const a = left.toLowerCase();
    const b = right.toLowerCase();
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  });
}

// User-chosen names ("constructor", "__proto__") must never reach Object.prototype
export function readOwn<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function writeOwn<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

export function formatIssues(issues: readonly string[]): string {
  return issues.join(" | ");
}
