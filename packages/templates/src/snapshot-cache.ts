// ──────────────────────────────────────────────
// Nodeplate - Snapshot Cache
// TTL cache that also reloads when the source reports a newer write
// ──────────────────────────────────────────────

import { createLogger } from "@nodeplate/utils";

export interface SnapshotCacheOptions<T> {
  name: string;
  ttlMs: number;
  load: () => Promise<T>;
  /** Last write time of the source, or `null` when it was never written. */
  modifiedAt: () => Promise<Date | null>;
  now?: () => number;
}

export interface SnapshotCache<T> {
  get(): Promise<T>;
  invalidate(): void;
}

export function createSnapshotCache<T>(options: SnapshotCacheOptions<T>): SnapshotCache<T> {
  const logger = createLogger("snapshot-cache", { cache: options.name });
  const now = options.now ?? Date.now;
  let entry: { value: T; loadedAt: number } | null = null;

  return {
    async get() {
      const requestedAt = now();
      const modifiedAt = await options.modifiedAt();

      if (
        entry &&
        requestedAt - entry.loadedAt < options.ttlMs &&
        (modifiedAt === null || modifiedAt.getTime() <= entry.loadedAt)
      ) {
        logger.debug("Snapshot cache hit");
        return entry.value;
      }

      const value = await options.load();
      entry = { value, loadedAt: requestedAt };
      return value;
    },

    invalidate() {
      entry = null;
    },
  };
}
