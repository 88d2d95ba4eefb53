// src/maintenance.ts
import { nodeFileSystem, type FileSystem } from "./fs-ops.js";
import type { IndexStats, IndexStore, SizedFileRow } from "./index-store.js";
import { NullLogger, type Logger } from "./logger.js";

export interface LargeFileDetail extends SizedFileRow {
  /** modifiedAt as local "YYYY-MM-DD HH:MM:SS" */
  modified: string;
}

export interface CleanResult {
  /** deleted from disk and dropped from the index */
  removed: string[];
  /** already missing on disk; dropped from the index only */
  pruned: string[];
}

const pad = (n: number) => String(n).padStart(2, "0");

export function formatTimestamp(epochSeconds: number): string {
  const d = new Date(epochSeconds * 1000);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

// Index reads only: returned paths may no longer exist on disk.

export function findByDateRange(
  store: IndexStore,
  start: number,
  end?: number | null,
): string[] {
  return store.queryByModifiedRange(start, end);
}

export function findLargeFiles(store: IndexStore, threshold: number): string[] {
  return store.queryBySizeGreaterThan(threshold);
}

export function findLargeFilesDetailed(
  store: IndexStore,
  threshold: number,
): LargeFileDetail[] {
  return store
    .queryBySizeGreaterThanDetailed(threshold)
    .map((row) => ({ ...row, modified: formatTimestamp(row.modifiedAt) }));
}

export function getStats(store: IndexStore): IndexStats {
  return store.aggregateStats();
}

/**
 * Delete every indexed file last modified before `threshold` (epoch
 * seconds) and drop its record. Records whose file is already gone are
 * dropped too. Index removal happens in one batch after the disk pass; if a
 * deletion fails, the records handled so far are still dropped before the
 * error propagates.
 */
export async function cleanOldFiles({
  store,
  threshold,
  fs = nodeFileSystem,
  dryRun = false,
  logger = new NullLogger(),
}: {
  store: IndexStore;
  threshold: number;
  fs?: FileSystem;
  dryRun?: boolean;
  logger?: Logger;
}): Promise<CleanResult> {
  const selected = store.queryModifiedBefore(threshold);
  const result: CleanResult = { removed: [], pruned: [] };
  logger.debug("clean candidates", { threshold, count: selected.length });

  try {
    for (const p of selected) {
      if (dryRun) {
        if (await fs.exists(p)) {
          result.removed.push(p);
        } else {
          result.pruned.push(p);
        }
        continue;
      }
      if (await fs.remove(p)) {
        result.removed.push(p);
      } else {
        result.pruned.push(p);
      }
    }
  } finally {
    if (!dryRun) {
      store.deleteByPaths([...result.removed, ...result.pruned]);
    }
  }

  logger.info(dryRun ? "would clean old files" : "cleaned old files", {
    threshold,
    removed: result.removed.length,
    pruned: result.pruned.length,
  });
  return result;
}
