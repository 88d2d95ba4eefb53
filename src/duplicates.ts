// src/duplicates.ts
import type { DuplicateMap, IndexStore } from "./index-store.js";

export type DuplicateGroup = {
  digest: string;
  paths: string[];
};

export type DuplicateSummary = DuplicateGroup & {
  /** indexed size of the first member */
  size: number;
  /** bytes freed by keeping a single copy */
  reclaimable: number;
};

/**
 * Duplicate groups as currently persisted. Reads the index only, so the
 * result reflects the last scan and any resolution since, not the disk.
 */
export function listDuplicates(store: IndexStore): DuplicateMap {
  return store.queryGroupedDuplicates();
}

export function toGroups(groups: DuplicateMap): DuplicateGroup[] {
  return Array.from(groups, ([digest, paths]) => ({ digest, paths }));
}

export function summarizeDuplicates(store: IndexStore): DuplicateSummary[] {
  return toGroups(listDuplicates(store)).map(({ digest, paths }) => {
    const size = store.get(paths[0])?.size ?? 0;
    return {
      digest,
      paths,
      size,
      reclaimable: size * (paths.length - 1),
    };
  });
}
