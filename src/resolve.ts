// src/resolve.ts
import { IOError, InvalidSelection, errorMessage } from "./errors.js";
import { nodeFileSystem, type FileSystem } from "./fs-ops.js";
import type { DuplicateGroup } from "./duplicates.js";
import type { IndexStore } from "./index-store.js";
import { NullLogger, type Logger } from "./logger.js";

/**
 * Asks which member of a group to keep. Resolves a 1-based position, or
 * null/undefined to skip the group.
 */
export type SurvivorChooser = (
  group: DuplicateGroup,
) => Promise<number | null | undefined>;

export type ResolveOutcome =
  | {
      status: "resolved";
      digest: string;
      survivor: string;
      deleted: string[];
      dryRun: boolean;
    }
  | { status: "skipped"; digest: string; reason: string }
  | { status: "failed"; digest: string; error: Error };

export function validateSurvivorIndex(
  choice: number | null | undefined,
  groupSize: number,
): number | InvalidSelection {
  if (choice == null) {
    return new InvalidSelection("no survivor chosen", choice, groupSize);
  }
  if (!Number.isInteger(choice)) {
    return new InvalidSelection(
      `survivor choice ${choice} is not a whole number`,
      choice,
      groupSize,
    );
  }
  if (choice < 1 || choice > groupSize) {
    return new InvalidSelection(
      `survivor choice ${choice} is outside 1..${groupSize}`,
      choice,
      groupSize,
    );
  }
  return choice;
}

/** Turns raw prompt text into a survivor choice; blank means skip. */
export function parseSurvivorInput(raw: string): number | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  // NaN is kept so validation reports it as not a whole number
  return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

export type ResolveGroupOptions = {
  store: IndexStore;
  fs?: FileSystem;
  digest: string;
  paths: readonly string[];
  survivorIndex: number | null | undefined;
  dryRun?: boolean;
  logger?: Logger;
};

/**
 * Keep paths[survivorIndex - 1] and delete every other member of the group
 * from disk, then drop their records with a single index call.
 *
 * A file already missing from disk counts as deleted. If a deletion fails
 * the index is left untouched and IOError is thrown; running the group
 * again finishes the job.
 */
export async function resolveGroup(
  opts: ResolveGroupOptions,
): Promise<ResolveOutcome> {
  const { store, fs = nodeFileSystem, digest, paths, dryRun = false } = opts;
  const logger = opts.logger ?? new NullLogger();

  const choice = validateSurvivorIndex(opts.survivorIndex, paths.length);
  if (choice instanceof InvalidSelection) {
    logger.info("skipping group", { digest, reason: choice.message });
    return { status: "skipped", digest, reason: choice.message };
  }
  const survivor = paths[choice - 1];
  if (!(await fs.exists(survivor))) {
    const reason = `survivor ${survivor} no longer exists`;
    logger.warn("skipping group", { digest, reason });
    return { status: "skipped", digest, reason };
  }

  const victims = paths.filter((_, i) => i !== choice - 1);
  const deleted: string[] = [];
  for (const victim of victims) {
    if (victim === survivor) continue;
    if (dryRun) {
      deleted.push(victim);
      continue;
    }
    try {
      const removed = await fs.remove(victim);
      logger.debug(removed ? "deleted file" : "already gone", {
        path: victim,
      });
    } catch (err) {
      logger.error("delete failed; index left unchanged for group", {
        digest,
        path: victim,
        deletedSoFar: deleted.length,
      });
      throw IOError.wrap("delete", victim, err);
    }
    deleted.push(victim);
  }

  if (!dryRun) {
    store.deleteByDigestExcept(digest, survivor);
  }
  logger.info(dryRun ? "would resolve group" : "resolved group", {
    digest,
    survivor,
    deleted: deleted.length,
  });
  return { status: "resolved", digest, survivor, deleted, dryRun };
}

export type ResolveDuplicatesOptions = {
  store: IndexStore;
  groups: Iterable<DuplicateGroup>;
  chooseSurvivor: SurvivorChooser;
  fs?: FileSystem;
  dryRun?: boolean;
  logger?: Logger;
};

/**
 * Resolve every group in turn. A skip or failure in one group never stops
 * the others.
 */
export async function resolveDuplicates(
  opts: ResolveDuplicatesOptions,
): Promise<ResolveOutcome[]> {
  const { store, groups, chooseSurvivor, fs, dryRun, logger } = opts;
  const outcomes: ResolveOutcome[] = [];
  for (const group of groups) {
    try {
      const survivorIndex = await chooseSurvivor(group);
      outcomes.push(
        await resolveGroup({
          store,
          fs,
          digest: group.digest,
          paths: group.paths,
          survivorIndex,
          dryRun,
          logger,
        }),
      );
    } catch (err) {
      logger?.error("group failed", {
        digest: group.digest,
        error: errorMessage(err),
      });
      outcomes.push({
        status: "failed",
        digest: group.digest,
        error: err instanceof Error ? err : new Error(String(err)),
      });
    }
  }
  return outcomes;
}

export function deletedPaths(outcomes: readonly ResolveOutcome[]): string[] {
  return outcomes.flatMap((o) => (o.status === "resolved" ? o.deleted : []));
}
