// src/scan.ts
import path from "node:path";
import { UNKNOWN_KIND } from "./constants.js";
import { IOError } from "./errors.js";
import { nodeFileSystem, type FileSystem } from "./fs-ops.js";
import { createFingerprinter, type Fingerprinter } from "./hash.js";
import { createIgnorer } from "./ignore.js";
import type { DuplicateMap, IndexStore } from "./index-store.js";
import { NullLogger, type Logger } from "./logger.js";

export type ScanOptions = {
  root: string;
  /** case-insensitive suffixes tested against the file name, e.g. ".jpg" */
  extensions: readonly string[];
  store: IndexStore;
  fingerprinter?: Fingerprinter;
  fs?: FileSystem;
  ignore?: readonly string[];
  logger?: Logger;
};

/** Lowercase extension of the base name, or "unknown". */
export function kindFromName(filePath: string): string {
  const name = path.basename(filePath);
  const dot = name.lastIndexOf(".");
  if (dot < 0 || dot === name.length - 1) return UNKNOWN_KIND;
  return name.slice(dot + 1).toLowerCase();
}

export function matchesExtension(
  filePath: string,
  extensions: readonly string[],
): boolean {
  const name = path.basename(filePath).toLowerCase();
  return extensions.some(
    (ext) => ext !== "" && name.endsWith(ext.toLowerCase()),
  );
}

export function onlyDuplicates(groups: DuplicateMap): DuplicateMap {
  const out: DuplicateMap = new Map();
  for (const [digest, paths] of groups) {
    if (paths.length > 1) out.set(digest, paths);
  }
  return out;
}

/**
 * Walk root, index every file whose name ends in one of the extensions and
 * return the duplicate groups seen during this walk.
 *
 * Files are hashed one at a time. The first file that cannot be read aborts
 * the scan with IOError; records written before that point stay in the index.
 */
export async function scanTree(opts: ScanOptions): Promise<DuplicateMap> {
  const {
    extensions,
    store,
    fingerprinter = createFingerprinter(),
    fs = nodeFileSystem,
    ignore = [],
  } = opts;
  const logger = opts.logger ?? new NullLogger();
  const root = path.resolve(opts.root);
  const t0 = Date.now();

  store.ensureHashAlgorithm(fingerprinter.algorithm);
  logger.info(`scan: using hash=${fingerprinter.algorithm}`);
  logger.debug("scanning", { root, extensions, ignore });

  const seen: DuplicateMap = new Map();
  let walked = 0;
  let matched = 0;

  for await (const filePath of fs.walkFiles(root, {
    ignorer: createIgnorer(ignore),
  })) {
    walked += 1;
    if (!matchesExtension(filePath, extensions)) continue;
    matched += 1;

    let digest: string;
    try {
      digest = await fingerprinter.digest(filePath);
    } catch (err) {
      throw IOError.wrap("digest", filePath, err);
    }
    const { size, modifiedAt } = await fs.stat(filePath);
    store.upsert({
      path: filePath,
      digest,
      kind: kindFromName(filePath),
      size,
      modifiedAt,
    });
    logger.debug("indexed", { path: filePath, digest, size });

    const group = seen.get(digest);
    if (group) {
      group.push(filePath);
    } else {
      seen.set(digest, [filePath]);
    }
  }

  const duplicates = onlyDuplicates(seen);
  logger.info("scan complete", {
    root,
    files: walked,
    matched,
    duplicateGroups: duplicates.size,
    ms: Date.now() - t0,
  });
  return duplicates;
}
