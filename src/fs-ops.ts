// src/fs-ops.ts
import * as walk from "@nodelib/fs.walk";
import { lstat, rm, stat } from "node:fs/promises";
import { IOError, errnoCode } from "./errors.js";
import { createIgnorer, toRel, type Ignorer } from "./ignore.js";

export interface FileStat {
  size: number;
  /** epoch seconds */
  modifiedAt: number;
}

/**
 * Filesystem operations the core depends on. Every method rejects with
 * IOError, except that a missing file is reported through the return value
 * of exists() and remove().
 */
export interface FileSystem {
  /** Absolute paths of regular files under root; symlinks are not followed. */
  walkFiles(root: string, opts?: { ignorer?: Ignorer }): AsyncIterable<string>;
  stat(path: string): Promise<FileStat>;
  exists(path: string): Promise<boolean>;
  /** Resolves false when the file was already gone. */
  remove(path: string): Promise<boolean>;
}

export function mtimeSeconds(mtimeMs: number): number {
  return Math.floor(mtimeMs / 1000);
}

async function* walkFiles(
  root: string,
  { ignorer = createIgnorer() }: { ignorer?: Ignorer } = {},
): AsyncIterable<string> {
  const entries: AsyncIterable<walk.Entry> = walk.walkStream(root, {
    followSymbolicLinks: false,
    // Do not descend into ignored directories
    deepFilter: (e) => !ignorer.ignoresDir(toRel(e.path, root)),
    entryFilter: (e) =>
      e.dirent.isFile() && !ignorer.ignoresFile(toRel(e.path, root)),
    // unreadable directories end the walk instead of being skipped
    errorFilter: () => false,
  });
  try {
    for await (const entry of entries) {
      yield entry.path;
    }
  } catch (err) {
    throw IOError.wrap("walk", root, err);
  }
}

export const nodeFileSystem: FileSystem = {
  walkFiles,

  async stat(p) {
    try {
      const st = await stat(p);
      return { size: st.size, modifiedAt: mtimeSeconds(st.mtimeMs) };
    } catch (err) {
      throw IOError.wrap("stat", p, err);
    }
  },

  async exists(p) {
    try {
      await lstat(p);
      return true;
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return false;
      throw IOError.wrap("stat", p, err);
    }
  },

  async remove(p) {
    try {
      await rm(p, { recursive: false, force: false });
      return true;
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return false;
      throw IOError.wrap("delete", p, err);
    }
  },
};
