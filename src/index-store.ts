// src/index-store.ts
import path from "node:path";
import { getDb, type Database } from "./db.js";
import { StorageError } from "./errors.js";
import { childOrNull, type Logger } from "./logger.js";

export interface FileRecord {
  path: string;
  digest: string;
  kind: string;
  size: number;
  /** epoch seconds */
  modifiedAt: number;
}

export interface SizedFileRow {
  path: string;
  size: number;
  modifiedAt: number;
}

export interface IndexStats {
  totalFiles: number;
  uniqueFileTypes: number;
  fileTypeDistribution: Record<string, number>;
  /** null when the index is empty */
  totalSize: number | null;
}

export type DuplicateMap = Map<string, string[]>;

export interface IndexStore {
  readonly dbPath: string;
  upsert(record: FileRecord): void;
  get(path: string): FileRecord | undefined;
  count(): number;
  deleteByPath(path: string): boolean;
  /** Removes every listed path in one transaction; returns rows removed. */
  deleteByPaths(paths: readonly string[]): number;
  /** Removes every record for `digest` except `keepPath`, atomically. */
  deleteByDigestExcept(digest: string, keepPath: string): number;
  queryByModifiedRange(start: number, end?: number | null): string[];
  queryModifiedBefore(threshold: number): string[];
  queryBySizeGreaterThan(threshold: number): string[];
  queryBySizeGreaterThanDetailed(threshold: number): SizedFileRow[];
  queryGroupedDuplicates(): DuplicateMap;
  aggregateStats(): IndexStats;
  getHashAlgorithm(): string | null;
  /**
   * Pins the digest algorithm of this index on first use and rejects a
   * different one afterwards, since digests of two algorithms never match.
   */
  ensureHashAlgorithm(alg: string): void;
  close(): void;
}

interface RawRow {
  path: string;
  hash: string;
  file_type: string;
  size: number;
  last_modified: number;
}

function rowToRecord(row: RawRow): FileRecord {
  return {
    path: row.path,
    digest: row.hash,
    kind: row.file_type,
    size: row.size,
    modifiedAt: row.last_modified,
  };
}

const META_HASH_ALG = "hash_alg";

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(operation, { cause: err });
  }
}

export function openIndexStore(
  dbPath: string,
  opts: { logger?: Logger } = {},
): IndexStore {
  const resolved = dbPath === ":memory:" ? dbPath : path.resolve(dbPath);
  const db = guard("open", () => getDb(resolved));
  try {
    return createIndexStore(db, { dbPath: resolved, logger: opts.logger });
  } catch (err) {
    db.close();
    throw err;
  }
}

export function createIndexStore(
  db: Database,
  { dbPath = db.name, logger }: { dbPath?: string; logger?: Logger } = {},
): IndexStore {
  const log = childOrNull(logger, "index");

  const stmts = guard("prepare", () => ({
    upsert: db.prepare<RawRow>(`
      INSERT INTO file_info(path, hash, file_type, size, last_modified)
      VALUES (@path, @hash, @file_type, @size, @last_modified)
      ON CONFLICT(path) DO UPDATE SET
        hash=excluded.hash,
        file_type=excluded.file_type,
        size=excluded.size,
        last_modified=excluded.last_modified
    `),
    get: db.prepare<[string], RawRow>(
      `SELECT path, hash, file_type, size, last_modified FROM file_info WHERE path = ?`,
    ),
    count: db.prepare<[], { n: number }>(
      `SELECT COUNT(*) AS n FROM file_info`,
    ),
    deleteByPath: db.prepare<[string]>(`DELETE FROM file_info WHERE path = ?`),
    deleteByDigestExcept: db.prepare<{ hash: string; keep: string }>(
      `DELETE FROM file_info WHERE hash = @hash AND path != @keep`,
    ),
    modifiedSince: db.prepare<[number], { path: string }>(
      `SELECT path FROM file_info WHERE last_modified >= ? ORDER BY path`,
    ),
    modifiedBetween: db.prepare<
      { start: number; end: number },
      { path: string }
    >(
      `SELECT path FROM file_info
        WHERE last_modified >= @start AND last_modified <= @end
        ORDER BY path`,
    ),
    modifiedBefore: db.prepare<[number], { path: string }>(
      `SELECT path FROM file_info WHERE last_modified < ? ORDER BY path`,
    ),
    sizeGreaterThan: db.prepare<
      [number],
      { path: string; size: number; last_modified: number }
    >(
      `SELECT path, size, last_modified FROM file_info WHERE size > ? ORDER BY path`,
    ),
    duplicates: db.prepare<[], { hash: string; path: string }>(`
      SELECT hash, path FROM file_info
       WHERE hash IN (
         SELECT hash FROM file_info GROUP BY hash HAVING COUNT(*) > 1
       )
       ORDER BY hash, path
    `),
    totals: db.prepare<
      [],
      { total: number; kinds: number; bytes: number | null }
    >(
      `SELECT COUNT(*) AS total, COUNT(DISTINCT file_type) AS kinds, SUM(size) AS bytes
         FROM file_info`,
    ),
    distribution: db.prepare<[], { file_type: string; n: number }>(
      `SELECT file_type, COUNT(*) AS n FROM file_info GROUP BY file_type ORDER BY file_type`,
    ),
    metaGet: db.prepare<[string], { value: string | null }>(
      `SELECT value FROM meta WHERE key = ?`,
    ),
    metaSet: db.prepare<{ key: string; value: string }>(
      `INSERT INTO meta(key, value) VALUES (@key, @value)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
    ),
  }));

  const deletePathsTx = db.transaction((paths: readonly string[]) => {
    let removed = 0;
    for (const p of paths) {
      removed += stmts.deleteByPath.run(p).changes;
    }
    return removed;
  });

  const deleteByDigestTx = db.transaction((hash: string, keep: string) => {
    return stmts.deleteByDigestExcept.run({ hash, keep }).changes;
  });

  const readHashAlg = (): string | null =>
    stmts.metaGet.get(META_HASH_ALG)?.value ?? null;

  const ensureHashAlgTx = db.transaction((alg: string) => {
    const current = readHashAlg();
    if (current == null) {
      stmts.metaSet.run({ key: META_HASH_ALG, value: alg });
      return;
    }
    if (current !== alg) {
      throw new StorageError("ensureHashAlgorithm", {
        message: `index ${dbPath} was built with ${current}; refusing to mix in ${alg} digests`,
      });
    }
  });

  return {
    dbPath,

    upsert(record) {
      guard("upsert", () =>
        stmts.upsert.run({
          path: record.path,
          hash: record.digest,
          file_type: record.kind,
          size: record.size,
          last_modified: record.modifiedAt,
        }),
      );
    },

    get(p) {
      const row = guard("get", () => stmts.get.get(p));
      return row ? rowToRecord(row) : undefined;
    },

    count() {
      return guard("count", () => stmts.count.get()?.n ?? 0);
    },

    deleteByPath(p) {
      return guard("deleteByPath", () => stmts.deleteByPath.run(p).changes > 0);
    },

    deleteByPaths(paths) {
      if (!paths.length) return 0;
      const removed = guard("deleteByPaths", () => deletePathsTx(paths));
      log.debug("deleted records", { requested: paths.length, removed });
      return removed;
    },

    deleteByDigestExcept(digest, keepPath) {
      const removed = guard("deleteByDigestExcept", () =>
        deleteByDigestTx(digest, keepPath),
      );
      log.debug("collapsed digest", { digest, keep: keepPath, removed });
      return removed;
    },

    queryByModifiedRange(start, end) {
      return guard("queryByModifiedRange", () =>
        end == null
          ? stmts.modifiedSince.all(start)
          : stmts.modifiedBetween.all({ start, end }),
      ).map((r) => r.path);
    },

    queryModifiedBefore(threshold) {
      return guard("queryModifiedBefore", () =>
        stmts.modifiedBefore.all(threshold),
      ).map((r) => r.path);
    },

    queryBySizeGreaterThan(threshold) {
      return guard("queryBySizeGreaterThan", () =>
        stmts.sizeGreaterThan.all(threshold),
      ).map((r) => r.path);
    },

    queryBySizeGreaterThanDetailed(threshold) {
      return guard("queryBySizeGreaterThanDetailed", () =>
        stmts.sizeGreaterThan.all(threshold),
      ).map((r) => ({
        path: r.path,
        size: r.size,
        modifiedAt: r.last_modified,
      }));
    },

    queryGroupedDuplicates() {
      const rows = guard("queryGroupedDuplicates", () =>
        stmts.duplicates.all(),
      );
      const groups: DuplicateMap = new Map();
      for (const { hash, path: p } of rows) {
        const group = groups.get(hash);
        if (group) {
          group.push(p);
        } else {
          groups.set(hash, [p]);
        }
      }
      return groups;
    },

    aggregateStats() {
      return guard("aggregateStats", () => {
        const totals = stmts.totals.get();
        // own data properties: "__proto__" is a legal kind
        const fileTypeDistribution: Record<string, number> =
          Object.fromEntries(
            stmts.distribution
              .all()
              .map((row): [string, number] => [row.file_type, row.n]),
          );
        return {
          totalFiles: totals?.total ?? 0,
          uniqueFileTypes: totals?.kinds ?? 0,
          fileTypeDistribution,
          totalSize: totals?.bytes ?? null,
        };
      });
    },

    getHashAlgorithm() {
      return guard("getHashAlgorithm", readHashAlg);
    },

    ensureHashAlgorithm(alg) {
      guard("ensureHashAlgorithm", () => ensureHashAlgTx(alg));
    },

    close() {
      guard("close", () => db.close());
    },
  };
}
