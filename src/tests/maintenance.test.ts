import fsp from "node:fs/promises";
import path from "node:path";
import { IOError } from "../errors.js";
import { nodeFileSystem, type FileSystem } from "../fs-ops.js";
import type { IndexStore } from "../index-store.js";
import {
  cleanOldFiles,
  findByDateRange,
  findLargeFiles,
  findLargeFilesDetailed,
  formatTimestamp,
  getStats,
} from "../maintenance.js";
import { scanTree } from "../scan.js";
import { fileExists, mkTmp, openTestStore, record, writeFile } from "./util";

describe("formatTimestamp", () => {
  test("renders local calendar time", () => {
    const local = new Date(2024, 0, 2, 3, 4, 5);
    expect(formatTimestamp(local.getTime() / 1000)).toBe("2024-01-02 03:04:05");
  });
});

describe("maintenance queries", () => {
  let tmp: string;
  let root: string;
  let store: IndexStore;

  beforeEach(async () => {
    tmp = await mkTmp("maint");
    root = path.join(tmp, "tree");
    store = openTestStore(tmp);
  });

  afterEach(async () => {
    store.close();
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("large files above a threshold", () => {
    store.upsert(record("/f500", { size: 500 }));
    store.upsert(record("/f1500", { size: 1500 }));
    store.upsert(record("/f2000", { size: 2000 }));
    expect(findLargeFiles(store, 1000)).toEqual(["/f1500", "/f2000"]);
  });

  test("detailed large files carry a formatted timestamp", () => {
    const modifiedAt = new Date(2023, 5, 7, 8, 9, 10).getTime() / 1000;
    store.upsert(record("/big", { size: 4096, modifiedAt }));
    expect(findLargeFilesDetailed(store, 100)).toEqual([
      { path: "/big", size: 4096, modifiedAt, modified: "2023-06-07 08:09:10" },
    ]);
  });

  test("date range reads the index without checking the disk", () => {
    store.upsert(record("/gone/early", { modifiedAt: 10 }));
    store.upsert(record("/gone/mid", { modifiedAt: 20 }));
    store.upsert(record("/gone/late", { modifiedAt: 30 }));
    expect(findByDateRange(store, 10, 20)).toEqual([
      "/gone/early",
      "/gone/mid",
    ]);
    expect(findByDateRange(store, 20)).toEqual(["/gone/late", "/gone/mid"]);
  });

  test("stats of an empty index", () => {
    expect(getStats(store)).toEqual({
      totalFiles: 0,
      uniqueFileTypes: 0,
      fileTypeDistribution: {},
      totalSize: null,
    });
  });

  test("cleanOldFiles removes everything older than the threshold", async () => {
    const old1 = await writeFile(path.join(root, "old1.log"), "a", 1000);
    const old2 = await writeFile(path.join(root, "sub", "old2.log"), "b", 1999);
    const edge = await writeFile(path.join(root, "edge.log"), "c", 2000);
    const fresh = await writeFile(path.join(root, "fresh.log"), "d", 5000);
    await scanTree({ root, extensions: [".log"], store });
    // indexed but already deleted by hand
    store.upsert(record(path.join(root, "vanished.log"), { modifiedAt: 1500 }));

    const result = await cleanOldFiles({ store, threshold: 2000 });

    expect(result).toEqual({
      removed: [old1, old2],
      pruned: [path.join(root, "vanished.log")],
    });
    expect(await fileExists(old1)).toBe(false);
    expect(await fileExists(old2)).toBe(false);
    expect(await fileExists(edge)).toBe(true);
    expect(await fileExists(fresh)).toBe(true);
    expect(store.queryByModifiedRange(0)).toEqual([edge, fresh]);
  });

  test("dry run leaves disk and index alone", async () => {
    const old = await writeFile(path.join(root, "old.log"), "a", 1000);
    store.upsert(record(old, { modifiedAt: 1000 }));
    store.upsert(record(path.join(root, "vanished.log"), { modifiedAt: 1000 }));

    const result = await cleanOldFiles({ store, threshold: 2000, dryRun: true });

    expect(result).toEqual({
      removed: [old],
      pruned: [path.join(root, "vanished.log")],
    });
    expect(await fileExists(old)).toBe(true);
    expect(store.count()).toBe(2);
  });

  test("a failed deletion still drops the records handled before it", async () => {
    const a = await writeFile(path.join(root, "a.log"), "a", 1000);
    const b = await writeFile(path.join(root, "b.log"), "b", 1000);
    const c = await writeFile(path.join(root, "c.log"), "c", 1000);
    await scanTree({ root, extensions: [".log"], store });
    const fs: FileSystem = {
      ...nodeFileSystem,
      remove: async (p) => {
        if (p === b) throw new IOError("EACCES", "delete", p);
        return nodeFileSystem.remove(p);
      },
    };

    await expect(
      cleanOldFiles({ store, threshold: 2000, fs }),
    ).rejects.toBeInstanceOf(IOError);

    expect(await fileExists(a)).toBe(false);
    expect(store.queryByModifiedRange(0)).toEqual([b, c]);
  });
});
