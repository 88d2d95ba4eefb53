import fsp from "node:fs/promises";
import { listDuplicates, summarizeDuplicates } from "../duplicates.js";
import type { IndexStore } from "../index-store.js";
import { mkTmp, openTestStore, record } from "./util";

describe("duplicate grouper", () => {
  let tmp: string;
  let store: IndexStore;

  beforeEach(async () => {
    tmp = await mkTmp("dups");
    store = openTestStore(tmp);
  });

  afterEach(async () => {
    store.close();
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("reads groups from the index even when the files are gone", () => {
    store.upsert(record("/nowhere/a", { digest: "d", size: 100 }));
    store.upsert(record("/nowhere/b", { digest: "d", size: 100 }));
    store.upsert(record("/nowhere/c", { digest: "e", size: 100 }));
    expect(Array.from(listDuplicates(store))).toEqual([
      ["d", ["/nowhere/a", "/nowhere/b"]],
    ]);
  });

  test("summaries report reclaimable bytes", () => {
    for (const p of ["/x/1", "/x/2", "/x/3"]) {
      store.upsert(record(p, { digest: "big", size: 1000 }));
    }
    expect(summarizeDuplicates(store)).toEqual([
      {
        digest: "big",
        paths: ["/x/1", "/x/2", "/x/3"],
        size: 1000,
        reclaimable: 2000,
      },
    ]);
  });
});
