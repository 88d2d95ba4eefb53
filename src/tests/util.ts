import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  openIndexStore,
  type FileRecord,
  type IndexStore,
} from "../index-store.js";

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), `dupindex-${prefix}-`));
}

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

// creates parent dirs; mtimeSec pins the modification time (epoch seconds)
export async function writeFile(
  p: string,
  content: string | Buffer,
  mtimeSec?: number,
): Promise<string> {
  await fsp.mkdir(path.dirname(p), { recursive: true });
  await fsp.writeFile(p, content);
  if (mtimeSec !== undefined) {
    await fsp.utimes(p, mtimeSec, mtimeSec);
  }
  return p;
}

export function openTestStore(dir: string, name = "index.db"): IndexStore {
  return openIndexStore(path.join(dir, name));
}

export function record(
  p: string,
  overrides: Partial<Omit<FileRecord, "path">> = {},
): FileRecord {
  return {
    path: p,
    digest: "d0",
    kind: "txt",
    size: 1,
    modifiedAt: 1_700_000_000,
    ...overrides,
  };
}
