import ignore from "ignore";
import path from "node:path";

export type Ignorer = {
  ignoresFile: (r: string) => boolean; // path relative to the scan root
  ignoresDir: (r: string) => boolean;
};

export function normalizeR(r: string): string {
  // rpath normalization; keep empty "" for the root itself
  return r.replace(/\\/g, "/").replace(/^\/+/, "");
}

export function toRel(abs: string, root: string): string {
  return normalizeR(path.relative(root, abs).split(path.sep).join("/"));
}

export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = raw.trim().replace(/\\/g, "/");
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

export function collectIgnoreOption(
  value: string,
  previous: string[] = [],
): string[] {
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}

const NOTHING_IGNORED: Ignorer = {
  ignoresFile: () => false,
  ignoresDir: () => false,
};

export function createIgnorer(patterns: readonly string[] = []): Ignorer {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) return NOTHING_IGNORED;
  const ig = ignore().add(cleaned);
  // the ignore lib rejects "" and absolute paths; the root is never ignored
  return {
    ignoresFile: (r) => {
      const rel = normalizeR(r);
      return rel !== "" && ig.ignores(rel);
    },
    // a trailing slash lets "build/" style rules match the directory itself
    ignoresDir: (r) => {
      const rel = normalizeR(r);
      return rel !== "" && ig.ignores(`${rel}/`);
    },
  };
}
