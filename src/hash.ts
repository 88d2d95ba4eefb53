// src/hash.ts
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { createHash, getHashes } from "node:crypto";
import { IOError } from "./errors.js";

export const DIGEST_CHUNK_SIZE = 64 * 1024;

const ENCODING = "hex";

// Curated set we're willing to expose. md5 stays so that indexes built with
// the old weak default can still be rescanned.
export const CURATED_HASH_ALGOS = [
  "sha256",
  "sha1",
  "sha512",
  "blake2b512",
  "blake2s256",
  "sha3-256",
  "sha3-512",
  "md5",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "sha256";
}

let supportedHashes: HashAlg[] | null = null;
export function listSupportedHashes(): HashAlg[] {
  if (supportedHashes == null) {
    const avail = new Set(getHashes().map((s) => s.toLowerCase()));
    supportedHashes = CURATED_HASH_ALGOS.filter((a) => avail.has(a));
  }
  return supportedHashes;
}

/**
 * Normalize/validate requested algorithm against runtime support.
 * Accepts short shorthands "blake2b" -> blake2b512, "blake2s" -> blake2s256.
 */
export function normalizeHashAlg(requested?: string): HashAlg {
  const list = listSupportedHashes();
  if (!requested) return defaultHashAlg();
  const low = requested.trim().toLowerCase();
  const alias =
    low === "blake2b" ? "blake2b512" : low === "blake2s" ? "blake2s256" : low;
  const found = list.find((h) => h === alias);
  if (found) return found;

  throw new Error(
    `Unknown/unsupported hash algorithm "${requested}". Try one of:\n  ${list.join(", ")}`,
  );
}

/**
 * Hash a file by streaming it in fixed-size chunks, so memory use does not
 * depend on file size. Open and read failures reject with IOError.
 */
export async function fileDigest(
  alg: string,
  path: string,
  { chunkSize = DIGEST_CHUNK_SIZE }: { chunkSize?: number } = {},
): Promise<string> {
  const h = createHash(alg);
  const rs = createReadStream(path, { highWaterMark: chunkSize });
  try {
    await pipeline(rs, async function* (src: AsyncIterable<Buffer>) {
      for await (const chunk of src) {
        h.update(chunk);
        // yield once to satisfy transform signature (no downstream consumer)
        yield;
      }
    });
  } catch (err) {
    throw IOError.wrap("digest", path, err);
  }
  return h.digest(ENCODING);
}

export function contentDigest(alg: string, data: string | Buffer): string {
  return createHash(alg).update(data).digest(ENCODING);
}

export interface Fingerprinter {
  readonly algorithm: HashAlg;
  digest(path: string): Promise<string>;
}

export function createFingerprinter(
  alg: string = defaultHashAlg(),
  opts: { chunkSize?: number } = {},
): Fingerprinter {
  const algorithm = normalizeHashAlg(alg);
  return {
    algorithm,
    digest: (path) => fileDigest(algorithm, path, opts),
  };
}
