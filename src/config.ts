// src/config.ts
import path from "node:path";
import { DEFAULT_DB_FILE } from "./constants.js";
import { normalizeHashAlg, type HashAlg } from "./hash.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

export interface Config {
  dbPath: string;
  logLevel: LogLevel;
  hashAlg: HashAlg;
  dryRun: boolean;
}

export interface ConfigOverrides {
  db?: string;
  logLevel?: string;
  hash?: string;
  dryRun?: boolean;
}

function envValue(
  env: NodeJS.ProcessEnv,
  key: string,
): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/** Flag, then DUPINDEX_* environment variable, then built-in default. */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Config {
  const db = overrides.db ?? envValue(env, "DUPINDEX_DB") ?? DEFAULT_DB_FILE;
  return {
    dbPath: path.resolve(cwd, db),
    logLevel: parseLogLevel(
      overrides.logLevel ?? envValue(env, "DUPINDEX_LOG_LEVEL"),
    ),
    hashAlg: normalizeHashAlg(overrides.hash ?? envValue(env, "DUPINDEX_HASH")),
    dryRun: overrides.dryRun ?? false,
  };
}
