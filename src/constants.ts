// src/constants.ts
export const CLI_NAME = "dupindex";
export const VERSION = "0.3.0";

// Resolved against the working directory when neither --db nor DUPINDEX_DB is set.
export const DEFAULT_DB_FILE = "dupindex.db";

export const UNKNOWN_KIND = "unknown";
