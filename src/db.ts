import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import BetterSqlite3 from "better-sqlite3";

export type Database = BetterSqlite3.Database;

const PRAGMAS = [
  "busy_timeout = 5000",
  "journal_mode = WAL",
  // every multi-row mutation is its own transaction, so a crash mid-batch
  // must not lose a committed one
  "synchronous = FULL",
];

export function getDb(dbPath: string): Database {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new BetterSqlite3(dbPath);
  for (const pragma of PRAGMAS) {
    db.pragma(pragma);
  }

  db.exec(`
  CREATE TABLE IF NOT EXISTS file_info (
    path          TEXT PRIMARY KEY NOT NULL,
    hash          TEXT NOT NULL,      -- lowercase hex content digest
    file_type     TEXT NOT NULL,      -- lowercase extension or 'unknown'
    size          INTEGER NOT NULL,   -- bytes
    last_modified INTEGER NOT NULL    -- epoch seconds
  );
  CREATE INDEX IF NOT EXISTS file_info_hash_idx ON file_info(hash);
  CREATE INDEX IF NOT EXISTS file_info_last_modified_idx ON file_info(last_modified);
  CREATE INDEX IF NOT EXISTS file_info_size_idx ON file_info(size);
  `);

  db.exec(`
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY NOT NULL,
    value TEXT
  );
  `);

  return db;
}
