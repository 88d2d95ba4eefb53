export {
  openIndexStore,
  createIndexStore,
  type IndexStore,
  type FileRecord,
  type SizedFileRow,
  type IndexStats,
  type DuplicateMap,
} from "./index-store.js";

export {
  fileDigest,
  createFingerprinter,
  defaultHashAlg,
  listSupportedHashes,
  normalizeHashAlg,
  type Fingerprinter,
  type HashAlg,
} from "./hash.js";

export {
  scanTree,
  kindFromName,
  matchesExtension,
  type ScanOptions,
} from "./scan.js";

export {
  listDuplicates,
  summarizeDuplicates,
  toGroups,
  type DuplicateGroup,
  type DuplicateSummary,
} from "./duplicates.js";

export {
  resolveGroup,
  resolveDuplicates,
  validateSurvivorIndex,
  parseSurvivorInput,
  deletedPaths,
  type ResolveOutcome,
  type SurvivorChooser,
} from "./resolve.js";

export {
  findByDateRange,
  findLargeFiles,
  findLargeFilesDetailed,
  cleanOldFiles,
  getStats,
  formatTimestamp,
  type CleanResult,
  type LargeFileDetail,
} from "./maintenance.js";

export { nodeFileSystem, type FileSystem, type FileStat } from "./fs-ops.js";
export { IOError, StorageError, InvalidSelection } from "./errors.js";
export { resolveConfig, type Config } from "./config.js";
export { DEFAULT_DB_FILE } from "./constants.js";
export { buildProgram } from "./program.js";

export {
  ConsoleLogger,
  StructuredLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
