/* ========================= Types =======================*/
export type {
  ArchiveConfig,
  ArchiveRunResult,
  CandidateFile,
  DryRunOption,
  HistoryEntry,
  RunOptions,
  WrittenArchive,
} from "./core/types.js";

/* ========================= Errors =======================*/
export {
  LogArchiveError,
  ArchiveConfigError,
  SourceDirectoryError,
  ArchiveWriteError,
  DeletionError,
} from "./core/errors.js";
export type { DeletionFailure } from "./core/errors.js";

/* ========================= Pipeline =======================*/
export { Logger } from "./core/logger.js";
export type { LoggerOptions } from "./core/logger.js";
export { selectCandidates, DAY_MS } from "./core/file-selector.js";
export type { SelectOptions } from "./core/file-selector.js";
export { makeArchiveName, isArchiveName, ARCHIVE_PREFIX, ARCHIVE_SUFFIX } from "./core/archive-name.js";
export { ArchiveWriter, TEMP_SUFFIX } from "./core/archive-writer.js";
export { HistoryRecorder, formatHistoryEntry, readHistory, DEFAULT_HISTORY_FILE } from "./core/history.js";
export { removeSources } from "./core/source-cleaner.js";
export { pruneArchives } from "./core/archive-pruner.js";
export type { PruneOptions } from "./core/archive-pruner.js";
export { ensureDirectory } from "./core/directory.js";
export { LogArchiver, runLogArchive } from "./core/log-archiver.js";

/* ========================= CLI =======================*/
export { parseArgs, USAGE, DEFAULT_DEST_DIR } from "./cli/args.js";
export type { ParsedArgs } from "./cli/args.js";
export { main } from "./cli/main.js";
