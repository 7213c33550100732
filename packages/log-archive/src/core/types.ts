// packages/log-archive/src/core/types.ts
import type { Logger } from "./logger.js";

/**
 * Validated run configuration. All paths are absolute.
 */
export interface ArchiveConfig {
  sourceDir: string;
  destDir: string;
  logFile: string;
  olderThanDays?: number;
  retainDays?: number;
  move: boolean;
  dryRun: boolean;
}

export interface RunOptions {
  logger: Logger;
  /** Reference time for age filtering, retention and the archive name. */
  now?: Date;
}

/**
 * A file picked for the next archive. `relativePath` uses `/` and becomes the member name.
 */
export interface CandidateFile {
  path: string;
  relativePath: string;
  mtimeMs: number;
  size: number;
}

export interface HistoryEntry {
  timestamp: Date;
  archiveName: string;
  fileCount: number;
  sizeBytes: number;
  sourceDir: string;
}

export interface WrittenArchive {
  path: string;
  size: number;
}

export interface DryRunOption {
  dryRun?: boolean;
}

/**
 * What a run did, or in dry-run what it would have done.
 */
export interface ArchiveRunResult {
  dryRun: boolean;
  candidates: CandidateFile[];
  archivePath: string | null;
  historyLine: string | null;
  removedSources: string[];
  prunedArchives: string[];
}
