// packages/log-archive/src/core/log-archiver.ts
import path from 'path';
import fs from 'fs-extra';
import type { ArchiveConfig, ArchiveRunResult, RunOptions } from './types.js';
import { SourceDirectoryError } from './errors.js';
import { ensureDirectory } from './directory.js';
import { selectCandidates } from './file-selector.js';
import { makeArchiveName } from './archive-name.js';
import { ArchiveWriter } from './archive-writer.js';
import { HistoryRecorder } from './history.js';
import { removeSources } from './source-cleaner.js';
import { pruneArchives } from './archive-pruner.js';

export class LogArchiver {
  private config: ArchiveConfig;
  private options: RunOptions;
  private writer: ArchiveWriter;
  private history: HistoryRecorder;

  constructor(config: ArchiveConfig, options: RunOptions) {
    this.config = config;
    this.options = options;
    this.writer = new ArchiveWriter(options.logger);
    this.history = new HistoryRecorder(options.logger);
  }

  /**
   * validate → ensure dirs → select → archive → history → (move) → (retain).
   * Stops after selection when nothing qualifies. Deletion failures surface after the
   * archive and its history line are already in place; they are not rolled back.
   */
  async execute(): Promise<ArchiveRunResult> {
    const { logger } = this.options;
    const { sourceDir, destDir, logFile, olderThanDays, retainDays, move, dryRun } = this.config;
    const now = this.options.now ?? new Date();

    await assertSourceDirectory(sourceDir);

    if (dryRun) {
      logger.info('Dry run mode - no changes will be applied');
    }

    await ensureDirectory(destDir, logger, { dryRun });
    const logDir = path.dirname(logFile);
    if (logDir !== destDir) {
      await ensureDirectory(logDir, logger, { dryRun });
    }

    logger.step(`Scanning ${sourceDir}...`);
    const candidates = await selectCandidates(sourceDir, {
      olderThanDays,
      excludeDirs: [destDir],
      excludeFiles: [logFile],
      now,
    });

    const result: ArchiveRunResult = {
      dryRun,
      candidates,
      archivePath: null,
      historyLine: null,
      removedSources: [],
      prunedArchives: [],
    };

    if (candidates.length === 0) {
      logger.info('Nothing to archive');
      return result;
    }
    logger.info(`Selected ${candidates.length} file(s)`);

    const archiveName = makeArchiveName(now);
    const files = candidates.map((c) => c.path);

    logger.step('Writing archive...');
    const written = await this.writer.write(files, sourceDir, destDir, archiveName, { dryRun });
    if (!written) {
      return result;
    }
    result.archivePath = written.path;

    result.historyLine = await this.history.record(
      logFile,
      { timestamp: now, archiveName, fileCount: files.length, sizeBytes: written.size, sourceDir },
      { dryRun }
    );

    if (move) {
      logger.step('Removing archived originals...');
      result.removedSources = await removeSources(files, logger, { dryRun });
    }

    if (retainDays !== undefined) {
      logger.step(`Pruning archives older than ${retainDays} day(s)...`);
      result.prunedArchives = await pruneArchives(destDir, retainDays, logger, { dryRun, now });
    }

    logger.success(dryRun ? 'Dry run complete' : 'Archive run complete');
    return result;
  }
}

async function assertSourceDirectory(dir: string): Promise<void> {
  const stat = await fs.stat(dir).catch((err: NodeJS.ErrnoException) => {
    if (err.code === 'ENOENT' || err.code === 'ENOTDIR') return null;
    throw err;
  });
  if (!stat) {
    throw new SourceDirectoryError(dir, 'missing');
  }
  if (!stat.isDirectory()) {
    throw new SourceDirectoryError(dir, 'not-a-directory');
  }
}

export function runLogArchive(config: ArchiveConfig, options: RunOptions): Promise<ArchiveRunResult> {
  return new LogArchiver(config, options).execute();
}
