import path from 'path';
import fs from 'fs-extra';
import { Logger } from './logger.js';
import { formatLocalIso } from './archive-name.js';
import type { DryRunOption, HistoryEntry } from './types.js';

export const DEFAULT_HISTORY_FILE = 'archive_history.log';

export function formatHistoryEntry(entry: HistoryEntry): string {
  return [
    formatLocalIso(entry.timestamp),
    entry.archiveName,
    `files=${entry.fileCount}`,
    `size=${entry.sizeBytes}`,
    `src=${entry.sourceDir}`,
  ].join(' | ');
}

/**
 * Append-only audit trail, one line per published archive.
 */
export class HistoryRecorder {
  constructor(private logger: Logger) {}

  async record(logFile: string, entry: HistoryEntry, options: DryRunOption = {}): Promise<string> {
    const line = formatHistoryEntry(entry);

    if (options.dryRun) {
      this.logger.dryRun(`would append to ${logFile}: ${line}`);
      return line;
    }

    await fs.ensureDir(path.dirname(logFile));
    await fs.appendFile(logFile, `${line}\n`, 'utf8');
    this.logger.info(`History updated: ${logFile}`);
    return line;
  }
}

export async function readHistory(logFile: string): Promise<string[]> {
  if (!(await fs.pathExists(logFile))) {
    return [];
  }
  const txt = await fs.readFile(logFile, 'utf8');
  return txt.split(/\r?\n/).filter((line) => line.length > 0);
}
