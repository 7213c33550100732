import path from 'path';
import fs from 'fs-extra';
import { Logger } from './logger.js';
import { isArchiveName } from './archive-name.js';
import { DeletionError, hasErrorCode, type DeletionFailure } from './errors.js';
import { DAY_MS } from './file-selector.js';
import type { DryRunOption } from './types.js';

export type PruneOptions = DryRunOption & {
  now?: Date;
};

/**
 * Deletes archives in `destDir` whose mtime is before `now - retainDays`.
 * Only `logs_archive_*.tar.gz` regular files are considered.
 */
export async function pruneArchives(
  destDir: string,
  retainDays: number | undefined,
  logger: Logger,
  options: PruneOptions = {}
): Promise<string[]> {
  if (retainDays === undefined) return [];
  if (!(await fs.pathExists(destDir))) return [];

  const cutoffMs = (options.now ?? new Date()).getTime() - retainDays * DAY_MS;
  const names = (await fs.readdir(destDir)).filter(isArchiveName).sort();

  const expired: string[] = [];
  const failures: DeletionFailure[] = [];
  for (const name of names) {
    const p = path.join(destDir, name);
    try {
      const st = await fs.stat(p);
      if (st.isFile() && st.mtimeMs < cutoffMs) expired.push(p);
    } catch (error) {
      // vanished since readdir (or a dangling link): nothing left to prune
      if (!hasErrorCode(error, 'ENOENT')) failures.push({ path: p, error });
    }
  }

  if (options.dryRun) {
    for (const p of expired) logger.dryRun(`would prune expired archive ${p}`);
    if (failures.length > 0) {
      throw new DeletionError('expired archive(s)', failures);
    }
    return expired;
  }

  const pruned: string[] = [];
  for (const p of expired) {
    try {
      await fs.unlink(p);
      pruned.push(p);
    } catch (error) {
      failures.push({ path: p, error });
    }
  }

  if (pruned.length > 0) {
    logger.success(`Pruned ${pruned.length} archive(s) older than ${retainDays} day(s)`);
  }
  if (failures.length > 0) {
    throw new DeletionError('expired archive(s)', failures);
  }
  return pruned;
}
