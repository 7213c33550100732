import fs from 'fs-extra';
import { Logger } from './logger.js';
import { DeletionError, type DeletionFailure } from './errors.js';
import type { DryRunOption } from './types.js';

/**
 * Deletes the originals of an archive ("move" mode). Every file is attempted; failures are
 * thrown together afterwards.
 */
export async function removeSources(
  files: string[],
  logger: Logger,
  options: DryRunOption = {}
): Promise<string[]> {
  if (options.dryRun) {
    for (const file of files) logger.dryRun(`would delete ${file}`);
    return [...files];
  }

  const removed: string[] = [];
  const failures: DeletionFailure[] = [];
  for (const file of files) {
    try {
      await fs.unlink(file);
      removed.push(file);
    } catch (error) {
      failures.push({ path: file, error });
    }
  }

  if (removed.length > 0) {
    logger.success(`Removed ${removed.length} original file(s)`);
  }
  if (failures.length > 0) {
    throw new DeletionError('source file(s)', failures);
  }
  return removed;
}
