import fs from 'fs-extra';
import { Logger } from './logger.js';
import { ArchiveConfigError } from './errors.js';
import type { DryRunOption } from './types.js';

/**
 * mkdir -p. Returns true when the directory had to be created (or would be, in dry-run).
 */
export async function ensureDirectory(
  dir: string,
  logger: Logger,
  options: DryRunOption = {}
): Promise<boolean> {
  const stat = await fs.stat(dir).catch((err: NodeJS.ErrnoException) => {
    if (err.code === 'ENOENT') return null;
    throw err;
  });

  if (stat) {
    if (!stat.isDirectory()) {
      throw new ArchiveConfigError(`Not a directory: ${dir}`);
    }
    return false;
  }

  if (options.dryRun) {
    logger.dryRun(`would create directory ${dir}`);
    return true;
  }

  await fs.ensureDir(dir);
  logger.info(`Created directory: ${dir}`);
  return true;
}
