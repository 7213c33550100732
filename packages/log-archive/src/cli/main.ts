import { Logger } from '../core/logger.js';
import { runLogArchive } from '../core/log-archiver.js';
import { ArchiveConfigError, LogArchiveError, describeError } from '../core/errors.js';
import { parseArgs, USAGE } from './args.js';

/**
 * Runs the CLI and resolves to the process exit code: 0 on success (also when there is
 * nothing to archive), 2 for usage errors or a bad source directory, 1 otherwise.
 */
export async function main(argv: string[], logger: Logger = new Logger(), now?: Date): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if (parsed.kind === 'help') {
      logger.log(USAGE);
      return 0;
    }
    await runLogArchive(parsed.config, { logger, now });
    return 0;
  } catch (err) {
    logger.error(describeError(err));
    if (err instanceof ArchiveConfigError) {
      logger.log('Run with --help for usage.');
    }
    return err instanceof LogArchiveError ? err.exitCode : 1;
  }
}
