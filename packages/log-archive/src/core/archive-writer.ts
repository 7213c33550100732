import path from 'path';
import fs from 'fs-extra';
import archiver from 'archiver';
import { v4 as uuid } from 'uuid';
import { Logger } from './logger.js';
import { ArchiveWriteError } from './errors.js';
import type { DryRunOption, WrittenArchive } from './types.js';
import { toMemberName } from '../utils/paths.js';

export const TEMP_SUFFIX = '.tmp';

export class ArchiveWriter {
  constructor(private logger: Logger) {}

  /**
   * Streams `files` into a gzipped tar under a temp name in `destDir`, then renames it to
   * `archiveName`. Members are named relative to `sourceRoot`.
   *
   * Resolves to `null` when there is nothing to archive. In dry-run nothing touches the
   * disk and the returned path is where the archive would have gone.
   */
  async write(
    files: string[],
    sourceRoot: string,
    destDir: string,
    archiveName: string,
    options: DryRunOption = {}
  ): Promise<WrittenArchive | null> {
    if (files.length === 0) {
      return null;
    }

    const finalPath = path.join(destDir, archiveName);
    if (options.dryRun) {
      this.logger.dryRun(`would create archive ${finalPath} (${files.length} files)`);
      return { path: finalPath, size: 0 };
    }

    const tmpPath = path.join(destDir, `${archiveName}.${uuid().slice(0, 8)}${TEMP_SUFFIX}`);
    try {
      await this.stream(files, sourceRoot, tmpPath);
      if (await fs.pathExists(finalPath)) {
        this.logger.warning(`Replacing existing archive: ${finalPath}`);
      }
      await fs.rename(tmpPath, finalPath);
    } catch (err) {
      await fs.remove(tmpPath);
      throw new ArchiveWriteError(finalPath, err);
    }

    const { size } = await fs.stat(finalPath);
    this.logger.success(`Archive created: ${finalPath} (${size} bytes)`);
    return { path: finalPath, size };
  }

  // settles only once the output fd is closed, so the caller can safely unlink the temp file
  private stream(files: string[], sourceRoot: string, tmpPath: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const output = fs.createWriteStream(tmpPath, { flags: 'wx' });
      const archive = archiver('tar', { gzip: true, gzipOptions: { level: 9 } });
      let failed = false;
      let failure: unknown;

      const fail = (err: unknown) => {
        if (failed) return;
        failed = true;
        failure = err;
        archive.abort();
        output.destroy();
      };

      output.on('close', () => {
        if (failed) reject(failure);
        else resolve();
      });
      output.on('error', fail);
      // archiver reports unreadable or vanished entries as warnings
      archive.on('warning', fail);
      archive.on('error', fail);

      archive.pipe(output);
      for (const file of files) {
        archive.file(file, { name: toMemberName(sourceRoot, file) });
      }
      archive.finalize().catch(fail);
    });
  }
}
