import path from 'path';
import fs from 'fs-extra';
import fg from 'fast-glob';
import type { CandidateFile } from './types.js';
import { hasErrorCode } from './errors.js';
import { isWithin, toMemberName } from '../utils/paths.js';

export const DAY_MS = 86_400 * 1000;

export type SelectOptions = {
  /** Keep only files whose mtime is at or before `now - days`. */
  olderThanDays?: number;
  /** Directories whose contents are never selected (the archive destination). */
  excludeDirs?: string[];
  excludeFiles?: string[];
  now?: Date;
};

export async function selectCandidates(
  sourceDir: string,
  options: SelectOptions = {}
): Promise<CandidateFile[]> {
  const root = path.resolve(sourceDir);
  const resolvedDirs = (options.excludeDirs ?? []).map((d) => path.resolve(d));
  // compare both spellings: a destination given through a link still excludes its real contents
  const excludeDirs = [...new Set([...resolvedDirs, ...(await Promise.all(resolvedDirs.map(realOrResolved)))])];
  const resolvedFiles = (options.excludeFiles ?? []).map((f) => path.resolve(f));
  const excludeFiles = new Set([...resolvedFiles, ...(await Promise.all(resolvedFiles.map(realOrResolved)))]);
  const cutoffMs =
    options.olderThanDays === undefined
      ? undefined
      : (options.now ?? new Date()).getTime() - options.olderThanDays * DAY_MS;

  // skip walking excluded subtrees; the per-file check below stays authoritative
  const ignore = resolvedDirs
    .filter((d) => d !== root && isWithin(root, d))
    .map((d) => `${fg.escapePath(toMemberName(root, d))}/**`);

  const entries = await fg('**/*', {
    cwd: root,
    absolute: true,
    dot: true,
    onlyFiles: true,
    // links are never entered or collected, so a candidate is always physically under the source
    followSymbolicLinks: false,
    ignore,
  });

  const candidates: CandidateFile[] = [];
  for (const entry of entries) {
    const file = path.resolve(entry);
    const real = await fs.realpath(file);
    if (excludeFiles.has(file) || excludeFiles.has(real)) continue;
    if (excludeDirs.some((d) => isWithin(d, file) || isWithin(d, real))) continue;

    const stat = await fs.stat(file);
    if (!stat.isFile()) continue;
    if (cutoffMs !== undefined && stat.mtimeMs > cutoffMs) continue;

    candidates.push({
      path: file,
      relativePath: toMemberName(root, file),
      mtimeMs: stat.mtimeMs,
      size: stat.size,
    });
  }

  return candidates.sort((a, b) =>
    a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0
  );
}

async function realOrResolved(p: string): Promise<string> {
  return fs.realpath(p).catch((err: unknown) => {
    if (hasErrorCode(err, 'ENOENT')) return p;
    throw err;
  });
}
