import os from "os";
import path from "path";
import { promises as fsp, type PathLike } from "fs";
import fs from "fs-extra";
import { jest } from "@jest/globals";
import fg from "fast-glob";
import * as tar from "tar";
import { Logger } from "../packages/log-archive/src/index.js";

export const DAY = 86_400_000;

/** Current time truncated to whole seconds, so utimes round-trips exactly. */
export function wholeSecondNow(): Date {
  return new Date(Math.floor(Date.now() / 1000) * 1000);
}

export function ago(now: Date, ms: number): Date {
  return new Date(now.getTime() - ms);
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "log-archive-"));
}

export async function writeAged(file: string, content: string, mtime: Date): Promise<void> {
  await fs.outputFile(file, content);
  await fs.utimes(file, mtime, mtime);
}

export function recordingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ write: (line) => lines.push(line), color: false });
  return { logger, lines };
}

export async function listArchive(file: string): Promise<string[]> {
  const names: string[] = [];
  await tar.t({ file, onentry: (entry) => { names.push(entry.path); } });
  return names.sort();
}

export async function extractArchive(file: string, cwd: string): Promise<void> {
  await fs.ensureDir(cwd);
  await tar.x({ file, cwd });
}

/** Relative path → base64 content for every file under `dir` (empty when absent). */
export async function snapshotTree(dir: string): Promise<Record<string, string>> {
  if (!(await fs.pathExists(dir))) return {};
  const files = await fg("**/*", { cwd: dir, dot: true, onlyFiles: true });
  const out: Record<string, string> = {};
  for (const rel of files.sort()) {
    out[rel] = (await fs.readFile(path.join(dir, rel))).toString("base64");
  }
  return out;
}

/** Makes `unlink` reject with EACCES for `blocked`; every other path is really deleted. */
export function failUnlinkFor(blocked: string) {
  return jest.spyOn(fs, "unlink").mockImplementation(async (target: PathLike): Promise<void> => {
    if (String(target) === blocked) {
      throw Object.assign(new Error(`EACCES: permission denied, unlink '${blocked}'`), { code: "EACCES" });
    }
    await fsp.unlink(target);
  });
}
