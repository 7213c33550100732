// packages/log-archive/src/utils/paths.ts
import path from "path";

/**
 * True when `target` is `dir` itself or lies somewhere below it.
 */
export function isWithin(dir: string, target: string): boolean {
  const rel = path.relative(path.resolve(dir), path.resolve(target));
  if (rel === "") return true;
  if (rel === ".." || rel.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(rel);
}

/** Archive member name: relative to `root`, always with `/`. */
export function toMemberName(root: string, file: string): string {
  return path.relative(root, file).split(path.sep).join("/");
}
