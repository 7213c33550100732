// packages/log-archive/src/cli/args.ts
import path from "path";
import type { ArchiveConfig } from "../core/types.js";
import { ArchiveConfigError } from "../core/errors.js";
import { DEFAULT_HISTORY_FILE } from "../core/history.js";

export const DEFAULT_DEST_DIR = "archives";

export const USAGE = `Usage: log-archive <log-dir> [options]

Archive log files into a timestamped tar.gz

Options:
  --days N        only include files at least N days old
  --dest PATH     destination directory for archives (default: <log-dir>/${DEFAULT_DEST_DIR})
  --move          remove original files after a successful archive
  --retain N      delete archives in the destination older than N days
  --logfile PATH  archive history log (default: <dest>/${DEFAULT_HISTORY_FILE})
  --dry-run       report what would happen without changing anything
  -h, --help      show this help`;

const VALUE_OPTIONS = ["days", "dest", "retain", "logfile"] as const;
type ValueOption = (typeof VALUE_OPTIONS)[number];

const VALUE_OPTION_NAMES: ReadonlySet<string> = new Set(VALUE_OPTIONS);
const FLAG_OPTION_NAMES: ReadonlySet<string> = new Set(["move", "dry-run"]);

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTION_NAMES.has(name);
}

export type ParsedArgs =
  | { kind: "help" }
  | { kind: "run"; config: ArchiveConfig };

/**
 * Parses CLI arguments into a validated, absolute-path `ArchiveConfig`.
 * Throws `ArchiveConfigError` on anything it does not understand.
 */
export function parseArgs(argv: string[], cwd: string = process.cwd()): ParsedArgs {
  let source: string | undefined;
  let move = false;
  let dryRun = false;
  const raw: Partial<Record<ValueOption, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") return { kind: "help" };
    if (arg === "--move") { move = true; continue; }
    if (arg === "--dry-run") { dryRun = true; continue; }

    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
      if (FLAG_OPTION_NAMES.has(name)) {
        throw new ArchiveConfigError(`Option --${name} does not take a value`);
      }
      if (!isValueOption(name)) {
        throw new ArchiveConfigError(`Unknown option: ${arg}`);
      }

      let value: string | undefined;
      if (eq >= 0) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined || value === "" || (eq < 0 && value.startsWith("--"))) {
        throw new ArchiveConfigError(`Option --${name} requires a value`);
      }
      raw[name] = value;
      continue;
    }

    if (arg.startsWith("-") && arg !== "-") {
      throw new ArchiveConfigError(`Unknown option: ${arg}`);
    }
    if (source !== undefined) {
      throw new ArchiveConfigError(`Unexpected argument: ${arg}`);
    }
    source = arg;
  }

  if (source === undefined) {
    throw new ArchiveConfigError("Missing required argument: <log-dir>");
  }

  const sourceDir = path.resolve(cwd, source);
  const destDir = raw.dest !== undefined ? path.resolve(cwd, raw.dest) : path.join(sourceDir, DEFAULT_DEST_DIR);
  const logFile =
    raw.logfile !== undefined ? path.resolve(cwd, raw.logfile) : path.join(destDir, DEFAULT_HISTORY_FILE);

  return {
    kind: "run",
    config: {
      sourceDir,
      destDir,
      logFile,
      olderThanDays: parseDays("days", raw.days),
      retainDays: parseDays("retain", raw.retain),
      move,
      dryRun,
    },
  };
}

function parseDays(name: ValueOption, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new ArchiveConfigError(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return Number(value);
}
