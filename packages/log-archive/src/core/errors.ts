export class LogArchiveError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Bad arguments or an unusable destination path. */
export class ArchiveConfigError extends LogArchiveError {
  constructor(message: string) {
    super(message, 2);
  }
}

export class SourceDirectoryError extends LogArchiveError {
  constructor(readonly sourceDir: string, reason: 'missing' | 'not-a-directory') {
    super(
      reason === 'missing'
        ? `Source directory does not exist: ${sourceDir}`
        : `Source path is not a directory: ${sourceDir}`,
      2
    );
  }
}

export class ArchiveWriteError extends LogArchiveError {
  constructor(readonly archivePath: string, cause: unknown) {
    super(`Failed to write archive ${archivePath}: ${describeError(cause)}`, 1, { cause });
  }
}

export type DeletionFailure = { path: string; error: unknown };

export class DeletionError extends LogArchiveError {
  constructor(what: string, readonly failures: DeletionFailure[]) {
    super(
      `Failed to delete ${failures.length} ${what}:\n` +
        failures.map((f) => `  - ${f.path}: ${describeError(f.error)}`).join('\n'),
      1
    );
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  // errors raised in another realm fail instanceof but still carry a message
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
