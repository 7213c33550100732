import dayjs from 'dayjs';

export const ARCHIVE_PREFIX = 'logs_archive_';
export const ARCHIVE_SUFFIX = '.tar.gz';

/**
 * `logs_archive_<YYYYMMDD_HHMMSS>.tar.gz` in local time. Second resolution:
 * two runs inside the same second get the same name.
 */
export function makeArchiveName(now: Date = new Date()): string {
  return `${ARCHIVE_PREFIX}${dayjs(now).format('YYYYMMDD_HHmmss')}${ARCHIVE_SUFFIX}`;
}

export function isArchiveName(name: string): boolean {
  return (
    name.startsWith(ARCHIVE_PREFIX) &&
    name.endsWith(ARCHIVE_SUFFIX) &&
    name.length > ARCHIVE_PREFIX.length + ARCHIVE_SUFFIX.length
  );
}

export function formatLocalIso(now: Date): string {
  return dayjs(now).format('YYYY-MM-DDTHH:mm:ss');
}
