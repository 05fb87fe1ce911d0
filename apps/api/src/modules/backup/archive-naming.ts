export const ARCHIVE_EXTENSION = ".zip";
export const MAX_COLLISION_SUFFIX = 99;

const ARCHIVE_NAME_PATTERN = /^(.+)_(\d{8}-\d{6})(?:_(\d{2}))?\.zip$/;
const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})$/;

export interface ParsedArchiveName {
  worldId: string;
  timestamp: string;
  createdAt: Date;
  sequence: number;
}

/** Format a date as YYYYMMDD-HHMMSS in UTC. */
export function formatArchiveTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function parseArchiveTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return null;

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map((part) => Number.parseInt(part, 10));
  const time = Date.UTC(year, month - 1, day, hours, minutes, seconds);
  const date = new Date(time);

  // Date.UTC rolls 20240230 over into March; reject instead.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    return null;
  }
  return date;
}

/**
 * `<worldId>_<YYYYMMDD-HHMMSS>.zip`, or `..._NN.zip` for the NN-th archive created in the
 * same second. `_` sorts after `.`, so name order stays equal to creation order.
 */
export function buildArchiveName(worldId: string, createdAt: Date, sequence = 1): string {
  const base = `${worldId}_${formatArchiveTimestamp(createdAt)}`;
  if (sequence <= 1) {
    return `${base}${ARCHIVE_EXTENSION}`;
  }
  if (sequence > MAX_COLLISION_SUFFIX) {
    throw new RangeError(`archive sequence must be at most ${MAX_COLLISION_SUFFIX}`);
  }
  return `${base}_${String(sequence).padStart(2, "0")}${ARCHIVE_EXTENSION}`;
}

export function parseArchiveName(name: string): ParsedArchiveName | null {
  const match = ARCHIVE_NAME_PATTERN.exec(name);
  if (!match) return null;

  const [, worldId, timestamp, suffix] = match;
  const createdAt = parseArchiveTimestamp(timestamp);
  if (!createdAt) return null;

  return {
    worldId,
    timestamp,
    createdAt,
    sequence: suffix ? Number.parseInt(suffix, 10) : 1
  };
}

export function isArchiveFileName(name: string): boolean {
  return !name.startsWith(".") && name.toLowerCase().endsWith(ARCHIVE_EXTENSION);
}

export function temporaryArchiveName(finalName: string, token: string): string {
  return `.${finalName}.${token}.partial`;
}

export function isTemporaryArchiveName(name: string): boolean {
  return name.startsWith(".") && name.endsWith(".partial");
}

/** World ids double as directory and file name prefixes. */
export function isSafeWorldId(worldId: string): boolean {
  return (
    worldId.length > 0 &&
    worldId !== "." &&
    worldId !== ".." &&
    !worldId.startsWith(".") &&
    !/[\\/\0]/.test(worldId)
  );
}
