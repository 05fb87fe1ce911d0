export type BackupErrorCode =
  | "ERR_ACCESS"
  | "ERR_IO"
  | "ERR_SOURCE_MISSING"
  | "ERR_CORRUPT_ARCHIVE"
  | "ERR_NOT_FOUND"
  | "ERR_WORLD_ACTIVE";

export class BackupError extends Error {
  constructor(
    message: string,
    readonly code: BackupErrorCode,
    readonly path?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "BackupError";
  }
}

/** Path missing or unreadable. */
export class AccessError extends BackupError {
  constructor(message: string, path?: string, options?: ErrorOptions) {
    super(message, "ERR_ACCESS", path, options);
    this.name = "AccessError";
  }
}

export type PartialRestoreState = "none" | "target-moved-aside";

/**
 * Write failure (disk full, permission denied). During a restore,
 * `partiallyApplied` tells the caller what was left on disk.
 */
export class IOError extends BackupError {
  readonly partiallyApplied: PartialRestoreState;

  constructor(
    message: string,
    path?: string,
    options?: ErrorOptions & { partiallyApplied?: PartialRestoreState }
  ) {
    super(message, "ERR_IO", path, options);
    this.name = "IOError";
    this.partiallyApplied = options?.partiallyApplied ?? "none";
  }
}

export class SourceMissingError extends BackupError {
  constructor(message: string, path?: string, options?: ErrorOptions) {
    super(message, "ERR_SOURCE_MISSING", path, options);
    this.name = "SourceMissingError";
  }
}

export class CorruptArchiveError extends BackupError {
  constructor(message: string, path?: string, options?: ErrorOptions) {
    super(message, "ERR_CORRUPT_ARCHIVE", path, options);
    this.name = "CorruptArchiveError";
  }
}

export class NotFoundError extends BackupError {
  constructor(message: string, path?: string, options?: ErrorOptions) {
    super(message, "ERR_NOT_FOUND", path, options);
    this.name = "NotFoundError";
  }
}

export class WorldActiveError extends BackupError {
  constructor(worldId: string, path?: string) {
    super(`World "${worldId}" is currently active. Close the game before restoring.`, "ERR_WORLD_ACTIVE", path);
    this.name = "WorldActiveError";
  }
}

export function errnoCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    return String(error.code).toUpperCase();
  }
  return "";
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
