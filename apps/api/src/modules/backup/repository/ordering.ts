import type { BackupRecord } from "../../../core/types.js";

/** Code-unit comparison, so the result never depends on the host locale. */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Oldest first; equal timestamps fall back to the archive name. */
export function compareBackups(a: BackupRecord, b: BackupRecord): number {
  const delta = a.createdAt.getTime() - b.createdAt.getTime();
  if (delta !== 0) return delta;
  return compareNames(a.name, b.name);
}
