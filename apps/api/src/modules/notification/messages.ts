import type { EvictionReport } from "../retention/retention-manager.js";
import type { Notification } from "./notifier.js";

const GIB = 1024 ** 3;
const MIB = 1024 ** 2;

export function formatBytes(bytes: number): string {
  if (bytes >= GIB) return `${(bytes / GIB).toFixed(1)} GB`;
  if (bytes >= MIB) return `${(bytes / MIB).toFixed(1)} MB`;
  if (bytes >= 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${bytes} B`;
}

/** Names the first two worlds and counts the rest. */
export function summariseWorlds(worldIds: string[]): string {
  const shown = worldIds.slice(0, 2).join(", ");
  return worldIds.length > 2 ? `${shown} +${worldIds.length - 2}` : shown;
}

export function autosaveCompleteMessage(worldIds: string[]): Notification | null {
  if (worldIds.length === 0) return null;
  return { level: "info", title: "Auto-save complete", body: `Backups created for: ${summariseWorlds(worldIds)}` };
}

export function backupFailedMessage(worldId: string, reason: string): Notification {
  return { level: "error", title: "Auto-save error", body: `Backup of ${worldId} failed: ${reason}` };
}

export function evictionMessage(report: EvictionReport, minKeepPerWorld: number): Notification | null {
  if (report.deleted.length === 0) return null;
  const freed = report.deleted.reduce((sum, backup) => sum + backup.sizeBytes, 0);
  return {
    level: "info",
    title: "Old backups removed",
    body:
      `Removed ${report.deleted.length} older backup${report.deleted.length === 1 ? "" : "s"} ` +
      `(freed ${formatBytes(freed)}) to stay under the size limit. ` +
      `At least ${minKeepPerWorld} backups per world were kept.`
  };
}

/** Distinct warning: only the user can fix this, by raising the limit or freeing space. */
export function budgetExceededMessage(report: EvictionReport, maxAggregateBytes: number): Notification | null {
  if (!report.budgetStillExceeded || report.finalAggregateBytes === null) return null;
  return {
    level: "warning",
    title: "Backup limit exceeded",
    body:
      `Backups use ${formatBytes(report.finalAggregateBytes)} (limit ${formatBytes(maxAggregateBytes)}) ` +
      `and nothing more can be removed without going below the per-world minimum. ` +
      `Raise the limit or delete backups manually.`
  };
}

export function evictionFailureMessage(report: EvictionReport): Notification | null {
  if (!report.failure) return null;
  const { backup, message } = report.failure;
  return {
    level: "error",
    title: "Backup cleanup failed",
    body: backup ? `Cleanup stopped at ${backup.name}: ${message}` : `Cleanup could not read the backups: ${message}`
  };
}
