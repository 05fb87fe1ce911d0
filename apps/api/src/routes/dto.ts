import type { BackupSummary, EvictionReportSummary, RestoreSummary } from "@worldvault/shared";
import type { BackupRecord } from "../core/types.js";
import type { RestoreResult } from "../modules/backup/archive-engine.js";
import type { EvictionReport } from "../modules/retention/retention-manager.js";

export function toBackupSummary(backup: BackupRecord): BackupSummary {
  return {
    worldId: backup.worldId,
    name: backup.name,
    sizeBytes: backup.sizeBytes,
    createdAt: backup.createdAt.toISOString(),
    timestampSource: backup.timestampSource
  };
}

export function toEvictionSummary(report: EvictionReport): EvictionReportSummary {
  return {
    deleted: report.deleted.map(toBackupSummary),
    freedBytes: report.deleted.reduce((sum, backup) => sum + backup.sizeBytes, 0),
    finalAggregateBytes: report.finalAggregateBytes,
    budgetStillExceeded: report.budgetStillExceeded,
    failure: report.failure
      ? {
          backup: report.failure.backup ? toBackupSummary(report.failure.backup) : null,
          code: report.failure.code,
          message: report.failure.message
        }
      : null
  };
}

export function toRestoreSummary(worldId: string, backup: string, result: RestoreResult): RestoreSummary {
  return {
    worldId,
    backup,
    targetDir: result.targetDir,
    filesRestored: result.filesRestored,
    bytesRestored: result.bytesRestored
  };
}
