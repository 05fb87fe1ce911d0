export type TimestampSource = "name" | "mtime";

export interface WorldSummary {
  id: string;
  name: string;
  mode: string;
  path: string;
  active: boolean;
  backupCount: number;
  backupBytes: number;
}

export interface BackupSummary {
  worldId: string;
  name: string;
  sizeBytes: number;
  createdAt: string;
  timestampSource: TimestampSource;
}

export interface RetentionPolicy {
  maxAggregateBytes: number;
  minKeepPerWorld: number;
}

export interface EvictionFailure {
  backup: BackupSummary | null;
  code: string;
  message: string;
}

export interface EvictionReportSummary {
  deleted: BackupSummary[];
  freedBytes: number;
  finalAggregateBytes: number | null;
  budgetStillExceeded: boolean;
  failure: EvictionFailure | null;
}

export interface UsageSummary {
  aggregateBytes: number;
  policy: RetentionPolicy;
  overBudget: boolean;
}

export interface CreateBackupResult {
  backup: BackupSummary;
  eviction: EvictionReportSummary;
}

export interface RestoreSummary {
  worldId: string;
  backup: string;
  targetDir: string;
  filesRestored: number;
  bytesRestored: number;
}
