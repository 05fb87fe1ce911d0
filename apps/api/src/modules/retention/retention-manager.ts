import type { RetentionPolicy } from "@worldvault/shared";
import { BackupError, errorMessage } from "../../core/errors.js";
import type { BackupRecord, Logger } from "../../core/types.js";
import type { BackupRepository } from "../backup/repository/backup-repository.js";
import { compareBackups } from "../backup/repository/ordering.js";

export interface EvictionFailure {
  /** The backup whose deletion failed; null when the inventory itself could not be read. */
  backup: BackupRecord | null;
  code: string;
  message: string;
}

export interface EvictionReport {
  deleted: BackupRecord[];
  /** Null when the inventory could not be read and no total is known. */
  finalAggregateBytes: number | null;
  budgetStillExceeded: boolean;
  failure: EvictionFailure | null;
}

export interface EvictionPlan {
  candidates: BackupRecord[];
  aggregateBytes: number;
  projectedAggregateBytes: number;
  budgetStillExceeded: boolean;
}

/** Oldest-first backup sets keyed by world id. Consumed front to back during eviction. */
export type Inventory = Map<string, BackupRecord[]>;

/**
 * The globally oldest backup among worlds holding strictly more than the floor, or null
 * when every world is at or below it.
 */
export function nextEvictionCandidate(inventory: Inventory, minKeepPerWorld: number): BackupRecord | null {
  let oldest: BackupRecord | null = null;
  for (const backups of inventory.values()) {
    if (backups.length <= minKeepPerWorld) continue;
    const head = backups[0];
    if (oldest === null || compareBackups(head, oldest) < 0) {
      oldest = head;
    }
  }
  return oldest;
}

export function sumSizes(inventory: Inventory): number {
  let total = 0;
  for (const backups of inventory.values()) {
    for (const backup of backups) total += backup.sizeBytes;
  }
  return total;
}

function cloneInventory(inventory: Inventory): Inventory {
  const out: Inventory = new Map();
  for (const [worldId, backups] of inventory) {
    out.set(worldId, [...backups].sort(compareBackups));
  }
  return out;
}

function removeHead(inventory: Inventory, backup: BackupRecord): void {
  const backups = inventory.get(backup.worldId);
  if (backups && backups[0] === backup) {
    backups.shift();
  }
}

/** Which backups `enforce` would delete, in order, without touching the disk. */
export function planEviction(inventory: Inventory, policy: RetentionPolicy): EvictionPlan {
  const working = cloneInventory(inventory);
  const aggregateBytes = sumSizes(working);
  const candidates: BackupRecord[] = [];
  let running = aggregateBytes;

  while (running > policy.maxAggregateBytes) {
    const candidate = nextEvictionCandidate(working, policy.minKeepPerWorld);
    if (!candidate) break;
    candidates.push(candidate);
    removeHead(working, candidate);
    running -= candidate.sizeBytes;
  }

  return {
    candidates,
    aggregateBytes,
    projectedAggregateBytes: running,
    budgetStillExceeded: running > policy.maxAggregateBytes
  };
}

function toFailure(backup: BackupRecord | null, error: unknown): EvictionFailure {
  return {
    backup,
    code: error instanceof BackupError ? error.code : "ERR_IO",
    message: errorMessage(error)
  };
}

export class RetentionManager {
  constructor(
    private readonly repository: BackupRepository,
    private readonly logger?: Logger
  ) {}

  async preview(policy: RetentionPolicy): Promise<EvictionPlan> {
    return planEviction(await this.repository.listAllBackups(), policy);
  }

  /**
   * Deletes the globally oldest backups until the aggregate fits the budget, never taking
   * a world below `minKeepPerWorld`. The first deletion error other than an already
   * missing file stops the pass; the report then lists what was removed before it.
   * Errors are reported, never thrown.
   */
  async enforce(policy: RetentionPolicy): Promise<EvictionReport> {
    let inventory: Inventory;
    try {
      inventory = cloneInventory(await this.repository.listAllBackups());
    } catch (error) {
      this.logger?.error({ backupsRoot: this.repository.root, err: error }, "Eviction skipped; backups unreadable");
      return {
        deleted: [],
        finalAggregateBytes: null,
        budgetStillExceeded: false,
        failure: toFailure(null, error)
      };
    }

    const deleted: BackupRecord[] = [];
    let running = sumSizes(inventory);
    let failure: EvictionFailure | null = null;

    while (running > policy.maxAggregateBytes) {
      const candidate = nextEvictionCandidate(inventory, policy.minKeepPerWorld);
      if (!candidate) break;

      try {
        await this.repository.delete(candidate);
      } catch (error) {
        failure = toFailure(candidate, error);
        this.logger?.error({ archive: candidate.path, err: error }, "Eviction aborted");
        break;
      }

      removeHead(inventory, candidate);
      running -= candidate.sizeBytes;
      deleted.push(candidate);
      this.logger?.info(
        { worldId: candidate.worldId, archive: candidate.name, sizeBytes: candidate.sizeBytes },
        "Evicted backup"
      );
    }

    const report: EvictionReport = {
      deleted,
      finalAggregateBytes: running,
      budgetStillExceeded: running > policy.maxAggregateBytes,
      failure
    };
    if (report.budgetStillExceeded) {
      this.logger?.warn(
        { aggregateBytes: running, maxAggregateBytes: policy.maxAggregateBytes, minKeepPerWorld: policy.minKeepPerWorld },
        "Backup budget still exceeded"
      );
    }
    return report;
  }
}
