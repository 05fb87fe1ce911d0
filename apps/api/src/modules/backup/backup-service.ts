import path from "node:path";
import type { RetentionPolicy, UsageSummary, WorldSummary } from "@worldvault/shared";
import { AccessError, NotFoundError, WorldActiveError } from "../../core/errors.js";
import type { BackupRecord, Logger, World } from "../../core/types.js";
import { type EvictionPlan, type EvictionReport, RetentionManager } from "../retention/retention-manager.js";
import type { WorldDiscovery } from "../world/world-discovery.js";
import { splitWorldId } from "../world/world-id.js";
import { ArchiveEngine, type RestoreResult } from "./archive-engine.js";
import type { BackupRepository } from "./repository/backup-repository.js";

export interface BackupServiceDeps {
  discovery: WorldDiscovery;
  repository: BackupRepository;
  policy: RetentionPolicy;
  engine?: ArchiveEngine;
  retention?: RetentionManager;
  logger?: Logger;
  now?: () => Date;
}

export interface RestoreOptions {
  targetWorldId?: string;
  allowActive?: boolean;
}

export interface SweepResult {
  partialArchives: number;
  restoreLeftovers: number;
}

export interface CreateBackupOutcome {
  backup: BackupRecord;
  eviction: EvictionReport;
}

/**
 * The operations the GUI shell and the autosave trigger call. Everything that writes or
 * deletes runs through one queue, so two triggers never touch the disk at the same time.
 */
export class BackupService {
  private readonly discovery: WorldDiscovery;
  private readonly repository: BackupRepository;
  private readonly engine: ArchiveEngine;
  private readonly retention: RetentionManager;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  private readonly currentPolicy: RetentionPolicy;
  private runExecutionQueue: Promise<unknown> = Promise.resolve();

  constructor(deps: BackupServiceDeps) {
    this.discovery = deps.discovery;
    this.repository = deps.repository;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
    this.engine = deps.engine ?? new ArchiveEngine(deps.repository, { now: this.now, logger: deps.logger });
    this.retention = deps.retention ?? new RetentionManager(deps.repository, deps.logger);
    this.currentPolicy = { ...deps.policy };
  }

  get policy(): RetentionPolicy {
    return { ...this.currentPolicy };
  }

  listWorlds(): Promise<World[]> {
    return this.discovery.listWorlds();
  }

  async describeWorlds(): Promise<WorldSummary[]> {
    const worlds = await this.discovery.listWorlds();
    const now = this.now();
    const out: WorldSummary[] = [];
    for (const world of worlds) {
      const backups = await this.repository.listBackups(world.id);
      out.push({
        id: world.id,
        name: world.name,
        mode: world.mode,
        path: world.path,
        active: await this.discovery.isWorldActive(world, now),
        backupCount: backups.length,
        backupBytes: backups.reduce((sum, backup) => sum + backup.sizeBytes, 0)
      });
    }
    return out;
  }

  listBackups(worldId: string): Promise<BackupRecord[]> {
    return this.repository.listBackups(worldId);
  }

  aggregateSize(): Promise<number> {
    return this.repository.aggregateSize();
  }

  async usage(): Promise<UsageSummary> {
    const aggregateBytes = await this.repository.aggregateSize();
    const policy = this.policy;
    return { aggregateBytes, policy, overBudget: aggregateBytes > policy.maxAggregateBytes };
  }

  createBackup(worldId: string): Promise<CreateBackupOutcome> {
    return this.enqueue(async () => {
      const world = await this.discovery.findWorld(worldId);
      const backup = await this.engine.createBackup(world);
      const eviction = await this.retention.enforce(this.currentPolicy);
      return { backup, eviction };
    });
  }

  /** Restores over the world directory. Callers wanting a safety copy create a backup first. */
  restoreBackup(worldId: string, name: string, options: RestoreOptions = {}): Promise<RestoreResult> {
    return this.enqueue(async () => {
      const backup = await this.repository.findBackup(worldId, name);
      const targetWorldId = options.targetWorldId ?? worldId;
      const target = await this.resolveRestoreTarget(targetWorldId);

      if (!options.allowActive && target.world && (await this.discovery.isWorldActive(target.world, this.now()))) {
        throw new WorldActiveError(targetWorldId, target.path);
      }
      return this.engine.restoreBackup(backup, target.path);
    });
  }

  /** Manual delete; ignores the retention floor. Returns false when nothing was there. */
  deleteBackup(worldId: string, name: string): Promise<boolean> {
    return this.enqueue(async () => {
      let backup: BackupRecord;
      try {
        backup = await this.repository.findBackup(worldId, name);
      } catch (error) {
        if (error instanceof NotFoundError) return false;
        throw error;
      }
      await this.repository.delete(backup);
      this.logger?.info({ worldId, archive: name }, "Backup deleted manually");
      return true;
    });
  }

  enforce(policy: RetentionPolicy = this.currentPolicy): Promise<EvictionReport> {
    return this.enqueue(() => this.retention.enforce(policy));
  }

  previewEviction(policy: RetentionPolicy = this.currentPolicy): Promise<EvictionPlan> {
    return this.retention.preview(policy);
  }

  /** Clears what an interrupted backup or restore left on disk. Run once at start-up. */
  sweepTemporaries(): Promise<SweepResult> {
    return this.enqueue(async () => {
      const partialArchives = await this.repository.removeStalePartials();
      const modeDirs = await this.discovery.listModeDirs().catch((error: unknown): string[] => {
        if (error instanceof AccessError) return [];
        throw error;
      });
      let restoreLeftovers = 0;
      for (const modeDir of modeDirs) {
        restoreLeftovers += await this.engine.sweepRestoreLeftovers(modeDir);
      }
      return { partialArchives, restoreLeftovers };
    });
  }

  private async resolveRestoreTarget(worldId: string): Promise<{ world: World | null; path: string }> {
    const parts = splitWorldId(worldId);
    if (!parts) {
      throw new NotFoundError(`Invalid world id: ${worldId}`);
    }
    const worlds = await this.discovery.listWorlds().catch((error: unknown): World[] => {
      if (error instanceof AccessError) return [];
      throw error;
    });
    const world = worlds.find((item) => item.id === worldId) ?? null;
    return { world, path: world?.path ?? path.join(path.resolve(this.discovery.root), parts.mode, parts.name) };
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.runExecutionQueue.then(task, task);
    this.runExecutionQueue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
