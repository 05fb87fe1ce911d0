import path from "node:path";
import { watch as chokidarWatch, type FSWatcher } from "chokidar";
import { errorMessage } from "../../core/errors.js";
import type { Logger } from "../../core/types.js";
import type { BackupService, CreateBackupOutcome } from "../backup/backup-service.js";
import {
  autosaveCompleteMessage,
  backupFailedMessage,
  budgetExceededMessage,
  evictionFailureMessage,
  evictionMessage
} from "../notification/messages.js";
import type { Notification, Notifier } from "../notification/notifier.js";
import type { WorldDiscovery } from "../world/world-discovery.js";
import { splitWorldId, worldIdFor } from "../world/world-id.js";

export interface WatchOptions {
  enabled: boolean;
  usePolling: boolean;
  pollingIntervalMs: number;
  debounceMs: number;
}

export interface AutosaveSchedulerDeps {
  service: BackupService;
  discovery: WorldDiscovery;
  intervalMs: number;
  watch: WatchOptions;
  notifier?: Notifier;
  logger?: Logger;
  now?: () => Date;
}

export type BackupTrigger = "timer" | "watch" | "queued";

export interface AutosaveRunResult {
  activeWorlds: string[];
  succeeded: string[];
  failed: { worldId: string; message: string }[];
}

/** Resolves the world a changed path belongs to, or null for paths outside any world. */
export function worldIdFromPath(savesRoot: string, changedPath: string): string | null {
  const relative = path.relative(path.resolve(savesRoot), path.resolve(changedPath));
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
    return null;
  }
  const [mode, name] = relative.split(path.sep);
  if (!mode || !name) return null;
  const worldId = worldIdFor(mode, name);
  return splitWorldId(worldId)?.mode === mode ? worldId : null;
}

/**
 * Periodic and change-driven backups. Holds the timers the core deliberately does not:
 * it calls `BackupService.createBackup`, which also runs retention, and reports results.
 */
export class AutosaveScheduler {
  private timer: NodeJS.Timeout | null = null;
  private watcher: FSWatcher | null = null;
  private readonly debounceTimers = new Map<string, NodeJS.Timeout>();
  private readonly runningWorlds = new Set<string>();
  private readonly queuedWorlds = new Set<string>();
  private readonly now: () => Date;

  constructor(private readonly deps: AutosaveSchedulerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  start(): void {
    if (this.deps.intervalMs > 0 && !this.timer) {
      this.timer = setInterval(() => {
        this.runAutosave().catch((error: unknown) => {
          this.deps.logger?.error({ err: error }, "Autosave run failed");
        });
      }, this.deps.intervalMs);
      this.timer.unref();
      this.deps.logger?.info({ intervalMs: this.deps.intervalMs }, "Autosave enabled");
    }

    if (this.deps.watch.enabled && !this.watcher) {
      this.watcher = this.createWatcher();
    }
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    for (const handle of this.debounceTimers.values()) {
      clearTimeout(handle);
    }
    this.debounceTimers.clear();
    this.queuedWorlds.clear();
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }

  /** Backs up every world that is being played right now; idle worlds are skipped. */
  async runAutosave(): Promise<AutosaveRunResult> {
    const worlds = await this.deps.discovery.listWorlds();
    const active = await this.deps.discovery.activeWorlds(worlds, this.now());
    const result: AutosaveRunResult = {
      activeWorlds: active.map((world) => world.id),
      succeeded: [],
      failed: []
    };

    if (active.length === 0) {
      this.deps.logger?.debug({ worldCount: worlds.length }, "No active worlds; autosave skipped");
      return result;
    }

    for (const world of active) {
      const outcome = await this.backupWorld(world.id, "timer");
      if (outcome.ok) {
        result.succeeded.push(world.id);
      } else {
        result.failed.push({ worldId: world.id, message: outcome.message });
      }
    }

    const complete = autosaveCompleteMessage(result.succeeded);
    if (complete) await this.notify(complete);
    return result;
  }

  /** Debounces bursts of save-file writes into one backup per world. */
  handleChange(changedPath: string): void {
    const worldId = worldIdFromPath(this.deps.discovery.root, changedPath);
    if (!worldId) return;

    const pending = this.debounceTimers.get(worldId);
    if (pending) {
      clearTimeout(pending);
    }
    const handle = setTimeout(() => {
      this.debounceTimers.delete(worldId);
      void this.runWatchedBackup(worldId, "watch");
    }, this.deps.watch.debounceMs);
    handle.unref();
    this.debounceTimers.set(worldId, handle);
  }

  async backupWorld(
    worldId: string,
    trigger: BackupTrigger
  ): Promise<{ ok: true; outcome: CreateBackupOutcome } | { ok: false; message: string }> {
    try {
      const outcome = await this.deps.service.createBackup(worldId);
      this.deps.logger?.info(
        {
          worldId,
          trigger,
          archive: outcome.backup.name,
          evicted: outcome.eviction.deleted.length,
          budgetStillExceeded: outcome.eviction.budgetStillExceeded
        },
        "Autosave backup completed"
      );
      await this.notifyEviction(outcome);
      return { ok: true, outcome };
    } catch (error) {
      const message = errorMessage(error);
      this.deps.logger?.error({ worldId, trigger, err: error }, "Autosave backup failed");
      await this.notify(backupFailedMessage(worldId, message));
      return { ok: false, message };
    }
  }

  private async runWatchedBackup(worldId: string, trigger: BackupTrigger): Promise<void> {
    if (this.runningWorlds.has(worldId)) {
      this.queuedWorlds.add(worldId);
      return;
    }

    this.runningWorlds.add(worldId);
    try {
      await this.backupWorld(worldId, trigger);
    } finally {
      this.runningWorlds.delete(worldId);
      if (this.queuedWorlds.delete(worldId)) {
        void this.runWatchedBackup(worldId, "queued");
      }
    }
  }

  private async notifyEviction(outcome: CreateBackupOutcome): Promise<void> {
    const policy = this.deps.service.policy;
    const messages = [
      evictionMessage(outcome.eviction, policy.minKeepPerWorld),
      evictionFailureMessage(outcome.eviction),
      budgetExceededMessage(outcome.eviction, policy.maxAggregateBytes)
    ];
    for (const message of messages) {
      if (message) await this.notify(message);
    }
  }

  private async notify(notification: Notification): Promise<void> {
    if (!this.deps.notifier?.enabled) return;
    try {
      await this.deps.notifier.send(notification);
    } catch (error) {
      this.deps.logger?.error({ err: error }, "Notification delivery failed");
    }
  }

  private createWatcher(): FSWatcher {
    const { watch } = this.deps;
    const root = this.deps.discovery.root;
    const watcher = chokidarWatch(root, {
      ignoreInitial: true,
      usePolling: watch.usePolling,
      interval: watch.pollingIntervalMs,
      binaryInterval: Math.max(watch.pollingIntervalMs, 1200),
      awaitWriteFinish: {
        stabilityThreshold: 800,
        pollInterval: 100
      },
      atomic: true
    });

    watcher.on("add", (watchPath: string) => this.handleChange(watchPath));
    watcher.on("change", (watchPath: string) => this.handleChange(watchPath));
    watcher.on("unlink", (watchPath: string) => this.handleChange(watchPath));
    watcher.on("error", (error: unknown) => {
      this.deps.logger?.error({ root, usePolling: watch.usePolling, err: error }, "Watcher error");
    });
    watcher.on("ready", () => {
      this.deps.logger?.info({ root, usePolling: watch.usePolling }, "Watcher ready");
    });
    return watcher;
  }
}
