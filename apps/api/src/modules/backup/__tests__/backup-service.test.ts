import { mkdir, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AccessError, NotFoundError, WorldActiveError } from "../../../core/errors.js";
import { createTempDir, readTree, removeDir, setMtime, utc, writeTree } from "../../../test-utils/fs-fixtures.js";
import { WorldDiscovery } from "../../world/world-discovery.js";
import { BackupService } from "../backup-service.js";
import { BackupRepository } from "../repository/backup-repository.js";

describe("BackupService", () => {
  let dir: string;
  let savesRoot: string;
  let survivalDir: string;
  let backupsRoot: string;
  let clock: Date;
  let discovery: WorldDiscovery;
  let repository: BackupRepository;

  function createService(maxAggregateBytes = 10 * 1024 ** 2, minKeepPerWorld = 1) {
    return new BackupService({
      discovery,
      repository,
      policy: { maxAggregateBytes, minKeepPerWorld },
      now: () => clock
    });
  }

  beforeEach(async () => {
    dir = await createTempDir("service");
    savesRoot = path.join(dir, "Saves");
    survivalDir = path.join(savesRoot, "Survival");
    backupsRoot = path.join(dir, "Backups");
    clock = utc(2024, 7, 1, 10, 0, 0);
    await writeTree(path.join(survivalDir, "Muldraugh"), { "players.db": "one", "map/chunk.bin": "map-data" });
    await writeTree(path.join(survivalDir, "Riverside"), { "players.db": "two" });
    await setMtime(path.join(survivalDir, "Muldraugh", "players.db"), utc(2024, 7, 1, 9, 59, 30));
    await setMtime(path.join(survivalDir, "Riverside", "players.db"), utc(2024, 6, 1));
    discovery = new WorldDiscovery(savesRoot, { keyFiles: ["players.db"], windowMs: 60_000 });
    repository = new BackupRepository(backupsRoot);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it("describes worlds with their activity and backup totals", async () => {
    const service = createService();
    const { backup } = await service.createBackup("Survival~Riverside");

    const worlds = await service.describeWorlds();

    expect(worlds.map((world) => [world.id, world.active, world.backupCount])).toEqual([
      ["Survival~Muldraugh", true, 0],
      ["Survival~Riverside", false, 1]
    ]);
    expect(worlds[1].backupBytes).toBe(backup.sizeBytes);
  });

  it("runs retention after each backup", async () => {
    const service = createService(1, 1);

    const first = await service.createBackup("Survival~Riverside");
    clock = utc(2024, 7, 1, 11, 0, 0);
    const second = await service.createBackup("Survival~Riverside");

    expect(first.eviction.deleted).toEqual([]);
    expect(second.eviction.deleted.map((backup) => backup.name)).toEqual(["Survival~Riverside_20240701-100000.zip"]);
    expect(second.eviction.budgetStillExceeded).toBe(true);
    expect((await service.listBackups("Survival~Riverside")).map((backup) => backup.name)).toEqual([
      "Survival~Riverside_20240701-110000.zip"
    ]);
  });

  it("serialises concurrent backups of the same world", async () => {
    const service = createService();

    const results = await Promise.all([service.createBackup("Survival~Riverside"), service.createBackup("Survival~Riverside")]);

    expect(results.map((result) => result.backup.name)).toEqual([
      "Survival~Riverside_20240701-100000.zip",
      "Survival~Riverside_20240701-100000_02.zip"
    ]);
  });

  it("raises NotFoundError for a world that does not exist", async () => {
    await expect(createService().createBackup("Nowhere")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("refuses to restore over a world that is being played", async () => {
    const service = createService();
    const { backup } = await service.createBackup("Survival~Muldraugh");

    await expect(service.restoreBackup("Survival~Muldraugh", backup.name)).rejects.toBeInstanceOf(WorldActiveError);

    const result = await service.restoreBackup("Survival~Muldraugh", backup.name, { allowActive: true });
    expect(result.filesRestored).toBe(2);
  });

  it("restores into a new world directory under the saves root", async () => {
    const service = createService();
    const { backup } = await service.createBackup("Survival~Riverside");

    const result = await service.restoreBackup("Survival~Riverside", backup.name, {
      targetWorldId: "Survival~Riverside copy"
    });

    expect(result.targetDir).toBe(path.join(survivalDir, "Riverside copy"));
    expect(await readTree(result.targetDir)).toEqual(await readTree(path.join(survivalDir, "Riverside")));
    expect((await readdir(survivalDir)).sort()).toEqual(["Muldraugh", "Riverside", "Riverside copy"]);
  });

  it("refuses a restore target without a game mode", async () => {
    const service = createService();
    const { backup } = await service.createBackup("Survival~Riverside");

    await expect(
      service.restoreBackup("Survival~Riverside", backup.name, { targetWorldId: "Riverside copy" })
    ).rejects.toBeInstanceOf(NotFoundError);
    expect((await readdir(survivalDir)).sort()).toEqual(["Muldraugh", "Riverside"]);
  });

  it("deletes backups manually and reports unknown ones", async () => {
    const service = createService();
    const { backup } = await service.createBackup("Survival~Riverside");

    expect(await service.deleteBackup("Survival~Riverside", "Riverside_20200101-000000.zip")).toBe(false);
    expect(await service.deleteBackup("Survival~Riverside", backup.name)).toBe(true);
    expect(await service.listBackups("Survival~Riverside")).toEqual([]);
  });

  it("reports usage against the policy", async () => {
    const service = createService(1, 1);
    const { backup } = await service.createBackup("Survival~Riverside");

    expect(await service.usage()).toEqual({
      aggregateBytes: backup.sizeBytes,
      policy: { maxAggregateBytes: 1, minKeepPerWorld: 1 },
      overBudget: true
    });
  });

  it("keeps a new backup when retention cannot read the inventory", async () => {
    const service = createService(1, 1);
    vi.spyOn(repository, "listAllBackups").mockRejectedValue(new AccessError("Backups root is unreadable", backupsRoot));

    const { backup, eviction } = await service.createBackup("Survival~Riverside");

    expect(backup.name).toBe("Survival~Riverside_20240701-100000.zip");
    expect(eviction.failure).toEqual({ backup: null, code: "ERR_ACCESS", message: "Backups root is unreadable" });
    expect(eviction.deleted).toEqual([]);
    expect(await readdir(path.join(backupsRoot, "Survival~Riverside"))).toEqual([
      "Survival~Riverside_20240701-100000.zip"
    ]);
  });

  it("clears leftovers of interrupted backups and restores", async () => {
    const service = createService();
    await service.createBackup("Survival~Riverside");
    const archiveDir = path.join(backupsRoot, "Survival~Riverside");
    await writeFile(path.join(archiveDir, ".Survival~Riverside_20240701-090000.zip.0123abcd.partial"), "half");
    await mkdir(path.join(survivalDir, ".Riverside.restore-0123abcd"));

    expect(await service.sweepTemporaries()).toEqual({ partialArchives: 1, restoreLeftovers: 1 });
    expect(await readdir(archiveDir)).toEqual(["Survival~Riverside_20240701-100000.zip"]);
    expect((await readdir(survivalDir)).sort()).toEqual(["Muldraugh", "Riverside"]);
  });
});
