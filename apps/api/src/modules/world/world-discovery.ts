import { constants } from "node:fs";
import { access, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { AccessError, NotFoundError, errnoCode } from "../../core/errors.js";
import type { Logger, World } from "../../core/types.js";
import { isSafeWorldId } from "../backup/archive-naming.js";
import { compareNames } from "../backup/repository/ordering.js";
import { WORLD_ID_SEPARATOR, worldIdFor } from "./world-id.js";

export interface WorldActivityOptions {
  keyFiles: string[];
  windowMs: number;
}

export const DEFAULT_ACTIVITY: WorldActivityOptions = {
  keyFiles: ["players.db", "map_meta.bin", "reanimated.bin"],
  windowMs: 60_000
};

// The game keeps its own backups as directories holding one of these.
const GAME_BACKUP_MARKERS = ["Save.zip", "Save.tar"];

/**
 * Worlds live two levels below the saves root: `<savesRoot>/<mode>/<world>`.
 */
export class WorldDiscovery {
  constructor(
    private readonly savesRoot: string,
    private readonly activity: WorldActivityOptions = DEFAULT_ACTIVITY,
    private readonly logger?: Logger
  ) {}

  get root(): string {
    return this.savesRoot;
  }

  /** Absolute paths of the game mode directories, sorted by name. */
  async listModeDirs(): Promise<string[]> {
    const root = path.resolve(this.savesRoot);
    let names: string[];
    try {
      const rootStat = await stat(root);
      if (!rootStat.isDirectory()) {
        throw new AccessError(`Saves root is not a directory: ${root}`, root);
      }
      names = await readdir(root);
    } catch (error) {
      if (error instanceof AccessError) throw error;
      throw new AccessError(`Saves root is missing or unreadable: ${root}`, root, { cause: error });
    }

    const out: string[] = [];
    for (const name of names.sort(compareNames)) {
      if (!isSafeWorldId(name) || name.includes(WORLD_ID_SEPARATOR)) continue;
      const modePath = path.join(root, name);
      const modeStat = await stat(modePath).catch(() => null);
      if (modeStat?.isDirectory()) {
        out.push(modePath);
      }
    }
    return out;
  }

  async listWorlds(): Promise<World[]> {
    const worlds: World[] = [];
    for (const modePath of await this.listModeDirs()) {
      const mode = path.basename(modePath);
      let names: string[];
      try {
        names = await readdir(modePath);
      } catch (error) {
        this.logger?.warn({ modePath, err: error }, "Skipping unreadable game mode directory");
        continue;
      }

      for (const name of names) {
        if (!isSafeWorldId(name)) continue;

        const worldPath = path.join(modePath, name);
        if (!(await isUsableWorldDir(worldPath))) {
          this.logger?.debug({ worldPath }, "Skipping empty or unreadable world directory");
          continue;
        }
        if (await isGameBackupDir(worldPath)) {
          this.logger?.debug({ worldPath }, "Skipping the game's own backup directory");
          continue;
        }
        worlds.push({ id: worldIdFor(mode, name), name, mode, path: worldPath });
      }
    }
    return worlds.sort((a, b) => compareNames(a.id, b.id));
  }

  async findWorld(worldId: string): Promise<World> {
    const worlds = await this.listWorlds();
    const world = worlds.find((item) => item.id === worldId);
    if (!world) {
      throw new NotFoundError(`World not found: ${worldId}`);
    }
    return world;
  }

  /** A world is being played when one of its key files changed inside the activity window. */
  async isWorldActive(world: World, now: Date = new Date()): Promise<boolean> {
    for (const keyFile of this.activity.keyFiles) {
      const fileStat = await stat(path.join(world.path, keyFile)).catch(() => null);
      if (fileStat && now.getTime() - fileStat.mtimeMs < this.activity.windowMs) {
        return true;
      }
    }
    return false;
  }

  async activeWorlds(worlds: World[], now: Date = new Date()): Promise<World[]> {
    const active: World[] = [];
    for (const world of worlds) {
      if (await this.isWorldActive(world, now)) {
        active.push(world);
      }
    }
    return active;
  }
}

async function isUsableWorldDir(worldPath: string): Promise<boolean> {
  try {
    const worldStat = await stat(worldPath);
    if (!worldStat.isDirectory()) return false;
    await access(worldPath, constants.R_OK | constants.X_OK);
    const entries = await readdir(worldPath);
    return entries.length > 0;
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOENT" || code === "EACCES" || code === "EPERM" || code === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}

async function isGameBackupDir(worldPath: string): Promise<boolean> {
  for (const marker of GAME_BACKUP_MARKERS) {
    if (await stat(path.join(worldPath, marker)).catch(() => null)) {
      return true;
    }
  }
  return false;
}
