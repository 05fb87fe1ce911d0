import type { Dirent } from "node:fs";
import { mkdir, readdir, stat, unlink } from "node:fs/promises";
import path from "node:path";
import { AccessError, IOError, NotFoundError, errnoCode } from "../../../core/errors.js";
import type { BackupRecord, FileEntry, Logger } from "../../../core/types.js";
import {
  MAX_COLLISION_SUFFIX,
  buildArchiveName,
  isArchiveFileName,
  isSafeWorldId,
  isTemporaryArchiveName,
  parseArchiveName
} from "../archive-naming.js";
import { compareBackups } from "./ordering.js";

/**
 * Filesystem-backed inventory of backups, one directory per world under the backups root.
 * Nothing is cached: every call rescans the directory, so files removed or copied in by
 * hand are picked up on the next read.
 */
export class BackupRepository {
  constructor(
    private readonly backupsRoot: string,
    private readonly logger?: Logger
  ) {}

  get root(): string {
    return this.backupsRoot;
  }

  worldDir(worldId: string): string {
    if (!isSafeWorldId(worldId)) {
      throw new NotFoundError(`Invalid world id: ${worldId}`);
    }
    return path.join(this.backupsRoot, worldId);
  }

  async ensureWorldDir(worldId: string): Promise<string> {
    const dir = this.worldDir(worldId);
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new IOError(`Cannot create backup directory ${dir}`, dir, { cause: error });
    }
    return dir;
  }

  /** World ids that own a backup directory, including worlds whose save was removed. */
  async listWorldIds(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(this.backupsRoot, { withFileTypes: true });
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return [];
      throw new AccessError(`Backups root is unreadable: ${this.backupsRoot}`, this.backupsRoot, { cause: error });
    }

    return entries
      .filter((entry) => entry.isDirectory() && isSafeWorldId(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  async listBackups(worldId: string): Promise<BackupRecord[]> {
    const files = await this.listArchiveFiles(worldId);
    const backups = files.map((file) => this.toRecord(worldId, file));
    return backups.sort(compareBackups);
  }

  async listAllBackups(): Promise<Map<string, BackupRecord[]>> {
    const out = new Map<string, BackupRecord[]>();
    for (const worldId of await this.listWorldIds()) {
      out.set(worldId, await this.listBackups(worldId));
    }
    return out;
  }

  async aggregateSize(worldIds?: string[]): Promise<number> {
    const ids = worldIds ?? (await this.listWorldIds());
    let total = 0;
    for (const worldId of ids) {
      for (const backup of await this.listBackups(worldId)) {
        total += backup.sizeBytes;
      }
    }
    return total;
  }

  async findBackup(worldId: string, name: string): Promise<BackupRecord> {
    const backups = await this.listBackups(worldId);
    const backup = backups.find((item) => item.name === name);
    if (!backup) {
      throw new NotFoundError(`Backup not found: ${worldId}/${name}`, path.join(this.worldDir(worldId), name));
    }
    return backup;
  }

  /** Removes the archive. A file that is already gone counts as deleted. */
  async delete(backup: BackupRecord): Promise<void> {
    try {
      await unlink(backup.path);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        this.logger?.warn({ archive: backup.path }, "Backup already removed");
        return;
      }
      throw new IOError(`Cannot delete backup ${backup.name}`, backup.path, { cause: error });
    }
  }

  async reserveArchivePath(worldId: string, createdAt: Date): Promise<string> {
    const dir = await this.ensureWorldDir(worldId);

    for (let sequence = 1; sequence <= MAX_COLLISION_SUFFIX; sequence += 1) {
      const candidate = path.join(dir, buildArchiveName(worldId, createdAt, sequence));
      const existing = await stat(candidate).catch(() => null);
      if (!existing) {
        return candidate;
      }
    }
    throw new IOError(`Too many backups of ${worldId} created in the same second`, dir);
  }

  /** Deletes temporary archives an interrupted backup left behind. They never count as backups. */
  async removeStalePartials(): Promise<number> {
    let removed = 0;
    for (const worldId of await this.listWorldIds()) {
      const dir = this.worldDir(worldId);
      const names = await readdir(dir).catch((error: unknown) => {
        throw new AccessError(`Backup directory is unreadable: ${dir}`, dir, { cause: error });
      });
      for (const name of names.filter(isTemporaryArchiveName)) {
        const partialPath = path.join(dir, name);
        try {
          await unlink(partialPath);
        } catch (error) {
          if (errnoCode(error) === "ENOENT") continue;
          throw new IOError(`Cannot remove temporary archive ${name}`, partialPath, { cause: error });
        }
        this.logger?.info({ worldId, archive: partialPath }, "Removed temporary archive");
        removed += 1;
      }
    }
    return removed;
  }

  async readBackup(worldId: string, archivePath: string): Promise<BackupRecord> {
    try {
      const archiveStat = await stat(archivePath);
      return this.toRecord(worldId, {
        path: archivePath,
        size: archiveStat.size,
        modifiedAt: archiveStat.mtime
      });
    } catch (error) {
      throw new NotFoundError(`Backup not found: ${archivePath}`, archivePath, { cause: error });
    }
  }

  private async listArchiveFiles(worldId: string): Promise<FileEntry[]> {
    const dir = this.worldDir(worldId);
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return [];
      throw new AccessError(`Backup directory is unreadable: ${dir}`, dir, { cause: error });
    }

    const out: FileEntry[] = [];
    for (const name of names) {
      if (!isArchiveFileName(name)) continue;

      const absolute = path.join(dir, name);
      const st = await stat(absolute).catch(() => null);
      if (st?.isFile()) {
        out.push({ path: absolute, size: st.size, modifiedAt: st.mtime });
      }
    }
    return out;
  }

  private toRecord(worldId: string, file: FileEntry): BackupRecord {
    const name = path.basename(file.path);
    const parsed = parseArchiveName(name);

    if (parsed && parsed.worldId === worldId) {
      return {
        worldId,
        name,
        path: file.path,
        sizeBytes: file.size,
        createdAt: parsed.createdAt,
        timestampSource: "name"
      };
    }

    this.logger?.warn(
      { worldId, archive: file.path },
      "Archive name carries no timestamp; ordering by modification time"
    );
    return {
      worldId,
      name,
      path: file.path,
      sizeBytes: file.size,
      createdAt: file.modifiedAt,
      timestampSource: "mtime"
    };
  }
}
