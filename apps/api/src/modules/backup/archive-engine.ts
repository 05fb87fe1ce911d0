import { randomUUID } from "node:crypto";
import { createWriteStream } from "node:fs";
import { mkdir, readdir, rename, rm, stat } from "node:fs/promises";
import path from "node:path";
import { Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import archiver from "archiver";
import CRC32 from "crc-32";
import { Open } from "unzipper";
import {
  AccessError,
  BackupError,
  CorruptArchiveError,
  IOError,
  SourceMissingError,
  errnoCode,
  errorMessage
} from "../../core/errors.js";
import type { BackupRecord, Logger, World } from "../../core/types.js";
import { temporaryArchiveName } from "./archive-naming.js";
import type { BackupRepository } from "./repository/backup-repository.js";

type ZipDirectory = Awaited<ReturnType<typeof Open.file>>;
type ZipEntry = ZipDirectory["files"][number];

export interface RestoreResult {
  targetDir: string;
  filesRestored: number;
  bytesRestored: number;
}

const STAGING_DIR_PATTERN = /^\.(.+)\.restore-[0-9a-f]{8}$/;
const ASIDE_DIR_PATTERN = /^\.(.+)\.previous-[0-9a-f]{8}$/;

export interface ArchiveEngineOptions {
  now?: () => Date;
  logger?: Logger;
}

export class ArchiveEngine {
  private readonly now: () => Date;
  private readonly logger?: Logger;

  constructor(
    private readonly repository: BackupRepository,
    options: ArchiveEngineOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  /**
   * Zips the whole world directory into a hidden temporary file next to its final
   * location and renames it into place once the archive is complete.
   */
  async createBackup(world: World): Promise<BackupRecord> {
    const sourceStat = await stat(world.path).catch(() => null);
    if (!sourceStat?.isDirectory()) {
      throw new SourceMissingError(`World directory is missing: ${world.path}`, world.path);
    }

    const finalPath = await this.repository.reserveArchivePath(world.id, this.now());
    const tempPath = path.join(
      path.dirname(finalPath),
      temporaryArchiveName(path.basename(finalPath), randomUUID().slice(0, 8))
    );

    try {
      const files = await collectFiles(world.path);
      await writeZip(world.path, files, tempPath);
      await rename(tempPath, finalPath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger?.error({ archive: tempPath, err: cleanupError }, "Failed to remove temporary archive");
      });
      throw await classifyCreateError(error, world, finalPath);
    }

    const backup = await this.repository.readBackup(world.id, finalPath);
    this.logger?.info({ worldId: world.id, archive: backup.name, sizeBytes: backup.sizeBytes }, "Backup created");
    return backup;
  }

  /**
   * Replaces the target directory with the archive contents. Extraction goes to a staging
   * directory first, so a corrupt archive never touches the target.
   */
  async restoreBackup(backup: BackupRecord, targetWorldDir: string): Promise<RestoreResult> {
    const target = path.resolve(targetWorldDir);
    const archiveStat = await stat(backup.path).catch(() => null);
    if (!archiveStat?.isFile()) {
      throw new AccessError(`Backup archive is missing: ${backup.path}`, backup.path);
    }

    const entries = await readEntries(backup.path);
    const parent = path.dirname(target);
    const token = randomUUID().slice(0, 8);
    const stagingDir = path.join(parent, `.${path.basename(target)}.restore-${token}`);
    const asideDir = path.join(parent, `.${path.basename(target)}.previous-${token}`);

    let filesRestored = 0;
    let bytesRestored = 0;
    try {
      await mkdir(stagingDir, { recursive: true });
      for (const entry of entries) {
        const destination = resolveEntryPath(stagingDir, entry.path, backup.path);
        if (entry.type === "Directory") {
          await mkdir(destination, { recursive: true });
          continue;
        }
        bytesRestored += await extractEntry(entry, destination, backup.path);
        filesRestored += 1;
      }
    } catch (error) {
      await rm(stagingDir, { recursive: true, force: true });
      if (error instanceof BackupError) throw error;
      throw new IOError(`Cannot extract ${backup.name}: ${errorMessage(error)}`, stagingDir, { cause: error });
    }

    const hadTarget = (await stat(target).catch(() => null)) !== null;
    if (hadTarget) {
      try {
        await rename(target, asideDir);
      } catch (error) {
        await rm(stagingDir, { recursive: true, force: true });
        throw new IOError(`Cannot replace ${target}: ${errorMessage(error)}`, target, { cause: error });
      }
    }

    try {
      await rename(stagingDir, target);
    } catch (error) {
      const rolledBack = hadTarget ? await rename(asideDir, target).then(() => true, () => false) : true;
      await rm(stagingDir, { recursive: true, force: true });
      throw new IOError(
        rolledBack
          ? `Cannot restore into ${target}: ${errorMessage(error)}`
          : `Cannot restore into ${target}; previous contents were left at ${asideDir}`,
        target,
        { cause: error, partiallyApplied: rolledBack ? "none" : "target-moved-aside" }
      );
    }

    if (hadTarget) {
      await rm(asideDir, { recursive: true, force: true }).catch((cleanupError: unknown) => {
        this.logger?.warn({ asideDir, err: cleanupError }, "Restored, but the previous world copy could not be removed");
      });
    }

    this.logger?.info({ worldId: backup.worldId, archive: backup.name, target, filesRestored }, "Backup restored");
    return { targetDir: target, filesRestored, bytesRestored };
  }

  /**
   * Removes staging directories a crashed restore left in `parentDir`. A previous world
   * copy is removed only when the world it was moved aside from is back in place;
   * otherwise it is the last copy of that world and stays.
   */
  async sweepRestoreLeftovers(parentDir: string): Promise<number> {
    let names: string[];
    try {
      names = await readdir(parentDir);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return 0;
      throw new AccessError(`Cannot read ${parentDir}`, parentDir, { cause: error });
    }

    let removed = 0;
    for (const name of names) {
      const leftover = path.join(parentDir, name);
      const aside = ASIDE_DIR_PATTERN.exec(name);
      if (aside) {
        const worldStat = await stat(path.join(parentDir, aside[1])).catch(() => null);
        if (!worldStat?.isDirectory()) {
          this.logger?.warn({ leftover }, "Keeping previous world copy; its world directory is missing");
          continue;
        }
      } else if (!STAGING_DIR_PATTERN.test(name)) {
        continue;
      }

      try {
        await rm(leftover, { recursive: true, force: true });
      } catch (error) {
        throw new IOError(`Cannot remove ${leftover}: ${errorMessage(error)}`, leftover, { cause: error });
      }
      this.logger?.info({ leftover }, "Removed restore leftover");
      removed += 1;
    }
    return removed;
  }
}

function toPosixPath(input: string): string {
  return input.split(path.sep).join(path.posix.sep);
}

async function collectFiles(rootPath: string): Promise<string[]> {
  const out: string[] = [];

  async function walk(currentPath: string) {
    const entries = await readdir(currentPath, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile()) {
        out.push(toPosixPath(path.relative(rootPath, fullPath)));
      }
    }
  }

  await walk(rootPath);
  return out.sort();
}

function writeZip(sourceRoot: string, relativePaths: string[], outputPath: string): Promise<void> {
  return new Promise<void>((resolvePromise, reject) => {
    const output = createWriteStream(outputPath, { flags: "wx" });
    const archive = archiver("zip");
    let settled = false;

    const fail = (error: unknown) => {
      if (settled) return;
      settled = true;
      archive.abort();
      output.destroy();
      reject(error);
    };

    output.on("close", () => {
      if (settled) return;
      settled = true;
      resolvePromise();
    });
    output.on("error", fail);
    // archiver reports files it could not stat as warnings; a vanished file must fail the backup.
    archive.on("warning", fail);
    archive.on("error", fail);

    archive.pipe(output);
    for (const relativePath of relativePaths) {
      archive.file(path.join(sourceRoot, ...relativePath.split("/")), { name: relativePath });
    }
    archive.finalize().catch(fail);
  });
}

async function classifyCreateError(error: unknown, world: World, finalPath: string): Promise<BackupError> {
  if (error instanceof BackupError) return error;

  const worldStillThere = (await stat(world.path).catch(() => null))?.isDirectory() ?? false;
  if (!worldStillThere) {
    return new SourceMissingError(`World directory disappeared during backup: ${world.path}`, world.path, {
      cause: error
    });
  }
  if (errnoCode(error) === "ENOENT") {
    return new SourceMissingError(`A world file disappeared during backup: ${errorMessage(error)}`, world.path, {
      cause: error
    });
  }
  return new IOError(`Cannot write backup ${path.basename(finalPath)}: ${errorMessage(error)}`, finalPath, {
    cause: error
  });
}

async function readEntries(archivePath: string): Promise<ZipEntry[]> {
  try {
    const directory = await Open.file(archivePath);
    return directory.files;
  } catch (error) {
    throw new CorruptArchiveError(`Archive cannot be read: ${errorMessage(error)}`, archivePath, { cause: error });
  }
}

function resolveEntryPath(stagingDir: string, entryName: string, archivePath: string): string {
  const normalized = path.posix.normalize(entryName.replaceAll("\\", "/"));
  const unsafe =
    entryName.includes("\0") ||
    path.posix.isAbsolute(normalized) ||
    /^[A-Za-z]:/.test(normalized) ||
    normalized === ".." ||
    normalized.startsWith("../");
  const resolved = path.resolve(stagingDir, ...normalized.split("/"));

  if (unsafe || !resolved.startsWith(`${stagingDir}${path.sep}`)) {
    throw new CorruptArchiveError(`Unsafe entry name in archive: ${entryName}`, archivePath);
  }
  return resolved;
}

async function extractEntry(entry: ZipEntry, destination: string, archivePath: string): Promise<number> {
  await mkdir(path.dirname(destination), { recursive: true });

  let readError: unknown = null;
  let written = 0;
  let checksum = 0;
  const source = entry.stream();
  source.once("error", (error: unknown) => {
    readError = error;
  });
  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      written += chunk.length;
      checksum = CRC32.buf(chunk, checksum);
      callback(null, chunk);
    }
  });

  try {
    await pipeline(source, counter, createWriteStream(destination));
  } catch (error) {
    if (readError !== null) {
      throw new CorruptArchiveError(`Entry ${entry.path} is unreadable: ${errorMessage(readError)}`, archivePath, {
        cause: readError
      });
    }
    throw new IOError(`Cannot write ${destination}: ${errorMessage(error)}`, destination, { cause: error });
  }

  if (written !== entry.uncompressedSize) {
    throw new CorruptArchiveError(
      `Entry ${entry.path} is truncated (${written} of ${entry.uncompressedSize} bytes)`,
      archivePath
    );
  }
  // crc-32 returns a signed 32-bit value; the archive stores it unsigned.
  if (checksum >>> 0 !== entry.crc32) {
    throw new CorruptArchiveError(`Entry ${entry.path} fails its CRC-32 check`, archivePath);
  }
  return written;
}
