import { mkdir, mkdtemp, readdir, readFile, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { buildArchiveName } from "../modules/backup/archive-naming.js";

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(tmpdir(), `worldvault-${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeTree(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, ...relativePath.split("/"));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

/** Every file under `root` keyed by its `/`-separated relative path. */
export async function readTree(root: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};

  async function walk(current: string) {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else {
        out[path.relative(root, full).split(path.sep).join("/")] = (await readFile(full)).toString("base64");
      }
    }
  }

  await walk(root);
  return out;
}

/** Writes a placeholder archive of `sizeBytes` bytes; the repository only reads names and sizes. */
export async function writeFakeArchive(
  backupsRoot: string,
  worldId: string,
  createdAt: Date,
  sizeBytes: number,
  sequence = 1
): Promise<string> {
  const dir = path.join(backupsRoot, worldId);
  await mkdir(dir, { recursive: true });
  const archivePath = path.join(dir, buildArchiveName(worldId, createdAt, sequence));
  await writeFile(archivePath, Buffer.alloc(sizeBytes, 1));
  return archivePath;
}

export async function setMtime(filePath: string, date: Date): Promise<void> {
  await utimes(filePath, date, date);
}

export function utc(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date {
  return new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
}
