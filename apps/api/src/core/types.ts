import type { FastifyBaseLogger } from "fastify";
import type { TimestampSource } from "@worldvault/shared";

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export interface FileEntry {
  path: string;
  size: number;
  modifiedAt: Date;
}

export interface World {
  /** `<mode>~<name>`, unique across game modes. */
  id: string;
  name: string;
  /** Game mode directory the save lives in, e.g. `Survival` or `Sandbox`. */
  mode: string;
  path: string;
}

export interface BackupRecord {
  worldId: string;
  name: string;
  path: string;
  sizeBytes: number;
  createdAt: Date;
  timestampSource: TimestampSource;
}
