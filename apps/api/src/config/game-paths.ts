import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";

export interface HostInfo {
  platform: NodeJS.Platform;
  homeDir: string;
  exists: (candidate: string) => boolean;
}

const currentHost: HostInfo = {
  platform: process.platform,
  homeDir: os.homedir(),
  exists: existsSync
};

/**
 * Best-effort location of the game's data directory. macOS and Linux prefer the
 * platform data directory when the game has created it, otherwise `~/Zomboid`.
 */
export function detectGameDataDir(host: HostInfo = currentHost): string {
  const fallback = path.join(host.homeDir, "Zomboid");

  if (host.platform === "win32") {
    return fallback;
  }

  const preferred =
    host.platform === "darwin"
      ? path.join(host.homeDir, "Library", "Application Support", "Zomboid")
      : path.join(host.homeDir, ".local", "share", "Zomboid");

  return host.exists(preferred) ? preferred : fallback;
}

export function expandHome(input: string, homeDir: string = os.homedir()): string {
  if (input === "~") return homeDir;
  if (input.startsWith("~/")) return path.join(homeDir, input.slice(2));
  return input;
}
