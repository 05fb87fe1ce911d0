import path from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_MAX_AGGREGATE_BYTES, parseEnv } from "../env.js";
import { detectGameDataDir, expandHome } from "../game-paths.js";

const dataDir = path.resolve("/data/Zomboid");

describe("parseEnv", () => {
  it("fills defaults and derives roots from the game data directory", () => {
    const env = parseEnv({}, () => dataDir);

    expect(env.GAME_DATA_DIR).toBe(dataDir);
    expect(env.SAVES_ROOT).toBe(path.join(dataDir, "Saves"));
    expect(env.BACKUPS_ROOT).toBe(path.join(dataDir, "Backups"));
    expect(env.MAX_AGGREGATE_BYTES).toBe(DEFAULT_MAX_AGGREGATE_BYTES);
    expect(env.MAX_AGGREGATE_BYTES).toBe(5368709120);
    expect(env.MIN_KEEP_PER_WORLD).toBe(3);
    expect(env.ACTIVE_KEY_FILES).toEqual(["players.db", "map_meta.bin", "reanimated.bin"]);
    expect(env.WATCH_MODE).toBe(false);
    expect(env.TELEGRAM_THREAD_ID).toBeUndefined();
  });

  it("reads explicit values", () => {
    const env = parseEnv(
      {
        SAVES_ROOT: "/games/saves",
        BACKUPS_ROOT: "/games/backups",
        MAX_AGGREGATE_BYTES: "1048576",
        MIN_KEEP_PER_WORLD: "0",
        ACTIVE_KEY_FILES: "players.db; vehicles.db\nmap_t.bin",
        WATCH_MODE: "Yes",
        TELEGRAM_THREAD_ID: "12"
      },
      () => dataDir
    );

    expect(env.SAVES_ROOT).toBe(path.resolve("/games/saves"));
    expect(env.BACKUPS_ROOT).toBe(path.resolve("/games/backups"));
    expect(env.MAX_AGGREGATE_BYTES).toBe(1048576);
    expect(env.MIN_KEEP_PER_WORLD).toBe(0);
    expect(env.ACTIVE_KEY_FILES).toEqual(["players.db", "vehicles.db", "map_t.bin"]);
    expect(env.WATCH_MODE).toBe(true);
    expect(env.TELEGRAM_THREAD_ID).toBe(12);
  });

  it("rejects invalid numbers", () => {
    expect(() => parseEnv({ MAX_AGGREGATE_BYTES: "-1" }, () => dataDir)).toThrow(
      /^Invalid environment variables: MAX_AGGREGATE_BYTES/
    );
  });
});

describe("game paths", () => {
  const homeDir = path.resolve("/home/player");

  it("prefers the platform data directory when it exists", () => {
    const linux = path.join(homeDir, ".local", "share", "Zomboid");

    expect(detectGameDataDir({ platform: "linux", homeDir, exists: (candidate) => candidate === linux })).toBe(linux);
    expect(detectGameDataDir({ platform: "linux", homeDir, exists: () => false })).toBe(path.join(homeDir, "Zomboid"));
    expect(detectGameDataDir({ platform: "win32", homeDir, exists: () => true })).toBe(path.join(homeDir, "Zomboid"));
  });

  it("expands a leading tilde", () => {
    expect(expandHome("~/saves", homeDir)).toBe(path.join(homeDir, "saves"));
    expect(expandHome("/abs", homeDir)).toBe("/abs");
  });
});
