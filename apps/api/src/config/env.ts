import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { detectGameDataDir, expandHome } from "./game-paths.js";

const truthyTokens = new Set(["1", "true", "yes", "on"]);
const booleanLike = z
  .string()
  .optional()
  .transform((value) => truthyTokens.has((value ?? "").trim().toLowerCase()));

const optionalPath = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? path.resolve(expandHome(trimmed)) : undefined;
  });

const keyFileList = z
  .string()
  .default("players.db,map_meta.bin,reanimated.bin")
  .transform((value) =>
    value
      .split(/[\n,;]/)
      .map((part) => part.trim())
      .filter(Boolean)
  );

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const rootEnvPath = path.resolve(currentDir, "../../../../.env");
const apiEnvPath = path.resolve(currentDir, "../../.env");
const cwdEnvPath = path.resolve(process.cwd(), ".env");

dotenv.config({ path: rootEnvPath });
dotenv.config({ path: apiEnvPath, override: true });
dotenv.config({ path: cwdEnvPath, override: true });

export const DEFAULT_MAX_AGGREGATE_BYTES = 5 * 2 ** 30;
export const DEFAULT_MIN_KEEP_PER_WORLD = 3;

const schema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  API_PORT: z.coerce.number().int().positive().default(8080),
  GAME_DATA_DIR: optionalPath,
  SAVES_ROOT: optionalPath,
  BACKUPS_ROOT: optionalPath,
  MAX_AGGREGATE_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_AGGREGATE_BYTES),
  MIN_KEEP_PER_WORLD: z.coerce.number().int().nonnegative().default(DEFAULT_MIN_KEEP_PER_WORLD),
  AUTOSAVE_INTERVAL_MINUTES: z.coerce.number().nonnegative().default(10),
  ACTIVE_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  ACTIVE_KEY_FILES: keyFileList,
  WATCH_MODE: booleanLike,
  WATCH_USE_POLLING: booleanLike,
  WATCH_POLLING_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  WATCH_DEBOUNCE_MS: z.coerce.number().int().positive().default(30_000),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  TELEGRAM_THREAD_ID: z.coerce.number().int().positive().optional(),
  TELEGRAM_PROXY_URL: z.string().optional()
});

export type RawEnv = z.infer<typeof schema>;

export type Env = Omit<RawEnv, "GAME_DATA_DIR" | "SAVES_ROOT" | "BACKUPS_ROOT"> & {
  GAME_DATA_DIR: string;
  SAVES_ROOT: string;
  BACKUPS_ROOT: string;
};

export function parseEnv(source: Record<string, string | undefined>, detectDataDir = detectGameDataDir): Env {
  const parsed = schema.safeParse(source);

  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment variables: ${message}`);
  }

  const gameDataDir = parsed.data.GAME_DATA_DIR ?? detectDataDir();
  return {
    ...parsed.data,
    GAME_DATA_DIR: gameDataDir,
    SAVES_ROOT: parsed.data.SAVES_ROOT ?? path.join(gameDataDir, "Saves"),
    BACKUPS_ROOT: parsed.data.BACKUPS_ROOT ?? path.join(gameDataDir, "Backups")
  };
}

export const env = parseEnv(process.env);
