import path from "node:path";
import { fileURLToPath } from "node:url";
import type { FastifyBaseLogger } from "fastify";
import { buildApp } from "./app.js";
import { env } from "./config/env.js";
import { BackupService } from "./modules/backup/backup-service.js";
import { BackupRepository } from "./modules/backup/repository/backup-repository.js";
import { TelegramService } from "./modules/notification/telegram-service.js";
import { AutosaveScheduler } from "./modules/scheduler/autosave-scheduler.js";
import { WorldDiscovery } from "./modules/world/world-discovery.js";

const currentDir = path.dirname(fileURLToPath(import.meta.url));

function createRuntime(logger: FastifyBaseLogger) {
  const discovery = new WorldDiscovery(
    env.SAVES_ROOT,
    { keyFiles: env.ACTIVE_KEY_FILES, windowMs: env.ACTIVE_WINDOW_MS },
    logger
  );
  const repository = new BackupRepository(env.BACKUPS_ROOT, logger);
  const service = new BackupService({
    discovery,
    repository,
    policy: {
      maxAggregateBytes: env.MAX_AGGREGATE_BYTES,
      minKeepPerWorld: env.MIN_KEEP_PER_WORLD
    },
    logger
  });
  const notifier = new TelegramService({
    botToken: env.TELEGRAM_BOT_TOKEN,
    chatId: env.TELEGRAM_CHAT_ID,
    threadId: env.TELEGRAM_THREAD_ID,
    proxyUrl: env.TELEGRAM_PROXY_URL
  });
  const scheduler = new AutosaveScheduler({
    service,
    discovery,
    intervalMs: env.AUTOSAVE_INTERVAL_MINUTES * 60_000,
    watch: {
      enabled: env.WATCH_MODE,
      usePolling: env.WATCH_USE_POLLING,
      pollingIntervalMs: env.WATCH_POLLING_INTERVAL_MS,
      debounceMs: env.WATCH_DEBOUNCE_MS
    },
    notifier,
    logger
  });
  return { service, scheduler };
}

const started: { scheduler?: AutosaveScheduler; service?: BackupService } = {};
const app = await buildApp({
  createService: (logger) => {
    const runtime = createRuntime(logger);
    started.scheduler = runtime.scheduler;
    started.service = runtime.service;
    return runtime.service;
  },
  publicRoot: path.resolve(currentDir, "../public")
});

app.addHook("onClose", async () => {
  await started.scheduler?.stop();
});

try {
  await app.listen({ port: env.API_PORT, host: "0.0.0.0" });
  const swept = await started.service?.sweepTemporaries().catch((error: unknown) => {
    app.log.error({ err: error }, "Failed to clear leftovers of interrupted runs");
    return null;
  });
  if (swept && swept.partialArchives + swept.restoreLeftovers > 0) {
    app.log.info(swept, "Cleared leftovers of interrupted runs");
  }
  started.scheduler?.start();
  app.log.info(
    { savesRoot: env.SAVES_ROOT, backupsRoot: env.BACKUPS_ROOT, maxAggregateBytes: env.MAX_AGGREGATE_BYTES },
    "Backup service ready"
  );
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
