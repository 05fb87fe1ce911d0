import type { CreateBackupResult } from "@worldvault/shared";
import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { isSafeWorldId } from "../modules/backup/archive-naming.js";
import type { BackupService } from "../modules/backup/backup-service.js";
import { toBackupSummary, toEvictionSummary, toRestoreSummary } from "./dto.js";

const worldIdSchema = z.string().min(1).refine(isSafeWorldId, "Invalid world id");

const worldParamsSchema = z.object({
  worldId: worldIdSchema
});

const backupParamsSchema = z.object({
  worldId: worldIdSchema,
  name: z
    .string()
    .min(1)
    .regex(/^[^\\/\0]+\.zip$/i, "Invalid backup name")
    .refine((value) => !value.startsWith("."), "Invalid backup name")
});

const restoreBodySchema = z
  .object({
    targetWorldId: worldIdSchema.optional()
  })
  .default({});

export interface WorldRoutesOptions {
  service: BackupService;
}

export const worldRoutes: FastifyPluginAsync<WorldRoutesOptions> = async (app, { service }) => {
  app.get("/worlds", async () => {
    return { worlds: await service.describeWorlds() };
  });

  app.get("/worlds/:worldId/backups", async (req) => {
    const { worldId } = worldParamsSchema.parse(req.params);
    const backups = await service.listBackups(worldId);
    return { backups: backups.map(toBackupSummary) };
  });

  app.post("/worlds/:worldId/backups", async (req, reply) => {
    const { worldId } = worldParamsSchema.parse(req.params);
    const { backup, eviction } = await service.createBackup(worldId);
    const body: CreateBackupResult = {
      backup: toBackupSummary(backup),
      eviction: toEvictionSummary(eviction)
    };
    return reply.code(201).send(body);
  });

  app.post("/worlds/:worldId/backups/:name/restore", async (req) => {
    const { worldId, name } = backupParamsSchema.parse(req.params);
    const { targetWorldId } = restoreBodySchema.parse(req.body ?? {});
    const result = await service.restoreBackup(worldId, name, { targetWorldId });
    return toRestoreSummary(targetWorldId ?? worldId, name, result);
  });

  app.delete("/worlds/:worldId/backups/:name", async (req, reply) => {
    const { worldId, name } = backupParamsSchema.parse(req.params);
    await service.deleteBackup(worldId, name);
    return reply.code(204).send();
  });
};
