import type { UsageSummary } from "@worldvault/shared";
import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { BackupService } from "../modules/backup/backup-service.js";
import { toBackupSummary, toEvictionSummary } from "./dto.js";

const policyOverrideSchema = z
  .object({
    maxAggregateBytes: z.number().int().positive().optional(),
    minKeepPerWorld: z.number().int().nonnegative().optional()
  })
  .default({});

export interface RetentionRoutesOptions {
  service: BackupService;
}

export const retentionRoutes: FastifyPluginAsync<RetentionRoutesOptions> = async (app, { service }) => {
  app.get("/usage", async () => {
    const usage: UsageSummary = await service.usage();
    return usage;
  });

  app.get("/retention/preview", async () => {
    const plan = await service.previewEviction();
    return {
      candidates: plan.candidates.map(toBackupSummary),
      aggregateBytes: plan.aggregateBytes,
      projectedAggregateBytes: plan.projectedAggregateBytes,
      budgetStillExceeded: plan.budgetStillExceeded
    };
  });

  app.post("/retention/enforce", async (req) => {
    const override = policyOverrideSchema.parse(req.body ?? {});
    const report = await service.enforce({ ...service.policy, ...override });
    return toEvictionSummary(report);
  });
};
