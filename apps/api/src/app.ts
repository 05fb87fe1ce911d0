import { existsSync } from "node:fs";
import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import fastifyStatic from "@fastify/static";
import { z } from "zod";
import {
  AccessError,
  BackupError,
  CorruptArchiveError,
  NotFoundError,
  SourceMissingError,
  WorldActiveError
} from "./core/errors.js";
import type { BackupService } from "./modules/backup/backup-service.js";
import { retentionRoutes } from "./routes/retention-routes.js";
import { worldRoutes } from "./routes/world-routes.js";

export interface BuildAppOptions {
  /** Called once with the app's logger, so services log through the same pino instance. */
  createService: (logger: FastifyBaseLogger) => BackupService;
  logger?: FastifyServerOptions["logger"];
  publicRoot?: string;
}

export function statusForError(error: BackupError): number {
  if (error instanceof NotFoundError || error instanceof AccessError) return 404;
  if (error instanceof WorldActiveError || error instanceof SourceMissingError) return 409;
  if (error instanceof CorruptArchiveError) return 422;
  return 500;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });
  const service = options.createService(app.log);
  await app.register(cors, { origin: true });

  const publicRoot = options.publicRoot && existsSync(options.publicRoot) ? options.publicRoot : null;
  if (publicRoot) {
    await app.register(fastifyStatic, {
      root: publicRoot,
      prefix: "/"
    });
  }

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof z.ZodError) {
      return reply.code(400).send({
        message: "Invalid request payload",
        issues: error.issues
      });
    }

    if (error instanceof BackupError) {
      const statusCode = statusForError(error);
      if (statusCode >= 500) {
        req.log.error({ err: error }, "Backup operation failed");
      }
      return reply.code(statusCode).send({ message: error.message, code: error.code });
    }

    const fastifyError = error as { statusCode?: number; code?: string; message?: string };
    if (fastifyError.code === "FST_ERR_CTP_EMPTY_JSON_BODY") {
      return reply.code(400).send({ message: "Body cannot be empty when content-type is set to application/json" });
    }

    const statusCode =
      typeof fastifyError.statusCode === "number" && fastifyError.statusCode >= 400
        ? fastifyError.statusCode
        : 500;
    if (statusCode >= 500) {
      req.log.error({ err: error }, "Unhandled error");
    }
    const message = error instanceof Error ? error.message : "Internal server error";
    return reply.code(statusCode).send({ message });
  });

  app.get("/healthz", async () => ({ ok: true }));

  await app.register(worldRoutes, { prefix: "/api", service });
  await app.register(retentionRoutes, { prefix: "/api", service });

  app.setNotFoundHandler((req, reply) => {
    if (req.raw.url?.startsWith("/api/")) {
      return reply.code(404).send({ message: "Not found" });
    }
    if (publicRoot) {
      return reply.sendFile("index.html");
    }
    return reply.code(404).send({ message: "Not found" });
  });

  return app;
}
