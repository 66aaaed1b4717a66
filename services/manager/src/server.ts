import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type Database from "better-sqlite3";
import { IndiError, type DriverRegistry, type IndiErrorCode } from "@indi-manager/indi";
import { systemInfo, type SystemInfo } from "./core/info";
import type { ManagerService } from "./core/manager";
import type { ProfileStore } from "./db/repo";
import { registerHealthRoute } from "./routes/health";
import { registerProfileRoutes } from "./routes/profiles";
import { registerServerRoutes } from "./routes/indi-server";
import { registerDriverRoutes } from "./routes/drivers";
import { registerDeviceRoutes } from "./routes/devices";
import { registerInfoRoutes } from "./routes/info";

const STATUS_BY_CODE: Record<IndiErrorCode, number> = {
  DEFINITION_PARSE: 500,
  NOT_FOUND: 404,
  ALREADY_RUNNING: 409,
  NOT_RUNNING: 409,
  CHANNEL_UNAVAILABLE: 503,
  START_FAILED: 500,
  INVALID_DIRECTIVE: 400,
  PROFILE_NOT_FOUND: 404
};

export interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
  manager: ManagerService;
  store: ProfileStore;
  registry: DriverRegistry;
  info?: SystemInfo;
  /** Closed after the device server is stopped on shutdown */
  db?: Database.Database;
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });
  const { manager, store, registry } = options;

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof IndiError) {
      const statusCode = STATUS_BY_CODE[error.code];
      const { code, message, details } = error.toJSON();
      if (statusCode >= 500) {
        request.log.error({ err: error }, "indi-manager: request failed");
      } else {
        request.log.warn({ code, message }, "indi-manager: request rejected");
      }
      return reply.status(statusCode).send({ error: message, code, ...(details ? { details } : {}) });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "indi-manager: unhandled error");
    }
    return reply.status(statusCode).send({ error: error.message });
  });

  registerHealthRoute(app);
  registerProfileRoutes(app, { store, manager });
  registerServerRoutes(app, { manager });
  registerDriverRoutes(app, { registry, manager });
  registerDeviceRoutes(app, { manager });
  registerInfoRoutes(app, { info: options.info ?? systemInfo });

  app.addHook("onClose", async () => {
    try {
      await manager.stopServer();
    } catch (error) {
      app.log.error({ err: error }, "indi-manager: failed stopping INDI server");
    }
    options.db?.close();
  });

  return app;
}
