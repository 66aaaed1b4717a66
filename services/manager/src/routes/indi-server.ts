import type { FastifyInstance, FastifyRequest } from "fastify";
import type { ManagerService } from "../core/manager";

interface ServerRouteDeps {
  manager: ManagerService;
}

export function registerServerRoutes(app: FastifyInstance, deps: ServerRouteDeps): void {
  const { manager } = deps;

  app.get("/api/server/status", () => manager.status());

  app.get("/api/server/drivers", () => manager.runningDrivers());

  app.post("/api/server/start/:profile", async (request: FastifyRequest<{ Params: { profile: string } }>) => {
    const result = await manager.startProfile(request.params.profile);
    return { ...result, server: manager.status() };
  });

  app.post("/api/server/stop", async () => {
    await manager.stopServer();
    return { stopped: true };
  });

  app.post("/api/server/autoconnect", () => manager.autoConnect());
}
