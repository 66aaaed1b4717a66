import type { FastifyInstance, FastifyRequest } from "fastify";
import type { DriverDescriptor, DriverRegistry } from "@indi-manager/indi";
import type { ManagerService } from "../core/manager";

interface DriverRouteDeps {
  registry: DriverRegistry;
  manager: ManagerService;
}

type LabelRequest = FastifyRequest<{ Params: { label: string } }>;

type DriverAction = "start" | "stop" | "restart";

/** Directives are fire-and-forget; the response only confirms the write. */
function directiveSent(action: DriverAction, driver: DriverDescriptor) {
  return { label: driver.label, action, result: "directive sent" as const };
}

export function registerDriverRoutes(app: FastifyInstance, deps: DriverRouteDeps): void {
  const { registry, manager } = deps;

  app.get("/api/drivers", () => registry.list());

  app.get("/api/drivers/groups", () => registry.families());

  app.post("/api/drivers/start/:label", async (request: LabelRequest) =>
    directiveSent("start", await manager.startDriver(request.params.label))
  );

  app.post("/api/drivers/stop/:label", async (request: LabelRequest) =>
    directiveSent("stop", await manager.stopDriver(request.params.label))
  );

  app.post("/api/drivers/restart/:label", async (request: LabelRequest) =>
    directiveSent("restart", await manager.restartDriver(request.params.label))
  );

  app.post("/api/drivers/start_remote/:label", async (request: LabelRequest) =>
    directiveSent("start", await manager.startRemoteDriver(request.params.label))
  );

  app.post("/api/drivers/stop_remote/:label", async (request: LabelRequest) =>
    directiveSent("stop", await manager.stopRemoteDriver(request.params.label))
  );
}
