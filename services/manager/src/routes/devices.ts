import type { FastifyInstance } from "fastify";
import type { ManagerService } from "../core/manager";

interface DeviceRouteDeps {
  manager: ManagerService;
}

export function registerDeviceRoutes(app: FastifyInstance, deps: DeviceRouteDeps): void {
  const { manager } = deps;

  app.get("/api/devices", () => manager.listDevices());
}
