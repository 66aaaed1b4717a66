import type { FastifyInstance } from "fastify";
import type { SystemInfo } from "../core/info";

interface InfoRouteDeps {
  info: SystemInfo;
}

export function registerInfoRoutes(app: FastifyInstance, deps: InfoRouteDeps): void {
  const { info } = deps;

  app.get("/api/info/version", async () => ({ version: await info.version() }));

  // Bare text.
  app.get("/api/info/arch", () => info.arch());

  app.get("/api/info/hostname", () => ({ hostname: info.hostname() }));
}
