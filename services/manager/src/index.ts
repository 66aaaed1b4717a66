import { fileURLToPath } from "node:url";
import pino from "pino";
import { DriverRegistry, IndiServerSupervisor } from "@indi-manager/indi";
import { loadConfig } from "./config";
import { ManagerService } from "./core/manager";
import { openProfileDatabase } from "./db/connection";
import { ProfileRepository } from "./db/repo";
import { buildServer } from "./server";

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    const logger = pino({ name: "indi-manager", level: config.logLevel });

    const db = openProfileDatabase(config.dbPath, logger);
    const store = new ProfileRepository(db, { defaultPort: config.indiPort });

    const registry = new DriverRegistry(logger);
    try {
      await registry.load(config.xmlDir);
    } catch (error) {
      logger.error({ err: error, xmlDir: config.xmlDir }, "indi-manager: cannot read driver definitions");
    }

    const supervisor = new IndiServerSupervisor({
      fifoPath: config.fifoPath,
      configDir: config.configDir,
      executable: config.serverBin,
      logger
    });
    const manager = new ManagerService({
      store,
      registry,
      supervisor,
      autoConnectDelayMs: config.autoConnectDelayMs,
      logger
    });
    manager.reloadCustomDrivers();

    const server = await buildServer({ logger, manager, store, registry, db });
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        server.log.info({ signal }, "indi-manager: shutting down");
        server.close().catch((error: unknown) => {
          server.log.error({ err: error }, "indi-manager: shutdown failed");
          process.exitCode = 1;
        });
      });
    }

    try {
      await manager.autostart();
    } catch (error) {
      logger.error({ err: error }, "indi-manager: autostart failed");
    }

    await server.listen({ port: config.port, host: config.host });
    server.log.info(`indi-manager listening on ${config.host}:${String(config.port)}`);
  } catch (error) {
    const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
    process.stderr.write(`indi-manager failed to start: ${message}\n`);
    process.exit(1);
  }
}

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  void main();
}
