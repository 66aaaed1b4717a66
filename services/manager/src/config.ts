import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_AUTOCONNECT_DELAY_MS, INDI_FIFO, INDI_PORT, INDI_SERVER_BIN } from "@indi-manager/indi";

const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_HTTP_PORT = 8624;
const DEFAULT_XML_DIR = "/usr/share/indi";

const PortSchema = z.coerce.number().int().min(1).max(65535);

const EnvSchema = z.object({
  INDI_MANAGER_HOST: z.string().min(1).default(DEFAULT_HOST),
  INDI_MANAGER_PORT: PortSchema.optional(),
  PORT: PortSchema.optional(),
  INDI_PORT: PortSchema.default(INDI_PORT),
  INDI_FIFO: z.string().min(1).default(INDI_FIFO),
  INDI_CONFIG_DIR: z.string().min(1).optional(),
  INDI_XML_DIR: z.string().min(1).default(DEFAULT_XML_DIR),
  INDI_SERVER_BIN: z.string().min(1).default(INDI_SERVER_BIN),
  INDI_MANAGER_DB_PATH: z.string().min(1).optional(),
  INDI_AUTOCONNECT_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_AUTOCONNECT_DELAY_MS),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  HOME: z.string().optional()
});

export interface ManagerConfig {
  host: string;
  port: number;
  /** Device-server port given to new profiles */
  indiPort: number;
  fifoPath: string;
  configDir: string;
  xmlDir: string;
  serverBin: string;
  dbPath: string;
  autoConnectDelayMs: number;
  logLevel: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ManagerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  const vars = parsed.data;
  const configDir = vars.INDI_CONFIG_DIR ?? join(vars.HOME ?? homedir(), ".indi");
  return {
    host: vars.INDI_MANAGER_HOST,
    port: vars.INDI_MANAGER_PORT ?? vars.PORT ?? DEFAULT_HTTP_PORT,
    indiPort: vars.INDI_PORT,
    fifoPath: vars.INDI_FIFO,
    configDir,
    xmlDir: vars.INDI_XML_DIR,
    serverBin: vars.INDI_SERVER_BIN,
    dbPath: vars.INDI_MANAGER_DB_PATH ?? join(configDir, "profiles.db"),
    autoConnectDelayMs: vars.INDI_AUTOCONNECT_DELAY_MS,
    logLevel: vars.LOG_LEVEL
  };
}
