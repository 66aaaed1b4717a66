import { readFile } from "node:fs/promises";
import os from "node:os";
import { z } from "zod";

const PACKAGE_JSON_URL = new URL("../../package.json", import.meta.url);

const PackageJsonSchema = z.object({ version: z.string() });

const ARCH_ALIASES: Record<string, string> = {
  aarch64: "arm64",
  armv7l: "armhf"
};

export function normalizeArch(machine: string): string {
  return ARCH_ALIASES[machine] ?? machine;
}

export interface SystemInfo {
  version(): Promise<string>;
  arch(): string;
  hostname(): string;
}

export const systemInfo: SystemInfo = {
  async version() {
    const parsed = PackageJsonSchema.parse(JSON.parse(await readFile(PACKAGE_JSON_URL, "utf-8")));
    return parsed.version;
  },
  arch() {
    return normalizeArch(os.machine());
  },
  hostname() {
    return os.hostname();
  }
};
