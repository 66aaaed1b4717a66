import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import type { Logger } from "@indi-manager/indi";

const SCHEMA_PATH = fileURLToPath(new URL("./schema.sql", import.meta.url));
const SCHEMA_VERSION = 1;

export const SEED_PROFILE = "Simulators";
export const SEED_DRIVERS = ["Telescope Simulator", "CCD Simulator", "Focuser Simulator"] as const;

export function openProfileDatabase(dbPath: string, logger?: Logger): Database.Database {
  const resolvedPath = path.resolve(dbPath);
  const dir = path.dirname(resolvedPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    logger?.info({ dir }, "profile-db: created database directory");
  }

  let db: Database.Database;
  try {
    db = new Database(resolvedPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`profile-db: failed to open SQLite at ${resolvedPath}: ${message}`, { cause: error });
  }

  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(fs.readFileSync(SCHEMA_PATH, "utf-8"));
  seedDefaults(db, logger);

  logger?.info({ dbPath: resolvedPath }, "profile-db: ready");
  return db;
}

/**
 * First open only: a `Simulators` profile with the simulator trio. Tracked by
 * `user_version`, so deleting the profile later does not bring it back.
 */
function seedDefaults(db: Database.Database, logger?: Logger): void {
  if (db.pragma("user_version", { simple: true }) !== 0) return;

  const insertProfile = db.prepare<[string]>(`INSERT OR IGNORE INTO profile (name) VALUES (?)`);
  const insertDriver = db.prepare<[string, string]>(
    `INSERT INTO driver (label, profile) SELECT ?, id FROM profile WHERE name = ?`
  );

  db.transaction(() => {
    insertProfile.run(SEED_PROFILE);
    for (const label of SEED_DRIVERS) {
      insertDriver.run(label, SEED_PROFILE);
    }
    db.pragma(`user_version = ${String(SCHEMA_VERSION)}`);
  })();

  logger?.info({ profile: SEED_PROFILE }, "profile-db: seeded default profile");
}
