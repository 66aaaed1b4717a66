import type Database from "better-sqlite3";
import { INDI_PORT, defineDriver, type DriverDescriptor } from "@indi-manager/indi";
import { ProfileNotFoundError } from "../core/errors";

interface ProfileRow {
  id: number;
  name: string;
  port: number;
  autostart: number;
  autoconnect: number;
}

interface CustomRow {
  label: string;
  name: string;
  family: string;
  exec: string;
  version: string;
}

export interface ProfileRecord {
  id: number;
  name: string;
  port: number;
  autostart: boolean;
  autoconnect: boolean;
}

export interface ProfileUpdate {
  port?: number;
  autostart?: boolean;
  autoconnect?: boolean;
}

export interface RemoteDrivers {
  /** Comma-separated `device@host:port` endpoints */
  drivers: string;
}

export type ProfileDriverEntry = { label: string } | { remote: string };

export interface CustomDriverInput {
  label: string;
  name: string;
  family: string;
  exec: string;
  version: string;
}

export interface ProfileStore {
  listProfiles(): ProfileRecord[];
  getProfile(name: string): ProfileRecord | undefined;
  addProfile(name: string): ProfileRecord;
  deleteProfile(name: string): boolean;
  updateProfile(name: string, update: ProfileUpdate): ProfileRecord;
  getProfileDriverLabels(name: string): Array<{ label: string }>;
  getProfileRemoteDrivers(name: string): RemoteDrivers | undefined;
  saveProfileDrivers(name: string, entries: readonly ProfileDriverEntry[]): void;
  getCustomDrivers(): DriverDescriptor[];
  saveCustomDriver(input: CustomDriverInput): DriverDescriptor;
}

export interface ProfileRepositoryOptions {
  /** Port given to profiles created without one */
  defaultPort?: number;
}

export class ProfileRepository implements ProfileStore {
  private readonly defaultPort: number;

  constructor(
    private readonly db: Database.Database,
    options: ProfileRepositoryOptions = {}
  ) {
    this.defaultPort = options.defaultPort ?? INDI_PORT;
  }

  listProfiles(): ProfileRecord[] {
    return this.db
      .prepare<[], ProfileRow>(`SELECT id, name, port, autostart, autoconnect FROM profile ORDER BY id`)
      .all()
      .map(mapProfile);
  }

  getProfile(name: string): ProfileRecord | undefined {
    const row = this.getProfileRow(name);
    return row ? mapProfile(row) : undefined;
  }

  /** Idempotent: an existing profile is returned unchanged. */
  addProfile(name: string): ProfileRecord {
    this.db.prepare<[string, number]>(`INSERT OR IGNORE INTO profile (name, port) VALUES (?, ?)`).run(name, this.defaultPort);
    return mapProfile(this.requireProfileRow(name));
  }

  deleteProfile(name: string): boolean {
    const result = this.db.prepare<[string]>(`DELETE FROM profile WHERE name = ?`).run(name);
    return result.changes > 0;
  }

  /**
   * Updates only the given fields. Flagging a profile `autostart` clears the
   * flag on every other profile.
   */
  updateProfile(name: string, update: ProfileUpdate): ProfileRecord {
    const apply = this.db.transaction((changes: ProfileUpdate) => {
      const current = this.requireProfileRow(name);
      const port = changes.port ?? current.port;
      const autostart = changes.autostart ?? current.autostart === 1;
      const autoconnect = changes.autoconnect ?? current.autoconnect === 1;

      if (autostart) {
        this.db.prepare<[number]>(`UPDATE profile SET autostart = 0 WHERE id != ?`).run(current.id);
      }
      this.db
        .prepare<[number, number, number, number]>(
          `UPDATE profile SET port = ?, autostart = ?, autoconnect = ? WHERE id = ?`
        )
        .run(port, autostart ? 1 : 0, autoconnect ? 1 : 0, current.id);
      return mapProfile(this.requireProfileRow(name));
    });
    return apply(update);
  }

  getProfileDriverLabels(name: string): Array<{ label: string }> {
    return this.db
      .prepare<[string], { label: string }>(
        `SELECT driver.label AS label FROM driver
         JOIN profile ON profile.id = driver.profile
         WHERE profile.name = ?
         ORDER BY driver.id`
      )
      .all(name);
  }

  getProfileRemoteDrivers(name: string): RemoteDrivers | undefined {
    return this.db
      .prepare<[string], RemoteDrivers>(
        `SELECT remote.drivers AS drivers FROM remote
         JOIN profile ON profile.id = remote.profile
         WHERE profile.name = ?
         ORDER BY remote.id
         LIMIT 1`
      )
      .get(name);
  }

  /**
   * Replaces the profile's driver list. Remote entries are merged into one
   * comma-separated row.
   */
  saveProfileDrivers(name: string, entries: readonly ProfileDriverEntry[]): void {
    const save = this.db.transaction((items: readonly ProfileDriverEntry[]) => {
      const { id } = this.requireProfileRow(name);
      this.db.prepare<[number]>(`DELETE FROM driver WHERE profile = ?`).run(id);
      this.db.prepare<[number]>(`DELETE FROM remote WHERE profile = ?`).run(id);

      const insertDriver = this.db.prepare<[string, number]>(`INSERT INTO driver (label, profile) VALUES (?, ?)`);
      const remotes: string[] = [];
      for (const entry of items) {
        if ("label" in entry) {
          insertDriver.run(entry.label, id);
        } else {
          remotes.push(entry.remote);
        }
      }
      if (remotes.length > 0) {
        this.db
          .prepare<[string, number]>(`INSERT INTO remote (drivers, profile) VALUES (?, ?)`)
          .run(remotes.join(","), id);
      }
    });
    save(entries);
  }

  getCustomDrivers(): DriverDescriptor[] {
    return this.db
      .prepare<[], CustomRow>(`SELECT label, name, family, exec, version FROM custom ORDER BY id`)
      .all()
      .map(mapCustom);
  }

  /** Insert or replace by label */
  saveCustomDriver(input: CustomDriverInput): DriverDescriptor {
    this.db
      .prepare<[string, string, string, string, string]>(
        `INSERT OR REPLACE INTO custom (label, name, family, exec, version) VALUES (?, ?, ?, ?, ?)`
      )
      .run(input.label, input.name, input.family, input.exec, input.version);
    return mapCustom(input);
  }

  private getProfileRow(name: string): ProfileRow | undefined {
    return this.db
      .prepare<[string], ProfileRow>(`SELECT id, name, port, autostart, autoconnect FROM profile WHERE name = ?`)
      .get(name);
  }

  private requireProfileRow(name: string): ProfileRow {
    const row = this.getProfileRow(name);
    if (!row) {
      throw new ProfileNotFoundError(name);
    }
    return row;
  }
}

function mapProfile(row: ProfileRow): ProfileRecord {
  return {
    id: row.id,
    name: row.name,
    port: row.port,
    autostart: row.autostart === 1,
    autoconnect: row.autoconnect === 1
  };
}

function mapCustom(row: CustomRow): DriverDescriptor {
  return defineDriver({
    name: row.name,
    label: row.label,
    version: row.version,
    family: row.family,
    binary: row.exec,
    custom: true
  });
}
