import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AlreadyRunningError, DriverNotFoundError, NotRunningError, type DriverRegistry } from "@indi-manager/indi";
import { ManagerService } from "../src/core/manager";
import { ProfileNotFoundError } from "../src/core/errors";
import { openProfileDatabase } from "../src/db/connection";
import { ProfileRepository } from "../src/db/repo";
import { createFakeSupervisor, loadSimulatorRegistry, silentLogger, type FakeSupervisor } from "./helpers";

describe("ManagerService", () => {
  let dir: string;
  let db: Database.Database;
  let store: ProfileRepository;
  let registry: DriverRegistry;
  let fake: FakeSupervisor;
  let manager: ManagerService;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "indi-manager-"));
    db = openProfileDatabase(path.join(dir, "profiles.db"));
    store = new ProfileRepository(db);
    registry = await loadSimulatorRegistry(dir);
    fake = createFakeSupervisor(path.join(dir, "config"));
    manager = new ManagerService({
      store,
      registry,
      supervisor: fake.supervisor,
      autoConnectDelayMs: 10,
      logger: silentLogger
    });
  });

  afterEach(async () => {
    await fake.supervisor.stop();
    db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("startProfile", () => {
    it("starts the Simulators profile on its port", async () => {
      const result = await manager.startProfile("Simulators");

      expect(result).toEqual({
        profile: "Simulators",
        started: true,
        drivers: ["Telescope Simulator", "CCD Simulator", "Focuser Simulator"],
        autoConnectScheduled: false
      });
      expect(fake.channels[0]?.lines).toEqual([
        'start indi_simulator_telescope -n "Telescope Simulator"\n',
        'start indi_simulator_ccd -n "CCD Simulator"\n',
        'start indi_simulator_focus -n "Focuser Simulator"\n'
      ]);
      expect(manager.status()).toEqual({ status: true, activeProfile: "Simulators", state: "running", port: 7624 });
    });

    it("appends one remote driver per endpoint", async () => {
      store.saveProfileDrivers("Simulators", [
        { label: "CCD Simulator" },
        { remote: "Guider@10.0.0.7:7624, Dome@10.0.0.8:7624" }
      ]);

      const result = await manager.startProfile("Simulators");

      expect(result.drivers).toEqual(["CCD Simulator", "Guider@10.0.0.7:7624", "Dome@10.0.0.8:7624"]);
      expect(fake.channels[0]?.lines).toEqual([
        'start indi_simulator_ccd -n "CCD Simulator"\n',
        "start Guider@10.0.0.7:7624\n",
        "start Dome@10.0.0.8:7624\n"
      ]);
    });

    it("starts nothing for a profile without drivers", async () => {
      store.addProfile("Empty");

      const result = await manager.startProfile("Empty");

      expect(result.started).toBe(false);
      expect(fake.processes).toHaveLength(0);
      expect(manager.session.activeProfile).toBe("Empty");
    });

    it("refuses an empty profile while another profile is running", async () => {
      store.addProfile("Empty");
      await manager.startProfile("Simulators");

      await expect(manager.startProfile("Empty")).rejects.toBeInstanceOf(AlreadyRunningError);
      expect(manager.status().activeProfile).toBe("Simulators");
      expect(manager.runningDrivers()).toHaveLength(3);
    });

    it("rejects unknown profiles", async () => {
      await expect(manager.startProfile("Nope")).rejects.toBeInstanceOf(ProfileNotFoundError);
    });

    it("rejects profiles naming unknown drivers without spawning", async () => {
      store.saveProfileDrivers("Simulators", [{ label: "Dome Simulator" }]);

      await expect(manager.startProfile("Simulators")).rejects.toBeInstanceOf(DriverNotFoundError);
      expect(fake.processes).toHaveLength(0);
      expect(manager.session.activeProfile).toBeUndefined();
    });

    it("schedules auto-connect when the profile asks for it", async () => {
      store.updateProfile("Simulators", { autoconnect: true });

      const result = await manager.startProfile("Simulators");

      expect(result.autoConnectScheduled).toBe(true);
      await vi.waitFor(() => {
        expect(fake.connects.map((target) => target.device)).toEqual([
          "Telescope Simulator",
          "CCD Simulator",
          "Focuser Simulator"
        ]);
      });
    });
  });

  it("clears the active profile on stop", async () => {
    await manager.startProfile("Simulators");

    await manager.stopServer();

    expect(manager.status()).toEqual({ status: false, activeProfile: null, state: "stopped" });
    expect(manager.runningDrivers()).toEqual([]);
  });

  it("autostarts the flagged profile", async () => {
    expect(await manager.autostart()).toBeUndefined();

    store.addProfile("Observatory");
    store.saveProfileDrivers("Observatory", [{ label: "Focuser Simulator" }]);
    store.updateProfile("Observatory", { autostart: true, port: 7700 });

    const result = await manager.autostart();

    expect(result?.profile).toBe("Observatory");
    expect(manager.status().port).toBe(7700);
  });

  it("reloads the custom overlay after saving a custom driver", async () => {
    manager.saveCustomDriver({
      label: "CCD Simulator",
      name: "My CCD",
      family: "CCDs",
      exec: "indi_my_ccd",
      version: "2.0"
    });

    expect(registry.byLabel("CCD Simulator").custom).toBe(true);

    await manager.startProfile("Simulators");
    expect(fake.channels[0]?.lines[1]).toBe('start indi_my_ccd -n "CCD Simulator"\n');
  });

  describe("single drivers", () => {
    it("needs a running server", async () => {
      await expect(manager.startDriver("CCD Simulator")).rejects.toBeInstanceOf(NotRunningError);
    });

    it("starts, stops and restarts by label", async () => {
      store.saveProfileDrivers("Simulators", [{ label: "Telescope Simulator" }]);
      await manager.startProfile("Simulators");

      await manager.startDriver("CCD Simulator");
      await manager.restartDriver("CCD Simulator");
      await manager.stopDriver("Telescope Simulator");

      expect(fake.channels[0]?.lines.slice(1)).toEqual([
        'start indi_simulator_ccd -n "CCD Simulator"\n',
        'stop indi_simulator_ccd -n "CCD Simulator"\n',
        'start indi_simulator_ccd -n "CCD Simulator"\n',
        'stop indi_simulator_telescope -n "Telescope Simulator"\n'
      ]);
      expect(manager.runningDrivers().map((driver) => driver.label)).toEqual(["CCD Simulator"]);
    });

    it("starts and stops remote drivers by endpoint", async () => {
      await manager.startProfile("Simulators");

      const started = await manager.startRemoteDriver("Guider@10.0.0.7:7624");
      await manager.stopRemoteDriver("Guider@10.0.0.7:7624");

      expect(started.family).toBe("Remote");
      expect(fake.channels[0]?.lines.slice(3)).toEqual([
        "start Guider@10.0.0.7:7624\n",
        "stop Guider@10.0.0.7:7624\n"
      ]);
    });

    it("reports no running drivers once the device server died", async () => {
      await manager.startProfile("Simulators");

      fake.processes[0]?.exit(1, null);

      expect(manager.runningDrivers()).toEqual([]);
      expect(manager.status().status).toBe(false);
    });
  });

  describe("devices", () => {
    it("lists nothing while the device server is down", async () => {
      expect(await manager.listDevices()).toEqual([]);
      expect(fake.queries).toEqual([]);
    });

    it("queries the running server on its profile port", async () => {
      await manager.startProfile("Simulators");

      const devices = await manager.listDevices();

      expect(devices).toEqual([
        { device: "Telescope Simulator", connected: true },
        { device: "CCD Simulator", connected: false }
      ]);
      expect(fake.queries).toEqual([{ host: "127.0.0.1", port: 7624, timeoutMs: 2000, settleMs: 500 }]);
    });
  });
});
