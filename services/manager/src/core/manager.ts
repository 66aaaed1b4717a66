import {
  AlreadyRunningError,
  DEFAULT_AUTOCONNECT_DELAY_MS,
  createLogger,
  remoteDriver,
  type AutoConnectReport,
  type DeviceConnection,
  type DriverDescriptor,
  type DriverRegistry,
  type IndiServerSupervisor,
  type Logger,
  type SupervisorState
} from "@indi-manager/indi";
import type { CustomDriverInput, ProfileStore } from "../db/repo";
import { ProfileNotFoundError } from "./errors";

/**
 * Which profile the operator last started. Whether anything is actually
 * running is always asked of the supervisor.
 */
export class ManagerSession {
  private active?: string;

  get activeProfile(): string | undefined {
    return this.active;
  }

  activate(profile: string): void {
    this.active = profile;
  }

  clear(): void {
    this.active = undefined;
  }
}

export interface ServerStatus {
  status: boolean;
  activeProfile: string | null;
  state: SupervisorState;
  port?: number;
}

export interface StartProfileResult {
  profile: string;
  started: boolean;
  drivers: string[];
  autoConnectScheduled: boolean;
}

export interface ManagerServiceOptions {
  store: ProfileStore;
  registry: DriverRegistry;
  supervisor: IndiServerSupervisor;
  session?: ManagerSession;
  autoConnectDelayMs?: number;
  logger?: Logger;
}

export class ManagerService {
  readonly session: ManagerSession;
  private readonly store: ProfileStore;
  private readonly registry: DriverRegistry;
  private readonly supervisor: IndiServerSupervisor;
  private readonly autoConnectDelayMs: number;
  private readonly logger: Logger;

  constructor(options: ManagerServiceOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.supervisor = options.supervisor;
    this.session = options.session ?? new ManagerSession();
    this.autoConnectDelayMs = options.autoConnectDelayMs ?? DEFAULT_AUTOCONNECT_DELAY_MS;
    this.logger = options.logger ?? createLogger("indi-manager");
  }

  /**
   * Profile drivers by label, then one remote descriptor per endpoint.
   * @throws DriverNotFoundError for a label the registry does not know
   */
  resolveProfileDrivers(name: string): DriverDescriptor[] {
    const drivers = this.store.getProfileDriverLabels(name).map(({ label }) => this.registry.byLabel(label));
    const remote = this.store.getProfileRemoteDrivers(name);
    if (remote) {
      for (const endpoint of splitEndpoints(remote.drivers)) {
        drivers.push(remoteDriver(endpoint));
      }
    }
    return drivers;
  }

  async startProfile(name: string): Promise<StartProfileResult> {
    const profile = this.store.getProfile(name);
    if (!profile) {
      throw new ProfileNotFoundError(name);
    }

    const drivers = this.resolveProfileDrivers(name);
    const labels = drivers.map((driver) => driver.label);
    if (drivers.length === 0) {
      const state = this.supervisor.getState();
      if (state === "starting" || state === "stopping" || this.supervisor.isRunning()) {
        throw new AlreadyRunningError(state);
      }
      this.logger.warn({ profile: name }, "indi-manager: profile has no drivers, nothing started");
      this.session.activate(name);
      return { profile: name, started: false, drivers: labels, autoConnectScheduled: false };
    }

    await this.supervisor.start(profile.port, drivers);
    this.session.activate(name);
    if (profile.autoconnect) {
      this.supervisor.scheduleAutoConnect(this.autoConnectDelayMs);
    }
    this.logger.info({ profile: name, port: profile.port, drivers: labels }, "indi-manager: profile started");
    return { profile: name, started: true, drivers: labels, autoConnectScheduled: profile.autoconnect };
  }

  async stopServer(): Promise<void> {
    await this.supervisor.stop();
    this.session.clear();
  }

  /** Boot-time start of the first profile flagged `autostart`. */
  async autostart(): Promise<StartProfileResult | undefined> {
    const profile = this.store.listProfiles().find((candidate) => candidate.autostart);
    if (!profile) return undefined;
    this.logger.info({ profile: profile.name }, "indi-manager: autostarting profile");
    return this.startProfile(profile.name);
  }

  saveCustomDriver(input: CustomDriverInput): DriverDescriptor {
    const saved = this.store.saveCustomDriver(input);
    this.reloadCustomDrivers();
    return saved;
  }

  reloadCustomDrivers(): void {
    this.registry.clearCustom();
    this.registry.loadCustom(this.store.getCustomDrivers());
  }

  async startDriver(label: string): Promise<DriverDescriptor> {
    const driver = this.registry.byLabel(label);
    await this.supervisor.startDriver(driver);
    return driver;
  }

  async stopDriver(label: string): Promise<DriverDescriptor> {
    const driver = this.registry.byLabel(label);
    await this.supervisor.stopDriver(driver);
    return driver;
  }

  async restartDriver(label: string): Promise<DriverDescriptor> {
    const driver = this.registry.byLabel(label);
    await this.supervisor.restartDriver(driver);
    return driver;
  }

  async startRemoteDriver(endpoint: string): Promise<DriverDescriptor> {
    const driver = remoteDriver(endpoint);
    await this.supervisor.startDriver(driver);
    return driver;
  }

  async stopRemoteDriver(endpoint: string): Promise<DriverDescriptor> {
    const driver = remoteDriver(endpoint);
    await this.supervisor.stopDriver(driver);
    return driver;
  }

  autoConnect(): Promise<AutoConnectReport> {
    return this.supervisor.autoConnect();
  }

  /** Devices and their connection state; none while the device server is down. */
  async listDevices(): Promise<DeviceConnection[]> {
    return this.supervisor.isRunning() ? this.supervisor.listDevices() : [];
  }

  status(): ServerStatus {
    const status = this.supervisor.status();
    return {
      status: status.running,
      activeProfile: this.session.activeProfile ?? null,
      state: status.state,
      ...(status.port !== undefined ? { port: status.port } : {})
    };
  }

  /** Drivers this process started, or none when the device server is down. */
  runningDrivers(): DriverDescriptor[] {
    return this.supervisor.isRunning() ? [...this.supervisor.runningDrivers().values()] : [];
  }
}

function splitEndpoints(drivers: string): string[] {
  return drivers
    .split(",")
    .map((endpoint) => endpoint.trim())
    .filter((endpoint) => endpoint.length > 0);
}
