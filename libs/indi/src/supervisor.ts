import { spawn, type SpawnOptions } from "node:child_process";
import { mkdir } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { DEFAULT_CONNECT_TIMEOUT_MS, sendConnectSwitch, type ConnectDevice } from "./auto-connect";
import {
  DEFAULT_DEVICE_SETTLE_MS,
  queryConnectionStates,
  type DeviceConnection,
  type QueryDevices
} from "./devices";
import { openFifoChannel, type ChannelOpener, type ControlChannel } from "./control-channel";
import { deviceName, type DriverDescriptor } from "./descriptor";
import {
  AlreadyRunningError,
  ChannelUnavailableError,
  NotRunningError,
  StartFailedError,
  describeError
} from "./errors";
import { createLogger, type Logger } from "./logger";
import { SerialExecutor } from "./serial";

export const INDI_PORT = 7624;
export const INDI_FIFO = "/tmp/indiFIFO";
export const INDI_SERVER_BIN = "indiserver";
export const DEFAULT_AUTOCONNECT_DELAY_MS = 3000;

const MAX_CLIENT_QUEUE_MB = 1000;

export type SupervisorState = "stopped" | "starting" | "running" | "stopping";

/**
 * The parts of a child process the supervisor relies on; `ChildProcess`
 * satisfies it.
 */
export interface DeviceServerProcess {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stderr?: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type SpawnProcess = (command: string, args: readonly string[], options: SpawnOptions) => DeviceServerProcess;

export interface SupervisorOptions {
  fifoPath?: string;
  configDir: string;
  executable?: string;
  /** Host the auto-connect handshake dials; the device server runs locally */
  clientHost?: string;
  pipeTimeoutMs?: number;
  pipePollMs?: number;
  stopGraceMs?: number;
  connectTimeoutMs?: number;
  spawnProcess?: SpawnProcess;
  openChannel?: ChannelOpener;
  connectDevice?: ConnectDevice;
  queryDevices?: QueryDevices;
  deviceSettleMs?: number;
  logger?: Logger;
}

export interface SupervisorStatus {
  state: SupervisorState;
  running: boolean;
  port?: number;
  pid?: number;
  drivers: string[];
}

export interface AutoConnectFailure {
  label: string;
  error: string;
}

export interface AutoConnectReport {
  attempted: string[];
  failed: AutoConnectFailure[];
}

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

interface ServerSession {
  process: DeviceServerProcess;
  port: number;
  exited: Promise<ProcessExit>;
  exit?: ProcessExit;
  channel?: ControlChannel;
}

const defaultSpawn: SpawnProcess = (command, args, options) => spawn(command, args, options);

/**
 * Owns the indiserver process, its control pipe and the set of drivers this
 * process has commanded. State changes are serialized; the running set is
 * never reconciled against the device server itself.
 */
export class IndiServerSupervisor {
  private state: SupervisorState = "stopped";
  private session?: ServerSession;
  private running = new Map<string, DriverDescriptor>();
  private epoch = 0;
  private autoConnectTimer?: NodeJS.Timeout;
  private readonly serial = new SerialExecutor();

  private readonly fifoPath: string;
  private readonly configDir: string;
  private readonly executable: string;
  private readonly clientHost: string;
  private readonly pipeTimeoutMs: number;
  private readonly pipePollMs: number;
  private readonly stopGraceMs: number;
  private readonly connectTimeoutMs: number;
  private readonly spawnProcess: SpawnProcess;
  private readonly openChannel: ChannelOpener;
  private readonly connectDevice: ConnectDevice;
  private readonly queryDevices: QueryDevices;
  private readonly deviceSettleMs: number;
  private readonly logger: Logger;

  constructor(options: SupervisorOptions) {
    this.fifoPath = options.fifoPath ?? INDI_FIFO;
    this.configDir = options.configDir;
    this.executable = options.executable ?? INDI_SERVER_BIN;
    this.clientHost = options.clientHost ?? "127.0.0.1";
    this.pipeTimeoutMs = options.pipeTimeoutMs ?? 5000;
    this.pipePollMs = options.pipePollMs ?? 100;
    this.stopGraceMs = options.stopGraceMs ?? 5000;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.openChannel = options.openChannel ?? openFifoChannel;
    this.connectDevice = options.connectDevice ?? sendConnectSwitch;
    this.queryDevices = options.queryDevices ?? queryConnectionStates;
    this.deviceSettleMs = options.deviceSettleMs ?? DEFAULT_DEVICE_SETTLE_MS;
    this.logger = options.logger ?? createLogger("indi-supervisor");
  }

  getState(): SupervisorState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === "running" && this.session !== undefined && isAlive(this.session);
  }

  runningDrivers(): Map<string, DriverDescriptor> {
    return new Map(this.running);
  }

  status(): SupervisorStatus {
    const running = this.isRunning();
    const drivers = [...this.running.keys()];
    const session = this.session;
    if (!running || !session) {
      return { state: this.state, running, drivers };
    }
    return { state: this.state, running, port: session.port, pid: session.process.pid, drivers };
  }

  start(
    port: number,
    drivers: readonly DriverDescriptor[],
    configDir: string = this.configDir
  ): Promise<SupervisorStatus> {
    return this.serial.run(async () => {
      this.reapIfDead();
      if (this.state !== "stopped") {
        throw new AlreadyRunningError(this.state);
      }

      this.state = "starting";
      this.epoch += 1;
      this.running = new Map();

      let session: ServerSession | undefined;
      try {
        session = await this.launch(port, configDir);
        this.session = session;
        session.channel = await this.openChannelWhenReady(session);
        for (const driver of drivers) {
          await session.channel.startDriver(driver);
          this.running.set(driver.label, driver);
          this.logger.info({ label: driver.label, binary: driver.binary }, "indi-supervisor: start directive sent");
        }
      } catch (error) {
        this.logger.error({ err: error, port }, "indi-supervisor: start failed, reverting to stopped");
        if (session) {
          await this.teardown(session);
        }
        this.session = undefined;
        this.running = new Map();
        this.state = "stopped";
        throw error instanceof StartFailedError
          ? error
          : new StartFailedError(describeError(error), { cause: error });
      }

      this.state = "running";
      this.logger.info(
        { port, pid: session?.process.pid, drivers: drivers.length },
        "indi-supervisor: INDI server running"
      );
      return this.status();
    });
  }

  stop(): Promise<void> {
    return this.serial.run(async () => {
      this.reapIfDead();
      const session = this.session;
      if (this.state === "stopped" || !session) {
        return;
      }

      this.state = "stopping";
      this.invalidatePendingWork();
      await this.teardown(session);
      this.session = undefined;
      this.running = new Map();
      this.state = "stopped";
      this.logger.info({ port: session.port }, "indi-supervisor: INDI server stopped");
    });
  }

  startDriver(driver: DriverDescriptor): Promise<void> {
    return this.serial.run(async () => {
      const channel = this.requireChannel("start driver");
      await channel.startDriver(driver);
      this.running.set(driver.label, driver);
      this.logger.info({ label: driver.label }, "indi-supervisor: start directive sent");
    });
  }

  stopDriver(driver: DriverDescriptor): Promise<void> {
    return this.serial.run(async () => {
      const channel = this.requireChannel("stop driver");
      await channel.stopDriver(driver);
      this.running.delete(driver.label);
      this.logger.info({ label: driver.label }, "indi-supervisor: stop directive sent");
    });
  }

  async restartDriver(driver: DriverDescriptor): Promise<void> {
    await this.stopDriver(driver);
    await this.startDriver(driver);
  }

  /**
   * Sets `CONNECTION.CONNECT` on every running driver. Failures are logged
   * and reported per driver; the sweep always visits every driver.
   */
  async autoConnect(): Promise<AutoConnectReport> {
    const session = this.session;
    if (!this.isRunning() || !session) {
      throw new NotRunningError("auto-connect drivers");
    }

    const report: AutoConnectReport = { attempted: [], failed: [] };
    for (const driver of [...this.running.values()]) {
      report.attempted.push(driver.label);
      try {
        await this.connectDevice({
          host: this.clientHost,
          port: session.port,
          device: deviceName(driver),
          timeoutMs: this.connectTimeoutMs
        });
        this.logger.info({ label: driver.label }, "indi-supervisor: connect requested");
      } catch (error) {
        this.logger.warn({ label: driver.label, err: error }, "indi-supervisor: auto-connect failed");
        report.failed.push({ label: driver.label, error: describeError(error) });
      }
    }
    return report;
  }

  /** Connection state of every device the running server reports. */
  async listDevices(): Promise<DeviceConnection[]> {
    const session = this.session;
    if (!this.isRunning() || !session) {
      throw new NotRunningError("list devices");
    }
    return this.queryDevices({
      host: this.clientHost,
      port: session.port,
      timeoutMs: this.connectTimeoutMs,
      settleMs: this.deviceSettleMs
    });
  }

  /**
   * Runs `autoConnect` once after `delayMs`, unless the server is stopped or
   * restarted first.
   */
  scheduleAutoConnect(delayMs: number = DEFAULT_AUTOCONNECT_DELAY_MS): void {
    const epoch = this.epoch;
    this.clearAutoConnectTimer();
    this.autoConnectTimer = setTimeout(() => {
      this.autoConnectTimer = undefined;
      if (epoch !== this.epoch || !this.isRunning()) {
        this.logger.debug({ epoch }, "indi-supervisor: skipping stale auto-connect");
        return;
      }
      this.autoConnect().catch((error: unknown) => {
        this.logger.warn({ err: error }, "indi-supervisor: auto-connect sweep failed");
      });
    }, delayMs);
  }

  private async launch(port: number, configDir: string): Promise<ServerSession> {
    await mkdir(configDir, { recursive: true });
    const args = ["-p", String(port), "-m", String(MAX_CLIENT_QUEUE_MB), "-v", "-f", this.fifoPath];
    this.logger.info({ command: this.executable, args, cwd: configDir }, "indi-supervisor: spawning INDI server");

    const child = this.spawnProcess(this.executable, args, {
      cwd: configDir,
      stdio: ["ignore", "ignore", "pipe"]
    });

    let markExited: (exit: ProcessExit) => void = () => undefined;
    const session: ServerSession = {
      process: child,
      port,
      exited: new Promise<ProcessExit>((resolve) => {
        markExited = resolve;
      })
    };
    const onExit = (exit: ProcessExit): void => {
      session.exit ??= exit;
      markExited(session.exit);
    };
    child.once("exit", (code, signal) => onExit({ code, signal }));
    child.on("error", (error) => onExit({ code: null, signal: null, error }));

    if (child.stderr) {
      createInterface({ input: child.stderr }).on("line", (line) => {
        this.logger.debug({ pid: child.pid }, line);
      });
    }
    return session;
  }

  private async openChannelWhenReady(session: ServerSession): Promise<ControlChannel> {
    const deadline = Date.now() + this.pipeTimeoutMs;
    let lastError: ChannelUnavailableError | undefined;

    for (;;) {
      if (!isAlive(session)) {
        throw new StartFailedError(describeExit(session));
      }
      try {
        return await this.openChannel(this.fifoPath);
      } catch (error) {
        if (!(error instanceof ChannelUnavailableError)) throw error;
        lastError = error;
      }
      if (Date.now() >= deadline) {
        throw new StartFailedError(
          `control pipe ${this.fifoPath} did not become available within ${String(this.pipeTimeoutMs)}ms`,
          { cause: lastError }
        );
      }
      await sleep(this.pipePollMs);
    }
  }

  private requireChannel(operation: string): ControlChannel {
    this.reapIfDead();
    const channel = this.session?.channel;
    if (this.state !== "running" || !channel) {
      throw new NotRunningError(operation);
    }
    return channel;
  }

  /**
   * A process that died out-of-band leaves the supervisor in `running`;
   * fold it back to `stopped` before the next state change.
   */
  private reapIfDead(): void {
    const session = this.session;
    if (this.state !== "running" || !session || isAlive(session)) {
      return;
    }
    this.logger.warn({ port: session.port, exit: describeExit(session) }, "indi-supervisor: INDI server exited unexpectedly");
    this.invalidatePendingWork();
    this.closeChannel(session).catch((error: unknown) => {
      this.logger.warn({ err: error }, "indi-supervisor: failed closing control pipe");
    });
    this.session = undefined;
    this.running = new Map();
    this.state = "stopped";
  }

  private invalidatePendingWork(): void {
    this.epoch += 1;
    this.clearAutoConnectTimer();
  }

  private clearAutoConnectTimer(): void {
    if (this.autoConnectTimer) {
      clearTimeout(this.autoConnectTimer);
      this.autoConnectTimer = undefined;
    }
  }

  private async teardown(session: ServerSession): Promise<void> {
    try {
      await this.closeChannel(session);
    } catch (error) {
      this.logger.warn({ err: error }, "indi-supervisor: failed closing control pipe");
    }
    await this.terminate(session);
  }

  private async closeChannel(session: ServerSession): Promise<void> {
    const channel = session.channel;
    session.channel = undefined;
    await channel?.close();
  }

  private async terminate(session: ServerSession): Promise<void> {
    if (!isAlive(session)) return;

    session.process.kill("SIGTERM");
    if (await exitsWithin(session, this.stopGraceMs)) return;

    this.logger.warn(
      { pid: session.process.pid, graceMs: this.stopGraceMs },
      "indi-supervisor: INDI server ignored SIGTERM, sending SIGKILL"
    );
    session.process.kill("SIGKILL");
    if (!(await exitsWithin(session, this.stopGraceMs))) {
      this.logger.error({ pid: session.process.pid }, "indi-supervisor: INDI server did not exit after SIGKILL");
    }
  }
}

function isAlive(session: ServerSession): boolean {
  return session.exit === undefined && session.process.exitCode === null && session.process.signalCode === null;
}

function describeExit(session: ServerSession): string {
  const exit = session.exit;
  if (exit?.error) return `process error: ${exit.error.message}`;
  const code = exit?.code ?? session.process.exitCode;
  const signal = exit?.signal ?? session.process.signalCode;
  if (signal) return `process exited on ${signal}`;
  return `process exited with code ${String(code)}`;
}

async function exitsWithin(session: ServerSession, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([session.exited.then(() => true), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
