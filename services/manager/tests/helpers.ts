import { EventEmitter } from "node:events";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import pino from "pino";
import {
  DriverRegistry,
  IndiServerSupervisor,
  formatStartDirective,
  formatStopDirective,
  type ConnectTarget,
  type ControlChannel,
  type DeviceConnection,
  type DeviceQuery,
  type DeviceServerProcess,
  type DriverDescriptor,
  type SupervisorOptions
} from "@indi-manager/indi";

export const silentLogger = pino({ level: "silent" });

export const SIMULATORS_XML = `<driversList>
  <devGroup group="Telescopes">
    <device label="Telescope Simulator">
      <driver name="Telescope Simulator">indi_simulator_telescope</driver>
      <version>1.0</version>
    </device>
  </devGroup>
  <devGroup group="CCDs">
    <device label="CCD Simulator">
      <driver name="CCD Simulator">indi_simulator_ccd</driver>
      <version>1.0</version>
    </device>
  </devGroup>
  <devGroup group="Focusers">
    <device label="Focuser Simulator">
      <driver name="Focuser Simulator">indi_simulator_focus</driver>
      <version>1.0</version>
    </device>
  </devGroup>
</driversList>
`;

export async function loadSimulatorRegistry(dir: string): Promise<DriverRegistry> {
  await writeFile(join(dir, "drivers.xml"), SIMULATORS_XML);
  const registry = new DriverRegistry(silentLogger);
  await registry.load(dir);
  return registry;
}

export const SIMULATOR_DEVICES: DeviceConnection[] = [
  { device: "Telescope Simulator", connected: true },
  { device: "CCD Simulator", connected: false }
];

export class FakeProcess extends EventEmitter implements DeviceServerProcess {
  readonly pid = 31337;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly signals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    setImmediate(() => this.exit(null, signal));
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    this.exitCode = code;
    this.signalCode = signal;
    this.emit("exit", code, signal);
  }
}

export class FakeChannel implements ControlChannel {
  readonly lines: string[] = [];

  async startDriver(driver: DriverDescriptor): Promise<void> {
    this.lines.push(formatStartDirective(driver));
  }

  async stopDriver(driver: DriverDescriptor): Promise<void> {
    this.lines.push(formatStopDirective(driver));
  }

  async close(): Promise<void> {}
}

export interface FakeSupervisor {
  supervisor: IndiServerSupervisor;
  processes: FakeProcess[];
  channels: FakeChannel[];
  connects: ConnectTarget[];
  queries: DeviceQuery[];
}

/** Supervisor over an in-memory process, pipe and client port */
export function createFakeSupervisor(configDir: string, overrides: Partial<SupervisorOptions> = {}): FakeSupervisor {
  const processes: FakeProcess[] = [];
  const channels: FakeChannel[] = [];
  const connects: ConnectTarget[] = [];
  const queries: DeviceQuery[] = [];

  const supervisor = new IndiServerSupervisor({
    configDir,
    fifoPath: join(configDir, "indiFIFO"),
    pipePollMs: 5,
    pipeTimeoutMs: 50,
    stopGraceMs: 50,
    spawnProcess: () => {
      const child = new FakeProcess();
      processes.push(child);
      return child;
    },
    openChannel: async () => {
      const channel = new FakeChannel();
      channels.push(channel);
      return channel;
    },
    connectDevice: async (target) => {
      connects.push(target);
    },
    queryDevices: async (query) => {
      queries.push(query);
      return SIMULATOR_DEVICES;
    },
    logger: silentLogger,
    ...overrides
  });

  return { supervisor, processes, channels, connects, queries };
}
