/**
 * @indi-manager/indi - INDI server supervision and driver catalog
 *
 * @example
 * ```typescript
 * import { DriverRegistry, IndiServerSupervisor } from '@indi-manager/indi';
 *
 * const registry = new DriverRegistry();
 * await registry.load('/usr/share/indi');
 *
 * const supervisor = new IndiServerSupervisor({ configDir: '/home/astro/.indi' });
 * await supervisor.start(7624, [registry.byLabel('CCD Simulator')]);
 * supervisor.scheduleAutoConnect();
 *
 * await supervisor.startDriver(registry.byLabel('Focuser Simulator'));
 * await supervisor.stop();
 * ```
 */

export {
  REMOTE_FAMILY,
  REMOTE_VERSION,
  defineDriver,
  deviceName,
  isRemoteDriver,
  remoteDriver,
  type DriverDescriptor
} from "./descriptor";
export { isDefinitionFile, parseDriverList } from "./definitions";
export { DriverRegistry, type DefinitionLoadReport, type SkippedDefinition } from "./registry";
export {
  FifoControlChannel,
  formatStartDirective,
  formatStopDirective,
  openFifoChannel,
  type ChannelOpener,
  type ControlChannel
} from "./control-channel";
export {
  DEFAULT_CONNECT_TIMEOUT_MS,
  escapeXml,
  formatConnectSwitch,
  sendConnectSwitch,
  type ConnectDevice,
  type ConnectTarget
} from "./auto-connect";
export {
  DEFAULT_DEVICE_SETTLE_MS,
  GET_CONNECTION_PROPERTIES,
  parseConnectionStates,
  queryConnectionStates,
  type DeviceConnection,
  type DeviceQuery,
  type QueryDevices
} from "./devices";
export {
  DEFAULT_AUTOCONNECT_DELAY_MS,
  INDI_FIFO,
  INDI_PORT,
  INDI_SERVER_BIN,
  IndiServerSupervisor,
  type AutoConnectFailure,
  type AutoConnectReport,
  type DeviceServerProcess,
  type SpawnProcess,
  type SupervisorOptions,
  type SupervisorState,
  type SupervisorStatus
} from "./supervisor";
export {
  AlreadyRunningError,
  ChannelUnavailableError,
  ControlDirectiveError,
  DefinitionParseError,
  DriverNotFoundError,
  IndiError,
  NotRunningError,
  StartFailedError,
  describeError,
  type IndiErrorCode
} from "./errors";
export { createLogger, type Logger } from "./logger";
export { SerialExecutor } from "./serial";
