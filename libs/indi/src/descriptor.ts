export const REMOTE_FAMILY = "Remote";
export const REMOTE_VERSION = "1.0";

export interface DriverDescriptor {
  readonly name: string;
  /** Unique identity; also the INDI device name the driver is started under */
  readonly label: string;
  readonly version: string;
  readonly family: string;
  /** Executable launched by the device server, or `device@host:port` for remote drivers */
  readonly binary: string;
  /** Property skeleton file passed with `-s` */
  readonly skeletonPath?: string;
  readonly custom?: boolean;
}

export function defineDriver(fields: DriverDescriptor): DriverDescriptor {
  const descriptor: DriverDescriptor = {
    name: fields.name,
    label: fields.label,
    version: fields.version,
    family: fields.family,
    binary: fields.binary,
    ...(fields.skeletonPath !== undefined ? { skeletonPath: fields.skeletonPath } : {}),
    ...(fields.custom !== undefined ? { custom: fields.custom } : {})
  };
  return Object.freeze(descriptor);
}

/**
 * Descriptor for a driver chained from another INDI server. The endpoint
 * doubles as name, label and binary.
 */
export function remoteDriver(endpoint: string): DriverDescriptor {
  return defineDriver({
    name: endpoint,
    label: endpoint,
    version: REMOTE_VERSION,
    family: REMOTE_FAMILY,
    binary: endpoint
  });
}

export function isRemoteDriver(driver: DriverDescriptor): boolean {
  return driver.binary.includes("@");
}

/**
 * Name of the INDI device a running driver exposes on the client port.
 * Remote drivers are addressed by the part of the endpoint before `@`.
 */
export function deviceName(driver: DriverDescriptor): string {
  if (driver.family === REMOTE_FAMILY && isRemoteDriver(driver)) {
    return driver.binary.slice(0, driver.binary.indexOf("@"));
  }
  return driver.label;
}
