import { constants } from "node:fs";
import { open, type FileHandle } from "node:fs/promises";
import { isRemoteDriver, type DriverDescriptor } from "./descriptor";
import { ChannelUnavailableError, ControlDirectiveError, describeError } from "./errors";

/**
 * One-way command sink of a running device server. A resolved write means
 * the directive reached the pipe, not that the driver started.
 */
export interface ControlChannel {
  startDriver(driver: DriverDescriptor): Promise<void>;
  stopDriver(driver: DriverDescriptor): Promise<void>;
  close(): Promise<void>;
}

export type ChannelOpener = (fifoPath: string) => Promise<ControlChannel>;

const UNSAFE_CHARACTERS = /["\r\n]/;

function quoted(field: string, value: string): string {
  if (UNSAFE_CHARACTERS.test(value)) {
    throw new ControlDirectiveError(field, value);
  }
  return `"${value}"`;
}

function bare(field: string, value: string): string {
  if (UNSAFE_CHARACTERS.test(value) || /\s/.test(value) || value.length === 0) {
    throw new ControlDirectiveError(field, value);
  }
  return value;
}

/**
 * `start <binary> [-n "<label>"] [-s "<skeleton>"]`. Remote endpoints carry
 * their own device name, so they are started without `-n`.
 */
export function formatStartDirective(driver: DriverDescriptor): string {
  let line = `start ${bare("binary", driver.binary)}`;
  if (!isRemoteDriver(driver)) {
    line += ` -n ${quoted("label", driver.label)}`;
  }
  if (driver.skeletonPath) {
    line += ` -s ${quoted("skeletonPath", driver.skeletonPath)}`;
  }
  return `${line}\n`;
}

/** `stop <binary> [-n "<label>"]`, with `-n` left out for remote endpoints. */
export function formatStopDirective(driver: DriverDescriptor): string {
  let line = `stop ${bare("binary", driver.binary)}`;
  if (!isRemoteDriver(driver)) {
    line += ` -n ${quoted("label", driver.label)}`;
  }
  return `${line}\n`;
}

export class FifoControlChannel implements ControlChannel {
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    readonly path: string
  ) {}

  /**
   * Opens the pipe without blocking: a FIFO nobody reads yet fails with
   * ENXIO instead of parking a libuv thread.
   */
  static async open(path: string): Promise<FifoControlChannel> {
    try {
      const handle = await open(path, constants.O_WRONLY | constants.O_NONBLOCK);
      return new FifoControlChannel(handle, path);
    } catch (error) {
      const reason = isErrnoException(error) && error.code === "ENXIO" ? "no reader attached" : describeError(error);
      throw new ChannelUnavailableError(path, reason, { cause: error });
    }
  }

  async startDriver(driver: DriverDescriptor): Promise<void> {
    await this.write(formatStartDirective(driver));
  }

  async stopDriver(driver: DriverDescriptor): Promise<void> {
    await this.write(formatStopDirective(driver));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }

  private async write(line: string): Promise<void> {
    if (this.closed) {
      throw new ChannelUnavailableError(this.path, "channel closed");
    }
    await this.handle.write(line);
  }
}

export const openFifoChannel: ChannelOpener = (fifoPath) => FifoControlChannel.open(fifoPath);

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
