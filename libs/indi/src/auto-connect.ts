import { createConnection } from "node:net";

export const DEFAULT_CONNECT_TIMEOUT_MS = 2000;

export interface ConnectTarget {
  host: string;
  port: number;
  device: string;
  timeoutMs: number;
}

export type ConnectDevice = (target: ConnectTarget) => Promise<void>;

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;"
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

export function formatConnectSwitch(device: string): string {
  return (
    `<newSwitchVector device="${escapeXml(device)}" name="CONNECTION">` +
    `<oneSwitch name="CONNECT">On</oneSwitch>` +
    `</newSwitchVector>\n`
  );
}

/**
 * Asks the device server to connect one device. The socket is half-closed
 * after the write; the promise settles when the server closes its side or
 * the socket stays idle for `timeoutMs`.
 */
export async function sendConnectSwitch(target: ConnectTarget): Promise<void> {
  const { host, port, device, timeoutMs } = target;
  await new Promise<void>((resolve, reject) => {
    const socket = createConnection({ host, port });
    socket.setTimeout(timeoutMs, () => {
      socket.destroy(new Error(`connection to ${host}:${String(port)} timed out after ${String(timeoutMs)}ms`));
    });
    socket.once("error", reject);
    socket.once("connect", () => {
      socket.end(formatConnectSwitch(device));
    });
    socket.once("close", (hadError: boolean) => {
      if (!hadError) resolve();
    });
  });
}
