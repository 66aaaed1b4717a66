import { createConnection } from "node:net";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";

export const DEFAULT_DEVICE_SETTLE_MS = 500;

export const GET_CONNECTION_PROPERTIES = '<getProperties version="1.7" name="CONNECTION"/>\n';

export interface DeviceConnection {
  device: string;
  connected: boolean;
}

export interface DeviceQuery {
  host: string;
  port: number;
  /** Connect timeout */
  timeoutMs: number;
  /** The reply is complete once the server stays quiet this long */
  settleMs: number;
}

export type QueryDevices = (query: DeviceQuery) => Promise<DeviceConnection[]>;

const SWITCH_VECTOR = /<(def|set)SwitchVector\b[\s\S]*?<\/\1SwitchVector>/g;

const LIST_PATHS = new Set(["defSwitchVector.defSwitch", "setSwitchVector.oneSwitch"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_name, jpath) => LIST_PATHS.has(String(jpath))
});

const SwitchSchema = z.object({
  "@_name": z.string(),
  "#text": z.string().default("")
});

const VectorAttributes = {
  "@_device": z.string().min(1),
  "@_name": z.string()
};

const SwitchVectorSchema = z.union([
  z.object({
    defSwitchVector: z.object({ ...VectorAttributes, defSwitch: z.array(SwitchSchema).default([]) })
  }),
  z.object({
    setSwitchVector: z.object({ ...VectorAttributes, oneSwitch: z.array(SwitchSchema).default([]) })
  })
]);

type Switch = z.infer<typeof SwitchSchema>;

function connectionState(switches: readonly Switch[]): boolean | undefined {
  const connect = switches.find((item) => item["@_name"] === "CONNECT");
  if (connect) return connect["#text"] === "On";
  const disconnect = switches.find((item) => item["@_name"] === "DISCONNECT");
  if (disconnect) return disconnect["#text"] !== "On";
  return undefined;
}

/**
 * Folds `CONNECTION` switch vectors from a device server reply into one
 * entry per device, in first-seen order. Later `set` updates override the
 * definition; incomplete or unrelated elements are ignored.
 */
export function parseConnectionStates(xml: string): DeviceConnection[] {
  const devices = new Map<string, boolean>();

  for (const [element] of xml.matchAll(SWITCH_VECTOR)) {
    if (XMLValidator.validate(element) !== true) continue;
    const parsed = SwitchVectorSchema.safeParse(parser.parse(element));
    if (!parsed.success) continue;

    const vector =
      "defSwitchVector" in parsed.data
        ? { ...parsed.data.defSwitchVector, switches: parsed.data.defSwitchVector.defSwitch }
        : { ...parsed.data.setSwitchVector, switches: parsed.data.setSwitchVector.oneSwitch };
    if (vector["@_name"] !== "CONNECTION") continue;

    const connected = connectionState(vector.switches);
    const device = vector["@_device"];
    devices.set(device, connected ?? devices.get(device) ?? false);
  }

  return [...devices].map(([device, connected]) => ({ device, connected }));
}

/**
 * Asks the device server for every `CONNECTION` property and collects the
 * replies until the socket has been idle for `settleMs` or the server hangs
 * up. The device server never ends the stream on its own.
 */
export async function queryConnectionStates(query: DeviceQuery): Promise<DeviceConnection[]> {
  const { host, port, timeoutMs, settleMs } = query;
  const received = await new Promise<string>((resolve, reject) => {
    let buffer = "";
    let connected = false;
    const socket = createConnection({ host, port });
    socket.setEncoding("utf-8");
    socket.setTimeout(timeoutMs);

    socket.on("timeout", () => {
      if (!connected) {
        socket.destroy(new Error(`connection to ${host}:${String(port)} timed out after ${String(timeoutMs)}ms`));
        return;
      }
      socket.destroy();
    });
    socket.once("error", reject);
    socket.once("connect", () => {
      connected = true;
      socket.setTimeout(settleMs);
      socket.write(GET_CONNECTION_PROPERTIES);
    });
    socket.on("data", (chunk: string) => {
      buffer += chunk;
    });
    socket.once("close", (hadError: boolean) => {
      if (!hadError) resolve(buffer);
    });
  });
  return parseConnectionStates(received);
}
