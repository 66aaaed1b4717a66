import { resolve } from "node:path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { defineDriver, type DriverDescriptor } from "./descriptor";
import { DefinitionParseError } from "./errors";

const DEFAULT_VERSION = "0.0";
const SKELETON_SUFFIX = "_sk.xml";

const LIST_PATHS = new Set(["driversList.devGroup", "driversList.devGroup.device"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_name, jpath) => LIST_PATHS.has(String(jpath))
});

const DriverElementSchema = z.object({
  "@_name": z.string().min(1, "driver name is required"),
  "#text": z.string().min(1, "driver binary is required")
});

const DeviceSchema = z.object({
  "@_label": z.string().min(1, "device label is required"),
  "@_skel": z.string().optional(),
  driver: DriverElementSchema,
  version: z.string().optional()
});

const DevGroupSchema = z.object({
  "@_group": z.string().min(1, "devGroup group is required"),
  device: z.array(DeviceSchema).default([])
});

const DriversListSchema = z.object({
  driversList: z.union([
    z.literal(""),
    z.object({
      devGroup: z.array(DevGroupSchema).default([])
    })
  ])
});

/**
 * Driver list files end in `.xml`; property skeletons (`*_sk.xml`) share the
 * directory but describe a single device's properties.
 */
export function isDefinitionFile(fileName: string): boolean {
  return fileName.endsWith(".xml") && !fileName.endsWith(SKELETON_SUFFIX);
}

/**
 * Parse one INDI driver list. `directory` resolves relative `skel` paths.
 *
 * @throws DefinitionParseError when the document is not a well-formed driver list
 */
export function parseDriverList(xml: string, file: string, directory: string): DriverDescriptor[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new DefinitionParseError(file, `${msg} (line ${String(line)})`);
  }

  const parsed = DriversListSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new DefinitionParseError(file, `${issue.message}${where}`);
  }

  const list = parsed.data.driversList;
  if (list === "") return [];

  return list.devGroup.flatMap((group) =>
    group.device.map((device) =>
      defineDriver({
        name: device.driver["@_name"],
        label: device["@_label"],
        version: device.version || DEFAULT_VERSION,
        family: group["@_group"],
        binary: device.driver["#text"],
        ...(device["@_skel"] ? { skeletonPath: resolve(directory, device["@_skel"]) } : {})
      })
    )
  );
}
