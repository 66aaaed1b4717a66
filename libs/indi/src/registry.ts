import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { DriverDescriptor } from "./descriptor";
import { DefinitionParseError, DriverNotFoundError, describeError } from "./errors";
import { isDefinitionFile, parseDriverList } from "./definitions";
import { createLogger, type Logger } from "./logger";

export interface SkippedDefinition {
  file: string;
  error: string;
}

export interface DefinitionLoadReport {
  directory: string;
  files: number;
  descriptors: number;
  skipped: SkippedDefinition[];
}

interface Catalog {
  readonly drivers: readonly DriverDescriptor[];
  readonly byLabel: ReadonlyMap<string, DriverDescriptor>;
}

const EMPTY_CATALOG: Catalog = { drivers: [], byLabel: new Map() };

/**
 * Built-in driver catalog plus an overlay of custom drivers. Both are
 * replaced as whole values.
 */
export class DriverRegistry {
  private catalog: Catalog = EMPTY_CATALOG;
  private overlay: ReadonlyMap<string, DriverDescriptor> = new Map();

  constructor(private readonly logger: Logger = createLogger("driver-registry")) {}

  async load(directory: string): Promise<DefinitionLoadReport> {
    const files = (await readdir(directory)).filter(isDefinitionFile).sort();
    const drivers: DriverDescriptor[] = [];
    const byLabel = new Map<string, DriverDescriptor>();
    const skipped: SkippedDefinition[] = [];

    for (const file of files) {
      let parsed: DriverDescriptor[];
      try {
        parsed = await this.readDefinitionFile(directory, file);
      } catch (error) {
        this.logger.warn({ file, err: error }, "driver-registry: skipping definition file");
        skipped.push({ file, error: describeError(error) });
        continue;
      }

      for (const driver of parsed) {
        if (byLabel.has(driver.label)) {
          this.logger.warn({ file, label: driver.label }, "driver-registry: duplicate driver label ignored");
          continue;
        }
        byLabel.set(driver.label, driver);
        drivers.push(driver);
      }
    }

    this.catalog = { drivers, byLabel };
    this.logger.info(
      { directory, files: files.length, drivers: drivers.length, skipped: skipped.length },
      "driver-registry: definitions loaded"
    );
    return { directory, files: files.length, descriptors: drivers.length, skipped };
  }

  loadCustom(descriptors: Iterable<DriverDescriptor>): void {
    const overlay = new Map<string, DriverDescriptor>();
    for (const descriptor of descriptors) {
      overlay.delete(descriptor.label);
      overlay.set(descriptor.label, descriptor);
    }
    this.overlay = overlay;
  }

  clearCustom(): void {
    this.overlay = new Map();
  }

  byLabel(label: string): DriverDescriptor {
    const driver = this.overlay.get(label) ?? this.catalog.byLabel.get(label);
    if (!driver) {
      throw new DriverNotFoundError(label);
    }
    return driver;
  }

  /** Built-ins in load order (minus labels a custom driver overrides), then custom drivers */
  list(): DriverDescriptor[] {
    const { catalog, overlay } = this;
    return [...catalog.drivers.filter((driver) => !overlay.has(driver.label)), ...overlay.values()];
  }

  groupsByFamily(): Map<string, DriverDescriptor[]> {
    const groups = new Map<string, DriverDescriptor[]>();
    for (const driver of this.list()) {
      const members = groups.get(driver.family);
      if (members) {
        members.push(driver);
      } else {
        groups.set(driver.family, [driver]);
      }
    }
    return new Map([...groups.entries()].sort(([a], [b]) => compareNames(a, b)));
  }

  families(): string[] {
    return [...this.groupsByFamily().keys()];
  }

  private async readDefinitionFile(directory: string, file: string): Promise<DriverDescriptor[]> {
    let xml: string;
    try {
      xml = await readFile(join(directory, file), "utf-8");
    } catch (error) {
      throw new DefinitionParseError(file, describeError(error), { cause: error });
    }
    return parseDriverList(xml, file, directory);
  }
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
