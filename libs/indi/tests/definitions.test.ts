import { describe, expect, it } from "vitest";
import { isDefinitionFile, parseDriverList } from "../src/definitions";
import { DefinitionParseError } from "../src/errors";

describe("isDefinitionFile", () => {
  it("accepts driver lists and ignores skeletons and other files", () => {
    expect(isDefinitionFile("drivers.xml")).toBe(true);
    expect(isDefinitionFile("indi_eqmod_sk.xml")).toBe(false);
    expect(isDefinitionFile("drivers.xml.bak")).toBe(false);
    expect(isDefinitionFile("README")).toBe(false);
  });
});

describe("parseDriverList", () => {
  it("maps every device of every group to a descriptor", () => {
    const xml = `<driversList>
      <devGroup group="Focusers">
        <device label="Focuser A">
          <driver name="Focuser A">indi_focuser_a</driver>
          <version>0.3</version>
        </device>
        <device label="Focuser B" skel="b_sk.xml">
          <driver name="Focuser B Driver">indi_focuser_b</driver>
          <version>1.1</version>
        </device>
      </devGroup>
      <devGroup group="Weather">
        <device label="Weather Sim">
          <driver name="Weather Sim">indi_simulator_weather</driver>
        </device>
      </devGroup>
    </driversList>`;

    expect(parseDriverList(xml, "drivers.xml", "/opt/indi")).toEqual([
      { name: "Focuser A", label: "Focuser A", version: "0.3", family: "Focusers", binary: "indi_focuser_a" },
      {
        name: "Focuser B Driver",
        label: "Focuser B",
        version: "1.1",
        family: "Focusers",
        binary: "indi_focuser_b",
        skeletonPath: "/opt/indi/b_sk.xml"
      },
      { name: "Weather Sim", label: "Weather Sim", version: "0.0", family: "Weather", binary: "indi_simulator_weather" }
    ]);
  });

  it("keeps absolute skeleton paths as given", () => {
    const xml = `<driversList><devGroup group="Domes">
      <device label="Dome" skel="/etc/indi/dome_sk.xml"><driver name="Dome">indi_dome</driver></device>
    </devGroup></driversList>`;

    expect(parseDriverList(xml, "domes.xml", "/opt/indi")[0]?.skeletonPath).toBe("/etc/indi/dome_sk.xml");
  });

  it("returns nothing for an empty list or an empty group", () => {
    expect(parseDriverList("<driversList/>", "empty.xml", "/opt/indi")).toEqual([]);
    expect(parseDriverList(`<driversList><devGroup group="CCDs"/></driversList>`, "g.xml", "/opt/indi")).toEqual([]);
  });

  it("rejects documents that are not well-formed", () => {
    expect(() => parseDriverList("<driversList><devGroup>", "broken.xml", "/opt/indi")).toThrow(
      DefinitionParseError
    );
  });

  it("rejects devices without a driver binary", () => {
    const xml = `<driversList><devGroup group="CCDs">
      <device label="Empty"><driver name="Empty"></driver></device>
    </devGroup></driversList>`;

    expect(() => parseDriverList(xml, "empty-driver.xml", "/opt/indi")).toThrow(DefinitionParseError);
  });

  it("names the file in the error", () => {
    expect(() => parseDriverList("<catalog/>", "catalog.xml", "/opt/indi")).toThrow(
      /Invalid driver definition file catalog\.xml/
    );
  });
});
