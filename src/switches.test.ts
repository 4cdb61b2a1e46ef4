import { describe, expect, it } from "vitest";
import {
  normalizeSwitch,
  parseSwitchCsv,
  switchXnamesByType,
  validateSwitch,
  validateSwitches,
  type ManagementSwitch,
} from "./switches.js";

function sw(xname: string, type: string): ManagementSwitch {
  return { xname, name: "", brand: "Aruba", model: "", type };
}

const CSV = [
  "Switch Xname,Type,Brand,Model",
  "x3000c0w22,Leaf,Aruba,8325",
  "x3000c0h33s1,Spine,Aruba,8325",
  "x3000c0h34s1,Spine,Aruba,8325",
  "x3000c0w14,LeafBMC,Dell,S3048-ON",
  "d0w1,CDU,Dell,S4148T-ON",
  "",
].join("\n");

describe("parseSwitchCsv", () => {
  it("reads rows and names switches per type", () => {
    const switches = parseSwitchCsv(CSV);
    expect(switches.map((s) => s.name)).toEqual(["sw-leaf-001", "sw-spine-001", "sw-spine-002", "sw-leaf-bmc-001", "sw-cdu-001"]);
    expect(switches[3]).toEqual({ xname: "x3000c0w14", name: "sw-leaf-bmc-001", brand: "Dell", model: "S3048-ON", type: "LeafBMC" });
  });

  it("tolerates padded headers and a missing model column", () => {
    const switches = parseSwitchCsv(" Switch Xname , Type , Brand \nx3000c0w22 , Leaf , Aruba\n");
    expect(switches).toEqual([{ xname: "x3000c0w22", name: "sw-leaf-001", brand: "Aruba", model: "", type: "Leaf" }]);
  });

  it("groups xnames by type in input order", () => {
    expect(switchXnamesByType(parseSwitchCsv(CSV), "Spine")).toEqual(["x3000c0h33s1", "x3000c0h34s1"]);
  });
});

describe("validateSwitch", () => {
  it("accepts each type on its xname format", () => {
    expect(validateSwitch(sw("x3000c0w22", "Leaf"))).toBeUndefined();
    expect(validateSwitch(sw("x3000c0w14", "LeafBMC"))).toBeUndefined();
    expect(validateSwitch(sw("x3000c0h33s1", "Aggregation"))).toBeUndefined();
    expect(validateSwitch(sw("d0w1", "CDU"))).toBeUndefined();
    expect(validateSwitch(sw("x3000c0h35s1", "CDU"))).toBeUndefined();
  });

  it("reports the first problem found", () => {
    expect(validateSwitch(sw("x3000c0w", "Leaf"))?.message).toBe("invalid xname for Switch: x3000c0w");
    expect(validateSwitch(sw("x3000c0w22", "Core"))?.message).toBe("invalid management switch type: x3000c0w22 Core");
    expect(validateSwitch(sw("x3000c0h33s1", "Leaf"))?.message).toBe(
      "invalid xname used for Leaf switch: x3000c0h33s1,  should use xXcCwW format",
    );
    expect(validateSwitch(sw("x3000c0w22", "Spine"))?.message).toBe(
      "invalid xname used for Spine/Aggregation switch: x3000c0w22, should use xXcChHsS format",
    );
    expect(validateSwitch(sw("x3000c0w22", "CDU"))?.message).toMatch(/^invalid xname used for CDU switch: x3000c0w22, should use dDwW format/);
  });

  it("aggregates problems across the file", () => {
    expect(validateSwitches([])?.message).toBe("unable to extract Switches from switch metadata csv");
    const err = validateSwitches([sw("x3000c0w22", "Leaf"), sw("bogus", "Leaf"), sw("d0w1", "Spine")]);
    expect(err?.issues).toEqual([
      "invalid xname for Switch: bogus",
      "invalid xname used for Spine/Aggregation switch: d0w1, should use xXcChHsS format",
    ]);
  });
});

describe("normalizeSwitch", () => {
  it("strips leading zeros without touching the input", () => {
    const input = sw("X03000c0W022", "Leaf");
    expect(normalizeSwitch(input).xname).toBe("x3000c0w22");
    expect(input.xname).toBe("X03000c0W022");
  });
});
