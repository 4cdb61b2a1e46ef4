import { describe, expect, it } from "vitest";
import { emptyAppNodeConfig } from "./app_node_config.js";
import { TopologyError } from "./errors.js";
import type { HmnRow } from "./hmn_rows.js";
import { parseIp } from "./ipam.js";
import { silentLogger } from "./logger.js";
import { managementSwitchesToSls } from "./sls_convert.js";
import {
  airCooledProblem,
  generateSlsState,
  liquidCooledHardware,
  newNidSequence,
  resolveParents,
  vendorPortName,
  type CabinetTemplate,
  type GeneratorInput,
} from "./sls_state_generator.js";
import type { ManagementSwitch } from "./switches.js";

function template(xname: string, over: Partial<CabinetTemplate>): CabinetTemplate {
  return { xname, class: "River", networks: { cn: {} }, liquidCooledChassis: [], airCooledChassis: [], ...over };
}

function leaf(xname: string, brand: string, n: number): ManagementSwitch {
  return { xname, name: `sw-leaf-bmc-00${n}`, brand, model: "test-model", type: "LeafBMC", managementInterface: parseIp(`10.254.0.${n + 1}`) };
}

function input(switches: ManagementSwitch[] = [leaf("x3000c0w14", "Dell", 1), leaf("x8001c4w22", "Aruba", 2)]): GeneratorInput {
  return {
    appNodeConfig: { ...emptyAppNodeConfig(), aliases: { x8001c4s19b0n0: ["uan01"] } },
    managementSwitches: managementSwitchesToSls(switches),
    riverCabinets: { x3000: template("x3000", { networks: { cn: {}, ncn: {} }, airCooledChassis: [0] }) },
    hillCabinets: {
      x9000: template("x9000", { class: "Hill", model: "EX2000", liquidCooledChassis: [1, 3] }),
      x8001: template("x8001", { class: "Hill", model: "EX2500", liquidCooledChassis: [0], airCooledChassis: [4] }),
    },
    mountainCabinets: { x1000: template("x1000", { class: "Mountain", liquidCooledChassis: [0] }) },
    mountainStartingNid: 1000,
    networks: {},
  };
}

function row(over: Partial<HmnRow>): HmnRow {
  return {
    Source: "",
    SourceRack: "x3000",
    SourceLocation: "u01",
    SourceSubLocation: "",
    SourceParent: "",
    DestinationRack: "x3000",
    DestinationLocation: "u14",
    DestinationPort: "",
    ...over,
  };
}

const ROWS: HmnRow[] = [
  row({ Source: "mn01", SourceLocation: "u01", DestinationPort: "j1" }),
  row({ Source: "nid000001", SourceLocation: "u30", SourceSubLocation: "L", SourceParent: "SubRack-001-CMC" }),
  row({ Source: "nid000002", SourceLocation: "u30", SourceSubLocation: "R", SourceParent: "SubRack-001-CMC" }),
  row({ Source: "SubRack-001-CMC", SourceLocation: "u30", DestinationPort: "j10" }),
  row({ Source: "sw-hsn01", SourceLocation: "u24", DestinationPort: "j2" }),
  row({ Source: "x3000p0", SourceLocation: "", DestinationPort: "j48" }),
  row({ Source: "CoolingDoor", DestinationPort: "j40" }),
  row({ Source: "hsn-switch", DestinationPort: "j41" }),
  row({ Source: "uan01", SourceRack: "x8001", SourceLocation: "u19", DestinationRack: "x8001", DestinationLocation: "u22", DestinationPort: "5" }),
];

describe("generateSlsState", () => {
  const state = generateSlsState(input(), ROWS, silentLogger());
  const hw = state.Hardware;

  it("builds river nodes from management and compute rows", () => {
    expect(hw["x3000c0s1b0n0"]).toEqual({
      Parent: "x3000c0s1b0",
      Xname: "x3000c0s1b0n0",
      Type: "comptype_node",
      Class: "River",
      TypeString: "Node",
      ExtraProperties: { NID: 100001, Role: "Management", SubRole: "Master", Aliases: ["ncn-m001"] },
    });
    expect(hw["x3000c0s30b1n0"].ExtraProperties).toEqual({ NID: 1, Role: "Compute", Aliases: ["nid000001"] });
    expect(hw["x3000c0s30b2n0"].ExtraProperties).toEqual({ NID: 2, Role: "Compute", Aliases: ["nid000002"] });
  });

  it("records the chassis controller of a multi-node enclosure", () => {
    expect(hw["x3000c0s30b999"]).toEqual({
      Parent: "x3000c0s30",
      Xname: "x3000c0s30b999",
      Type: "comptype_ncard",
      Class: "River",
      TypeString: "NodeBMC",
    });
  });

  it("builds router BMCs and PDU controllers", () => {
    expect(hw["x3000c0r24b0"]).toEqual({
      Parent: "x3000c0r24",
      Xname: "x3000c0r24b0",
      Type: "comptype_rtr_bmc",
      Class: "River",
      TypeString: "RouterBMC",
      ExtraProperties: { Username: "vault://hms-creds/x3000c0r24b0", Password: "vault://hms-creds/x3000c0r24b0" },
    });
    expect(hw["x3000m0"]).toEqual({
      Parent: "x3000",
      Xname: "x3000m0",
      Type: "comptype_cab_pdu_controller",
      Class: "River",
      TypeString: "CabinetPDUController",
    });
  });

  it("places application nodes in the air-cooled chassis of an EX2500", () => {
    expect(hw["x8001c4s19b0n0"].ExtraProperties).toEqual({ Role: "Application", SubRole: "UAN", Aliases: ["uan01"] });
  });

  it("connects devices to their management switch ports", () => {
    expect(hw["x3000c0w14j1"]).toEqual({
      Parent: "x3000c0w14",
      Xname: "x3000c0w14j1",
      Type: "comptype_mgmt_switch_connector",
      Class: "River",
      TypeString: "MgmtSwitchConnector",
      ExtraProperties: { NodeNics: ["x3000c0s1b0"], VendorName: "ethernet1/1/1" },
    });
    expect(hw["x3000c0w14j10"].ExtraProperties).toEqual({ NodeNics: ["x3000c0s30b999"], VendorName: "ethernet1/1/10" });
    expect(hw["x3000c0w14j2"].ExtraProperties).toEqual({ NodeNics: ["x3000c0r24b0"], VendorName: "ethernet1/1/2" });
    expect(hw["x3000c0w14j48"].ExtraProperties).toEqual({ NodeNics: ["x3000m0"], VendorName: "ethernet1/1/48" });
    expect(hw["x8001c4w22j5"].ExtraProperties).toEqual({ NodeNics: ["x8001c4s19b0"], VendorName: "1/1/5" });
  });

  it("skips doors and unknown sources", () => {
    expect(hw["x3000c0w14j40"]).toBeUndefined();
    expect(hw["x3000c0w14j41"]).toBeUndefined();
  });

  it("numbers hill nodes before mountain nodes", () => {
    expect(hw["x8001c0s0b0n0"].ExtraProperties).toEqual({ NID: 1000, Role: "Compute", Aliases: ["nid001000"] });
    expect(hw["x9000c1s0b0n0"].ExtraProperties).toEqual({ NID: 1032, Role: "Compute", Aliases: ["nid001032"] });
    expect(hw["x9000c3s0b0n0"].ExtraProperties).toEqual({ NID: 1064, Role: "Compute", Aliases: ["nid001064"] });
    expect(hw["x1000c0s7b1n1"].ExtraProperties).toEqual({ NID: 1127, Role: "Compute", Aliases: ["nid001127"] });
    expect(hw["x1000c0s0b0n0"].Class).toBe("Mountain");
    expect(hw["x9000c1b0"].Parent).toBe("x9000c1");
  });

  it("merges everything into one sorted map", () => {
    expect(Object.keys(hw)).toHaveLength(154);
    expect(Object.keys(hw)[0]).toBe("x1000");
    expect(hw["x3000"].ExtraProperties).toEqual({ Networks: { cn: {}, ncn: {} } });
    expect(hw["x8001"].ExtraProperties).toEqual({ Model: "EX2500", Networks: { cn: {} } });
    expect(hw["x3000c0w14"].TypeString).toBe("MgmtSwitch");
  });

  it("hands out management NIDs in row order", () => {
    const out = generateSlsState(input(), [row({ Source: "wn01", SourceLocation: "u05" }), row({ Source: "sn01", SourceLocation: "u09" })], silentLogger());
    expect(out.Hardware["x3000c0s5b0n0"].ExtraProperties).toEqual({ NID: 100001, Role: "Management", SubRole: "Worker", Aliases: ["ncn-w001"] });
    expect(out.Hardware["x3000c0s9b0n0"].ExtraProperties).toEqual({ NID: 100002, Role: "Management", SubRole: "Storage", Aliases: ["ncn-s001"] });
  });
});

describe("generateSlsState failures", () => {
  const run = (rows: HmnRow[], switches?: ManagementSwitch[]) => () => generateSlsState(input(switches), rows, silentLogger());

  it("refuses air-cooled rows outside river-capable cabinets", () => {
    expect(run([row({ Source: "mn01", SourceRack: "x9000" })])).toThrow("hill cabinet (non EX2500) x9000 cannot contain air-cooled hardware");
    expect(run([row({ Source: "mn01", SourceRack: "x1000" })])).toThrow("mountain cabinet x1000 cannot contain air-cooled hardware");
    expect(run([row({ Source: "mn01", SourceRack: "x4000" })])).toThrow("unknown cabinet x4000");
  });

  it("needs the destination switch in the inventory", () => {
    expect(run([row({ Source: "mn01", DestinationLocation: "u20", DestinationPort: "j1" })])).toThrow(
      "Failed to find switch x3000c0w20 for connector x3000c0w20j1 of x3000c0s1b0 in the management switch inventory",
    );
  });

  it("cannot name ports on Mellanox switches", () => {
    expect(run([row({ Source: "mn01", DestinationPort: "j1" })], [leaf("x3000c0w14", "Mellanox", 1)])).toThrow(TopologyError);
  });

  it("needs every named parent row", () => {
    expect(run([row({ Source: "nid000005", SourceParent: "SubRack-009-CMC" })])).toThrow(
      "failed to find a row for parent SubRack-009-CMC of nid000005",
    );
  });

  it("checks the cabinet of each river switch", () => {
    expect(run([], [leaf("x1000c0w14", "Dell", 1)])).toThrow(
      "cabinet x1000 of management switch x1000c0w14 cannot hold it: mountain cabinet x1000 cannot contain air-cooled hardware",
    );
  });
});

describe("helpers", () => {
  it("names switch ports by brand", () => {
    expect(vendorPortName("Dell", 7, "x3000c0w14")).toBe("ethernet1/1/7");
    expect(vendorPortName("Aruba", 7, "x3000c0w14")).toBe("1/1/7");
    expect(() => vendorPortName("", 7, "x3000c0w14")).toThrow("Management Switch brand not provided for switch x3000c0w14");
    expect(() => vendorPortName("Acme", 7, "x3000c0w14")).toThrow("Unknown Management Switch brand Acme found for switch x3000c0w14");
  });

  it("explains why a cabinet cannot hold air-cooled hardware", () => {
    const i = input();
    expect(airCooledProblem(i, "x3000")).toBeUndefined();
    expect(airCooledProblem(i, "x8001")).toBeUndefined();
    i.hillCabinets.x8001.airCooledChassis = [];
    expect(airCooledProblem(i, "x8001")).toBe("hill cabinet (EX2500) x8001 does not contain any air-cooled chassis");
  });

  it("resolves parent U numbers without regard to case", () => {
    const parents = resolveParents([
      row({ Source: "nid000001", SourceParent: "subrack-002-cmc" }),
      row({ Source: "SubRack-002-CMC", SourceLocation: "U07" }),
    ]);
    expect([...parents]).toEqual([["subrack-002-cmc", 7]]);
  });

  it("fills a liquid-cooled chassis with 32 nodes", () => {
    const nids = newNidSequence(5);
    const out = liquidCooledHardware(template("x1001", { class: "Mountain", liquidCooledChassis: [2] }), nids);
    expect(out.map((h) => h.Xname).slice(0, 4)).toEqual(["x1001", "x1001c2", "x1001c2b0", "x1001c2s0b0n0"]);
    expect(out).toHaveLength(35);
    expect(nids).toEqual({ management: 100001, liquidCooled: 37 });
  });
});
