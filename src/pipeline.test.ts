import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { emptyAppNodeConfig } from "./app_node_config.js";
import { loadHmnConnections } from "./hmn_rows.js";
import { silentLogger } from "./logger.js";
import { generateSls, loadInputs, planNetworks, prepareInputs, validateInputs, type SiteInputs } from "./pipeline.js";
import { defaultSiteConfig } from "./site_config.js";

const fixture = (name: string) => fileURLToPath(new URL(`../test/fixtures/${name}`, import.meta.url));

function fixtureInputs(): SiteInputs {
  return loadInputs({
    cabinets: fixture("cabinets.yaml"),
    switches: fixture("switch_metadata.csv"),
    appNodeConfig: fixture("application_node_config.yaml"),
    systemConfig: fixture("system_config.yaml"),
  });
}

describe("loadInputs", () => {
  it("reads every input file", () => {
    const inputs = fixtureInputs();
    expect(inputs.groups.map((g) => [g.kind, g.cabinetDetails.map((d) => d.id)])).toEqual([
      ["river", [3000]],
      ["mountain", [1000]],
    ]);
    expect(inputs.switches.map((s) => s.name)).toEqual(["sw-spine-001", "sw-leaf-bmc-001"]);
    expect(inputs.siteConfig.startingMountainNid).toBe(2000);
    expect(validateInputs(inputs)).toBeUndefined();
  });
});

describe("validateInputs", () => {
  it("lists the problems of every input together", () => {
    const inputs: SiteInputs = {
      groups: [{ kind: "EX9000", cabinets: 1, startingCabinet: 3000, cabinetDetails: [{ id: 3000 }] }],
      switches: [{ xname: "x3000c0w14", name: "sw-x", brand: "Aruba", model: "", type: "Edge" }],
      appNodeConfig: { ...emptyAppNodeConfig(), aliases: { x3000c0s19b0: ["uan01"] } },
      siteConfig: defaultSiteConfig(),
    };
    expect(validateInputs(inputs)?.issues).toEqual([
      "unknown cabinet kind (EX9000)",
      "invalid management switch type: x3000c0w14 Edge",
      "invalid type NodeBMC for Application xname in Aliases map: x3000c0s19b0",
    ]);
    expect(() => prepareInputs(inputs)).toThrow("input validation failed with 3 problems");
  });
});

describe("planNetworks", () => {
  it("reserves the extra management addresses", () => {
    const networks = planNetworks(prepareInputs(fixtureInputs()), silentLogger());
    const boot = networks.HMN.subnets.find((s) => s.name === "bootstrap_dhcp");
    expect(boot?.ipReservations.map((r) => r.name)).toEqual(["mgmt_net_001", "kubeapi-vip"]);
    const cmn = networks.CMN.subnets.find((s) => s.name === "bootstrap_dhcp");
    expect(cmn?.ipReservations.map((r) => r.name)).toEqual(["mgmt_net_001", "kubeapi-vip"]);
  });
});

describe("generateSls", () => {
  const state = generateSls(prepareInputs(fixtureInputs()), loadHmnConnections(fixture("hmn_connections.json")), silentLogger());

  it("combines inferred, liquid-cooled and switch hardware", () => {
    expect(Object.keys(state.Hardware)).toHaveLength(280);
    expect(state.Hardware.x3000c0s1b0n0.ExtraProperties).toEqual({ NID: 100001, Role: "Management", SubRole: "Master", Aliases: ["ncn-m001"] });
    expect(state.Hardware.x3000c0s19b0n0.ExtraProperties).toEqual({ Role: "Application", SubRole: "UAN", Aliases: ["uan01"] });
    expect(state.Hardware.x3000c0w14j19.ExtraProperties).toEqual({ NodeNics: ["x3000c0s19b0"], VendorName: "1/1/19" });
  });

  it("gives switches the addresses reserved for them", () => {
    expect(state.Hardware.x3000c0w14.ExtraProperties).toMatchObject({ IP4Addr: "10.254.0.3", Brand: "Aruba", Model: "6300M" });
    expect(state.Hardware.x3000c0h33s1.ExtraProperties).toEqual({
      IP4Addr: "10.254.0.2",
      Brand: "Aruba",
      Model: "8325",
      Aliases: ["sw-spine-001"],
    });
  });

  it("puts the river cabinet subnets on the cabinet", () => {
    const cn = {
      HMN: { CIDR: "10.107.0.0/22", Gateway: "10.107.0.1", VLan: 1513 },
      NMN: { CIDR: "10.106.0.0/22", Gateway: "10.106.0.1", VLan: 1770 },
    };
    expect(state.Hardware.x3000.ExtraProperties).toEqual({ Networks: { cn, ncn: cn } });
  });

  it("reserves the UAN on the CAN before settling its range", () => {
    const boot = state.Networks.CAN.ExtraProperties.Subnets.find((s) => s.Name === "bootstrap_dhcp");
    expect(boot?.IPReservations?.[3]).toEqual({ Name: "uan01", IPAddress: "10.102.11.5", Comment: "x3000c0s19b0n0" });
    expect([boot?.DHCPStart, boot?.DHCPEnd]).toEqual(["10.102.11.10", "10.102.11.111"]);
  });
});
