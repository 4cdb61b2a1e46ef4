import { describe, expect, it } from "vitest";
import { ConfigValidationError } from "./errors.js";
import { defaultSiteConfig, includesCan, includesChn, siteConfigFromFile } from "./site_config.js";

function issues(data: unknown): string[] {
  try {
    siteConfigFromFile(data);
  } catch (e) {
    if (e instanceof ConfigValidationError) return e.issues;
    throw e;
  }
  return [];
}

describe("siteConfigFromFile", () => {
  it("fills every setting from the defaults", () => {
    const c = defaultSiteConfig();
    expect(c.startingMountainNid).toBe(1000);
    expect(c.supernet).toBe(true);
    expect(c.networks.HMN).toEqual({ cidr: "10.254.0.0/17", bootstrapVlan: 4 });
    expect(c.networks.NMN_RVR).toEqual({ cidr: "10.106.0.0/17" });
    expect(c.canStaticPool).toBe("10.102.11.112/28");
    expect(includesCan(c)).toBe(true);
    expect(includesChn(c)).toBe(false);
    expect(c.networks.CHN).toBeUndefined();
    expect(c.cmnExternalDns).toBe("");
  });

  it("reads kebab-case keys", () => {
    const c = siteConfigFromFile({
      "starting-mountain-nid": 2000,
      "management-net-ips": 4,
      "mtl-cidr": "10.1.0.0/16",
      "can-static-pool": "",
      "bican-user-network-name": "CHN",
      "chn-cidr": "10.104.7.0/24",
      "chn-gateway": "10.104.7.1",
    });
    expect([c.startingMountainNid, c.managementNetIps, c.networks.MTL.cidr, c.canStaticPool]).toEqual([2000, 4, "10.1.0.0/16", ""]);
    expect(c.networks.CHN).toEqual({ cidr: "10.104.7.0/24", bootstrapVlan: 5 });
    expect(c.chnGateway).toBe("10.104.7.1");
    expect(includesCan(c)).toBe(false);
    expect(includesChn(c)).toBe(true);
    expect(includesCan({ ...c, retainUnusedUserNetwork: true })).toBe(true);
  });

  it("needs a CIDR and gateway for a CHN user network", () => {
    expect(issues({ "bican-user-network-name": "CHN" })).toEqual([
      "chn-cidr: required when bican-user-network-name is CHN",
      "chn-gateway: required when bican-user-network-name is CHN",
    ]);
    expect(includesChn(siteConfigFromFile({ "retain-unused-user-network": true }))).toBe(false);
  });

  it("rejects bad CIDRs and VLANs", () => {
    expect(() => siteConfigFromFile({ "hmn-cidr": "10.254.0.0" })).toThrow(ConfigValidationError);
    expect(() => siteConfigFromFile({ "nmn-bootstrap-vlan": 5000 })).toThrow(ConfigValidationError);
    expect(() => siteConfigFromFile({ "bican-user-network-name": "XYZ" })).toThrow(ConfigValidationError);
    expect(issues({ "cmn-external-dns": "10.103.6" })).toEqual(["cmn-external-dns: not a valid IPv4 address"]);
  });
});
