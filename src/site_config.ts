import { z } from "zod";
import * as d from "./defaults.js";
import { AllocationError } from "./errors.js";
import { parseCidr, parseIp } from "./ipam.js";
import { loadYaml, parseInput } from "./util.js";

export type NetworkOverride = {
  cidr: string;
  bootstrapVlan?: number;
};

export type SiteConfig = {
  startingMountainNid: number;
  managementNetIps: number;
  supernet: boolean;
  hsnCidr: string;
  canGateway: string;
  canStaticPool: string;
  canDynamicPool: string;
  cmnStaticPool: string;
  cmnDynamicPool: string;
  // Empty leaves the external DNS service out of the CMN static pool.
  cmnExternalDns: string;
  chnGateway: string;
  chnStaticPool: string;
  chnDynamicPool: string;
  // Keyed by network name: HMN, NMN, CMN, CAN, CHN, MTL and the HMN/NMN cabinet variants.
  networks: Record<string, NetworkOverride>;
  retainUnusedUserNetwork: boolean;
  bicanUserNetworkName: "CAN" | "CHN";
};

function parses(parse: (s: string) => unknown, s: string): boolean {
  try {
    parse(s);
    return true;
  } catch (e) {
    if (e instanceof AllocationError) return false;
    throw e;
  }
}

const isCidr = (s: string) => parses(parseCidr, s);

const cidr = (fallback: string) => z.string().default(fallback).refine(isCidr, "not a valid IPv4 CIDR");

// Empty means "not set" for pools.
const optionalCidr = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((s) => s === "" || isCidr(s), "not a valid IPv4 CIDR");

const optionalIp = z
  .string()
  .default("")
  .refine((s) => s === "" || parses(parseIp, s), "not a valid IPv4 address");

const vlan = (fallback: number) => z.number().int().min(0).max(4095).default(fallback);

const siteConfigSchema = z.object({
  "starting-mountain-nid": z.number().int().positive().default(d.DEFAULT_STARTING_MOUNTAIN_NID),
  "management-net-ips": z.number().int().nonnegative().default(0),
  supernet: z.boolean().default(true),
  "hsn-cidr": cidr(d.DEFAULT_HSN_CIDR),
  "hmn-cidr": cidr(d.DEFAULT_HMN_CIDR),
  "nmn-cidr": cidr(d.DEFAULT_NMN_CIDR),
  "hmn-mtn-cidr": cidr(d.DEFAULT_HMN_MTN_CIDR),
  "hmn-rvr-cidr": cidr(d.DEFAULT_HMN_RVR_CIDR),
  "nmn-mtn-cidr": cidr(d.DEFAULT_NMN_MTN_CIDR),
  "nmn-rvr-cidr": cidr(d.DEFAULT_NMN_RVR_CIDR),
  "mtl-cidr": cidr(d.DEFAULT_MTL_CIDR),
  "can-cidr": cidr(d.DEFAULT_CAN_CIDR),
  "can-gateway": optionalIp,
  "can-static-pool": optionalCidr(d.DEFAULT_CAN_STATIC_POOL),
  "can-dynamic-pool": optionalCidr(d.DEFAULT_CAN_DYNAMIC_POOL),
  "cmn-cidr": cidr(d.DEFAULT_CMN_CIDR),
  "cmn-static-pool": optionalCidr(d.DEFAULT_CMN_STATIC_POOL),
  "cmn-dynamic-pool": optionalCidr(d.DEFAULT_CMN_DYNAMIC_POOL),
  "cmn-external-dns": optionalIp,
  "chn-cidr": optionalCidr(""),
  "chn-gateway": optionalIp,
  "chn-static-pool": optionalCidr(""),
  "chn-dynamic-pool": optionalCidr(""),
  "hmn-bootstrap-vlan": vlan(d.DEFAULT_HMN_VLAN),
  "nmn-bootstrap-vlan": vlan(d.DEFAULT_NMN_VLAN),
  "cmn-bootstrap-vlan": vlan(d.DEFAULT_CMN_VLAN),
  "can-bootstrap-vlan": vlan(d.DEFAULT_CAN_VLAN),
  "chn-bootstrap-vlan": vlan(d.DEFAULT_CHN_VLAN),
  "mtl-bootstrap-vlan": vlan(d.DEFAULT_MTL_VLAN),
  "retain-unused-user-network": z.boolean().default(false),
  "bican-user-network-name": z.enum(["CAN", "CHN"]).default("CAN"),
}).superRefine((f, ctx) => {
  if (f["bican-user-network-name"] !== "CHN") return;
  for (const key of ["chn-cidr", "chn-gateway"] as const) {
    if (f[key] === "") ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "required when bican-user-network-name is CHN" });
  }
});

export function siteConfigFromFile(data: unknown, source = "site config"): SiteConfig {
  const f = parseInput(siteConfigSchema, data ?? {}, source);
  return {
    startingMountainNid: f["starting-mountain-nid"],
    managementNetIps: f["management-net-ips"],
    supernet: f.supernet,
    hsnCidr: f["hsn-cidr"],
    canGateway: f["can-gateway"],
    canStaticPool: f["can-static-pool"],
    canDynamicPool: f["can-dynamic-pool"],
    cmnStaticPool: f["cmn-static-pool"],
    cmnDynamicPool: f["cmn-dynamic-pool"],
    cmnExternalDns: f["cmn-external-dns"],
    chnGateway: f["chn-gateway"],
    chnStaticPool: f["chn-static-pool"],
    chnDynamicPool: f["chn-dynamic-pool"],
    networks: {
      HMN: { cidr: f["hmn-cidr"], bootstrapVlan: f["hmn-bootstrap-vlan"] },
      NMN: { cidr: f["nmn-cidr"], bootstrapVlan: f["nmn-bootstrap-vlan"] },
      CMN: { cidr: f["cmn-cidr"], bootstrapVlan: f["cmn-bootstrap-vlan"] },
      CAN: { cidr: f["can-cidr"], bootstrapVlan: f["can-bootstrap-vlan"] },
      MTL: { cidr: f["mtl-cidr"], bootstrapVlan: f["mtl-bootstrap-vlan"] },
      HMN_MTN: { cidr: f["hmn-mtn-cidr"] },
      HMN_RVR: { cidr: f["hmn-rvr-cidr"] },
      NMN_MTN: { cidr: f["nmn-mtn-cidr"] },
      NMN_RVR: { cidr: f["nmn-rvr-cidr"] },
      ...(f["chn-cidr"] ? { CHN: { cidr: f["chn-cidr"], bootstrapVlan: f["chn-bootstrap-vlan"] } } : {}),
    },
    retainUnusedUserNetwork: f["retain-unused-user-network"],
    bicanUserNetworkName: f["bican-user-network-name"],
  };
}

export function defaultSiteConfig(): SiteConfig {
  return siteConfigFromFile({});
}

export function loadSiteConfig(path: string): SiteConfig {
  return siteConfigFromFile(loadYaml(path), `site config ${path}`);
}

// The CAN is built when it is the user network, or when the unused one is kept.
export function includesCan(config: SiteConfig): boolean {
  return config.bicanUserNetworkName === "CAN" || config.retainUnusedUserNetwork;
}

// The CHN is built on the same terms, but only once it has a CIDR.
export function includesChn(config: SiteConfig): boolean {
  return (config.bicanUserNetworkName === "CHN" || config.retainUnusedUserNetwork) && config.networks.CHN !== undefined;
}
