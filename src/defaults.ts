import type { NetworkInit } from "./network.js";

export const DEFAULT_HMN_CIDR = "10.254.0.0/17";
export const DEFAULT_HMN_VLAN = 4;
export const DEFAULT_HMN_MTN_CIDR = "10.104.0.0/17";
export const DEFAULT_HMN_RVR_CIDR = "10.107.0.0/17";
export const DEFAULT_NMN_CIDR = "10.252.0.0/17";
export const DEFAULT_NMN_VLAN = 2;
export const DEFAULT_NMN_MTN_CIDR = "10.100.0.0/17";
export const DEFAULT_NMN_RVR_CIDR = "10.106.0.0/17";
export const DEFAULT_NMNLB_CIDR = "10.92.100.0/24";
export const DEFAULT_HMNLB_CIDR = "10.94.100.0/24";
export const DEFAULT_HSN_CIDR = "10.253.0.0/16";
export const DEFAULT_CMN_CIDR = "10.103.6.0/24";
export const DEFAULT_CMN_STATIC_POOL = "10.103.6.112/28";
export const DEFAULT_CMN_DYNAMIC_POOL = "10.103.6.128/25";
export const DEFAULT_CMN_VLAN = 6;
export const DEFAULT_CAN_CIDR = "10.102.11.0/24";
export const DEFAULT_CAN_STATIC_POOL = "10.102.11.112/28";
export const DEFAULT_CAN_DYNAMIC_POOL = "10.102.11.128/25";
export const DEFAULT_CAN_VLAN = 7;
export const DEFAULT_CHN_CIDR = "10.104.7.0/24";
export const DEFAULT_CHN_VLAN = 5;
export const DEFAULT_MTL_CIDR = "10.1.1.0/16";
export const DEFAULT_MTL_VLAN = 1;
export const DEFAULT_STARTING_MOUNTAIN_NID = 1000;

export const DEFAULT_CABINET_PREFIX = 22;
export const DEFAULT_NETWORKING_HARDWARE_PREFIX = 24;
export const DEFAULT_BOOTSTRAP_DHCP_PREFIX = 24;
export const UAI_SUBNET_PREFIX = 23;
export const METALLB_POOL_PREFIX = 24;

export const MAIN_NETWORK_NAMES = ["HMN", "NMN", "CMN", "CAN", "CHN", "MTL", "HMN_RVR", "HMN_MTN", "NMN_RVR", "NMN_MTN"];

export type NetworkLayout = {
  template: NetworkInit;
  includeBootstrapDhcp: boolean;
  desiredBootstrapDhcpPrefix: number;
  includeNetworkingHardwareSubnet: boolean;
  networkingHardwarePrefix: number;
  supernetHack: boolean;
  additionalNetworkingSpace: number;
  baseVlan: number;
  subdivideByCabinet: boolean;
  groupNetworksByCabinetType: boolean;
  includeUaiSubnet: boolean;
  cabinetPrefix: number;
};

function layout(template: NetworkInit, over: Partial<NetworkLayout>): NetworkLayout {
  return {
    template,
    includeBootstrapDhcp: false,
    desiredBootstrapDhcpPrefix: DEFAULT_BOOTSTRAP_DHCP_PREFIX,
    includeNetworkingHardwareSubnet: false,
    networkingHardwarePrefix: DEFAULT_NETWORKING_HARDWARE_PREFIX,
    supernetHack: false,
    additionalNetworkingSpace: 0,
    baseVlan: template.vlanRange?.[0] ?? 0,
    subdivideByCabinet: false,
    groupNetworksByCabinetType: false,
    includeUaiSubnet: false,
    cabinetPrefix: DEFAULT_CABINET_PREFIX,
    ...over,
  };
}

export function defaultHmnLayout(): NetworkLayout {
  return layout(
    { name: "HMN", fullName: "Hardware Management Network", cidr: DEFAULT_HMN_CIDR, vlanRange: [DEFAULT_HMN_VLAN, DEFAULT_HMN_VLAN] },
    { includeBootstrapDhcp: true, includeNetworkingHardwareSubnet: true, supernetHack: true, groupNetworksByCabinetType: true },
  );
}

export function defaultNmnLayout(): NetworkLayout {
  return layout(
    { name: "NMN", fullName: "Node Management Network", cidr: DEFAULT_NMN_CIDR, vlanRange: [DEFAULT_NMN_VLAN, DEFAULT_NMN_VLAN] },
    {
      includeBootstrapDhcp: true,
      includeNetworkingHardwareSubnet: true,
      supernetHack: true,
      groupNetworksByCabinetType: true,
      includeUaiSubnet: true,
    },
  );
}

export function defaultHsnLayout(): NetworkLayout {
  return layout(
    { name: "HSN", fullName: "High Speed Network", cidr: DEFAULT_HSN_CIDR, vlanRange: [613, 868], netType: "slingshot10" },
    {},
  );
}

export function defaultCmnLayout(): NetworkLayout {
  return layout(
    { name: "CMN", fullName: "Customer Management Network", cidr: DEFAULT_CMN_CIDR, vlanRange: [DEFAULT_CMN_VLAN, DEFAULT_CMN_VLAN] },
    { includeBootstrapDhcp: true },
  );
}

export function defaultCanLayout(): NetworkLayout {
  return layout(
    { name: "CAN", fullName: "Customer Access Network", cidr: DEFAULT_CAN_CIDR, vlanRange: [DEFAULT_CAN_VLAN, DEFAULT_CAN_VLAN] },
    { includeBootstrapDhcp: true },
  );
}

export function defaultChnLayout(): NetworkLayout {
  return layout(
    { name: "CHN", fullName: "Customer High-Speed Network", cidr: DEFAULT_CHN_CIDR, vlanRange: [DEFAULT_CHN_VLAN, DEFAULT_CHN_VLAN] },
    { includeBootstrapDhcp: true },
  );
}

export function defaultMtlLayout(): NetworkLayout {
  return layout(
    {
      name: "MTL",
      fullName: "Provisioning Network (untagged)",
      cidr: DEFAULT_MTL_CIDR,
      vlanRange: [DEFAULT_MTL_VLAN, DEFAULT_MTL_VLAN],
      comment: "This network is only valid for the NCNs",
    },
    { includeBootstrapDhcp: true, includeNetworkingHardwareSubnet: true, supernetHack: true },
  );
}

// Per-cabinet variants of the HMN and NMN: one subnet per cabinet and nothing else.
export function cabinetNetworkLayout(base: NetworkLayout, template: NetworkInit): NetworkLayout {
  return {
    ...base,
    template,
    baseVlan: template.vlanRange?.[0] ?? 0,
    subdivideByCabinet: true,
    includeBootstrapDhcp: false,
    includeNetworkingHardwareSubnet: false,
    includeUaiSubnet: false,
    supernetHack: false,
  };
}

export const DEFAULT_LOAD_BALANCER_NMN: NetworkInit = {
  name: "NMNLB",
  fullName: "Node Management Network LoadBalancers",
  cidr: DEFAULT_NMNLB_CIDR,
};

export const DEFAULT_LOAD_BALANCER_HMN: NetworkInit = {
  name: "HMNLB",
  fullName: "Hardware Management Network LoadBalancers",
  cidr: DEFAULT_HMNLB_CIDR,
};

export const UAI_SUBNET_RESERVATIONS: Array<[string, string[]]> = [
  ["uai_macvlan_bridge", ["uai-macvlan-bridge"]],
  ["slurmctld_service", ["slurmctld-service", "slurmctld-service-nmn"]],
  ["slurmdbd_service", ["slurmdbd-service", "slurmdbd-service-nmn"]],
  ["pbs_service", ["pbs-service", "pbs-service-nmn"]],
  ["pbs_comm_service", ["pbs-comm-service", "pbs-comm-service-nmn"]],
];

export type PinnedReservation = {
  name: string;
  lastOctet: number;
  aliases: string[];
};

// These addresses are fixed so services keep the addresses they had in earlier releases.
export const PINNED_METALLB_RESERVATIONS: PinnedReservation[] = [
  {
    name: "istio-ingressgateway",
    lastOctet: 71,
    aliases:
      "api-gw-service api-gw-service-nmn.local packages registry spire.local api_gw_service registry.local packages packages.local spire".split(
        " ",
      ),
  },
  { name: "istio-ingressgateway-local", lastOctet: 81, aliases: ["api-gw-service.local"] },
  { name: "rsyslog-aggregator", lastOctet: 72, aliases: ["rsyslog-agg-service"] },
  { name: "cray-tftp", lastOctet: 60, aliases: ["tftp-service"] },
  { name: "unbound", lastOctet: 225, aliases: ["unbound"] },
  { name: "docker-registry", lastOctet: 73, aliases: ["docker_registry_service"] },
];
