import {
  airCooledChassisCountFilter,
  andFilter,
  cabinetClassFilter,
  cabinetKindFilter,
  orFilter,
  type CabinetFilter,
  type CabinetGroupDetail,
} from "./cabinets.js";
import {
  cabinetNetworkLayout,
  defaultCanLayout,
  defaultChnLayout,
  defaultCmnLayout,
  defaultHmnLayout,
  defaultHsnLayout,
  defaultMtlLayout,
  defaultNmnLayout,
  DEFAULT_LOAD_BALANCER_HMN,
  DEFAULT_LOAD_BALANCER_NMN,
  MAIN_NETWORK_NAMES,
  METALLB_POOL_PREFIX,
  PINNED_METALLB_RESERVATIONS,
  UAI_SUBNET_PREFIX,
  UAI_SUBNET_RESERVATIONS,
  type NetworkLayout,
} from "./defaults.js";
import { ConfigValidationError, type SiteInitError } from "./errors.js";
import { addIp, broadcast, formatCidr, parseCidr, parseIp } from "./ipam.js";
import type { Logger } from "./logger.js";
import {
  addBiggestSubnet,
  addReservation,
  addReservationAlias,
  addReservationWithIp,
  addReservationWithPin,
  addSubnet,
  addSubnetByCidr,
  applySupernetHack,
  genSubnets,
  lookUpSubnet,
  newNetwork,
  reserveNetMgmtIps,
  updateDhcpRange,
  type IPReservation,
  type IPV4Network,
  type IPV4Subnet,
  type NetworkInit,
} from "./network.js";
import { includesCan, includesChn, type SiteConfig } from "./site_config.js";
import type { GenericHardware } from "./sls_types.js";
import { switchXnamesByType, type ManagementSwitch } from "./switches.js";
import { die, sortedKeys } from "./util.js";

export type NetworkMap = Record<string, IPV4Network>;

type PoolSpec = {
  subnetName: string;
  fullName: string;
  poolName: string;
  cidr: string;
};

function hasCabinets(groups: CabinetGroupDetail[], filter: CabinetFilter): boolean {
  return groups.some((g) => g.cabinetDetails.some((d) => filter(g, d)));
}

// River subnets also serve the air-cooled chassis of an EX2500.
const riverFilter = orFilter(cabinetClassFilter("River"), andFilter(cabinetKindFilter("EX2500"), airCooledChassisCountFilter(1)));

/**
 * The layouts for one system. The HMN and NMN grow `_MTN` and `_RVR` variants
 * when there are cabinets for them, and the CAN is only laid out when it is
 * the user network or the unused one is kept. The CHN follows the same rule
 * once it has a CIDR.
 */
export function defaultLayouts(config: SiteConfig, groups: CabinetGroupDetail[]): Record<string, NetworkLayout> {
  const layouts: Record<string, NetworkLayout> = {
    HMN: defaultHmnLayout(),
    NMN: defaultNmnLayout(),
    HSN: defaultHsnLayout(),
    CMN: defaultCmnLayout(),
    MTL: defaultMtlLayout(),
  };
  if (includesCan(config)) layouts.CAN = defaultCanLayout();
  if (includesChn(config)) layouts.CHN = defaultChnLayout();

  const liquid = hasCabinets(groups, orFilter(cabinetClassFilter("Mountain"), cabinetClassFilter("Hill")));
  const river = hasCabinets(groups, riverFilter);
  const variants: Array<[string, NetworkLayout, string, [number, number], boolean]> = [
    ["HMN_MTN", layouts.HMN, "Mountain Compute Hardware Management Network", [3000, 3999], liquid],
    ["HMN_RVR", layouts.HMN, "River Compute Hardware Management Network", [1513, 1769], river],
    ["NMN_MTN", layouts.NMN, "Mountain Compute Node Management Network", [2000, 2999], liquid],
    ["NMN_RVR", layouts.NMN, "River Compute Node Management Network", [1770, 1999], river],
  ];
  for (const [name, base, fullName, vlanRange, wanted] of variants) {
    if (!wanted || !base.groupNetworksByCabinetType) continue;
    layouts[name] = cabinetNetworkLayout(base, { name, fullName, cidr: base.template.cidr, vlanRange });
  }

  for (const [name, l] of Object.entries(layouts)) {
    const override = config.networks[name];
    if (override) {
      l.template = { ...l.template, cidr: override.cidr };
      if (override.bootstrapVlan !== undefined) l.baseVlan = override.bootstrapVlan;
    }
    l.additionalNetworkingSpace = config.managementNetIps;
  }
  layouts.HSN.template = { ...layouts.HSN.template, cidr: config.hsnCidr };
  return layouts;
}

export function isLayoutValid(
  layout: NetworkLayout,
  switches: ManagementSwitch[],
  groups: CabinetGroupDetail[],
): SiteInitError | undefined {
  if (layout.includeNetworkingHardwareSubnet && switches.length < 1) {
    return new ConfigValidationError("can't build networking hardware subnets without ManagementSwitches");
  }
  if (layout.subdivideByCabinet && groups.length < 1) {
    return new ConfigValidationError("can't build per cabinet subnets without a list of cabinet details");
  }
  return undefined;
}

function addMetalLbPools(net: IPV4Network, pools: PoolSpec[], vlan: number, logger: Logger): void {
  for (const p of pools) {
    if (p.cidr === "") {
      logger.debug("no CIDR given for MetalLB pool, skipping it", { network: net.name, subnet: p.subnetName });
      continue;
    }
    const subnet = addSubnetByCidr(net, parseCidr(p.cidr), p.subnetName, vlan);
    subnet.fullName = p.fullName;
    subnet.metalLbPoolName = p.poolName;
  }
}

function userNetworkPools(name: string, config: SiteConfig): PoolSpec[] {
  if (name === "CAN") {
    return [
      { subnetName: "can_metallb_static_pool", fullName: "CAN Static Pool MetalLB", poolName: "customer-access-static", cidr: config.canStaticPool },
      { subnetName: "can_metallb_address_pool", fullName: "CAN Dynamic MetalLB", poolName: "customer-access", cidr: config.canDynamicPool },
    ];
  }
  if (name === "CHN") {
    return [
      {
        subnetName: "chn_metallb_static_pool",
        fullName: "CHN Static Pool MetalLB",
        poolName: "customer-high-speed-static",
        cidr: config.chnStaticPool,
      },
      { subnetName: "chn_metallb_address_pool", fullName: "CHN Dynamic MetalLB", poolName: "customer-high-speed", cidr: config.chnDynamicPool },
    ];
  }
  if (name === "CMN") {
    return [
      {
        subnetName: "cmn_metallb_static_pool",
        fullName: "CMN Static Pool MetalLB",
        poolName: "customer-management-static",
        cidr: config.cmnStaticPool,
      },
      { subnetName: "cmn_metallb_address_pool", fullName: "CMN Dynamic MetalLB", poolName: "customer-management", cidr: config.cmnDynamicPool },
    ];
  }
  return [];
}

// The external DNS service answers site to system lookups from the CMN static pool.
function addExternalDns(net: IPV4Network, config: SiteConfig): void {
  if (net.name !== "CMN" || config.cmnExternalDns === "") return;
  const pool =
    net.subnets.find((s) => s.name === "cmn_metallb_static_pool") ??
    die(`cmn-external-dns ${config.cmnExternalDns} needs a cmn-static-pool to live in`, ConfigValidationError);
  addReservationWithIp(pool, "external-dns", config.cmnExternalDns, "site to system lookups");
}

// The user networks' bootstrap subnets span the whole configured CIDR, pools included.
function spanUserNetwork(subnet: IPV4Subnet, layout: NetworkLayout, cidr: string | undefined, gateway: string): void {
  subnet.cidr = parseCidr(cidr ?? layout.template.cidr);
  subnet.gateway = gateway ? parseIp(gateway) : addIp(subnet.cidr.ip, 1);
}

function addBootstrapDhcp(net: IPV4Network, layout: NetworkLayout, config: SiteConfig): void {
  const subnet = addBiggestSubnet(net, layout.desiredBootstrapDhcpPrefix, "bootstrap_dhcp", layout.baseVlan);
  subnet.fullName = `${net.name} Bootstrap DHCP Subnet`;
  if (!["NMN", "HMN", "CMN", "CAN", "CHN"].includes(net.name)) return;
  if (net.name === "CAN") {
    spanUserNetwork(subnet, layout, config.networks.CAN?.cidr, config.canGateway);
    addReservation(subnet, "can-switch-1", "");
    addReservation(subnet, "can-switch-2", "");
  } else if (net.name === "CHN") {
    spanUserNetwork(subnet, layout, config.networks.CHN?.cidr, config.chnGateway);
  } else {
    reserveNetMgmtIps(subnet, { spine: [], leaf: [], leafBmc: [], aggregation: [], cdu: [] }, layout.additionalNetworkingSpace);
  }
  addReservation(subnet, "kubeapi-vip", "k8s-virtual-ip");
  if (net.name === "NMN") addReservation(subnet, "rgw-vip", "rgw-virtual-ip");
}

function addUaiSubnet(net: IPV4Network, layout: NetworkLayout): void {
  const subnet = addSubnet(net, UAI_SUBNET_PREFIX, "uai_macvlan", layout.baseVlan);
  subnet.gateway = addIp(net.cidr.ip, 1);
  subnet.fullName = "NMN UAIs";
  for (const [name, aliases] of UAI_SUBNET_RESERVATIONS) {
    const r = addReservation(subnet, name, aliases.join(","));
    for (const alias of aliases) addReservationAlias(r, alias);
  }
}

function addCabinetSubnets(net: IPV4Network, layout: NetworkLayout, groups: CabinetGroupDetail[]): void {
  if (!layout.subdivideByCabinet) return;
  const p = layout.cabinetPrefix;
  if (!layout.groupNetworksByCabinetType) {
    for (const cls of ["River", "Hill", "Mountain"] as const) genSubnets(net, groups, p, cabinetClassFilter(cls));
    return;
  }
  if (net.name.endsWith("RVR")) genSubnets(net, groups, p, riverFilter);
  if (net.name.endsWith("MTN")) {
    genSubnets(net, groups, p, cabinetClassFilter("Mountain"));
    genSubnets(net, groups, p, cabinetClassFilter("Hill"));
  }
}

export function buildNetwork(
  layout: NetworkLayout,
  groups: CabinetGroupDetail[],
  switches: ManagementSwitch[],
  config: SiteConfig,
  logger: Logger,
): IPV4Network {
  const invalid = isLayoutValid(layout, switches, groups);
  if (invalid) throw invalid;
  const net = newNetwork(layout.template);

  addMetalLbPools(net, userNetworkPools(net.name, config), layout.baseVlan, logger);
  addExternalDns(net, config);

  // The HSN subnet holds the reservations used for naming.
  if (net.name === "HSN") {
    const subnet = addSubnetByCidr(net, parseCidr(config.hsnCidr), "hsn_base_subnet", net.vlanRange[0]);
    subnet.fullName = "HSN Base Subnet";
  }

  if (layout.includeNetworkingHardwareSubnet) {
    const subnet = addSubnet(net, layout.networkingHardwarePrefix, "network_hardware", layout.baseVlan);
    subnet.fullName = `${net.name} Management Network Infrastructure`;
    reserveNetMgmtIps(
      subnet,
      {
        spine: switchXnamesByType(switches, "Spine"),
        leaf: switchXnamesByType(switches, "Leaf"),
        leafBmc: switchXnamesByType(switches, "LeafBMC"),
        aggregation: switchXnamesByType(switches, "Aggregation"),
        cdu: switchXnamesByType(switches, "CDU"),
      },
      layout.additionalNetworkingSpace,
    );
  }

  if (layout.includeBootstrapDhcp) addBootstrapDhcp(net, layout, config);
  if (layout.includeUaiSubnet) addUaiSubnet(net, layout);
  addCabinetSubnets(net, layout, groups);
  if (layout.supernetHack) applySupernetHack(net);
  return net;
}

function loadBalancer(
  init: NetworkInit,
  poolName: string,
  fullName: string,
  metalLbPoolName: string,
  vlan: number,
  aliasFilter: (name: string, alias: string) => boolean,
): IPV4Network {
  const net = newNetwork(init);
  const pool = addSubnet(net, METALLB_POOL_PREFIX, poolName, vlan);
  pool.fullName = fullName;
  pool.metalLbPoolName = metalLbPoolName;
  for (const r of PINNED_METALLB_RESERVATIONS) {
    const aliases = r.aliases.filter((a) => aliasFilter(r.name, a));
    addReservationWithPin(pool, r.name, aliases.join(","), r.lastOctet);
  }
  return net;
}

// The HMN has no use for the package, registry and .local names of the ingress gateway.
function hmnAlias(name: string, alias: string): boolean {
  if (name !== "istio-ingressgateway") return true;
  return !alias.endsWith(".local") && alias !== "packages" && alias !== "registry";
}

/** Builds every layout in name order, then the NMN and HMN load balancer networks. */
export function buildCsmNetworks(
  layouts: Record<string, NetworkLayout>,
  groups: CabinetGroupDetail[],
  switches: ManagementSwitch[],
  config: SiteConfig,
  logger: Logger,
): NetworkMap {
  const networks: NetworkMap = {};
  for (const name of sortedKeys(layouts)) {
    logger.debug("building network", { network: name });
    networks[name] = buildNetwork(layouts[name], groups, switches, config, logger);
  }
  networks.NMNLB = loadBalancer(
    DEFAULT_LOAD_BALANCER_NMN,
    "nmn_metallb_address_pool",
    "NMN MetalLB",
    "node-management",
    config.networks.NMN?.bootstrapVlan ?? 0,
    () => true,
  );
  networks.HMNLB = loadBalancer(
    DEFAULT_LOAD_BALANCER_HMN,
    "hmn_metallb_address_pool",
    "HMN MetalLB",
    "hardware-management",
    config.networks.HMN?.bootstrapVlan ?? 0,
    hmnAlias,
  );
  logger.info("built networks", { networks: Object.keys(networks).length });
  return networks;
}

function userPools(name: string, config: SiteConfig): string[] | undefined {
  if (name === "CAN") return [config.canStaticPool, config.canDynamicPool];
  if (name === "CMN") return [config.cmnStaticPool, config.cmnDynamicPool];
  if (name === "CHN") return [config.chnStaticPool, config.chnDynamicPool];
  return undefined;
}

// First address of whichever configured pool starts lowest, or the broadcast address without pools.
function poolStart(cidr: string, pools: string[]): number {
  const starts = pools.filter((p) => p !== "").map((p) => parseCidr(p).ip);
  return starts.length ? Math.min(...starts) : broadcast(parseCidr(cidr));
}

/**
 * Settles the dynamic ranges once every reservation is in. On the user networks
 * the range stops short of the MetalLB pools, and of a gateway sitting just
 * before them.
 */
export function finalizeDhcpRanges(networks: NetworkMap, config: SiteConfig): void {
  for (const name of MAIN_NETWORK_NAMES) {
    const net = networks[name];
    if (!net) continue;
    const subnet = net.subnets.find((s) => s.name === "bootstrap_dhcp");
    const pools = userPools(name, config);
    if (subnet && pools) {
      updateDhcpRange(subnet, false);
      const start = poolStart(config.networks[name]?.cidr ?? formatCidr(net.cidr), pools);
      subnet.dhcpEnd = subnet.gateway === addIp(start, -1) ? addIp(start, -2) : addIp(start, -1);
    } else if (subnet) {
      updateDhcpRange(subnet, config.supernet);
    }
    if (name === "NMN") updateDhcpRange(lookUpSubnet(net, "uai_macvlan"), false);
  }
}

/**
 * Gives every UAN a bootstrap address on each user network that was built,
 * named after its first alias, in xname order.
 */
export function reserveUanAddresses(networks: NetworkMap, hardware: Record<string, GenericHardware>): IPReservation[] {
  const subnets = ["CAN", "CHN"].flatMap((name) => {
    const net = networks[name];
    return net ? [lookUpSubnet(net, "bootstrap_dhcp")] : [];
  });
  const out: IPReservation[] = [];
  for (const xname of sortedKeys(hardware)) {
    const ep = hardware[xname].ExtraProperties;
    if (ep === undefined || !("Role" in ep) || ep.Role !== "Application" || ep.SubRole !== "UAN") continue;
    const hostname = ep.Aliases?.[0] ?? die(`UAN ${xname} needs at least one alias in the application node config`, ConfigValidationError);
    for (const subnet of subnets) out.push(addReservation(subnet, hostname, xname));
  }
  return out;
}
