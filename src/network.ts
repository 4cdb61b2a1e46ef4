import type { CabinetFilter, CabinetGroupDetail } from "./cabinets.js";
import { AllocationError } from "./errors.js";
import {
  addIp,
  broadcast,
  contains,
  containsIp,
  free,
  formatCidr,
  formatIp,
  overlaps,
  parseCidr,
  type Cidr,
  usableHostAddresses,
} from "./ipam.js";
import { die, pad } from "./util.js";

export type IPReservation = {
  ipAddress: number;
  name: string;
  comment: string;
  aliases: string[];
};

export type IPV4Subnet = {
  fullName: string;
  cidr: Cidr;
  ipReservations: IPReservation[];
  name: string;
  netName: string;
  vlanId: number;
  comment: string;
  gateway: number;
  dhcpStart?: number;
  dhcpEnd?: number;
  reservationStart?: number;
  reservationEnd?: number;
  metalLbPoolName?: string;
};

export type IPV4Network = {
  fullName: string;
  cidr: Cidr;
  subnets: IPV4Subnet[];
  name: string;
  vlanRange: [number, number];
  mtu: number;
  netType: string;
  comment: string;
};

export type NetworkInit = {
  name: string;
  fullName?: string;
  cidr: string;
  vlanRange?: [number, number];
  mtu?: number;
  netType?: string;
  comment?: string;
};

export function newNetwork(init: NetworkInit): IPV4Network {
  return {
    name: init.name,
    fullName: init.fullName ?? init.name,
    cidr: parseCidr(init.cidr),
    subnets: [],
    vlanRange: init.vlanRange ?? [0, 0],
    mtu: init.mtu ?? 9000,
    netType: init.netType ?? "ethernet",
    comment: init.comment ?? "",
  };
}

function newSubnet(net: IPV4Network, cidr: Cidr, name: string, vlanId: number): IPV4Subnet {
  return {
    fullName: "",
    cidr,
    ipReservations: [],
    name,
    netName: net.name,
    vlanId,
    comment: "",
    gateway: addIp(cidr.ip, 1),
  };
}

export function allocatedSubnets(net: IPV4Network): Cidr[] {
  return net.subnets.map((s) => s.cidr);
}

export function addSubnetByCidr(net: IPV4Network, cidr: Cidr, name: string, vlanId: number): IPV4Subnet {
  if (!contains(net.cidr, cidr)) die(`subnet ${formatCidr(cidr)} is not part of ${formatCidr(net.cidr)}`, AllocationError);
  const clash = net.subnets.find((s) => overlaps(s.cidr, cidr));
  if (clash) die(`subnet ${formatCidr(cidr)} overlaps ${clash.name} (${formatCidr(clash.cidr)}) in ${net.name}`, AllocationError);
  const subnet = newSubnet(net, cidr, name, vlanId);
  net.subnets.push(subnet);
  return subnet;
}

export function addSubnet(net: IPV4Network, prefix: number, name: string, vlanId: number): IPV4Subnet {
  const subnet = newSubnet(net, free(net.cidr, prefix, allocatedSubnets(net)), name, vlanId);
  net.subnets.push(subnet);
  return subnet;
}

export function addBiggestSubnet(net: IPV4Network, prefix: number, name: string, vlanId: number): IPV4Subnet {
  for (let p = prefix; p < 29; p++) {
    try {
      return addSubnet(net, p, name, vlanId);
    } catch (e) {
      if (!(e instanceof AllocationError)) throw e;
    }
  }
  return die(`no room for ${name} subnet within ${net.name} (tried from /${prefix} to /29)`, AllocationError);
}

/**
 * Carves one `cabinet_{id}` subnet per cabinet accepted by `filter`, walking
 * groups and their cabinets in order. The VLAN comes from the cabinet's NMN or
 * HMN override, falling back to the network's first VLAN plus the cabinet's
 * index within its group. The network's VLAN range then spans every cabinet
 * subnet it holds.
 */
export function genSubnets(net: IPV4Network, groups: CabinetGroupDetail[], prefix: number, filter: CabinetFilter): void {
  const allocated = allocatedSubnets(net);
  for (const group of groups) {
    group.cabinetDetails.forEach((detail, j) => {
      if (!filter(group, detail)) return;
      const cidr = free(net.cidr, prefix, allocated);
      allocated.push(cidr);
      let vlan = 0;
      if (net.name.startsWith("NMN")) vlan = detail.nmnVlanId ?? 0;
      if (net.name.startsWith("HMN")) vlan = detail.hmnVlanId ?? 0;
      if (vlan === 0) vlan = j + net.vlanRange[0];
      const subnet = newSubnet(net, cidr, `cabinet_${detail.id}`, vlan);
      updateDhcpRange(subnet, false);
      net.subnets.push(subnet);
    });
  }
  const vlans = net.subnets.filter((s) => s.name.startsWith("cabinet_")).map((s) => s.vlanId);
  if (vlans.length) net.vlanRange = [Math.min(...vlans), Math.max(...vlans)];
}

export function lookUpSubnet(net: IPV4Network, name: string): IPV4Subnet {
  const found = net.subnets.filter((s) => s.name === name);
  if (found.length > 1) die(`found ${found.length} subnets instead of just one`, AllocationError);
  return found[0] ?? die(`subnet not found "${name}"`, AllocationError);
}

export type SwitchReservations = {
  spine: string[];
  leaf: string[];
  leafBmc: string[];
  aggregation: string[];
  cdu: string[];
};

export function reserveNetMgmtIps(subnet: IPV4Subnet, switches: SwitchReservations, extraSlots: number): void {
  const groups: Array<[string, string[]]> = [
    ["sw-spine", switches.spine],
    ["sw-leaf", switches.leaf],
    ["sw-leaf-bmc", switches.leafBmc],
    ["sw-agg", switches.aggregation],
    ["sw-cdu", switches.cdu],
  ];
  for (const [prefix, xnames] of groups) {
    xnames.forEach((x, i) => addReservation(subnet, `${prefix}-${pad(i + 1, 3)}`, x));
  }
  for (let i = 0; i < extraSlots; i++) addReservation(subnet, `mgmt_net_${pad(i + 1, 3)}`, "");
}

export function reservedIps(subnet: IPV4Subnet): number[] {
  return subnet.ipReservations.map((r) => r.ipAddress);
}

export function reservationsByName(subnet: IPV4Subnet): Map<string, IPReservation> {
  return new Map(subnet.ipReservations.map((r) => [r.name, r]));
}

export function lookupReservation(subnet: IPV4Subnet, name: string): IPReservation {
  return (
    subnet.ipReservations.find((r) => r.name === name) ??
    die(`reservation "${name}" not found in ${subnet.name}`, AllocationError)
  );
}

// Names and addresses are both unique within a subnet.
function claim(subnet: IPV4Subnet, r: IPReservation): IPReservation {
  if (subnet.ipReservations.some((x) => x.name === r.name)) {
    die(`reservation "${r.name}" already exists in ${subnet.name}`, AllocationError);
  }
  const holder = subnet.ipReservations.find((x) => x.ipAddress === r.ipAddress);
  if (holder) {
    die(`Cannot add "${r.name}" to ${subnet.name} subnet as ${formatIp(r.ipAddress)}. It is already reserved for "${holder.name}".`, AllocationError);
  }
  subnet.ipReservations.push(r);
  return r;
}

/** Next unreserved address, counting up from just past the gateway. */
export function addReservation(subnet: IPV4Subnet, name: string, comment: string): IPReservation {
  const taken = new Set(reservedIps(subnet));
  let ip = addIp(subnet.cidr.ip, 2);
  while (taken.has(ip)) ip++;
  if (ip >= broadcast(subnet.cidr)) die(`no free address in ${subnet.name} (${formatCidr(subnet.cidr)}) for ${name}`, AllocationError);
  return claim(subnet, { ipAddress: ip, name, comment, aliases: [] });
}

// Keeps the address a name had in earlier releases: the subnet's first three octets plus `pin`.
export function addReservationWithPin(subnet: IPV4Subnet, name: string, comment: string, pin: number): IPReservation {
  const ip = ((subnet.cidr.ip & 0xffffff00) >>> 0) + (pin & 255);
  if (!containsIp(subnet.cidr, ip)) {
    const addr = formatIp(ip);
    die(`Cannot pin "${name}" in ${subnet.name} subnet to ${addr}. ${addr} is not part of ${formatCidr(subnet.cidr)}.`, AllocationError);
  }
  return claim(subnet, { ipAddress: ip, name, comment, aliases: comment ? comment.split(",") : [] });
}

export function addReservationWithIp(subnet: IPV4Subnet, name: string, addr: string, comment: string): IPReservation {
  const ip = parseCidr(`${addr}/32`).ip;
  if (!containsIp(subnet.cidr, ip)) {
    die(`Cannot add "${name}" to ${subnet.name} subnet as ${addr}. ${addr} is not part of ${formatCidr(subnet.cidr)}.`, AllocationError);
  }
  return claim(subnet, { ipAddress: ip, name, comment, aliases: [] });
}

export function addReservationAlias(r: IPReservation, alias: string): void {
  if (!r.aliases.includes(alias)) r.aliases.push(alias);
}

export function subnetUsableHosts(subnet: IPV4Subnet): number {
  return usableHostAddresses(subnet.cidr.prefix);
}

/**
 * Moves the dynamic range past the reservations: it starts at least ten
 * addresses in, and ends at the last host address, or 200 addresses after the
 * start when the supernet hack has widened the mask. `uai_macvlan` tracks the
 * same bounds as its reservation range instead.
 */
export function updateDhcpRange(subnet: IPV4Subnet, supernetHack: boolean): void {
  const usable = subnetUsableHosts(subnet);
  if (subnet.ipReservations.length > usable) {
    die(
      `Could not create ${subnet.fullName || subnet.name} subnet in ${subnet.netName}. There are ${subnet.ipReservations.length} reservations and only ${usable} usable ip addresses in the subnet ${formatCidr(subnet.cidr)}.`,
      AllocationError,
    );
  }
  const base = subnet.cidr.ip;
  const start = Math.max(addIp(base, 10), addIp(base, subnet.ipReservations.length + 2));
  const end = supernetHack ? addIp(start, 200) : addIp(broadcast(subnet.cidr), -1);
  if (subnet.name === "uai_macvlan") {
    subnet.reservationStart = start;
    subnet.reservationEnd = end;
  } else {
    subnet.dhcpStart = start;
    subnet.dhcpEnd = end;
  }
}

export const SUPERNET_HACK_SUBNETS = ["bootstrap_dhcp", "network_hardware", "can_metallb_static_pool", "can_metallb_address_pool"];

// Gives the listed subnets the supernet's gateway and mask, so their broadcast domains overlap the whole network.
export function applySupernetHack(net: IPV4Network): void {
  for (const name of SUPERNET_HACK_SUBNETS) {
    const subnet = net.subnets.find((s) => s.name === name);
    if (!subnet) continue;
    subnet.gateway = addIp(net.cidr.ip, 1);
    subnet.cidr = { ip: subnet.cidr.ip, prefix: net.cidr.prefix };
  }
}
