import { cabinetClass, chassisLists, isModel, type CabinetClass, type CabinetGroupDetail } from "./cabinets.js";
import { ConfigValidationError, TopologyError } from "./errors.js";
import { formatCidr, formatIp } from "./ipam.js";
import type { IPReservation, IPV4Network, IPV4Subnet } from "./network.js";
import { buildHardware, type CabinetTemplate } from "./sls_state_generator.js";
import type { CabinetNetwork, GenericHardware, SlsNetwork, SlsReservation, SlsSubnet } from "./sls_types.js";
import { SWITCH_NAME_PREFIX, type ManagementSwitch, type SwitchType } from "./switches.js";
import { die } from "./util.js";
import * as xn from "./xname.js";

export type CabinetTemplates = Record<CabinetClass, Record<string, CabinetTemplate>>;

const CABINET_NETWORKS = ["NMN", "HMN", "NMN_MTN", "HMN_MTN", "NMN_RVR", "HMN_RVR"];

function vault(xname: string): string {
  return `vault://hms-creds/${xname}`;
}

export function managementSwitchToSls(sw: ManagementSwitch): GenericHardware {
  const ip = sw.managementInterface === undefined ? "" : formatIp(sw.managementInterface);
  const aliases = [sw.name];
  switch (sw.type) {
    case "Leaf":
    case "LeafBMC":
      return buildHardware(sw.xname, "River", {
        IP4Addr: ip,
        Brand: sw.brand,
        Model: sw.model,
        SNMPAuthPassword: vault(sw.xname),
        SNMPAuthProtocol: "MD5",
        SNMPPrivPassword: vault(sw.xname),
        SNMPPrivProtocol: "DES",
        SNMPUsername: "testuser",
        Aliases: aliases,
      });
    case "Spine":
    case "Aggregation":
      return buildHardware(sw.xname, "River", { IP4Addr: ip, Brand: sw.brand, Model: sw.model, Aliases: aliases });
    case "CDU":
      // A CDU switch in a river cabinet next to a hill cabinet is addressed like a spine.
      if (xn.getType(sw.xname) === xn.T.MgmtHLSwitch) {
        return buildHardware(sw.xname, "River", { IP4Addr: ip, Brand: sw.brand, Model: sw.model, Aliases: aliases });
      }
      return buildHardware(sw.xname, "Mountain", { Brand: sw.brand, Model: sw.model, Aliases: aliases });
    default:
      return die(`unknown management switch type: ${sw.type}`, ConfigValidationError);
  }
}

export function managementSwitchesToSls(switches: ManagementSwitch[]): Record<string, GenericHardware> {
  return Object.fromEntries(switches.map((sw) => [sw.xname, managementSwitchToSls(sw)]));
}

function cabinetNetworks(networks: Record<string, IPV4Network>, id: number): Record<string, CabinetNetwork> {
  const out: Record<string, CabinetNetwork> = {};
  for (const netName of CABINET_NETWORKS) {
    const subnet = networks[netName]?.subnets.find((s) => s.name === `cabinet_${id}`);
    if (!subnet) continue;
    out[netName.replace(/_MTN$/, "").replace(/_RVR$/, "")] = {
      CIDR: formatCidr(subnet.cidr),
      Gateway: formatIp(subnet.gateway),
      VLan: subnet.vlanId,
    };
  }
  return out;
}

/**
 * One template per cabinet, keyed by class and then xname. Each carries the
 * `cabinet_{id}` subnets of the NMN and HMN families and its chassis lists.
 */
export function cabinetTemplates(groups: CabinetGroupDetail[], networks: Record<string, IPV4Network>): CabinetTemplates {
  const out: CabinetTemplates = { River: {}, Hill: {}, Mountain: {} };
  for (const group of groups) {
    const cls = cabinetClass(group.kind);
    for (const detail of group.cabinetDetails) {
      const xname = xn.cabinet(detail.id);
      if (!xn.isValid(xname)) die(`${xname} is not a valid xname for a cabinet`, ConfigValidationError);
      const cn = cabinetNetworks(networks, detail.id);
      const chassis = chassisLists(group.kind, detail);
      const template: CabinetTemplate = {
        xname,
        class: cls,
        networks: cls === "River" ? { cn, ncn: cn } : { cn },
        liquidCooledChassis: chassis.liquidCooled,
        airCooledChassis: chassis.airCooled,
      };
      if (isModel(group.kind)) template.model = group.kind;
      out[cls][xname] = template;
    }
  }
  return out;
}

function reservationToSls(r: IPReservation): SlsReservation {
  const out: SlsReservation = { Name: r.name, IPAddress: formatIp(r.ipAddress) };
  if (r.aliases.length) out.Aliases = [...r.aliases];
  if (r.comment) out.Comment = r.comment;
  return out;
}

export function subnetToSls(s: IPV4Subnet): SlsSubnet {
  const out: SlsSubnet = {
    Name: s.name,
    FullName: s.fullName,
    CIDR: formatCidr(s.cidr),
    VlanID: s.vlanId,
    Gateway: formatIp(s.gateway),
  };
  if (s.dhcpStart !== undefined) out.DHCPStart = formatIp(s.dhcpStart);
  if (s.dhcpEnd !== undefined) out.DHCPEnd = formatIp(s.dhcpEnd);
  if (s.reservationStart !== undefined) out.ReservationStart = formatIp(s.reservationStart);
  if (s.reservationEnd !== undefined) out.ReservationEnd = formatIp(s.reservationEnd);
  if (s.metalLbPoolName) out.MetalLBPoolName = s.metalLbPoolName;
  out.IPReservations = s.ipReservations.map(reservationToSls);
  return out;
}

export function networkToSls(n: IPV4Network): SlsNetwork {
  const cidr = formatCidr(n.cidr);
  return {
    Name: n.name,
    FullName: n.fullName,
    Type: n.netType,
    IPRanges: [cidr],
    ExtraProperties: {
      CIDR: cidr,
      MTU: n.mtu,
      VlanRange: [...n.vlanRange],
      ...(n.comment ? { Comment: n.comment } : {}),
      Subnets: n.subnets.map(subnetToSls),
    },
  };
}

export function networksToSls(networks: Record<string, IPV4Network>): Record<string, SlsNetwork> {
  return Object.fromEntries(Object.values(networks).map((n) => [n.name, networkToSls(n)]));
}

// sw-leaf-bmc is checked before sw-leaf.
const RESERVATION_PREFIXES: Array<[string, SwitchType]> = [
  [SWITCH_NAME_PREFIX.Spine, "Spine"],
  [SWITCH_NAME_PREFIX.LeafBMC, "LeafBMC"],
  [SWITCH_NAME_PREFIX.Leaf, "Leaf"],
  [SWITCH_NAME_PREFIX.Aggregation, "Aggregation"],
  [SWITCH_NAME_PREFIX.CDU, "CDU"],
];

/** Switches named by a `network_hardware` subnet's reservations; the comment holds the xname. */
export function switchesFromReservations(subnet: IPV4Subnet): ManagementSwitch[] {
  const out: ManagementSwitch[] = [];
  for (const r of subnet.ipReservations) {
    const match = RESERVATION_PREFIXES.find(([prefix]) => r.name.startsWith(prefix));
    if (!match) continue;
    out.push({ xname: r.comment, name: r.name, brand: "", model: "", type: match[1], managementInterface: r.ipAddress });
  }
  return out;
}

/**
 * Joins the reserved switches with the brand and model from the switch
 * metadata, matching on xname. Every switch needs a brand.
 */
export function mergeSwitchMetadata(reserved: ManagementSwitch[], metadata: ManagementSwitch[]): ManagementSwitch[] {
  const byXname = new Map(metadata.map((sw) => [sw.xname, sw]));
  return reserved.map((sw) => {
    const meta = byXname.get(sw.xname);
    if (!meta || meta.brand === "") return die(`Couldn't determine switch brand for: ${sw.xname}`, TopologyError);
    return { ...sw, brand: meta.brand, model: meta.model };
  });
}
