import type { CabinetClass } from "./cabinets.js";
import { T, type XnameType } from "./xname.js";

export type CabinetNetwork = {
  CIDR: string;
  Gateway: string;
  VLan: number;
};

export type CabinetExtraProperties = {
  Model?: string;
  Networks: Record<string, Record<string, CabinetNetwork>>;
};

export type NodeExtraProperties = {
  NID?: number;
  Role: string;
  SubRole?: string;
  Aliases?: string[];
};

export type RouterBmcExtraProperties = {
  Username: string;
  Password: string;
};

export type MgmtSwitchExtraProperties = {
  IP4Addr: string;
  Brand: string;
  Model: string;
  SNMPAuthPassword: string;
  SNMPAuthProtocol: string;
  SNMPPrivPassword: string;
  SNMPPrivProtocol: string;
  SNMPUsername: string;
  Aliases: string[];
};

export type HLSwitchExtraProperties = {
  IP4Addr: string;
  Brand: string;
  Model: string;
  Aliases: string[];
};

export type CduSwitchExtraProperties = {
  Brand: string;
  Model: string;
  Aliases: string[];
};

export type ConnectorExtraProperties = {
  NodeNics: string[];
  VendorName: string;
};

export type ExtraProperties =
  | CabinetExtraProperties
  | NodeExtraProperties
  | RouterBmcExtraProperties
  | MgmtSwitchExtraProperties
  | HLSwitchExtraProperties
  | CduSwitchExtraProperties
  | ConnectorExtraProperties;

export type GenericHardware = {
  Parent: string;
  Xname: string;
  Type: string;
  Class: CabinetClass;
  TypeString: XnameType;
  ExtraProperties?: ExtraProperties;
};

export type SlsReservation = {
  Name: string;
  IPAddress: string;
  Aliases?: string[];
  Comment?: string;
};

export type SlsSubnet = {
  Name: string;
  FullName: string;
  CIDR: string;
  VlanID: number;
  Gateway: string;
  DHCPStart?: string;
  DHCPEnd?: string;
  ReservationStart?: string;
  ReservationEnd?: string;
  MetalLBPoolName?: string;
  IPReservations?: SlsReservation[];
};

export type SlsNetwork = {
  Name: string;
  FullName: string;
  Type: string;
  IPRanges: string[];
  ExtraProperties: {
    CIDR: string;
    MTU: number;
    VlanRange: number[];
    Comment?: string;
    Subnets: SlsSubnet[];
  };
};

export type SlsState = {
  Hardware: Record<string, GenericHardware>;
  Networks: Record<string, SlsNetwork>;
};

// Inventory type tags for the component types this tool emits.
const SLS_TYPES: Record<string, string> = {
  [T.CDU]: "comptype_cdu",
  [T.CDUMgmtSwitch]: "comptype_cdu_mgmt_switch",
  [T.Cabinet]: "comptype_cabinet",
  [T.CabinetPDUController]: "comptype_cab_pdu_controller",
  [T.Chassis]: "comptype_chassis",
  [T.ChassisBMC]: "comptype_chassis_bmc",
  [T.ComputeModule]: "comptype_compmod",
  [T.RouterModule]: "comptype_rtrmod",
  [T.NodeBMC]: "comptype_ncard",
  [T.Node]: "comptype_node",
  [T.RouterBMC]: "comptype_rtr_bmc",
  [T.MgmtSwitch]: "comptype_mgmt_switch",
  [T.MgmtSwitchConnector]: "comptype_mgmt_switch_connector",
  [T.MgmtHLSwitch]: "comptype_hl_switch",
};

export function slsType(type: XnameType): string {
  return SLS_TYPES[type] ?? "invalid";
}

// Types that host their own management endpoint.
export function isControllerType(type: XnameType): boolean {
  return type === T.ChassisBMC || type === T.RouterBMC || type === T.NodeBMC || type === T.CabinetPDUController;
}
