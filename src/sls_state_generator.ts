import type { AppNodeConfig } from "./app_node_config.js";
import { appNodeAliases } from "./app_node_config.js";
import type { CabinetClass } from "./cabinets.js";
import { TopologyError } from "./errors.js";
import {
  classifyRow,
  destinationPort,
  destinationU,
  hasUplink,
  rackNumber,
  rackPosition,
  type HmnRow,
  type NodeIdentity,
} from "./hmn_rows.js";
import type { Logger } from "./logger.js";
import {
  isControllerType,
  slsType,
  type CabinetNetwork,
  type ExtraProperties,
  type GenericHardware,
  type NodeExtraProperties,
  type SlsNetwork,
  type SlsState,
} from "./sls_types.js";
import { die, pad, parseInteger } from "./util.js";
import * as xn from "./xname.js";

export type CabinetTemplate = {
  xname: string;
  model?: string;
  class: CabinetClass;
  networks: Record<string, Record<string, CabinetNetwork>>;
  liquidCooledChassis: number[];
  airCooledChassis: number[];
};

export type GeneratorInput = {
  appNodeConfig: AppNodeConfig;
  managementSwitches: Record<string, GenericHardware>;
  riverCabinets: Record<string, CabinetTemplate>;
  hillCabinets: Record<string, CabinetTemplate>;
  mountainCabinets: Record<string, CabinetTemplate>;
  mountainStartingNid: number;
  networks: Record<string, SlsNetwork>;
};

export type NidSequence = {
  management: number;
  liquidCooled: number;
};

export const FIRST_MANAGEMENT_NID = 100001;

export function newNidSequence(mountainStartingNid: number): NidSequence {
  return { management: FIRST_MANAGEMENT_NID, liquidCooled: mountainStartingNid };
}

type Generator = {
  input: GeneratorInput;
  logger: Logger;
  nids: NidSequence;
  // SourceParent name -> U number of the row that names it.
  parentU: Map<string, number>;
};

export function buildHardware(xname: string, cls: CabinetClass, extra?: ExtraProperties): GenericHardware {
  const type = xn.getType(xname);
  const hw: GenericHardware = { Parent: xn.parent(xname), Xname: xname, Type: slsType(type), Class: cls, TypeString: type };
  if (extra !== undefined) hw.ExtraProperties = extra;
  return hw;
}

function vault(xname: string): string {
  return `vault://hms-creds/${xname}`;
}

function cabinetProperties(t: CabinetTemplate): ExtraProperties {
  return t.model ? { Model: t.model, Networks: t.networks } : { Networks: t.networks };
}

function nodeProperties(nid: number, role: string, subRole: string, aliases: string[]): NodeExtraProperties {
  return {
    ...(nid !== 0 ? { NID: nid } : {}),
    Role: role,
    ...(subRole ? { SubRole: subRole } : {}),
    ...(aliases.length ? { Aliases: aliases } : {}),
  };
}

/** Reason a cabinet cannot hold air-cooled hardware, or undefined when it can. */
export function airCooledProblem(input: GeneratorInput, cabinet: string): string | undefined {
  if (cabinet in input.riverCabinets) return undefined;
  const hill = input.hillCabinets[cabinet];
  if (hill) {
    if (hill.model === "EX2500") {
      return hill.airCooledChassis.length ? undefined : `hill cabinet (EX2500) ${cabinet} does not contain any air-cooled chassis`;
    }
    return `hill cabinet (non EX2500) ${cabinet} cannot contain air-cooled hardware`;
  }
  if (cabinet in input.mountainCabinets) return `mountain cabinet ${cabinet} cannot contain air-cooled hardware`;
  return `unknown cabinet ${cabinet}`;
}

// Standard racks use c0; an EX2500 keeps its air-cooled chassis at a fixed ordinal.
export function riverChassis(input: GeneratorInput, cabinet: number): number {
  const x = xn.cabinet(cabinet);
  const problem = airCooledProblem(input, x);
  if (problem) die(problem, TopologyError);
  return input.hillCabinets[x]?.airCooledChassis[0] ?? 0;
}

function verifyRiverSwitches(input: GeneratorInput): void {
  for (const xname of Object.keys(input.managementSwitches).sort(xn.compareXnames)) {
    const sw = input.managementSwitches[xname];
    if (sw.Class !== "River") continue;
    let cabinet: string;
    if (sw.TypeString === xn.T.MgmtSwitch) cabinet = xn.parent(sw.Parent);
    else if (sw.TypeString === xn.T.MgmtHLSwitch) cabinet = xn.parent(xn.parent(sw.Parent));
    else return die(`unknown river management switch type ${sw.TypeString} for ${xname}`, TopologyError);
    const problem = airCooledProblem(input, cabinet);
    if (problem) die(`cabinet ${cabinet} of management switch ${xname} cannot hold it: ${problem}`, TopologyError);
  }
}

function findRowWithSource(rows: HmnRow[], source: string): HmnRow | undefined {
  const lower = source.toLowerCase();
  return rows.find((r) => r.Source.toLowerCase() === lower);
}

/**
 * Resolves the U number of every row named as another row's SourceParent. The
 * parent row is matched on Source without regard to case.
 */
export function resolveParents(rows: HmnRow[]): Map<string, number> {
  const out = new Map<string, number>();
  for (const row of rows) {
    const name = row.SourceParent.trim();
    if (name === "" || out.has(name)) continue;
    const parentRow = findRowWithSource(rows, name);
    if (!parentRow) die(`failed to find a row for parent ${name} of ${row.Source}`, TopologyError);
    const uString = parentRow.SourceLocation.trim().replace(/^[uU]/, "");
    const u = parseInteger(uString);
    if (Number.isNaN(u)) die(`failed to parse parent U number "${uString}" of ${name}`, TopologyError);
    out.set(name, u);
  }
  return out;
}

function torFromRow(g: Generator, row: HmnRow): GenericHardware {
  const cabinet = rackNumber(row.SourceRack, row);
  const chassis = riverChassis(g.input, cabinet);
  const pos = rackPosition(row);
  const x = xn.routerBmc({ cabinet, chassis, slot: pos.u, bmc: pos.bmc });
  return buildHardware(x, "River", { Username: vault(x), Password: vault(x) });
}

function pduFromRow(row: HmnRow, controller: number): GenericHardware {
  const cabinet = rackNumber(row.SourceRack, row);
  return buildHardware(xn.cabinetPduController({ cabinet, controller }), "River");
}

function nodeRole(g: Generator, node: NodeIdentity): { nid: number; role: string; subRole: string; aliases: string[] } {
  switch (node.role) {
    case "Management":
      return { nid: g.nids.management++, role: node.role, subRole: node.subRole, aliases: [node.alias] };
    case "Compute":
      return { nid: node.nid, role: node.role, subRole: "", aliases: [node.alias] };
    case "Application":
      return { nid: 0, role: node.role, subRole: node.subRole, aliases: [] };
    case "System":
      return { nid: 0, role: node.role, subRole: "", aliases: [] };
  }
}

function nodeFromRow(g: Generator, row: HmnRow, node: NodeIdentity): GenericHardware {
  const props = nodeRole(g, node);

  let u: number;
  let bmc: number;
  const parentName = row.SourceParent.trim();
  if (parentName !== "") {
    u = g.parentU.get(parentName) ?? die(`failed to find a row for parent ${parentName} of ${row.Source}`, TopologyError);
    // Multi-node enclosures hold four nodes.
    bmc = ((props.nid - 1) % 4) + 1;
  } else {
    ({ u, bmc } = rackPosition(row));
  }

  const cabinet = rackNumber(row.SourceRack, row);
  const chassis = riverChassis(g.input, cabinet);

  if (g.parentU.has(row.Source)) {
    return buildHardware(xn.nodeBmc({ cabinet, chassis, slot: u, bmc: 999 }), "River");
  }

  const x = xn.node({ cabinet, chassis, slot: u, bmc, node: 0 });
  const aliases = node.role === "Application" ? [...props.aliases, ...appNodeAliases(g.input.appNodeConfig, x)] : props.aliases;
  return buildHardware(x, "River", nodeProperties(props.nid, props.role, props.subRole, aliases));
}

function riverHardwareFromRow(g: Generator, row: HmnRow): GenericHardware | undefined {
  const c = classifyRow(row, g.input.appNodeConfig);
  switch (c.kind) {
    case "tor":
      return torFromRow(g, row);
    case "pdu":
      return pduFromRow(row, c.controller);
    case "door":
      g.logger.warn("Cooling door found, but xname does not yet exist for cooling doors!", { row });
      return undefined;
    case "mgmt-switch":
      g.logger.warn(
        "Ignoring management Switch found in hmn_connections, management switch information is solely from from switch_metadata.csv",
        { row },
      );
      return undefined;
    case "node":
      return nodeFromRow(g, row, c.node);
    case "unknown":
      g.logger.warn(
        "Found unknown source prefix! If this is expected to be an Application node, please update application_node_config.yaml",
        { row },
      );
      return undefined;
  }
}

export function vendorPortName(brand: string, port: number, switchXname: string): string {
  switch (brand) {
    case "Dell":
      return `ethernet1/1/${port}`;
    case "Aruba":
      return `1/1/${port}`;
    case "Mellanox":
      return die(`Currently do no support MgmtSwitchConnector for Mellanox switches (${switchXname})`, TopologyError);
    case "":
      return die(`Management Switch brand not provided for switch ${switchXname}`, TopologyError);
    default:
      return die(`Unknown Management Switch brand ${brand} found for switch ${switchXname}`, TopologyError);
  }
}

function connectorFor(g: Generator, hw: GenericHardware, row: HmnRow): GenericHardware {
  const nic = isControllerType(hw.TypeString) ? hw.Xname : hw.Parent;
  const cabinet = rackNumber(row.DestinationRack, row);
  const chassis = riverChassis(g.input, cabinet);
  const slot = destinationU(row);
  const switchXname = xn.mgmtSwitch({ cabinet, chassis, slot });
  const port = destinationPort(row);
  const connector = xn.mgmtSwitchConnector({ cabinet, chassis, slot, port });
  const sw =
    g.input.managementSwitches[switchXname] ??
    die(`Failed to find switch ${switchXname} for connector ${connector} of ${nic} in the management switch inventory`, TopologyError);
  const ep = sw.ExtraProperties;
  const brand = ep !== undefined && "Brand" in ep ? ep.Brand : "";
  return buildHardware(connector, "River", {
    NodeNics: [nic],
    VendorName: vendorPortName(brand, port, switchXname),
  });
}

/** Cabinet record, then per chassis a Chassis, its ChassisBMC and 32 compute nodes. */
export function liquidCooledHardware(template: CabinetTemplate, nids: NidSequence): GenericHardware[] {
  const out = [buildHardware(template.xname, template.class, cabinetProperties(template))];
  const cabinet = xn.parse(template.xname).ordinals[0];
  for (const chassis of template.liquidCooledChassis) {
    out.push(buildHardware(xn.chassis({ cabinet, chassis }), template.class));
    out.push(buildHardware(xn.chassisBmc({ cabinet, chassis, bmc: 0 }), template.class));
    for (let slot = 0; slot < 8; slot++) {
      for (let bmc = 0; bmc < 2; bmc++) {
        for (let node = 0; node < 2; node++) {
          const nid = nids.liquidCooled++;
          out.push(
            buildHardware(xn.node({ cabinet, chassis, slot, bmc, node }), template.class, {
              NID: nid,
              Role: "Compute",
              Aliases: [`nid${pad(nid, 6)}`],
            }),
          );
        }
      }
    }
  }
  return out;
}

function sortedTemplates(cabinets: Record<string, CabinetTemplate>): CabinetTemplate[] {
  return Object.keys(cabinets)
    .sort(xn.compareXnames)
    .map((x) => cabinets[x]);
}

export function generateSlsState(input: GeneratorInput, rows: HmnRow[], logger: Logger): SlsState {
  logger.info("generating SLS state", { rows: rows.length, switches: Object.keys(input.managementSwitches).length });
  verifyRiverSwitches(input);

  const g: Generator = { input, logger, nids: newNidSequence(input.mountainStartingNid), parentU: resolveParents(rows) };
  const cabinets: GenericHardware[] = sortedTemplates(input.riverCabinets).map((t) =>
    buildHardware(t.xname, t.class, cabinetProperties(t)),
  );
  const nodes: GenericHardware[] = [];
  const connectors: GenericHardware[] = [];

  for (const row of rows) {
    const hw = riverHardwareFromRow(g, row);
    if (!hw) {
      logger.debug("Found empty hardware, ignoring...", { row });
      continue;
    }
    const problem = airCooledProblem(input, xn.cabinet(rackNumber(row.SourceRack, row)));
    if (problem) die(`${hw.Xname}: ${problem}`, TopologyError);
    nodes.push(hw);
    if (hasUplink(row)) connectors.push(connectorFor(g, hw, row));
  }

  // Hill NIDs are handed out before Mountain ones.
  for (const t of sortedTemplates(input.hillCabinets)) nodes.push(...liquidCooledHardware(t, g.nids));
  for (const t of sortedTemplates(input.mountainCabinets)) nodes.push(...liquidCooledHardware(t, g.nids));

  const merged = new Map<string, GenericHardware>();
  for (const hw of [...cabinets, ...nodes, ...connectors, ...Object.values(input.managementSwitches)]) {
    merged.set(hw.Xname, hw);
  }
  const Hardware = Object.fromEntries([...merged.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));

  logger.info("generated SLS state", { hardware: merged.size, connectors: connectors.length });
  return { Hardware, Networks: input.networks };
}
