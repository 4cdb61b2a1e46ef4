import { z } from "zod";
import { TopologyError } from "./errors.js";
import { matchApplicationPrefix, type AppNodeConfig } from "./app_node_config.js";
import { die, pad, parseInput, parseInteger, readText } from "./util.js";

export type HmnRow = {
  Source: string;
  SourceRack: string;
  SourceLocation: string;
  SourceSubLocation: string;
  SourceParent: string;
  DestinationRack: string;
  DestinationLocation: string;
  DestinationPort: string;
};

export type ManagementSubRole = "Master" | "Worker" | "Storage" | "FabricManager";

export type NodeIdentity =
  | { role: "Management"; subRole: ManagementSubRole; index: number; alias: string }
  | { role: "Compute"; nid: number; alias: string }
  | { role: "Application"; subRole: string }
  | { role: "System" };

export type RowClassification =
  | { kind: "tor" }
  | { kind: "pdu"; controller: number }
  | { kind: "door" }
  | { kind: "mgmt-switch" }
  | { kind: "node"; node: NodeIdentity }
  | { kind: "unknown" };

export type RackPosition = {
  u: number;
  bmc: number;
};

const PDU_RE = /(x\d+p|pdu)(\d+)/;
const U_RE = /[a-zA-Z]*(\d+)([a-zA-Z]*)/;
const COMPUTE_RE = /(\d+$)/;
const PORT_RE = /[a-zA-Z]*(\d+)/;

// Current and deprecated management switch names.
const MGMT_SWITCH_PREFIXES = ["sw-leaf", "sw-25g", "sw-40g", "sw-leaf-bmc", "sw-agg", "sw-smn"];

const MANAGEMENT_PREFIXES: Array<{ prefix: string; subRole: ManagementSubRole; alias: (n: number) => string }> = [
  { prefix: "mn", subRole: "Master", alias: (n) => `ncn-m${pad(n, 3)}` },
  { prefix: "wn", subRole: "Worker", alias: (n) => `ncn-w${pad(n, 3)}` },
  { prefix: "sn", subRole: "Storage", alias: (n) => `ncn-s${pad(n, 3)}` },
  { prefix: "fmn", subRole: "FabricManager", alias: (n) => `fmn${pad(n, 3)}` },
];

function toInt(s: string, what: string, row: HmnRow): number {
  const n = parseInteger(s);
  if (Number.isNaN(n)) die(`failed to parse ${what} "${s}" as an integer (source ${row.Source})`, TopologyError);
  return n;
}

function classifyNode(row: HmnRow, lower: string, config: AppNodeConfig): NodeIdentity | undefined {
  for (const m of MANAGEMENT_PREFIXES) {
    if (!lower.startsWith(m.prefix)) continue;
    const index = toInt(lower.slice(m.prefix.length), "management node index", row);
    return { role: "Management", subRole: m.subRole, index, alias: m.alias(index) };
  }
  if (lower.startsWith("nid") || lower.startsWith("cn")) {
    const m = COMPUTE_RE.exec(row.Source);
    if (!m) return die(`did not find a NID number in source ${row.Source}`, TopologyError);
    const nid = toInt(m[1], "NID", row);
    return { role: "Compute", nid, alias: `nid${pad(nid, 6)}` };
  }
  const app = matchApplicationPrefix(lower, config);
  if (app) return { role: "Application", subRole: app.subRole };
  if (lower.includes("cmc")) return { role: "System" };
  return undefined;
}

type Rule = (row: HmnRow, lower: string, config: AppNodeConfig) => RowClassification | undefined;

// Evaluated in order; the first rule that answers wins.
const RULES: Rule[] = [
  (_row, lower) => (lower === "columbia" || lower.startsWith("sw-hsn") ? { kind: "tor" } : undefined),
  (row, lower) => {
    const m = PDU_RE.exec(lower);
    return m ? { kind: "pdu", controller: toInt(m[2], "PDU number", row) } : undefined;
  },
  (_row, lower) => (lower.includes("door") ? { kind: "door" } : undefined),
  (_row, lower) => (MGMT_SWITCH_PREFIXES.some((p) => lower.startsWith(p)) ? { kind: "mgmt-switch" } : undefined),
  (row, lower, config) => {
    const node = classifyNode(row, lower, config);
    return node ? { kind: "node", node } : undefined;
  },
];

export function classifyRow(row: HmnRow, config: AppNodeConfig): RowClassification {
  const lower = row.Source.toLowerCase();
  for (const rule of RULES) {
    const c = rule(row, lower, config);
    if (c) return c;
  }
  return { kind: "unknown" };
}

/**
 * U number and BMC ordinal from the source location. A sub-location of L or R,
 * or the same letter stuck to the end of the U, selects BMC 1 or 2.
 */
export function rackPosition(row: HmnRow): RackPosition {
  const m = U_RE.exec(row.SourceLocation);
  if (!m) return die(`did not find a U number in source location "${row.SourceLocation}" (source ${row.Source})`, TopologyError);
  const dangling = m[2].toLowerCase();
  const sub = row.SourceSubLocation.toLowerCase();
  let bmc = 0;
  if (sub === "l" || dangling === "l") bmc = 1;
  else if (sub === "r" || dangling === "r") bmc = 2;
  return { u: toInt(m[1], "U number", row), bmc };
}

export function rackNumber(rack: string, row: HmnRow): number {
  const s = rack.toLowerCase().replace(/^x/, "");
  return toInt(s, "cabinet number", row);
}

export function destinationU(row: HmnRow): number {
  return toInt(row.DestinationLocation.toLowerCase().replace(/^u/, ""), "destination location", row);
}

// Ports show up as j12, p12 or plain 12.
export function destinationPort(row: HmnRow): number {
  const m = PORT_RE.exec(row.DestinationPort);
  if (!m) return die(`did not find a port number in destination port "${row.DestinationPort}"`, TopologyError);
  return toInt(m[1], "destination port", row);
}

export function hasUplink(row: HmnRow): boolean {
  const port = row.DestinationPort.trim();
  return port !== "" && port !== "0";
}

const field = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? "" : String(v)));

const hmnRowSchema = z.object({
  Source: field,
  SourceRack: field,
  SourceLocation: field,
  SourceSubLocation: field,
  SourceParent: field,
  DestinationRack: field,
  DestinationLocation: field,
  DestinationPort: field,
});

export function parseHmnConnections(data: unknown, source = "HMN connections"): HmnRow[] {
  return parseInput(z.array(hmnRowSchema), data, source);
}

export function loadHmnConnections(path: string): HmnRow[] {
  const raw: unknown = JSON.parse(readText(path));
  return parseHmnConnections(raw, `HMN connections ${path}`);
}
