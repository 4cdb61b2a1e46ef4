import { z } from "zod";
import { XnameError } from "./errors.js";
import { dataPath, die, readText } from "./util.js";

export type XnameType = string;

export const INVALID: XnameType = "INVALID";

// Type names referenced directly by the rest of the code.
export const T = {
  System: "System",
  CDU: "CDU",
  CDUMgmtSwitch: "CDUMgmtSwitch",
  Cabinet: "Cabinet",
  CabinetPDUController: "CabinetPDUController",
  Chassis: "Chassis",
  ChassisBMC: "ChassisBMC",
  ComputeModule: "ComputeModule",
  NodeBMC: "NodeBMC",
  Node: "Node",
  RouterModule: "RouterModule",
  RouterBMC: "RouterBMC",
  MgmtSwitch: "MgmtSwitch",
  MgmtSwitchConnector: "MgmtSwitchConnector",
  MgmtHLSwitch: "MgmtHLSwitch",
} as const;

const entrySchema = z.object({
  type: z.string(),
  parentType: z.string(),
  template: z.string(),
  pattern: z.string(),
  format: z.string(),
  numArgs: z.number().int().nonnegative(),
});

export type XnameTypeEntry = z.infer<typeof entrySchema> & { regex: RegExp };

export type ParsedXname = {
  type: XnameType;
  ordinals: number[];
};

function loadTable(): XnameTypeEntry[] {
  const raw: unknown = JSON.parse(readText(dataPath("xname_types.json")));
  return z
    .array(entrySchema)
    .parse(raw)
    .map((e) => ({ ...e, regex: new RegExp(e.pattern) }));
}

const table = loadTable();
const byType = new Map(table.map((e) => [e.type, e]));

export function xnameTypes(): XnameTypeEntry[] {
  return table;
}

export function typeEntry(type: XnameType): XnameTypeEntry {
  return byType.get(type) ?? die(`unknown xname type: ${type}`, XnameError);
}

export function getType(xname: string): XnameType {
  for (const e of table) {
    if (e.regex.test(xname)) return e.type;
  }
  return INVALID;
}

export function isValid(xname: string): boolean {
  return getType(xname) !== INVALID;
}

// Drops a '0' that follows a letter (or a dropped zero) and precedes another digit.
export function removeLeadingZeros(s: string): string {
  if (s.length < 2) return s;
  let out = "";
  let lastLetter = true;
  for (let i = 0; i < s.length - 1; i++) {
    const c = s[i];
    if (c === "0" && lastLetter && isDigit(s[i + 1])) continue;
    lastLetter = !isDigit(c);
    out += c;
  }
  return out + s[s.length - 1];
}

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

export function normalize(xname: string): string {
  return removeLeadingZeros(xname.trim()).toLowerCase();
}

export function parent(xname: string): string {
  const type = getType(xname);
  if (type === T.CDU || type === T.Cabinet) return "s0";
  if (type === INVALID) die(`invalid xname: ${xname}`, XnameError);
  if (type === T.System) die(`xname ${xname} is the system root and has no parent`, XnameError);
  return xname.replace(/[0-9]+$/, "").replace(/[a-zA-Z]+$/, "");
}

export function parse(xname: string): ParsedXname {
  for (const e of table) {
    const m = e.regex.exec(xname);
    if (!m) continue;
    const ordinals = m
      .slice(1)
      .filter((g): g is string => g !== undefined && /^[0-9]+$/.test(g))
      .map((g) => Number.parseInt(g, 10));
    return { type: e.type, ordinals };
  }
  return die(`invalid xname: ${xname}`, XnameError);
}

export function format(type: XnameType, ...ordinals: number[]): string {
  const e = typeEntry(type);
  if (ordinals.length !== e.numArgs) {
    die(`${type} takes ${e.numArgs} ordinals (${e.template}), got ${ordinals.length}`, XnameError);
  }
  let i = 0;
  const out = e.format.replace(/%d/g, () => String(ordinals[i++]));
  if (!e.regex.test(out)) die(`ordinals ${ordinals.join(",")} do not form a valid ${type} (${e.template}): ${out}`, XnameError);
  return out;
}

export function child(parentXname: string, childType: XnameType, ordinal: number): string {
  const p = parse(parentXname);
  const e = typeEntry(childType);
  if (e.parentType !== p.type) {
    die(`cannot add a ${childType} under ${parentXname}: expected a ${e.parentType}, got ${p.type}`, XnameError);
  }
  return format(childType, ...p.ordinals, ordinal);
}

// Fails with a message naming the xname and the type that was expected.
export function expectType(xname: string, ...types: XnameType[]): ParsedXname {
  const p = parse(xname);
  if (!types.includes(p.type)) die(`xname ${xname} is a ${p.type}, expected ${types.join(" or ")}`, XnameError);
  return p;
}

export const cabinet = (id: number) => format(T.Cabinet, id);

export const chassis = (o: { cabinet: number; chassis: number }) => format(T.Chassis, o.cabinet, o.chassis);

export const chassisBmc = (o: { cabinet: number; chassis: number; bmc: number }) =>
  format(T.ChassisBMC, o.cabinet, o.chassis, o.bmc);

export const nodeBmc = (o: { cabinet: number; chassis: number; slot: number; bmc: number }) =>
  format(T.NodeBMC, o.cabinet, o.chassis, o.slot, o.bmc);

export const node = (o: { cabinet: number; chassis: number; slot: number; bmc: number; node: number }) =>
  format(T.Node, o.cabinet, o.chassis, o.slot, o.bmc, o.node);

export const routerBmc = (o: { cabinet: number; chassis: number; slot: number; bmc: number }) =>
  format(T.RouterBMC, o.cabinet, o.chassis, o.slot, o.bmc);

export const cabinetPduController = (o: { cabinet: number; controller: number }) =>
  format(T.CabinetPDUController, o.cabinet, o.controller);

export const mgmtSwitch = (o: { cabinet: number; chassis: number; slot: number }) =>
  format(T.MgmtSwitch, o.cabinet, o.chassis, o.slot);

export const mgmtSwitchConnector = (o: { cabinet: number; chassis: number; slot: number; port: number }) =>
  format(T.MgmtSwitchConnector, o.cabinet, o.chassis, o.slot, o.port);

function segments(xname: string): Array<[string, number]> {
  return [...xname.matchAll(/([^0-9]*)([0-9]*)/g)]
    .filter((m) => m[0].length > 0)
    .map((m): [string, number] => [m[1], m[2] === "" ? -1 : Number.parseInt(m[2], 10)]);
}

// Orders segment by segment, comparing ordinals as numbers: x10 < x100 < x3000.
export function compareXnames(a: string, b: string): number {
  const sa = segments(a);
  const sb = segments(b);
  for (let i = 0; i < Math.min(sa.length, sb.length); i++) {
    const [la, na] = sa[i];
    const [lb, nb] = sb[i];
    if (la !== lb) return la < lb ? -1 : 1;
    if (na !== nb) return na - nb;
  }
  return sa.length - sb.length;
}
