import Papa from "papaparse";
import { z } from "zod";
import { ConfigValidationError, validateAll } from "./errors.js";
import { getType, isValid, normalize, T } from "./xname.js";
import { pad, parseInput, readText } from "./util.js";

export type SwitchType = "CDU" | "Leaf" | "LeafBMC" | "Spine" | "Aggregation";

export const SWITCH_TYPES: readonly SwitchType[] = ["CDU", "Leaf", "LeafBMC", "Spine", "Aggregation"];

// Reservation and hostname prefix for each switch type.
export const SWITCH_NAME_PREFIX: Record<SwitchType, string> = {
  Spine: "sw-spine",
  Leaf: "sw-leaf",
  LeafBMC: "sw-leaf-bmc",
  Aggregation: "sw-agg",
  CDU: "sw-cdu",
};

// Brand and type stay plain strings until validation, as they come straight from the CSV.
export type ManagementSwitch = {
  xname: string;
  name: string;
  brand: string;
  model: string;
  os?: string;
  firmware?: string;
  type: string;
  managementInterface?: number;
};

export function isSwitchType(s: string): s is SwitchType {
  return SWITCH_TYPES.some((t) => t === s);
}

export function validateSwitch(sw: ManagementSwitch): ConfigValidationError | undefined {
  const x = sw.xname;
  if (!isValid(x)) return new ConfigValidationError(`invalid xname for Switch: ${x}`);
  if (!isSwitchType(sw.type)) return new ConfigValidationError(`invalid management switch type: ${x} ${sw.type}`);
  const hmsType = getType(x);
  switch (sw.type) {
    case "Leaf":
    case "LeafBMC":
      if (hmsType !== T.MgmtSwitch) {
        return new ConfigValidationError(`invalid xname used for ${sw.type} switch: ${x},  should use xXcCwW format`);
      }
      return undefined;
    case "Spine":
    case "Aggregation":
      if (hmsType !== T.MgmtHLSwitch) {
        return new ConfigValidationError(`invalid xname used for Spine/Aggregation switch: ${x}, should use xXcChHsS format`);
      }
      return undefined;
    case "CDU":
      // dDwW for CDU-powered switches, xXcChHsS when racked in a river cabinet next to a hill cabinet.
      if (hmsType !== T.CDUMgmtSwitch && hmsType !== T.MgmtHLSwitch) {
        return new ConfigValidationError(
          `invalid xname used for CDU switch: ${x}, should use dDwW format (if in an adjacent river cabinet to a hill cabinet use the xXcChHsS format)`,
        );
      }
      return undefined;
  }
}

export function validateSwitches(switches: ManagementSwitch[]): ConfigValidationError | undefined {
  if (!switches.length) return new ConfigValidationError("unable to extract Switches from switch metadata csv");
  return validateAll("switch metadata validation", switches.map(validateSwitch));
}

export function normalizeSwitch(sw: ManagementSwitch): ManagementSwitch {
  return { ...sw, xname: normalize(sw.xname) };
}

/** Names switches `sw-<type>-NNN`, numbering each type separately in input order. */
export function assignSwitchNames(switches: ManagementSwitch[]): ManagementSwitch[] {
  const counters = new Map<string, number>();
  return switches.map((sw) => {
    if (!isSwitchType(sw.type)) return sw;
    const n = (counters.get(sw.type) ?? 0) + 1;
    counters.set(sw.type, n);
    return { ...sw, name: `${SWITCH_NAME_PREFIX[sw.type]}-${pad(n, 3)}` };
  });
}

export function switchXnamesByType(switches: ManagementSwitch[], type: SwitchType): string[] {
  return switches.filter((sw) => sw.type === type).map((sw) => sw.xname);
}

const csvRowSchema = z.object({
  "Switch Xname": z.string().min(1),
  Type: z.string(),
  Brand: z.string().default(""),
  Model: z.string().default(""),
});

export function parseSwitchCsv(text: string, source = "switch metadata"): ManagementSwitch[] {
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim(),
    transform: (v) => v.trim(),
  });
  if (parsed.errors.length) {
    throw new ConfigValidationError(
      `invalid ${source}`,
      parsed.errors.map((e) => `row ${e.row ?? "?"}: ${e.message}`),
    );
  }
  const rows = parseInput(z.array(csvRowSchema), parsed.data, source);
  return assignSwitchNames(
    rows.map((r) => ({ xname: r["Switch Xname"], name: "", brand: r.Brand, model: r.Model, type: r.Type })),
  );
}

export function readSwitchCsv(path: string): ManagementSwitch[] {
  return parseSwitchCsv(readText(path), `switch metadata ${path}`);
}
