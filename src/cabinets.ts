import { z } from "zod";
import { ConfigValidationError, validateAll } from "./errors.js";
import { cabinet as cabinetXname } from "./xname.js";
import { loadYaml, parseInput } from "./util.js";

export type CabinetKind = "river" | "hill" | "mountain" | "EX2000" | "EX2500" | "EX3000" | "EX4000";

export type CabinetClass = "River" | "Hill" | "Mountain";

export const CABINET_KINDS: readonly CabinetKind[] = ["river", "hill", "mountain", "EX2000", "EX2500", "EX3000", "EX4000"];

export type ChassisCount = {
  liquidCooled: number;
  airCooled: number;
};

export type CabinetDetail = {
  id: number;
  model?: string;
  chassisCount?: ChassisCount;
  nmnSubnet?: string;
  nmnVlanId?: number;
  hmnSubnet?: string;
  hmnVlanId?: number;
};

// `kind` stays a plain string until validation so unknown kinds can be reported, not dropped.
export type CabinetGroupDetail = {
  kind: string;
  cabinets: number;
  startingCabinet: number;
  ids?: number[];
  cabinetDetails: CabinetDetail[];
};

export type CabinetFilter = (group: CabinetGroupDetail, detail: CabinetDetail) => boolean;

export type ChassisLists = {
  liquidCooled: number[];
  airCooled: number[];
};

export const MOUNTAIN_CHASSIS = [0, 1, 2, 3, 4, 5, 6, 7];
export const HILL_CHASSIS = [1, 3];
export const RIVER_CHASSIS = [0];
// Air-cooled chassis ordinal inside an EX2500.
export const EX2500_AIR_COOLED_CHASSIS = 4;

export function isCabinetKind(kind: string): kind is CabinetKind {
  return CABINET_KINDS.some((k) => k === kind);
}

export function isModel(kind: string): boolean {
  return kind.startsWith("EX") && isCabinetKind(kind);
}

export function cabinetClass(kind: string): CabinetClass {
  switch (kind) {
    case "river":
      return "River";
    case "EX2000":
    case "EX2500":
    case "hill":
      return "Hill";
    case "EX3000":
    case "EX4000":
    case "mountain":
      return "Mountain";
    default:
      throw new ConfigValidationError(`unknown cabinet kind (${kind})`);
  }
}

/**
 * Fills the group's cabinet list up to its total. A cabinet without an id gets
 * `starting_id + index`. An explicit `ids` list sets the order and wins over the
 * starting id.
 */
export function populateIds(group: CabinetGroupDetail): void {
  if (group.ids?.length) {
    const byId = new Map(group.cabinetDetails.map((d) => [d.id, d]));
    const listed = group.ids.map((id) => byId.get(id) ?? { id });
    const unlisted = group.cabinetDetails.filter((d) => !group.ids?.includes(d.id));
    group.cabinetDetails = [...listed, ...unlisted];
    group.cabinets = Math.max(group.cabinets, group.cabinetDetails.length);
    return;
  }
  if (group.cabinetDetails.length >= group.cabinets) return;
  for (let i = 0; i < group.cabinets; i++) {
    const detail = group.cabinetDetails[i] ?? { id: 0 };
    if (detail.id === 0) detail.id = group.startingCabinet + i;
    group.cabinetDetails[i] = detail;
  }
}

export function cabinetIds(group: CabinetGroupDetail): number[] {
  return group.cabinetDetails.map((d) => d.id);
}

export function cabinetDetailsById(group: CabinetGroupDetail): Map<number, CabinetDetail> {
  return new Map(group.cabinetDetails.map((d) => [d.id, d]));
}

export function groupLength(group: CabinetGroupDetail): number {
  return group.cabinetDetails.length || group.cabinets;
}

export function cabinetKindFilter(kind: string): CabinetFilter {
  return (group) => group.kind === kind;
}

export function cabinetClassFilter(cls: CabinetClass): CabinetFilter {
  return (group) => isCabinetKind(group.kind) && cabinetClass(group.kind) === cls;
}

export function airCooledChassisCountFilter(n: number): CabinetFilter {
  return (_group, detail) => detail.chassisCount !== undefined && detail.chassisCount.airCooled === n;
}

export function liquidCooledChassisCountFilter(n: number): CabinetFilter {
  return (_group, detail) => detail.chassisCount !== undefined && detail.chassisCount.liquidCooled === n;
}

export function andFilter(...filters: CabinetFilter[]): CabinetFilter {
  return (group, detail) => filters.every((f) => f(group, detail));
}

export function orFilter(...filters: CabinetFilter[]): CabinetFilter {
  return (group, detail) => filters.some((f) => f(group, detail));
}

export function ex2500AirCooledChassisFilter(): CabinetFilter {
  return (group, detail) => (detail.model ?? group.kind) === "EX2500" && (detail.chassisCount?.airCooled ?? 0) > 0;
}

/**
 * Chassis that exist in one cabinet. Only EX2500 cabinets take a chassis-count
 * override, and it must describe 1-3 liquid-cooled chassis, or one air-cooled
 * chassis with at most one liquid-cooled chassis.
 */
export function chassisLists(kind: string, detail: CabinetDetail): ChassisLists {
  const cls = cabinetClass(kind);
  const x = cabinetXname(detail.id);
  const count = detail.chassisCount;
  if (kind !== "EX2500") {
    if (count) {
      const what = cls === "Hill" ? "hill (EX2000)" : cls.toLowerCase();
      throw new ConfigValidationError(`Overriding air or liquid cooled chassis counts is not permitted for ${what} cabinets (${x})`);
    }
    if (cls === "River") return { liquidCooled: [], airCooled: RIVER_CHASSIS };
    return { liquidCooled: cls === "Hill" ? HILL_CHASSIS : MOUNTAIN_CHASSIS, airCooled: [] };
  }
  if (!count) {
    throw new ConfigValidationError(
      `EX2500 cabinet ${x} requires chassis counts; give it a chassis-count with air-cooled and liquid-cooled entries in the cabinets file`,
    );
  }
  if (count.airCooled === 0) {
    if (count.liquidCooled < 1 || count.liquidCooled > 3) {
      throw new ConfigValidationError(
        `Invalid liquid-cooled chassis count specified for hill (EX2500) cabinet ${x}. Given ${count.liquidCooled}, expected between 1 and 3`,
      );
    }
    return { liquidCooled: Array.from({ length: count.liquidCooled }, (_, i) => i), airCooled: [] };
  }
  if (count.airCooled === 1) {
    if (count.liquidCooled > 1) {
      throw new ConfigValidationError(
        `Invalid liquid-cooled chassis count specified for hill (EX2500) cabinet ${x}. Given ${count.liquidCooled}, expected 0 or 1 alongside an air-cooled chassis`,
      );
    }
    return { liquidCooled: count.liquidCooled === 1 ? [0] : [], airCooled: [EX2500_AIR_COOLED_CHASSIS] };
  }
  throw new ConfigValidationError(
    `Invalid air-cooled chassis count specified for hill (EX2500) cabinet ${x}. Given ${count.airCooled}, expected 0 or 1`,
  );
}

export function validateCabinetGroups(groups: CabinetGroupDetail[]): ConfigValidationError | undefined {
  const results: Array<ConfigValidationError | undefined> = [];
  const seen = new Map<number, string>();
  for (const group of groups) {
    if (!isCabinetKind(group.kind)) {
      results.push(new ConfigValidationError(`unknown cabinet kind (${group.kind})`));
      continue;
    }
    for (const detail of group.cabinetDetails) {
      const prior = seen.get(detail.id);
      if (prior !== undefined) {
        results.push(new ConfigValidationError(`cabinet id ${detail.id} is used by both ${prior} and ${group.kind} cabinets`));
      }
      seen.set(detail.id, group.kind);
      if (detail.id > 9999) {
        results.push(new ConfigValidationError(`cabinet id ${detail.id} does not fit the xXXXX cabinet format`));
        continue;
      }
      try {
        chassisLists(group.kind, detail);
      } catch (e) {
        if (!(e instanceof ConfigValidationError)) throw e;
        results.push(e);
      }
    }
  }
  return validateAll("cabinet validation", results);
}

const chassisCountSchema = z.object({
  "liquid-cooled": z.number().int().nonnegative().default(0),
  "air-cooled": z.number().int().nonnegative().default(0),
});

const cabinetDetailSchema = z.object({
  id: z.number().int().nonnegative().default(0),
  model: z.string().optional(),
  "chassis-count": chassisCountSchema.optional(),
  "nmn-subnet": z.string().optional(),
  "nmn-vlan": z.number().int().min(0).max(4095).optional(),
  "hmn-subnet": z.string().optional(),
  "hmn-vlan": z.number().int().min(0).max(4095).optional(),
});

const cabinetGroupSchema = z.object({
  type: z.string().min(1),
  total_number: z.number().int().nonnegative().default(0),
  starting_id: z.number().int().nonnegative().default(0),
  ids: z.array(z.number().int().nonnegative()).optional(),
  cabinets: z.array(cabinetDetailSchema).default([]),
});

export const cabinetDetailFileSchema = z.object({
  cabinets: z.array(cabinetGroupSchema).default([]),
});

export type CabinetDetailFile = z.output<typeof cabinetDetailFileSchema>;

export function groupsFromFile(file: CabinetDetailFile): CabinetGroupDetail[] {
  return file.cabinets.map((g) => {
    const group: CabinetGroupDetail = {
      kind: g.type,
      cabinets: g.total_number,
      startingCabinet: g.starting_id,
      ids: g.ids,
      cabinetDetails: g.cabinets.map((c) => ({
        id: c.id,
        model: c.model,
        chassisCount: c["chassis-count"] && {
          liquidCooled: c["chassis-count"]["liquid-cooled"],
          airCooled: c["chassis-count"]["air-cooled"],
        },
        nmnSubnet: c["nmn-subnet"],
        nmnVlanId: c["nmn-vlan"],
        hmnSubnet: c["hmn-subnet"],
        hmnVlanId: c["hmn-vlan"],
      })),
    };
    populateIds(group);
    return group;
  });
}

export function loadCabinetDetailFile(path: string): CabinetGroupDetail[] {
  return groupsFromFile(parseInput(cabinetDetailFileSchema, loadYaml(path), `cabinet detail file ${path}`));
}
