import { validateCabinetGroups, loadCabinetDetailFile, type CabinetGroupDetail } from "./cabinets.js";
import { emptyAppNodeConfig, loadAppNodeConfig, normalizeAppNodeConfig, validateAppNodeConfig, type AppNodeConfig } from "./app_node_config.js";
import { ConfigValidationError, validateAll } from "./errors.js";
import type { HmnRow } from "./hmn_rows.js";
import type { Logger } from "./logger.js";
import { lookUpSubnet } from "./network.js";
import { buildCsmNetworks, defaultLayouts, finalizeDhcpRanges, reserveUanAddresses, type NetworkMap } from "./network_builder.js";
import { defaultSiteConfig, loadSiteConfig, type SiteConfig } from "./site_config.js";
import { cabinetTemplates, managementSwitchesToSls, mergeSwitchMetadata, networksToSls, switchesFromReservations } from "./sls_convert.js";
import { generateSlsState } from "./sls_state_generator.js";
import type { SlsState } from "./sls_types.js";
import { normalizeSwitch, readSwitchCsv, validateSwitches, type ManagementSwitch } from "./switches.js";

export type SiteInputs = {
  groups: CabinetGroupDetail[];
  switches: ManagementSwitch[];
  appNodeConfig: AppNodeConfig;
  siteConfig: SiteConfig;
};

export type InputPaths = {
  cabinets: string;
  switches: string;
  appNodeConfig?: string;
  systemConfig?: string;
};

export function loadInputs(paths: InputPaths): SiteInputs {
  return {
    groups: loadCabinetDetailFile(paths.cabinets),
    switches: readSwitchCsv(paths.switches),
    appNodeConfig: paths.appNodeConfig ? loadAppNodeConfig(paths.appNodeConfig) : emptyAppNodeConfig(),
    siteConfig: paths.systemConfig ? loadSiteConfig(paths.systemConfig) : defaultSiteConfig(),
  };
}

/** Every problem across the cabinets, switches and app-node config, or undefined. */
export function validateInputs(inputs: SiteInputs): ConfigValidationError | undefined {
  const normalized = normalizeAppNodeConfig(inputs.appNodeConfig);
  return validateAll("input validation", [
    validateCabinetGroups(inputs.groups),
    validateSwitches(inputs.switches.map(normalizeSwitch)),
    "error" in normalized ? normalized.error : validateAppNodeConfig(normalized.config),
  ]);
}

/** Normalizes xnames and prefixes, throwing when anything fails validation. */
export function prepareInputs(inputs: SiteInputs): SiteInputs {
  const invalid = validateInputs(inputs);
  if (invalid) throw invalid;
  const normalized = normalizeAppNodeConfig(inputs.appNodeConfig);
  if ("error" in normalized) throw normalized.error;
  return { ...inputs, switches: inputs.switches.map(normalizeSwitch), appNodeConfig: normalized.config };
}

export function buildNetworks(inputs: SiteInputs, logger: Logger): NetworkMap {
  const { groups, switches, siteConfig } = inputs;
  return buildCsmNetworks(defaultLayouts(siteConfig, groups), groups, switches, siteConfig, logger);
}

/** The network plan on its own, with settled DHCP ranges. */
export function planNetworks(inputs: SiteInputs, logger: Logger): NetworkMap {
  const networks = buildNetworks(inputs, logger);
  finalizeDhcpRanges(networks, inputs.siteConfig);
  return networks;
}

/**
 * Networks first, then the cabinet and switch inventory they address, then the
 * hardware inferred from the HMN rows. UAN addresses are reserved before the
 * DHCP ranges are settled so the ranges start past them.
 */
export function generateSls(inputs: SiteInputs, rows: HmnRow[], logger: Logger): SlsState {
  const networks = buildNetworks(inputs, logger);
  const templates = cabinetTemplates(inputs.groups, networks);
  const reserved = switchesFromReservations(lookUpSubnet(networks.HMN, "network_hardware"));
  const state = generateSlsState(
    {
      appNodeConfig: inputs.appNodeConfig,
      managementSwitches: managementSwitchesToSls(mergeSwitchMetadata(reserved, inputs.switches)),
      riverCabinets: templates.River,
      hillCabinets: templates.Hill,
      mountainCabinets: templates.Mountain,
      mountainStartingNid: inputs.siteConfig.startingMountainNid,
      networks: {},
    },
    rows,
    logger,
  );
  const uans = reserveUanAddresses(networks, state.Hardware);
  if (uans.length) logger.info("reserved UAN addresses", { count: uans.length });
  finalizeDhcpRanges(networks, inputs.siteConfig);
  return { Hardware: state.Hardware, Networks: networksToSls(networks) };
}
