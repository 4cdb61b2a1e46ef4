import { z } from "zod";
import { ConfigValidationError, validateAll } from "./errors.js";
import { getType, isValid, normalize, T } from "./xname.js";
import { loadYaml, parseInput, sortedKeys } from "./util.js";

export type AppNodeConfig = {
  prefixes: string[];
  prefixHsmSubroles: Record<string, string>;
  aliases: Record<string, string[]>;
};

export type AppNodeMatch = {
  prefix: string;
  subRole: string;
};

export const DEFAULT_APP_NODE_PREFIXES = ["uan", "gn", "ln"];

export const DEFAULT_APP_NODE_SUBROLES: Record<string, string> = {
  uan: "UAN",
  ln: "UAN",
  gn: "Gateway",
};

export const SUBROLE_PLACEHOLDER = "~fixme~";

export function emptyAppNodeConfig(): AppNodeConfig {
  return { prefixes: [], prefixHsmSubroles: {}, aliases: {} };
}

/**
 * Lower-cases prefixes and subrole keys and normalizes alias xnames. The input
 * is left as it was; a key that collides with another after normalization is
 * reported instead of merged.
 */
export function normalizeAppNodeConfig(config: AppNodeConfig): { config: AppNodeConfig } | { error: ConfigValidationError } {
  const prefixHsmSubroles: Record<string, string> = {};
  for (const prefix of Object.keys(config.prefixHsmSubroles)) {
    const lower = prefix.toLowerCase();
    if (lower in prefixHsmSubroles) {
      return {
        error: new ConfigValidationError(
          `found a duplicate application node prefix after normalization - Prefix: ${prefix}, Normalized Prefix: ${lower}`,
        ),
      };
    }
    prefixHsmSubroles[lower] = config.prefixHsmSubroles[prefix];
  }

  const aliases: Record<string, string[]> = {};
  for (const xname of Object.keys(config.aliases)) {
    const normalized = normalize(xname);
    if (normalized in aliases) {
      return {
        error: new ConfigValidationError(
          `found a duplicate application node xname after normalization - Xname: ${xname}, Normalized Xname: ${normalized}`,
        ),
      };
    }
    aliases[normalized] = [...config.aliases[xname]];
  }

  return { config: { prefixes: config.prefixes.map((p) => p.toLowerCase()), prefixHsmSubroles, aliases } };
}

export function validateAppNodeConfig(config: AppNodeConfig): ConfigValidationError | undefined {
  const results: Array<ConfigValidationError | undefined> = [];
  const xnames = sortedKeys(config.aliases);

  for (const xname of xnames) {
    if (!isValid(xname)) {
      results.push(new ConfigValidationError(`invalid xname for application node used as key in Aliases map: ${xname}`));
    } else if (getType(xname) !== T.Node) {
      results.push(new ConfigValidationError(`invalid type ${getType(xname)} for Application xname in Aliases map: ${xname}`));
    }
  }

  const owners = new Map<string, string>();
  for (const xname of xnames) {
    for (const alias of config.aliases[xname]) {
      const owner = owners.get(alias);
      if (owner !== undefined) {
        results.push(new ConfigValidationError(`found duplicate application node alias: ${alias} for xnames ${owner} ${xname}`));
        continue;
      }
      owners.set(alias, xname);
    }
  }

  const unmapped = sortedKeys(config.prefixHsmSubroles).filter((p) => config.prefixHsmSubroles[p] === SUBROLE_PLACEHOLDER);
  if (unmapped.length > 1) {
    results.push(
      new ConfigValidationError(
        `prefixes, '${unmapped.join(", ")}', have no subrole mapping. Replace \`${SUBROLE_PLACEHOLDER}\` placeholders with valid subroles in the Application Node Config file`,
      ),
    );
  } else if (unmapped.length === 1) {
    results.push(
      new ConfigValidationError(
        `prefix, '${unmapped[0]}', has no subrole mapping. Replace \`${SUBROLE_PLACEHOLDER}\` placeholder with a valid subrole in the Application Node Config file`,
      ),
    );
  }

  return validateAll("application node config validation", results);
}

// User prefixes are tried before the defaults; user subroles override the default ones.
export function matchApplicationPrefix(sourceLower: string, config: AppNodeConfig): AppNodeMatch | undefined {
  const subRoles = { ...DEFAULT_APP_NODE_SUBROLES, ...config.prefixHsmSubroles };
  const prefix = [...config.prefixes, ...DEFAULT_APP_NODE_PREFIXES].find((p) => sourceLower.startsWith(p));
  if (prefix === undefined) return undefined;
  return { prefix, subRole: subRoles[prefix] ?? "" };
}

export function appNodeAliases(config: AppNodeConfig, xname: string): string[] {
  return config.aliases[xname] ?? [];
}

const appNodeConfigFileSchema = z.object({
  prefixes: z.array(z.string()).nullish(),
  prefix_hsm_subroles: z.record(z.string()).nullish(),
  aliases: z.record(z.array(z.string())).nullish(),
});

export function appNodeConfigFromFile(data: unknown, source: string): AppNodeConfig {
  const file = parseInput(appNodeConfigFileSchema, data ?? {}, source);
  return {
    prefixes: file.prefixes ?? [],
    prefixHsmSubroles: file.prefix_hsm_subroles ?? {},
    aliases: file.aliases ?? {},
  };
}

export function loadAppNodeConfig(path: string): AppNodeConfig {
  return appNodeConfigFromFile(loadYaml(path), `application node config ${path}`);
}
