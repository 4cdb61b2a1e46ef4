export class SiteInitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed xname, or an xname of the wrong type for where it is used. */
export class XnameError extends SiteInitError {}

/** Input files that failed normalization or validation. */
export class ConfigValidationError extends SiteInitError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.issues = issues.length ? issues : [message];
  }
}

/** Fatal inconsistencies found while deriving hardware from the HMN connections. */
export class TopologyError extends SiteInitError {}

/** Subnet carving, reservation, and lookup failures. */
export class AllocationError extends SiteInitError {}

export type ErrorClass = new (message: string) => SiteInitError;

// Collects the errors returned by validation passes into one, flattening errors that already aggregate several.
export function validateAll(label: string, results: Array<SiteInitError | undefined>): ConfigValidationError | undefined {
  const issues = results
    .filter((e): e is SiteInitError => e !== undefined)
    .flatMap((e) => (e instanceof ConfigValidationError ? e.issues : [e.message]));
  if (!issues.length) return undefined;
  if (issues.length === 1) return new ConfigValidationError(issues[0]);
  return new ConfigValidationError(`${label} failed with ${issues.length} problems`, issues);
}
