export class ComplianceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A single artifact could not be read or decoded. Scoped to that artifact;
 * the run carries on without it.
 */
export class ArtifactLoadError extends ComplianceError {
  constructor(
    readonly artifactId: string,
    readonly reason: string,
  ) {
    super(`Failed to load ${artifactId}: ${reason}`);
  }
}

/**
 * The rule catalog is malformed. Raised before any artifact is scanned.
 */
export class RuleLoadError extends ComplianceError {
  constructor(
    readonly filePath: string,
    readonly problems: readonly string[],
  ) {
    super(`Invalid rule catalog ${filePath}: ${problems.join("; ")}`);
  }
}

export class ConfigLoadError extends ComplianceError {
  constructor(
    readonly configPath: string,
    readonly problems: readonly string[],
  ) {
    super(`Invalid configuration ${configPath}:\n${problems.join("\n")}`);
  }
}

export class TargetError extends ComplianceError {
  constructor(
    readonly target: string,
    message: string,
  ) {
    super(message);
  }
}
