/**
 * Raised before any generation or search work when the inputs are malformed:
 * bad maze dimensions, or a start/goal outside the grid or on a wall.
 *
 * An unreachable goal is never reported this way; it is an empty path.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}
