/**
 * Build-time errors. These stop startup and never become responses.
 */

export class BuildError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "BuildError";
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * A route pattern is malformed or disagrees with an already registered
 * pattern on the variable name at the same tree position.
 */
export class ConflictingPatternError extends BuildError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Conflicting route pattern ${pattern}: ${reason}`, "CONFLICTING_PATTERN");
    this.name = "ConflictingPatternError";
    this.pattern = pattern;
  }
}

/**
 * Registration was attempted after the router was frozen.
 */
export class RouterFrozenError extends BuildError {
  constructor(what: string) {
    super(`Router is frozen, cannot register ${what}`, "ROUTER_FROZEN");
    this.name = "RouterFrozenError";
  }
}

/**
 * The application configuration failed validation.
 */
export class ConfigError extends BuildError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, "INVALID_CONFIG");
    this.name = "ConfigError";
    this.issues = issues;
  }
}
