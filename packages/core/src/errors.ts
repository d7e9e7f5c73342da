/**
 * Error types shared across the arithmos packages.
 */

/**
 * Thrown when an internal consistency check fails. Indicates a bug in the
 * caller or the library, never a recoverable condition.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/** Where a rejected configuration value came from. */
export type ConfigSource = "env" | "file" | "programmatic";

/**
 * Thrown when a configuration value does not have the expected shape.
 */
export class ConfigError extends Error {
  constructor(
    readonly path: string,
    readonly source: ConfigSource,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
