/**
 * Base class for every error raised while building a plugin stage.
 * All of them are raised before any data moves.
 */
export class PluginIOError extends Error {
  /** Whether retrying the same call can succeed. Build-time errors never can. */
  readonly retryable: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A required request field was not set.
 */
export class MissingConfigurationError extends PluginIOError {
  constructor(readonly field: string) {
    super(`Missing required configuration: ${field}`);
  }
}

/**
 * A plugin parameter could not be mapped onto its configuration field.
 */
export class ConfigMappingError extends PluginIOError {
  constructor(
    readonly field: string,
    readonly reason: string
  ) {
    super(`Invalid plugin parameter "${field}": ${reason}`);
  }
}

/**
 * Declared types or directories disagree with what the plugin's format actually uses.
 */
export class ConfigurationMismatchError extends PluginIOError {}

/**
 * Permanent capability gap, e.g. writing through an unbounded plugin.
 */
export class UnsupportedOperationError extends PluginIOError {}

/**
 * Guard for required request fields. Empty strings count as missing.
 */
export const requireArg = <T>(value: T | null | undefined, field: string): T => {
  if (value === null || value === undefined || value === '') {
    throw new MissingConfigurationError(field);
  }
  return value;
};
