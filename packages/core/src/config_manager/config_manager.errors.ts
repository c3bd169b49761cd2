export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** Every schema or consistency violation, one `path: message` line each */
export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly source: string,
    public readonly errors: string[]
  ) {
    super(`ConfigValidation: ${source}:\n  ${errors.join("\n  ")}`);
    this.name = "ConfigValidationError";
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(public readonly source: string) {
    super(`ConfigNotFound: ${source}: no configuration file; run "gradewatch config init"`);
    this.name = "ConfigNotFoundError";
    Object.setPrototypeOf(this, ConfigNotFoundError.prototype);
  }
}

export class ConfigParseError extends ConfigError {
  constructor(
    public readonly source: string,
    reason: string
  ) {
    super(`ConfigParse: ${source}: ${reason}`);
    this.name = "ConfigParseError";
    Object.setPrototypeOf(this, ConfigParseError.prototype);
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isConfigValidationError(error: unknown): error is ConfigValidationError {
  return error instanceof ConfigValidationError;
}
