/**
 * Base error class for plugin discovery and installation
 */
export class PluginRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PluginRegistryError";
    Object.setPrototypeOf(this, PluginRegistryError.prototype);
  }
}

/**
 * The downloaded artifact's digest differs from the advertised one.
 * Nothing is written to the install directory.
 */
export class IntegrityError extends PluginRegistryError {
  public readonly institutionCode: string;
  public readonly expected: string;
  public readonly actual: string;

  constructor(institutionCode: string, expected: string, actual: string) {
    super(`IntegrityError: ${institutionCode}: expected sha256 ${expected}, got ${actual}`);
    this.name = "IntegrityError";
    this.institutionCode = institutionCode;
    this.expected = expected;
    this.actual = actual;
    Object.setPrototypeOf(this, IntegrityError.prototype);
  }
}

export class PluginNotFoundError extends PluginRegistryError {
  public readonly institutionCode: string;

  constructor(institutionCode: string, detail = "no adapter with this code") {
    super(`PluginNotFound: ${institutionCode}: ${detail}`);
    this.name = "PluginNotFoundError";
    this.institutionCode = institutionCode;
    Object.setPrototypeOf(this, PluginNotFoundError.prototype);
  }
}

export class IndexUnavailableError extends PluginRegistryError {
  public readonly url: string;

  constructor(url: string, reason: string) {
    super(`IndexUnavailable: ${url}: ${reason}`);
    this.name = "IndexUnavailableError";
    this.url = url;
    Object.setPrototypeOf(this, IndexUnavailableError.prototype);
  }
}

export class PluginDownloadError extends PluginRegistryError {
  public readonly url: string;

  constructor(url: string, reason: string) {
    super(`PluginDownload: ${url}: ${reason}`);
    this.name = "PluginDownloadError";
    this.url = url;
    Object.setPrototypeOf(this, PluginDownloadError.prototype);
  }
}

export class InvalidInstitutionCodeError extends PluginRegistryError {
  public readonly institutionCode: string;

  constructor(institutionCode: string) {
    super(`InvalidInstitutionCode: "${institutionCode}" may only contain letters, digits, "_" and "-"`);
    this.name = "InvalidInstitutionCodeError";
    this.institutionCode = institutionCode;
    Object.setPrototypeOf(this, InvalidInstitutionCodeError.prototype);
  }
}

export function isPluginRegistryError(error: unknown): error is PluginRegistryError {
  return error instanceof PluginRegistryError;
}

export function isIntegrityError(error: unknown): error is IntegrityError {
  return error instanceof IntegrityError;
}

export function isPluginNotFoundError(error: unknown): error is PluginNotFoundError {
  return error instanceof PluginNotFoundError;
}
