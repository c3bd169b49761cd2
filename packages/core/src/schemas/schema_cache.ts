import Ajv from "ajv";
import type { AnySchema, ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

/**
 * Singleton cache of compiled AJV validators.
 * Schemas are keyed by their serialized form so callers can pass
 * module-level schema constants without registering them first.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, useDefaults: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object (already parsed YAML/JSON)
   */
  static getValidatorFromSchema<T = unknown>(schema: AnySchema): ValidateFunction<T> {
    const schemaKey = JSON.stringify(schema);

    let validator = this.schemaValidators.get(schemaKey);
    if (!validator) {
      validator = this.getAjv().compile(schema);
      this.schemaValidators.set(schemaKey, validator);
    }

    return validator as ValidateFunction<T>;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemaValidators.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number } {
    return { cachedSchemas: this.schemaValidators.size };
  }
}

/**
 * Flattens AJV errors into `path: message` lines.
 * The root path is reported as `/`.
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return [];
  }
  return errors.map((error) => `${error.instancePath || "/"}: ${error.message ?? "is invalid"}`);
}
