import Ajv from "ajv";
import type { AnySchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

/**
 * Process-wide cache of compiled validators, keyed by schema content.
 * Compiling is the expensive part; validating is cheap.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  /**
   * Gets or creates a cached validator for a schema object.
   */
  static getValidatorFromSchema(schema: AnySchemaObject): ValidateFunction {
    const schemaKey = JSON.stringify(schema);

    const cached = this.schemaValidators.get(schemaKey);
    if (cached) {
      return cached;
    }

    // $id is dropped so two schemas sharing an id cannot collide inside one Ajv instance
    const { $id: _id, ...schemaWithoutId } = schema;
    const validator = this.getAjv().compile(schemaWithoutId);
    this.schemaValidators.set(schemaKey, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemaValidators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number } {
    return { cachedSchemas: this.schemaValidators.size };
  }

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }
}
