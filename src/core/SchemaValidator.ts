import AjvModule, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";

// ajv and ajv-formats are CommonJS; under NodeNext their classes sit on `.default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/**
 * Schema validation result.
 */
export interface ValidationResult {
  valid: boolean;
  errors?: ErrorObject[];
  /** Validated copy with defaults applied */
  data?: unknown;
}

/**
 * AJV-based JSON Schema validator.
 * Always validates a clone, so callers' payloads are never mutated.
 */
export class SchemaValidator {
  private readonly ajv: InstanceType<typeof Ajv>;
  private readonly cache = new Map<string, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      useDefaults: true,
      strict: false,
    });
    addFormats(this.ajv);
  }

  /**
   * Validate data against a JSON Schema.
   */
  validate(schema: object, data: unknown): ValidationResult {
    const validate = this.getOrCompile(schema);
    const cloned = structuredClone(data);
    if (validate(cloned)) {
      return { valid: true, data: cloned };
    }
    return { valid: false, errors: validate.errors ?? [] };
  }

  /**
   * Boolean form of validate(), for capability handles.
   */
  check(schema: object, data: unknown): boolean {
    return this.validate(schema, data).valid;
  }

  /**
   * Validate and return the validated copy, or throw a descriptive error.
   */
  validateOrThrow(schema: object, data: unknown, context: string): unknown {
    const result = this.validate(schema, data);
    if (!result.valid) {
      const errors = result.errors ?? [];
      throw new SchemaValidationError(
        `${context}: ${formatValidationErrors(errors).join("; ")}`,
        errors,
      );
    }
    return result.data;
  }

  private getOrCompile(schema: object): ValidateFunction {
    const key = JSON.stringify(schema);
    let cached = this.cache.get(key);
    if (!cached) {
      cached = this.ajv.compile(schema);
      this.cache.set(key, cached);
    }
    return cached;
  }
}

/**
 * Render AJV errors as `path message` strings.
 */
export function formatValidationErrors(errors: ErrorObject[]): string[] {
  return errors.map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
}

/**
 * Error thrown on schema validation failure.
 */
export class SchemaValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ErrorObject[],
  ) {
    super(message);
    this.name = "SchemaValidationError";
  }
}
