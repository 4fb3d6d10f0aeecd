import { resolveConfig, type ErrorKitConfig } from "./config.js";
import { schemaOf, STRUCT, type FieldSchema } from "./schema.js";
import type { FieldViolation, Validator, ValidatorTable } from "./types.js";

/**
 * Walks the declared fields of a value and runs every validator named on
 * each one, recursing into fields marked STRUCT.
 *
 * Violations are returned in discovery order: fields in declaration
 * order, validators left to right, nested results at the position of the
 * STRUCT marker. All validators on a field run, and null or undefined
 * field values are passed to them like any other value.
 */
export class StructValidator {
  private readonly table: ReadonlyMap<string, Validator>;

  constructor(
    table: ValidatorTable,
    private readonly config: ErrorKitConfig = resolveConfig(),
  ) {
    this.table = new Map(Object.entries(table));
  }

  /**
   * Validate a decorated class instance. Values without a declared
   * schema (null, primitives, arrays, plain objects) have nothing to
   * check and yield [].
   */
  validate(value: unknown): FieldViolation[] {
    const violations: FieldViolation[] = [];
    this.walk(value, 0, violations);
    return violations;
  }

  private walk(value: unknown, depth: number, out: FieldViolation[]): void {
    if (typeof value !== "object" || value === null) return;
    const fields = schemaOf(value);
    if (!fields) return;

    for (const field of fields) {
      if (field.validators.length === 0) continue;
      const read = readField(value, field.key);
      if (read.failure) {
        out.push(this.violation(displayName(field), read.failure.message));
        continue;
      }
      const fieldValue = read.value;

      for (const name of field.validators) {
        if (name === STRUCT) {
          if (depth + 1 > this.config.maxDepth && schemaOf(fieldValue)) {
            out.push(
              this.violation(
                displayName(field),
                `nesting depth exceeds ${this.config.maxDepth}`,
              ),
            );
          } else {
            this.walk(fieldValue, depth + 1, out);
          }
          continue;
        }

        const validator = this.table.get(name);
        if (!validator) {
          out.push(
            this.violation(field.key, `undefined validator: ${JSON.stringify(name)}`),
          );
          continue;
        }

        const failure = runValidator(validator, fieldValue);
        if (failure) {
          out.push(this.violation(displayName(field), failure.message));
        }
      }
    }
  }

  private violation(field: string, description: string): FieldViolation {
    return {
      field,
      description,
      errorName: this.config.validationError.name,
      errorCode: this.config.validationError.code,
    };
  }
}

function displayName(field: FieldSchema): string {
  return field.alias ?? field.key;
}

function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

// A getter that throws leaves the field unreadable; the throw is reported
// in place of the field's validators.
function readField(
  value: object,
  key: string,
): { value: unknown; failure?: undefined } | { value?: undefined; failure: Error } {
  try {
    return { value: Reflect.get(value, key) };
  } catch (err) {
    return { failure: toError(err) };
  }
}

// A validator that throws has rejected the value just as if it had
// returned the error.
function runValidator(validator: Validator, value: unknown): Error | undefined {
  try {
    return validator(value) ?? undefined;
  } catch (err) {
    return toError(err);
  }
}

/** One-off validation with a table and an optional configuration */
export function validate(
  table: ValidatorTable,
  value: unknown,
  config?: ErrorKitConfig,
): FieldViolation[] {
  return new StructValidator(table, config).validate(value);
}
