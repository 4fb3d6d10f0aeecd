import { parseTag } from "./tag.js";

/** Reserved validator name: validate the field's value as a nested struct */
export const STRUCT = "struct";

/** Validation description of one declared field */
export interface FieldSchema {
  /** Property name on the instance */
  readonly key: string;
  /** Serialization alias shown in violations instead of the key */
  readonly alias?: string;
  /** Validator names in evaluation order, STRUCT included */
  readonly validators: readonly string[];
}

/** A field declared through defineSchema */
export interface FieldOptions {
  key: string;
  /** Validator names, as an array or a comma-separated string */
  validate?: string | readonly string[];
  /** Serialization alias */
  json?: string;
  /** Struct tag; its validate and json keys are read */
  tag?: string;
}

interface FieldEntry {
  key: string;
  alias?: string;
  validators: string[];
}

// Own fields per constructor, in declaration order.
const ownFields = new WeakMap<object, FieldEntry[]>();

// Fields merged along the prototype chain. Rebuilt after any declaration.
let resolvedFields = new WeakMap<object, readonly FieldSchema[]>();

function entryFor(ctor: object, key: string): FieldEntry {
  let fields = ownFields.get(ctor);
  if (!fields) {
    fields = [];
    ownFields.set(ctor, fields);
  }

  let entry = fields.find((f) => f.key === key);
  if (!entry) {
    entry = { key, validators: [] };
    fields.push(entry);
  }

  resolvedFields = new WeakMap();
  return entry;
}

/** First segment of a json tag value; "" and "-" declare no alias */
function jsonAlias(jsonTag: string): string | undefined {
  const name = jsonTag.split(",")[0] ?? "";
  return name === "" || name === "-" ? undefined : name;
}

function tagValidators(validateTag: string): string[] {
  return validateTag === "" ? [] : validateTag.split(",");
}

function decoratedEntry(
  target: unknown,
  propertyKey: string | symbol,
  decorator: string,
): FieldEntry {
  if (typeof target === "function") {
    throw new TypeError(
      `@${decorator} cannot decorate static member ${String(propertyKey)}`,
    );
  }
  if (typeof propertyKey !== "string") {
    throw new TypeError(`@${decorator} requires a string property name`);
  }

  const ctor: unknown =
    typeof target === "object" && target !== null
      ? Reflect.get(target, "constructor")
      : undefined;
  if (typeof ctor !== "function") {
    throw new TypeError(`@${decorator} must be applied inside a class`);
  }
  return entryFor(ctor, propertyKey);
}

// ── Decorators ───────────────────────────────────────────────────────────

/**
 * Name the validators that run on a property, in order. Use STRUCT to
 * validate a nested object with the same table.
 *
 * ```
 * class Signup {
 *   @Validate("required", "email")
 *   email!: string;
 *
 *   @Validate(STRUCT)
 *   address!: Address;
 * }
 * ```
 */
export function Validate(...names: string[]): PropertyDecorator {
  return (target, propertyKey) => {
    // Stacked decorators are applied bottom-up; prepend to keep source order.
    decoratedEntry(target, propertyKey, "Validate").validators.unshift(...names);
  };
}

/** Display name of the property in violations */
export function JsonName(alias: string): PropertyDecorator {
  return (target, propertyKey) => {
    decoratedEntry(target, propertyKey, "JsonName").alias = jsonAlias(alias);
  };
}

/**
 * Declare validators and alias with a struct tag:
 * `@Tag('validate:"required,numeric" json:"age"')`.
 */
export function Tag(tagText: string): PropertyDecorator {
  const tags = parseTag(tagText);
  return (target, propertyKey) => {
    const entry = decoratedEntry(target, propertyKey, "Tag");
    if (tags.validate !== undefined) {
      entry.validators.unshift(...tagValidators(tags.validate));
    }
    if (tags.json !== undefined) {
      entry.alias = jsonAlias(tags.json);
    }
  };
}

// ── Programmatic declaration ─────────────────────────────────────────────

/**
 * Declare fields for a class without decorators. Fields are appended in
 * the order given, after any already declared.
 */
export function defineSchema(
  ctor: abstract new (...args: never[]) => unknown,
  fields: readonly FieldOptions[],
): void {
  for (const field of fields) {
    const entry = entryFor(ctor, field.key);

    if (field.tag !== undefined) {
      const tags = parseTag(field.tag);
      if (tags.validate !== undefined) {
        entry.validators.push(...tagValidators(tags.validate));
      }
      if (tags.json !== undefined) entry.alias = jsonAlias(tags.json);
    }

    if (typeof field.validate === "string") {
      entry.validators.push(...tagValidators(field.validate));
    } else if (field.validate) {
      entry.validators.push(...field.validate);
    }

    if (field.json !== undefined) entry.alias = jsonAlias(field.json);
  }
}

// ── Lookup ───────────────────────────────────────────────────────────────

function resolveFields(ctor: object): readonly FieldSchema[] {
  const cached = resolvedFields.get(ctor);
  if (cached) return cached;

  const chain: object[] = [];
  for (
    let current: unknown = ctor;
    typeof current === "function" && current !== Function.prototype;
    current = Object.getPrototypeOf(current)
  ) {
    chain.unshift(current);
  }

  // Base-class fields first; a redeclared key keeps its base position.
  const merged = new Map<string, FieldSchema>();
  for (const link of chain) {
    for (const entry of ownFields.get(link) ?? []) {
      const field: FieldSchema = entry.alias === undefined
        ? { key: entry.key, validators: [...entry.validators] }
        : { key: entry.key, alias: entry.alias, validators: [...entry.validators] };
      merged.set(entry.key, Object.freeze(field));
    }
  }

  const fields = Object.freeze([...merged.values()]);
  resolvedFields.set(ctor, fields);
  return fields;
}

/**
 * Declared fields of a value's class, base-class fields first. Undefined
 * for primitives, null, and objects whose class declares no fields.
 */
export function schemaOf(value: unknown): readonly FieldSchema[] | undefined {
  if (typeof value !== "object" || value === null) return undefined;

  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== "object" || proto === null) return undefined;

  const ctor: unknown = Reflect.get(proto, "constructor");
  if (typeof ctor !== "function") return undefined;

  const fields = resolveFields(ctor);
  return fields.length === 0 ? undefined : fields;
}
