import { STATUS_CODES } from "node:http";
import type { ErrorKitConfig } from "./config.js";
import {
  isAppError,
  isCodedError,
  isHTTPEquivError,
  isNamedError,
} from "./errors.js";
import type { ClassifiedError } from "./types.js";

/** Whether a number can be written as an HTTP status line */
export function isValidStatus(status: number): boolean {
  return Number.isInteger(status) && status >= 100 && status <= 599;
}

/**
 * Standard reason phrase of a status in snake case, or undefined when the
 * status has none.
 *
 * snakeCaseStatusText(404) // "not_found"
 */
export function snakeCaseStatusText(status: number): string | undefined {
  const phrase = STATUS_CODES[status];
  if (!phrase) return undefined;
  return phrase.toLowerCase().replace(/ /g, "_");
}

/** Constructor name of an object, "" when there is none */
function runtimeTypeName(value: unknown): string {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    return "";
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== "object" || proto === null) return "";
  const ctor: unknown = Reflect.get(proto, "constructor");
  return typeof ctor === "function" ? ctor.name : "";
}

// A capability method that throws counts as absent.
function tryCapability<T>(call: () => T): T | undefined {
  try {
    return call();
  } catch {
    return undefined;
  }
}

// Base classes that say nothing about what went wrong.
const ANONYMOUS_TYPES = new Set(["", "Object", "Error"]);

/**
 * Resolves any thrown value to a stable { typeName, code, description,
 * httpStatus } shape by probing for the NamedError, HTTPEquivError and
 * CodedError capabilities and falling back to the runtime type.
 */
export class ErrorClassifier {
  constructor(private readonly config: ErrorKitConfig) {}

  classify(err: unknown): ClassifiedError {
    return {
      typeName: this.errorName(err),
      code: this.errorCode(err),
      description: this.description(err),
      httpStatus: this.statusCode(err),
    };
  }

  /**
   * Public type name: the error's own name, then its snake-cased status
   * phrase (when enabled), then its class name. Classes named in lower
   * camel case and the built-in base classes resolve to `fallback`.
   */
  errorName(err: unknown, fallback = this.config.fallbackName): string {
    if (isNamedError(err)) {
      const named = err;
      const name = tryCapability(() => named.errorName());
      if (typeof name === "string" && name !== "") return name;
    }

    if (isHTTPEquivError(err) && this.config.snakeCaseHTTPEquivErrors) {
      const equiv = err;
      const status = tryCapability(() => equiv.statusCode());
      const name = typeof status === "number" ? snakeCaseStatusText(status) : undefined;
      if (name) return name;
    }

    const typeName = runtimeTypeName(err);
    if (ANONYMOUS_TYPES.has(typeName) || /^\p{Ll}/u.test(typeName)) {
      return fallback;
    }
    return typeName;
  }

  /** HTTP status: explicit AppError status, then statusCode(), then 500 */
  statusCode(err: unknown): number {
    if (isAppError(err) && isValidStatus(err.status)) {
      return err.status;
    }

    if (isHTTPEquivError(err)) {
      const equiv = err;
      const status = tryCapability(() => equiv.statusCode());
      if (typeof status === "number" && isValidStatus(status)) return status;
    }

    return 500;
  }

  errorCode(err: unknown): number {
    if (!isCodedError(err)) return 0;
    const coded = err;
    const code = tryCapability(() => coded.errorCode());
    return typeof code === "number" && Number.isInteger(code) ? code : 0;
  }

  /** Human-readable message carried by the error */
  description(err: unknown): string {
    if (isAppError(err)) return err.description;
    if (err instanceof Error) return err.message;
    try {
      return String(err);
    } catch {
      // Objects without a prototype have no toString.
      return Object.prototype.toString.call(err);
    }
  }
}
