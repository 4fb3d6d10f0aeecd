import type { CodedError, HTTPEquivError, NamedError } from "./types.js";

// ── Reserved types and codes ─────────────────────────────────────────────

export const ErrorTypes = {
  unknown: "unknown",
  json: "json",
  marshaler: "marshaler",
  validation: "validation",
} as const;

export const ErrorCodes = {
  unknown: 0,
  json: 9001,
  marshaler: 9002,
  validation: 8000,
} as const;

/** Options accepted by the AppError constructor */
export interface AppErrorOptions {
  /** Public type name; an empty type defers to the classifier */
  type?: string;
  /** Application code, 0 for none */
  code?: number;
  /** HTTP status, 0 when the error does not decide one */
  status?: number;
  cause?: unknown;
}

/**
 * Application error with an explicit public type, code and HTTP status.
 *
 * Implements every classifier capability, so it serializes exactly as
 * declared:
 * ```
 * throw new AppError("Card was declined", {
 *   type: "payment_declined",
 *   code: 4021,
 *   status: 402,
 * });
 * ```
 */
export class AppError
  extends Error
  implements NamedError, HTTPEquivError, CodedError
{
  readonly type: string;
  readonly code: number;
  readonly status: number;

  constructor(description: string, options: AppErrorOptions = {}) {
    super(description, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AppError";
    this.type = options.type ?? "";
    this.code = options.code ?? 0;
    this.status = options.status ?? 0;
  }

  get description(): string {
    return this.message;
  }

  errorName(): string {
    return this.type;
  }

  errorCode(): number {
    return this.code;
  }

  statusCode(): number {
    return this.status;
  }
}

// ── Factories ────────────────────────────────────────────────────────────

/** Generic application error without an HTTP status of its own */
export function appError(code: number, type: string, description: string): AppError {
  return new AppError(description, { code, type });
}

/** A request body that could not be decoded as JSON */
export function jsonError(description: string): AppError {
  return new AppError(description, {
    type: ErrorTypes.json,
    code: ErrorCodes.json,
    status: 400,
  });
}

/** A handler declared a body type that cannot be decoded into */
export function marshalerEmptyBodyError(method: string): AppError {
  return new AppError(
    `Empty interface is not suitable for ${method} request bodies`,
    { type: ErrorTypes.marshaler, code: ErrorCodes.marshaler, status: 500 },
  );
}

export function marshalerContentTypeError(contentType: string): AppError {
  return new AppError(
    `Content-Type header is ${contentType}, not application/json`,
    { type: ErrorTypes.marshaler, code: ErrorCodes.marshaler, status: 415 },
  );
}

export function methodNotFoundError(description: string): AppError {
  return new AppError(description, { status: 404 });
}

export function methodNotAllowedError(description: string): AppError {
  return new AppError(`Method not allowed, ${description}`, { status: 405 });
}

// ── Capability guards ────────────────────────────────────────────────────

function hasMethod(value: unknown, method: string): boolean {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    return false;
  }
  return typeof Reflect.get(value, method) === "function";
}

export function isNamedError(value: unknown): value is NamedError {
  return hasMethod(value, "errorName");
}

export function isHTTPEquivError(value: unknown): value is HTTPEquivError {
  return hasMethod(value, "statusCode");
}

export function isCodedError(value: unknown): value is CodedError {
  return hasMethod(value, "errorCode");
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}
