import type { IncomingHttpHeaders } from "node:http";

// ── Capabilities ─────────────────────────────────────────────────────────

/** An error that supplies its own public type name */
export interface NamedError {
  errorName(): string;
}

/** An error that maps onto an HTTP status */
export interface HTTPEquivError {
  statusCode(): number;
}

/** An error that carries a numeric application code */
export interface CodedError {
  errorCode(): number;
}

// ── Classification and violations ────────────────────────────────────────

/** Stable public view of an arbitrary error value */
export interface ClassifiedError {
  typeName: string;
  /** Application code, 0 when the error carries none */
  code: number;
  description: string;
  httpStatus: number;
}

/** One failed validator invocation on one field */
export interface FieldViolation {
  /** Serialization alias of the field, or its property name */
  field: string;
  description: string;
  errorName: string;
  errorCode: number;
}

/**
 * A named validation function. Returning an Error marks the value as
 * invalid; null or undefined means it passed.
 */
export type Validator = (value: unknown) => Error | null | undefined;

/** Caller-supplied mapping of tag names to validators */
export type ValidatorTable = Readonly<Record<string, Validator>>;

// ── HTTP collaborators ───────────────────────────────────────────────────

/** The part of Node's ServerResponse the encoder writes to */
export interface ResponseSink {
  setHeader(name: string, value: string): unknown;
  writeHead(statusCode: number): unknown;
  end(body?: string): unknown;
}

/** The part of Node's IncomingMessage used for content negotiation */
export interface RequestLike {
  headers: IncomingHttpHeaders;
}
