import { z } from "zod/v4";
import type { ClassifiedError, FieldViolation } from "./types.js";

/** One entry of the error envelope */
export const ErrorItemSchema = z.object({
  error: z.string(),
  errorCode: z.number().int().optional(),
  field: z.string().optional(),
  description: z.string().optional(),
});

/** The body of every JSON error response */
export const ErrorEnvelopeSchema = z.object({
  errors: z.array(ErrorItemSchema),
});

export type ErrorItem = z.infer<typeof ErrorItemSchema>;
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;

function item(
  error: string,
  errorCode: number,
  field: string,
  description: string
): ErrorItem {
  const entry: ErrorItem = { error };
  if (errorCode !== 0) entry.errorCode = errorCode;
  if (field !== "") entry.field = field;
  if (description !== "") entry.description = description;
  return entry;
}

/** Envelope item for a classified error; zero codes and empty strings are omitted */
export function classifiedItem(classified: ClassifiedError): ErrorItem {
  return item(classified.typeName, classified.code, "", classified.description);
}

export function violationItem(violation: FieldViolation): ErrorItem {
  return item(
    violation.errorName,
    violation.errorCode,
    violation.field,
    violation.description
  );
}

/**
 * Decode an error response body on the client side.
 *
 * Accepts either the raw JSON text or an already parsed value.
 */
export function parseErrorEnvelope(
  raw: unknown
): { ok: true; envelope: ErrorEnvelope } | { ok: false; message: string } {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, message: `Invalid JSON: ${message}` };
    }
  }

  const parseResult = ErrorEnvelopeSchema.safeParse(value);
  if (!parseResult.success) {
    const message = parseResult.error.issues
      .map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    return { ok: false, message: `Invalid error envelope: ${message}` };
  }

  return { ok: true, envelope: parseResult.data };
}
