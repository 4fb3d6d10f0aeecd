import type { ErrorClassifier } from "./classify.js";
import {
  classifiedItem,
  violationItem,
  type ErrorEnvelope,
} from "./envelope.js";
import type { Logger } from "./logger.js";
import type {
  FieldViolation,
  RequestLike,
  ResponseSink,
} from "./types.js";

/**
 * Whether the client should get a JSON body.
 *
 * A missing Accept header means JSON. Otherwise the header only has to
 * contain the full wildcard or `application/json` somewhere; q-values and
 * ordering are not considered.
 */
export function acceptsJSON(request: RequestLike): boolean {
  const accept = request.headers.accept;
  if (!accept) return true;
  return accept.includes("*/*") || accept.includes("application/json");
}

/**
 * Terminal writers for error responses. Each method sets the content
 * type and the status line before touching the body, so call exactly one
 * of them per response.
 */
export class ResponseEncoder {
  constructor(
    private readonly classifier: ErrorClassifier,
    private readonly logger: Logger,
  ) {}

  /** Classify `err` and write it as a one-item JSON envelope */
  writeJSONError(sink: ResponseSink, err: unknown): void {
    const classified = this.classifier.classify(err);
    sink.setHeader("Content-Type", "application/json");
    sink.writeHead(classified.httpStatus);
    this.writeEnvelope(sink, { errors: [classifiedItem(classified)] });
  }

  /** Write field violations as a 400 JSON envelope, without reclassifying them */
  writeValidationErrors(
    sink: ResponseSink,
    violations: readonly FieldViolation[],
  ): void {
    sink.setHeader("Content-Type", "application/json");
    sink.writeHead(400);

    let envelope: ErrorEnvelope;
    try {
      envelope = { errors: violations.map(violationItem) };
    } catch (err) {
      this.logEncodeFailure(err);
      sink.end();
      return;
    }
    this.writeEnvelope(sink, envelope);
  }

  /** Write `<typeName>: <message>` as a single text/plain line */
  writePlaintextError(sink: ResponseSink, err: unknown): void {
    sink.setHeader("Content-Type", "text/plain");
    sink.writeHead(this.classifier.statusCode(err));
    sink.end(
      `${this.classifier.errorName(err)}: ${this.classifier.description(err)}`,
    );
  }

  /** Pick the JSON or plaintext writer from the request's Accept header */
  writeError(sink: ResponseSink, request: RequestLike, err: unknown): void {
    if (acceptsJSON(request)) {
      this.writeJSONError(sink, err);
    } else {
      this.writePlaintextError(sink, err);
    }
  }

  // The status line is already out, so a body that fails to serialize
  // can only be logged.
  private writeEnvelope(sink: ResponseSink, envelope: ErrorEnvelope): void {
    let body: string;
    try {
      body = JSON.stringify(envelope) + "\n";
    } catch (err) {
      this.logEncodeFailure(err);
      sink.end();
      return;
    }
    sink.end(body);
  }

  private logEncodeFailure(err: unknown): void {
    this.logger.error("Error marshalling error response into JSON output", {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
