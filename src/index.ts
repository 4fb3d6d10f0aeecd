// Core types and capabilities
export type {
  NamedError,
  HTTPEquivError,
  CodedError,
  ClassifiedError,
  FieldViolation,
  Validator,
  ValidatorTable,
  ResponseSink,
  RequestLike,
} from "./types.js";

// Error types
export {
  AppError,
  type AppErrorOptions,
  ErrorTypes,
  ErrorCodes,
  appError,
  jsonError,
  marshalerEmptyBodyError,
  marshalerContentTypeError,
  methodNotFoundError,
  methodNotAllowedError,
  isNamedError,
  isHTTPEquivError,
  isCodedError,
  isAppError,
} from "./errors.js";

// Configuration
export {
  ErrorKitConfigSchema,
  resolveConfig,
  configFromEnv,
  type ErrorKitConfig,
  type ErrorKitConfigInput,
} from "./config.js";

// Classification
export {
  ErrorClassifier,
  isValidStatus,
  snakeCaseStatusText,
} from "./classify.js";

// Envelope schemas and types
export {
  ErrorItemSchema,
  ErrorEnvelopeSchema,
  classifiedItem,
  violationItem,
  parseErrorEnvelope,
  type ErrorItem,
  type ErrorEnvelope,
} from "./envelope.js";

// Response encoding
export { ResponseEncoder, acceptsJSON } from "./encode.js";

// Field schemas
export {
  STRUCT,
  Validate,
  JsonName,
  Tag,
  defineSchema,
  schemaOf,
  type FieldSchema,
  type FieldOptions,
} from "./schema.js";
export { parseTag, tagLookup } from "./tag.js";

// Validation
export { StructValidator, validate } from "./validate.js";

// Logging
export {
  createLogger,
  type Logger,
  type LoggerConfig,
  type LogLevel,
} from "./logger.js";

// Wiring
export { createErrorKit, type ErrorKit, type ErrorKitOptions } from "./kit.js";
