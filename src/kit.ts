import { ErrorClassifier } from "./classify.js";
import {
  resolveConfig,
  type ErrorKitConfig,
  type ErrorKitConfigInput,
} from "./config.js";
import { ResponseEncoder } from "./encode.js";
import { createLogger, type Logger } from "./logger.js";
import type { ValidatorTable } from "./types.js";
import { StructValidator } from "./validate.js";

/** Options for createErrorKit */
export interface ErrorKitOptions {
  /** Partial configuration, or one already returned by resolveConfig */
  config?: ErrorKitConfigInput | ErrorKitConfig;
  /** Logger for encode failures (defaults to a logger named "errorwire") */
  logger?: Logger;
}

/** Components built around one frozen configuration */
export interface ErrorKit {
  config: ErrorKitConfig;
  logger: Logger;
  classifier: ErrorClassifier;
  encoder: ResponseEncoder;
  /** Build a validator over a caller-supplied table */
  validator(table: ValidatorTable): StructValidator;
}

/**
 * Resolve the configuration once and build the classifier, encoder and
 * validators from it.
 *
 * ```
 * const kit = createErrorKit({ config: { snakeCaseHTTPEquivErrors: true } });
 * const violations = kit.validator(rules).validate(payload);
 * if (violations.length > 0) {
 *   kit.encoder.writeValidationErrors(res, violations);
 * }
 * ```
 */
export function createErrorKit(options: ErrorKitOptions = {}): ErrorKit {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? createLogger({ name: "errorwire" });
  const classifier = new ErrorClassifier(config);
  const encoder = new ResponseEncoder(classifier, logger);

  return {
    config,
    logger,
    classifier,
    encoder,
    validator: (table) => new StructValidator(table, config),
  };
}
