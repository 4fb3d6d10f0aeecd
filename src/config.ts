import { z } from "zod/v4";
import { ErrorCodes, ErrorTypes } from "./errors.js";

/** Configuration shared by the classifier, encoder and validators */
export const ErrorKitConfigSchema = z.strictObject({
  /**
   * Name unnamed HTTP-equivalent errors after their status phrase
   * (404 → "not_found") instead of their class.
   */
  snakeCaseHTTPEquivErrors: z.boolean().default(false),
  /** Code and label stamped on every field violation */
  validationError: z
    .strictObject({
      code: z.number().int().nonnegative().default(ErrorCodes.validation),
      name: z.string().default(ErrorTypes.validation),
    })
    .default({ code: ErrorCodes.validation, name: ErrorTypes.validation }),
  /** Type name for errors with nothing better to offer */
  fallbackName: z.string().min(1).default("error"),
  /** Deepest chain of "struct" fields the validator follows */
  maxDepth: z.number().int().positive().default(32),
});

export type ErrorKitConfig = Readonly<z.infer<typeof ErrorKitConfigSchema>>;
export type ErrorKitConfigInput = z.input<typeof ErrorKitConfigSchema>;

/**
 * Parse a partial configuration, fill in defaults and freeze the result.
 *
 * Throws a TypeError listing every invalid path, unknown keys included;
 * call it once at startup.
 */
export function resolveConfig(
  input: ErrorKitConfigInput | ErrorKitConfig = {}
): ErrorKitConfig {
  const parseResult = ErrorKitConfigSchema.safeParse(input);
  if (!parseResult.success) {
    const message = parseResult.error.issues
      .map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new TypeError(`Invalid errorwire configuration: ${message}`);
  }

  const config = parseResult.data;
  Object.freeze(config.validationError);
  return Object.freeze(config);
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

function envInt(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  return Number(value);
}

/**
 * Build the configuration from ERRORWIRE_* environment variables.
 *
 * Unset variables keep their defaults; a malformed number fails the same
 * way as in resolveConfig.
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env
): ErrorKitConfig {
  const code = envInt(env.ERRORWIRE_VALIDATION_CODE);
  const name = env.ERRORWIRE_VALIDATION_NAME;

  return resolveConfig({
    snakeCaseHTTPEquivErrors: envFlag(env.ERRORWIRE_SNAKE_CASE),
    validationError:
      code === undefined && name === undefined ? undefined : { code, name },
    fallbackName: env.ERRORWIRE_FALLBACK_NAME || undefined,
    maxDepth: envInt(env.ERRORWIRE_MAX_DEPTH),
  });
}
