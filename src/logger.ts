export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerConfig {
  /** Minimum level written (default "info") */
  level?: LogLevel;
  name?: string;
  /** One JSON object per line instead of plain text */
  json?: boolean;
}

type LogMethod = (msg: string, data?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: Infinity,
};

function formatText(
  level: LogLevel,
  msg: string,
  name: string | undefined,
  data: Record<string, unknown>,
): string {
  let line = `${level.toUpperCase().padEnd(5)} `;
  if (name) line += `[${name}] `;
  line += msg;

  for (const [k, v] of Object.entries(data)) {
    line += ` ${k}=${typeof v === "string" ? v : JSON.stringify(v)}`;
  }
  return line + "\n";
}

/**
 * Leveled logger. Errors go to stderr, everything else to stdout, as
 * `LEVEL [name] msg k=v` lines or, with `json`, one object per line.
 */
export function createLogger(options: LoggerConfig = {}): Logger {
  const threshold = LOG_LEVELS[options.level ?? "info"];
  const name = options.name;

  const log = (level: LogLevel, msg: string, data: Record<string, unknown> = {}): void => {
    if (LOG_LEVELS[level] < threshold) return;

    const output = options.json
      ? JSON.stringify({ ...data, level, time: Date.now(), msg, ...(name ? { name } : {}) }) + "\n"
      : formatText(level, msg, name, data);

    (level === "error" ? process.stderr : process.stdout).write(output);
  };

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
  };
}
