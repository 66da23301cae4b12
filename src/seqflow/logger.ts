/**
 * Leveled logger.
 *
 * Writes one line per entry to stderr so that stdout stays free for
 * workflow output (the CLI streams model text there).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export type LoggerOptions = {
  level?: LogLevel;
  /** Line prefix (defaults to [SEQFLOW]) */
  prefix?: string;
  /** Sink for formatted lines (defaults to process.stderr) */
  write?: (line: string) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function formatLogLine(prefix: string, level: Exclude<LogLevel, "silent">, message: string, fields?: LogFields): string {
  const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
  return `${prefix} ${level.toUpperCase()} ${message}${suffix}\n`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const prefix = options.prefix ?? "[SEQFLOW]";
  const write = options.write ?? ((line: string) => {
    process.stderr.write(line);
  });

  const log = (level: Exclude<LogLevel, "silent">, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < threshold) return;
    write(formatLogLine(prefix, level, message, fields));
  };

  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields)
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
