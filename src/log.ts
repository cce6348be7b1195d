/**
 * Leveled console logging. Everything goes to stderr because stdout is
 * where the rewritten program is written.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (line: string) => void;

/**
 * Create a logger printing "LEVEL:message" lines for messages at or above `level`
 */
export function createLogger(
  level: LogLevel,
  sink: LogSink = (line) => console.error(line),
): Logger {
  const emit = (at: Exclude<LogLevel, "silent">, message: string) => {
    if (LEVEL_ORDER[at] >= LEVEL_ORDER[level]) {
      sink(`${at.toUpperCase()}:${message}`);
    }
  };
  return {
    level,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

export const silentLogger: Logger = createLogger("silent");

/**
 * Map -v / -q counts to a level. No flags gives "info".
 */
export function levelFromVerbosity(verbose: number, quiet: number): LogLevel {
  const score = 1 + verbose - quiet;
  if (score > 1) return "debug";
  if (score === 1) return "info";
  if (score === 0) return "warn";
  if (score === -1) return "error";
  return "silent";
}
