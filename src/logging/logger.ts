import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly name?: string;
}

/**
 * JSON logger written to stderr so command output on stdout stays parseable.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? "geocheck",
      level: options.level ?? "info",
    },
    pino.destination(2),
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
