import bunyan from "bunyan";

export type Logger = bunyan;
export type LogLevel = bunyan.LogLevelString;

const LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  return value !== undefined && isLogLevel(value) ? value : fallback;
}

/** Logs go to stderr so command output on stdout stays machine-readable. */
export function createLogger(name: string, level: LogLevel = "info"): Logger {
  return bunyan.createLogger({
    name,
    streams: [{ stream: process.stderr, level }],
  });
}

/** A logger with no streams; used by tests and quiet callers. */
export function silentLogger(): Logger {
  return bunyan.createLogger({ name: "breachgrid", streams: [] });
}

const log = createLogger("breachgrid", parseLogLevel(process.env.LOG_LEVEL));

export default log;
