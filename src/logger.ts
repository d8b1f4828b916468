/**
 * Leveled line logger.
 *
 * Lines look like `[04-22 13:05:09][INFO] message` and go to stderr by default,
 * leaving stdout to the interactive source-file prompt.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Minimum level written (default: "info") */
  level?: LogLevel;
  /** Destination stream (default: process.stderr) */
  stream?: { write(chunk: string): unknown };
  /** Clock, for deterministic timestamps */
  now?: () => Date;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Format a timestamp as `MM-DD HH:mm:ss` in local time. */
export function formatTimestamp(date: Date): string {
  const day = `${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function createLogger(options?: LoggerOptions): Logger {
  const level = options?.level ?? "info";
  const stream = options?.stream ?? process.stderr;
  const now = options?.now ?? (() => new Date());
  const threshold = SEVERITY[level];

  function write(lineLevel: Exclude<LogLevel, "silent">, message: string): void {
    if (SEVERITY[lineLevel] < threshold) return;
    stream.write(`[${formatTimestamp(now())}][${lineLevel.toUpperCase()}] ${message}\n`);
  }

  return {
    level,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = createLogger({ level: "silent" });
