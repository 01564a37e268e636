/**
 * Passive logging sink the transport reports to.
 *
 * Transports never require a logger; the default {@link noopLogger} drops
 * everything. {@link createConsoleLogger} writes coloured single-line entries
 * to stderr, which keeps stdout free for frames.
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";

/** Ordered severity levels, lowest first. */
export const LOG_LEVELS = ["debug", "info", "notice", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Flat key/value context attached to a log entry. */
export type LogMetadata = Record<string, string | number | boolean>;

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  notice(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

const noop = (): void => {};

export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  notice: noop,
  warn: noop,
  error: noop,
};

/** Narrow an arbitrary string (flag, env var) to a {@link LogLevel}. */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/** Anything with a `write(string)` method, e.g. `process.stderr`. */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface ConsoleLoggerOptions {
  /** Logger name shown in brackets. Defaults to `linewire.transport.stdio`. */
  label?: string;
  /** Minimum level written. Defaults to `info`. */
  level?: LogLevel;
  /** Destination. Defaults to `process.stderr`. */
  stream?: LogStream;
  /** Colourize level names. Defaults to chalk's own terminal detection. */
  color?: boolean;
  /** Clock override for tests. */
  now?: () => Date;
}

export const DEFAULT_LOG_LABEL = "linewire.transport.stdio";

function paint(ink: ChalkInstance, level: LogLevel): string {
  const name = level.toUpperCase().padEnd(6);
  switch (level) {
    case "debug":
      return ink.dim(name);
    case "info":
      return ink.cyan(name);
    case "notice":
      return ink.blue(name);
    case "warn":
      return ink.yellow(name);
    case "error":
      return ink.red(name);
  }
}

function formatMetadata(metadata: LogMetadata | undefined): string {
  if (!metadata) return "";
  const pairs = Object.entries(metadata).map(([key, value]) => `${key}=${String(value)}`);
  return pairs.length > 0 ? ` ${pairs.join(" ")}` : "";
}

/**
 * Create a logger writing `<time> <LEVEL> [<label>] <message> key=value...`
 * lines to a stream.
 */
export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const label = opts.label ?? DEFAULT_LOG_LABEL;
  const threshold = LOG_LEVELS.indexOf(opts.level ?? "info");
  const stream = opts.stream ?? process.stderr;
  const now = opts.now ?? (() => new Date());
  const ink = opts.color === undefined ? chalk : new Chalk({ level: opts.color ? 1 : 0 });

  const write = (level: LogLevel, message: string, metadata?: LogMetadata): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    stream.write(
      `${now().toISOString()} ${paint(ink, level)} [${label}] ${message}${formatMetadata(metadata)}\n`,
    );
  };

  return {
    debug: (message, metadata) => write("debug", message, metadata),
    info: (message, metadata) => write("info", message, metadata),
    notice: (message, metadata) => write("notice", message, metadata),
    warn: (message, metadata) => write("warn", message, metadata),
    error: (message, metadata) => write("error", message, metadata),
  };
}
