import { isLogLevel, type LogLevel } from "../sdk/logger.js";
import { DEFAULT_POLL_INTERVAL_MS } from "../sdk/transport/stdio.js";

/** Resolved settings shared by every CLI command. */
export interface CliOptions {
  logLevel: LogLevel;
  pollIntervalMs: number;
  color: boolean | undefined;
}

/** Raw flag values as yargs hands them over. */
export interface CliFlags {
  logLevel?: string;
  pollInterval?: number;
  color?: boolean;
}

export const DEFAULT_CLI_LOG_LEVEL: LogLevel = "warn";

/**
 * Merge flags with environment fallbacks.
 *
 * Flags win over `LINEWIRE_LOG_LEVEL` / `LINEWIRE_POLL_INTERVAL_MS`.
 * `NO_COLOR` (any non-empty value) disables colour unless `--color` is given.
 */
export function resolveCliOptions(
  flags: CliFlags,
  env: Record<string, string | undefined> = process.env,
): CliOptions {
  const rawLevel = flags.logLevel ?? env["LINEWIRE_LOG_LEVEL"] ?? DEFAULT_CLI_LOG_LEVEL;
  if (!isLogLevel(rawLevel)) {
    throw new Error(`Invalid log level: ${rawLevel}`);
  }

  const rawInterval = flags.pollInterval ?? env["LINEWIRE_POLL_INTERVAL_MS"];
  const pollIntervalMs = rawInterval === undefined ? DEFAULT_POLL_INTERVAL_MS : Number(rawInterval);
  if (!Number.isFinite(pollIntervalMs) || pollIntervalMs < 0) {
    throw new Error(`Invalid poll interval: ${String(rawInterval)}`);
  }

  let color = flags.color;
  if (color === undefined && env["NO_COLOR"]) color = false;

  return { logLevel: rawLevel, pollIntervalMs, color };
}
