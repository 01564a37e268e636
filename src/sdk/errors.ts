/**
 * Structured error hierarchy for linewire transports.
 *
 * All errors extend LinewireError with a `.code` discriminant for programmatic
 * handling via switch statements or type predicates.
 *
 * @example
 * ```ts
 * try {
 *   await transport.send(payload);
 * } catch (e) {
 *   if (e instanceof LinewireError) {
 *     switch (e.code) {
 *       case "NOT_CONNECTED": console.error("Call connect() first"); break;
 *       case "WRITE_FAILED":  console.error(`Write failed after ${e.bytesWritten} bytes`); break;
 *     }
 *   }
 * }
 * ```
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

/** Union of all error codes for exhaustive switch handling. */
export type LinewireErrorCode =
  | "CONFIGURATION"
  | "NOT_CONNECTED"
  | "TRANSPORT_CLOSED"
  | "READ_FAILED"
  | "WRITE_FAILED";

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/** Base error for all linewire errors. */
export class LinewireError extends Error {
  readonly code: LinewireErrorCode;
  readonly cause?: Error;

  constructor(code: LinewireErrorCode, message: string, opts?: { cause?: Error }) {
    super(message);
    this.code = code;
    this.name = "LinewireError";
    if (opts?.cause) this.cause = opts.cause;
  }
}

// ---------------------------------------------------------------------------
// Concrete errors
// ---------------------------------------------------------------------------

/** Non-blocking mode could not be applied to a descriptor. */
export class ConfigurationError extends LinewireError {
  readonly code = "CONFIGURATION" as const;
  readonly label: string;
  readonly errno: string | undefined;
  readonly unsupported: boolean;

  constructor(label: string, cause: Error) {
    const errno = errnoOf(cause);
    const unsupported = errno === "ENOTSUP" || errno === "EOPNOTSUPP";
    super(
      "CONFIGURATION",
      unsupported
        ? `${label}: non-blocking mode is not supported on this platform`
        : `${label}: failed to set non-blocking mode (${errno ?? cause.message})`,
      { cause },
    );
    this.name = "ConfigurationError";
    this.label = label;
    this.errno = errno;
    this.unsupported = unsupported;
  }
}

/** Send attempted while not connected, or the peer end reports ENOTCONN. */
export class NotConnectedError extends LinewireError {
  readonly code = "NOT_CONNECTED" as const;

  constructor(opts?: { cause?: Error }) {
    super("NOT_CONNECTED", "Transport is not connected", opts);
    this.name = "NotConnectedError";
  }
}

/** connect() called on a transport that was already disconnected. */
export class TransportClosedError extends LinewireError {
  readonly code = "TRANSPORT_CLOSED" as const;

  constructor() {
    super("TRANSPORT_CLOSED", "Transport is closed; create a new one to reconnect");
    this.name = "TransportClosedError";
  }
}

/** Unrecoverable read failure. Terminal error of the receive sequence. */
export class ReadError extends LinewireError {
  readonly code = "READ_FAILED" as const;
  readonly errno: string | undefined;

  constructor(cause: Error) {
    const errno = errnoOf(cause);
    super("READ_FAILED", `Read failed: ${errno ?? cause.message}`, { cause });
    this.name = "ReadError";
    this.errno = errno;
  }
}

/** Unrecoverable write failure. Aborts one send; the transport stays usable. */
export class WriteError extends LinewireError {
  readonly code = "WRITE_FAILED" as const;
  readonly errno: string | undefined;
  readonly bytesWritten: number;

  constructor(cause: Error, bytesWritten: number) {
    const errno = errnoOf(cause);
    super("WRITE_FAILED", `Write failed: ${errno ?? cause.message}`, { cause });
    this.name = "WriteError";
    this.errno = errno;
    this.bytesWritten = bytesWritten;
  }
}

// ---------------------------------------------------------------------------
// Type predicates
// ---------------------------------------------------------------------------

/** Narrow any caught value to a {@link LinewireError}. */
export function isLinewireError(err: unknown): err is LinewireError {
  return err instanceof LinewireError;
}

/** Narrow to a specific error by code. */
export function isErrorCode<C extends LinewireErrorCode>(
  err: unknown,
  code: C,
): err is LinewireError & { code: C } {
  return err instanceof LinewireError && err.code === code;
}

// ---------------------------------------------------------------------------
// System error classification
// ---------------------------------------------------------------------------

const TRANSIENT_CODES = new Set(["EAGAIN", "EWOULDBLOCK", "EINTR"]);

/** Extract the system error code (`EAGAIN`, `EBADF`, ...) from a caught value. */
export function errnoOf(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

/** "No data or capacity right now, try again": retried, never surfaced. */
export function isResourceTemporarilyUnavailable(err: unknown): boolean {
  const code = errnoOf(err);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

/** A system error shaped like the ones `node:fs` produces. */
export function systemError(code: string, syscall: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: ${syscall} failed`), { code, syscall });
}

/** Coerce a caught value to an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
