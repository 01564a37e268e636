/**
 * linewire: newline-delimited message transport over a pair of byte streams.
 *
 * @example Quick start
 * ```ts
 * import { StdioTransport, createConsoleLogger } from "linewire";
 *
 * const transport = new StdioTransport({ logger: createConsoleLogger() });
 * await transport.connect();
 *
 * await transport.send(JSON.stringify({ jsonrpc: "2.0", method: "ready" }));
 * for await (const line of transport.receive().text()) {
 *   console.error("got", line);
 * }
 *
 * await transport.disconnect();
 * ```
 *
 * @module
 */

// ── Primary API ─────────────────────────────────────────────────────
export {
  StdioTransport,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_READ_CHUNK_SIZE,
  type StdioTransportOptions,
} from "./transport/stdio.js";
export { type Transport, type TransportState } from "./transport/transport.js";

// ── Stream ──────────────────────────────────────────────────────────
export { MessageStream } from "./stream.js";

// ── Errors ──────────────────────────────────────────────────────────
export {
  LinewireError,
  ConfigurationError,
  NotConnectedError,
  TransportClosedError,
  ReadError,
  WriteError,
  isLinewireError,
  isErrorCode,
  isResourceTemporarilyUnavailable,
  systemError,
  type LinewireErrorCode,
} from "./errors.js";

// ── Logging ─────────────────────────────────────────────────────────
export {
  createConsoleLogger,
  noopLogger,
  isLogLevel,
  LOG_LEVELS,
  DEFAULT_LOG_LABEL,
  type Logger,
  type LogLevel,
  type LogMetadata,
  type ConsoleLoggerOptions,
} from "./logger.js";

// ── Low-level (advanced usage) ──────────────────────────────────────
export {
  NodeFileDescriptor,
  standardInput,
  standardOutput,
  type DescriptorMode,
  type FileDescriptor,
} from "./transport/descriptor.js";
export { configureNonBlocking } from "./transport/nonblocking.js";
export {
  createMemoryPipe,
  createMemoryTransportPair,
  type MemoryPipeOptions,
  type MemoryReader,
  type MemoryWriter,
} from "./transport/memory.js";
