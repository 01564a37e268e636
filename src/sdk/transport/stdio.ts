/**
 * Stdio transport: newline-delimited messages over two byte streams,
 * by default the process's own stdin and stdout.
 *
 * Messages may be single JSON-RPC requests, notifications, responses, or
 * batches encoded as JSON arrays. Each frame on the wire is the payload
 * followed by one `\n`; payloads must not contain a newline themselves.
 */

import {
  NotConnectedError,
  ReadError,
  TransportClosedError,
  WriteError,
  errnoOf,
  isResourceTemporarilyUnavailable,
  toError,
} from "../errors.js";
import { noopLogger, type Logger } from "../logger.js";
import { MessageStream } from "../stream.js";
import { standardInput, standardOutput, type FileDescriptor } from "./descriptor.js";
import { configureNonBlocking } from "./nonblocking.js";
import type { Transport, TransportState } from "./transport.js";

const NEWLINE = 0x0a;
const DELIMITER = Buffer.from([NEWLINE]);

export const DEFAULT_POLL_INTERVAL_MS = 10;
export const DEFAULT_READ_CHUNK_SIZE = 4096;

/** Options for constructing a StdioTransport. */
export interface StdioTransportOptions {
  /** Where messages are read from. Defaults to stdin. */
  input?: FileDescriptor;
  /** Where frames are written. Defaults to stdout. */
  output?: FileDescriptor;
  /** Log sink. Defaults to {@link noopLogger}. */
  logger?: Logger;
  /** Delay before retrying a read or write that would block. */
  pollIntervalMs?: number;
  /** Bytes requested per read. */
  readChunkSize?: number;
  /**
   * Upper bound on buffered bytes without a delimiter. Exceeding it fails the
   * receive sequence with a ReadError (`ENOBUFS`). Unbounded by default.
   */
  maxPendingBytes?: number;
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const noop = (): void => {};

/**
 * Transport over a pair of descriptors.
 *
 * A background read loop splits incoming bytes on newlines and publishes
 * each non-empty line to {@link receive}. Sends are serialized so frames
 * never interleave.
 */
export class StdioTransport implements Transport {
  readonly #input: FileDescriptor;
  readonly #output: FileDescriptor;
  readonly #logger: Logger;
  readonly #pollIntervalMs: number;
  readonly #readChunkSize: number;
  readonly #maxPendingBytes: number;
  readonly #messages = new MessageStream();
  #state: TransportState = "idle";
  #connecting: Promise<void> | null = null;
  #abort: AbortController | null = null;
  #readLoop: Promise<void> = Promise.resolve();
  #writeLock: Promise<void> = Promise.resolve();

  constructor(opts: StdioTransportOptions = {}) {
    this.#input = opts.input ?? standardInput();
    this.#output = opts.output ?? standardOutput();
    this.#logger = opts.logger ?? noopLogger;
    this.#pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.#readChunkSize = opts.readChunkSize ?? DEFAULT_READ_CHUNK_SIZE;
    this.#maxPendingBytes = opts.maxPendingBytes ?? Infinity;

    if (!(this.#pollIntervalMs >= 0)) {
      throw new RangeError(`pollIntervalMs must be >= 0, got ${this.#pollIntervalMs}`);
    }
    if (!Number.isInteger(this.#readChunkSize) || this.#readChunkSize <= 0) {
      throw new RangeError(`readChunkSize must be a positive integer, got ${this.#readChunkSize}`);
    }
    if (!(this.#maxPendingBytes > 0)) {
      throw new RangeError(`maxPendingBytes must be > 0, got ${this.#maxPendingBytes}`);
    }
  }

  /** Current connection state. */
  get state(): TransportState {
    return this.#state;
  }

  get connected(): boolean {
    return this.#state === "connected";
  }

  /** Settles once the read loop has exited (immediately if it never ran). */
  get readLoopDone(): Promise<void> {
    return this.#readLoop;
  }

  /**
   * Configure both descriptors for non-blocking I/O and start the read loop.
   * Idempotent; concurrent calls share one attempt.
   *
   * @throws {ConfigurationError} if non-blocking mode cannot be set. The
   *   transport stays idle and connect() may be retried.
   * @throws {TransportClosedError} if the transport was disconnected.
   */
  async connect(): Promise<void> {
    if (this.#state === "connected") return;
    if (this.#state === "closed") throw new TransportClosedError();

    const attempt =
      this.#connecting ??
      this.#establish().finally(() => {
        this.#connecting = null;
      });
    this.#connecting = attempt;
    return attempt;
  }

  /**
   * Mark disconnected and end the receive sequence. Idempotent.
   *
   * An in-flight read is not interrupted; the loop exits at its next
   * iteration boundary and publishes nothing further.
   */
  async disconnect(): Promise<void> {
    if (this.#state !== "connected") return;
    this.#state = "closed";
    this.#abort?.abort();
    this.#messages.finish();
    this.#logger.info("Transport disconnected");
  }

  /**
   * Write one message followed by a newline. Strings are UTF-8 encoded.
   *
   * Partial writes and would-block conditions are retried until the whole
   * frame is out. Concurrent calls are written in call order.
   *
   * @throws {NotConnectedError} if not connected; nothing is written.
   * @throws {WriteError} on any other write failure.
   */
  async send(message: Uint8Array | string): Promise<void> {
    if (this.#state !== "connected") throw new NotConnectedError();

    const payload = typeof message === "string" ? Buffer.from(message, "utf8") : message;
    const frame = Buffer.concat([payload, DELIMITER]);

    const write = this.#writeLock.then(() => this.#writeFrame(frame));
    this.#writeLock = write.then(noop, noop);
    await write;

    this.#logger.debug("Message sent", { size: payload.byteLength });
  }

  /** The sequence of received messages. Same instance on every call. */
  receive(): MessageStream {
    return this.#messages;
  }

  /** `await using` support. */
  async [Symbol.asyncDispose](): Promise<void> {
    await this.disconnect();
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  async #establish(): Promise<void> {
    await configureNonBlocking(this.#input, this.#output);

    this.#state = "connected";
    this.#logger.info("Transport connected successfully");

    const abort = new AbortController();
    this.#abort = abort;
    this.#readLoop = this.#runReadLoop(abort.signal);
  }

  /** Read, split on newlines, publish. Always ends by finishing the stream. */
  async #runReadLoop(signal: AbortSignal): Promise<void> {
    const scratch = Buffer.alloc(this.#readChunkSize);
    // Bytes of the current unterminated message, joined once its newline arrives
    const pending: Buffer[] = [];
    let pendingBytes = 0;
    let failure: Error | undefined;

    while (this.#state === "connected" && !signal.aborted) {
      let bytesRead: number;
      try {
        bytesRead = await this.#input.read(scratch);
      } catch (err) {
        if (isResourceTemporarilyUnavailable(err)) {
          await sleep(this.#pollIntervalMs);
          continue;
        }
        const cause = toError(err);
        if (!signal.aborted) {
          this.#logger.error("Read error occurred", { error: errnoOf(err) ?? cause.message });
        }
        failure = new ReadError(cause);
        break;
      }

      if (bytesRead === 0) {
        this.#logger.notice("EOF received");
        break;
      }

      // Disconnected while the read was in flight: drop the bytes
      if (signal.aborted) break;

      const chunk = scratch.subarray(0, bytesRead);
      let start = 0;
      let newline = chunk.indexOf(NEWLINE);
      while (newline !== -1) {
        pending.push(chunk.subarray(start, newline));
        const message = Buffer.concat(pending, pendingBytes + newline - start);
        pending.length = 0;
        pendingBytes = 0;
        if (message.byteLength > 0) {
          this.#logger.debug("Message received", { size: message.byteLength });
          this.#messages.push(message);
        }
        start = newline + 1;
        newline = chunk.indexOf(NEWLINE, start);
      }

      if (start < bytesRead) {
        // scratch is reused by the next read
        pending.push(Buffer.from(chunk.subarray(start)));
        pendingBytes += bytesRead - start;
      }

      if (pendingBytes > this.#maxPendingBytes) {
        this.#logger.error("Read error occurred", { error: "ENOBUFS" });
        failure = new ReadError(
          Object.assign(new Error(`${pendingBytes} bytes buffered without a newline`), {
            code: "ENOBUFS",
          }),
        );
        break;
      }
    }

    this.#messages.finish(failure);
  }

  /** Drive a whole frame onto the output. */
  async #writeFrame(frame: Buffer): Promise<void> {
    // Queued behind a send that outlived the connection
    if (this.#state !== "connected") throw new NotConnectedError();

    let written = 0;
    while (written < frame.byteLength) {
      let count: number;
      try {
        count = await this.#output.write(frame.subarray(written));
      } catch (err) {
        if (isResourceTemporarilyUnavailable(err)) {
          await sleep(this.#pollIntervalMs);
          continue;
        }
        const cause = toError(err);
        if (errnoOf(err) === "ENOTCONN") throw new NotConnectedError({ cause });
        throw new WriteError(cause, written);
      }

      if (count > 0) {
        written += count;
      } else {
        await sleep(this.#pollIntervalMs);
      }
    }
  }
}
