import type { MessageStream } from "../stream.js";

/**
 * Lifecycle state of a transport connection.
 *
 * `idle` until connect() succeeds, `closed` after disconnect(). Closed is
 * terminal: build a new transport to reconnect.
 */
export type TransportState = "idle" | "connected" | "closed";

/**
 * Point-to-point channel carrying opaque message blobs.
 *
 * Implementations handle framing (newline-delimited for stdio). Consumers
 * send and receive raw bytes; JSON-RPC encoding lives a layer above.
 */
export interface Transport {
  /** Current connection state. */
  readonly state: TransportState;

  /** Open the connection and start receiving. Idempotent. */
  connect(): Promise<void>;

  /** Stop receiving and end the receive sequence. Idempotent, never rejects. */
  disconnect(): Promise<void>;

  /** Deliver one message. Rejects if not connected or the write fails. */
  send(message: Uint8Array | string): Promise<void>;

  /** The sequence of received messages. Same instance on every call. */
  receive(): MessageStream;

  /** `await using` support; disconnects. */
  [Symbol.asyncDispose](): Promise<void>;
}
