/**
 * MessageStream: async iterable of received messages.
 *
 * Bridges the read loop's push-based delivery into pull-based
 * `for await...of` iteration. One producer (the read loop), one consumer.
 *
 * @example Iterate messages
 * ```ts
 * await transport.connect();
 * for await (const message of transport.receive()) {
 *   handle(JSON.parse(new TextDecoder().decode(message)));
 * }
 * ```
 *
 * @example Work with strings
 * ```ts
 * for await (const line of transport.receive().text()) console.error(line);
 * ```
 */

import { ReadableStream } from "node:stream/web";
import { TextDecoder } from "node:util";

/**
 * Unbounded single-producer, single-consumer message queue with a terminal
 * signal.
 *
 * Created by the transport. Do not construct directly outside tests.
 * Messages pushed before `finish()` are still delivered; the terminal error,
 * if any, is thrown once after them.
 */
export class MessageStream implements AsyncIterable<Uint8Array> {
  readonly #messages: Uint8Array[] = [];
  readonly #waiters = new Set<() => void>();
  #done = false;
  #error: Error | undefined;

  /** Whether the terminal signal has been given. */
  get finished(): boolean {
    return this.#done;
  }

  /** Number of messages waiting to be consumed. */
  get pending(): number {
    return this.#messages.length;
  }

  /** Enqueue a message. Ignored once finished. */
  push(message: Uint8Array): void {
    if (this.#done) return;
    this.#messages.push(message);
    this.#wake();
  }

  /**
   * Give the terminal signal: completion, or failure with `error`.
   * Only the first call counts.
   */
  finish(error?: Error): void {
    if (this.#done) return;
    this.#done = true;
    this.#error = error;
    this.#wake();
  }

  /** Iterate the remaining messages decoded as UTF-8. */
  async *text(): AsyncGenerator<string, void, undefined> {
    const decoder = new TextDecoder();
    for await (const message of this) {
      yield decoder.decode(message);
    }
  }

  /** Convert to a Web ReadableStream for interop. */
  toReadableStream(): ReadableStream<Uint8Array> {
    const iterator = this[Symbol.asyncIterator]();
    return new ReadableStream<Uint8Array>({
      async pull(controller) {
        try {
          const result = await iterator.next();
          if (result.done) {
            controller.close();
          } else {
            controller.enqueue(result.value);
          }
        } catch (err) {
          controller.error(err);
        }
      },
      async cancel() {
        await iterator.return?.();
      },
    });
  }

  /** Async iterator implementation. */
  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    while (true) {
      // Drain buffered messages
      let message = this.#messages.shift();
      while (message !== undefined) {
        yield message;
        message = this.#messages.shift();
      }

      if (this.#error) {
        const error = this.#error;
        // Delivered once; later iterations just complete
        this.#error = undefined;
        throw error;
      }

      if (this.#done) return;

      // Wait for the next push or finish
      await new Promise<void>((resolve) => {
        this.#waiters.add(resolve);
      });
    }
  }

  #wake(): void {
    const waiters = [...this.#waiters];
    this.#waiters.clear();
    for (const resolve of waiters) resolve();
  }
}
