/**
 * In-memory descriptor pipe for deterministic testing and in-process wiring.
 *
 * Behaves like a non-blocking OS pipe: reads on an empty open pipe and
 * writes to a full one fail with `EAGAIN`, so transports exercise the same
 * polling paths they take on real descriptors.
 */

import { systemError } from "../errors.js";
import type { FileDescriptor } from "./descriptor.js";
import { StdioTransport, type StdioTransportOptions } from "./stdio.js";

/** Options for {@link createMemoryPipe}. */
export interface MemoryPipeOptions {
  /** Max bytes buffered before writes become partial, then fail with EAGAIN. */
  capacity?: number;
}

/** Read end of a memory pipe. */
export interface MemoryReader extends FileDescriptor {
  /** Close the read end; subsequent writes fail with EPIPE. */
  close(): void;
  readonly closed: boolean;
}

/** Write end of a memory pipe. */
export interface MemoryWriter extends FileDescriptor {
  /** Close the write end; the reader sees EOF once drained. */
  close(): void;
  readonly closed: boolean;
  /** Bytes written and not yet read. */
  readonly buffered: number;
}

/** Create a linked reader/writer pair. Bytes written to one are read from the other. */
export function createMemoryPipe(opts: MemoryPipeOptions = {}): {
  reader: MemoryReader;
  writer: MemoryWriter;
} {
  const pipe = new MemoryPipe(opts.capacity ?? Infinity);
  return { reader: new PipeReader(pipe), writer: new PipeWriter(pipe) };
}

class MemoryPipe {
  readonly capacity: number;
  chunks: Buffer[] = [];
  size = 0;
  readerClosed = false;
  writerClosed = false;

  constructor(capacity: number) {
    this.capacity = capacity;
  }
}

class PipeReader implements MemoryReader {
  readonly label = "memory pipe (read)";
  readonly #pipe: MemoryPipe;

  constructor(pipe: MemoryPipe) {
    this.#pipe = pipe;
  }

  get closed(): boolean {
    return this.#pipe.readerClosed;
  }

  async setNonBlocking(): Promise<void> {
    if (this.#pipe.readerClosed) throw systemError("EBADF", "fcntl");
  }

  async read(into: Uint8Array): Promise<number> {
    const pipe = this.#pipe;
    if (pipe.readerClosed) throw systemError("EBADF", "read");
    if (pipe.size === 0) {
      if (pipe.writerClosed) return 0;
      throw systemError("EAGAIN", "read");
    }

    let copied = 0;
    while (copied < into.byteLength && pipe.chunks.length > 0) {
      const [head, ...rest] = pipe.chunks;
      const take = Math.min(head.byteLength, into.byteLength - copied);
      into.set(head.subarray(0, take), copied);
      copied += take;
      pipe.chunks = take < head.byteLength ? [head.subarray(take), ...rest] : rest;
    }
    pipe.size -= copied;
    return copied;
  }

  async write(): Promise<number> {
    throw systemError("EBADF", "write");
  }

  close(): void {
    this.#pipe.readerClosed = true;
    this.#pipe.chunks = [];
    this.#pipe.size = 0;
  }
}

class PipeWriter implements MemoryWriter {
  readonly label = "memory pipe (write)";
  readonly #pipe: MemoryPipe;

  constructor(pipe: MemoryPipe) {
    this.#pipe = pipe;
  }

  get closed(): boolean {
    return this.#pipe.writerClosed;
  }

  get buffered(): number {
    return this.#pipe.size;
  }

  async setNonBlocking(): Promise<void> {
    if (this.#pipe.writerClosed) throw systemError("EBADF", "fcntl");
  }

  async read(): Promise<number> {
    throw systemError("EBADF", "read");
  }

  async write(bytes: Uint8Array): Promise<number> {
    const pipe = this.#pipe;
    if (pipe.writerClosed) throw systemError("EBADF", "write");
    if (pipe.readerClosed) throw systemError("EPIPE", "write");
    if (bytes.byteLength === 0) return 0;

    const room = pipe.capacity - pipe.size;
    if (room <= 0) throw systemError("EAGAIN", "write");

    const accepted = Math.min(room, bytes.byteLength);
    pipe.chunks.push(Buffer.from(bytes.subarray(0, accepted)));
    pipe.size += accepted;
    return accepted;
  }

  close(): void {
    this.#pipe.writerClosed = true;
  }
}

/**
 * Create two transports wired to each other through memory pipes.
 * Messages sent on one are received by the other.
 */
export function createMemoryTransportPair(
  opts: Omit<StdioTransportOptions, "input" | "output"> & MemoryPipeOptions = {},
): [StdioTransport, StdioTransport] {
  const { capacity, ...transportOpts } = opts;
  const ab = createMemoryPipe({ capacity });
  const ba = createMemoryPipe({ capacity });
  const a = new StdioTransport({ ...transportOpts, input: ba.reader, output: ab.writer });
  const b = new StdioTransport({ ...transportOpts, input: ab.reader, output: ba.writer });
  return [a, b];
}
