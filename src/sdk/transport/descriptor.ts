/**
 * Byte-level descriptor abstraction underneath the stdio transport.
 *
 * A descriptor is one direction of a byte stream. Reads and writes report
 * failures as Node system errors (an `Error` with a string `code`), so the
 * transport can tell transient `EAGAIN` apart from real failures.
 */

import { close, fstat, read, write, type Stats } from "node:fs";
import { Socket } from "node:net";
import { ReadStream, isatty } from "node:tty";
import { errnoOf, systemError } from "../errors.js";

export interface FileDescriptor {
  /** Human-readable name used in errors and logs. */
  readonly label: string;

  /** Put the descriptor in non-blocking mode. Rejects with a system error. */
  setNonBlocking(): Promise<void>;

  /**
   * Read up to `into.byteLength` bytes. Resolves with the count read;
   * `0` means end-of-stream.
   */
  read(into: Uint8Array): Promise<number>;

  /** Write bytes, resolving with how many were accepted (may be fewer). */
  write(bytes: Uint8Array): Promise<number>;
}

/**
 * How a descriptor was made non-blocking.
 *
 * - `file`: regular files and devices that never wait for a peer.
 * - `pipe`: FIFOs and sockets, opened as a libuv pipe or TCP handle.
 * - `tty`: terminals, reopened by libuv onto the same descriptor number.
 */
export type DescriptorMode = "file" | "pipe" | "tty";

/**
 * Descriptor over a numeric OS file descriptor.
 *
 * Node has no `fcntl`, so setNonBlocking() hands pipes, sockets and
 * terminals to a libuv handle, which sets `O_NONBLOCK` as it opens them.
 * The handle is never read from or written to and holds no event loop
 * reference. From then on `fs.read`/`fs.write` fail with `EAGAIN` instead
 * of parking a thread-pool worker, and the transport polls on that.
 */
export class NodeFileDescriptor implements FileDescriptor {
  readonly fd: number;
  readonly label: string;
  #mode: DescriptorMode | null = null;
  #handle: Socket | null = null;

  constructor(fd: number, label = `fd ${fd}`) {
    this.fd = fd;
    this.label = label;
  }

  /** Whether setNonBlocking() has succeeded. */
  get nonBlocking(): boolean {
    return this.#mode !== null;
  }

  /** How the descriptor is driven, once setNonBlocking() has succeeded. */
  get mode(): DescriptorMode | null {
    return this.#mode;
  }

  async setNonBlocking(): Promise<void> {
    if (this.#mode !== null) return;

    const stats = await new Promise<Stats>((resolve, reject) => {
      fstat(this.fd, (err, s) => {
        if (err) reject(err);
        else resolve(s);
      });
    });

    if (stats.isFIFO() || stats.isSocket()) {
      this.#handle = this.#open(() => new Socket({ fd: this.fd, readable: false, writable: true }));
      this.#mode = "pipe";
    } else if (stats.isCharacterDevice() && isatty(this.fd)) {
      this.#handle = this.#open(() => new ReadStream(this.fd));
      this.#mode = "tty";
    } else {
      this.#mode = "file";
    }
  }

  read(into: Uint8Array): Promise<number> {
    return new Promise((resolve, reject) => {
      read(this.fd, into, 0, into.byteLength, null, (err, bytesRead) => {
        if (err) reject(err);
        else resolve(bytesRead);
      });
    });
  }

  write(bytes: Uint8Array): Promise<number> {
    return new Promise((resolve, reject) => {
      write(this.fd, bytes, 0, bytes.byteLength, null, (err, written) => {
        if (err) reject(err);
        else resolve(written);
      });
    });
  }

  /**
   * Close the descriptor and any handle setNonBlocking() opened.
   * Standard streams (fd 0-2) are left open.
   */
  async close(): Promise<void> {
    const handle = this.#handle;
    this.#handle = null;
    this.#mode = null;

    if (handle) {
      // libuv closes a pipe's descriptor with its handle; a terminal handle
      // owns a reopened copy instead
      await new Promise<void>((resolve) => {
        handle.once("close", () => resolve());
        handle.destroy();
      });
      if (!(handle instanceof ReadStream)) return;
    }
    if (this.fd <= 2) return;

    await new Promise<void>((resolve, reject) => {
      close(this.fd, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  #open(create: () => Socket): Socket {
    try {
      const handle = create();
      handle.unref();
      return handle;
    } catch (err) {
      // UDP sockets and other descriptor kinds libuv cannot stream
      if (errnoOf(err) === "ERR_INVALID_FD_TYPE") throw systemError("ENOTSUP", "open");
      throw err;
    }
  }
}

/** The process's standard input (fd 0). */
export function standardInput(): NodeFileDescriptor {
  return new NodeFileDescriptor(0, "stdin");
}

/** The process's standard output (fd 1). */
export function standardOutput(): NodeFileDescriptor {
  return new NodeFileDescriptor(1, "stdout");
}
