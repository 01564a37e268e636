import { describe, it, expect } from "vitest";
import { createMemoryPipe } from "../../sdk/transport/memory.js";
import { systemError } from "../../sdk/errors.js";

const buf = (size: number) => Buffer.alloc(size);

describe("createMemoryPipe", () => {
  it("reads fail with EAGAIN while empty and open", async () => {
    const { reader } = createMemoryPipe();
    await expect(reader.read(buf(8))).rejects.toMatchObject({ code: "EAGAIN" });
  });

  it("delivers written bytes to the reader", async () => {
    const { reader, writer } = createMemoryPipe();
    await expect(writer.write(Buffer.from("hello\n"))).resolves.toBe(6);
    expect(writer.buffered).toBe(6);

    const into = buf(16);
    await expect(reader.read(into)).resolves.toBe(6);
    expect(into.subarray(0, 6).toString()).toBe("hello\n");
    expect(writer.buffered).toBe(0);
  });

  it("reads at most the buffer size and keeps the rest", async () => {
    const { reader, writer } = createMemoryPipe();
    await writer.write(Buffer.from("abc"));
    await writer.write(Buffer.from("defg"));

    const into = buf(5);
    await expect(reader.read(into)).resolves.toBe(5);
    expect(into.toString()).toBe("abcde");

    const rest = buf(5);
    await expect(reader.read(rest)).resolves.toBe(2);
    expect(rest.subarray(0, 2).toString()).toBe("fg");
  });

  it("accepts partial writes up to capacity, then EAGAIN", async () => {
    const { reader, writer } = createMemoryPipe({ capacity: 4 });
    await expect(writer.write(Buffer.from("abcdef"))).resolves.toBe(4);
    await expect(writer.write(Buffer.from("ef"))).rejects.toMatchObject({ code: "EAGAIN" });

    await reader.read(buf(2));
    await expect(writer.write(Buffer.from("ef"))).resolves.toBe(2);
  });

  it("signals EOF once the writer is closed and drained", async () => {
    const { reader, writer } = createMemoryPipe();
    await writer.write(Buffer.from("x"));
    writer.close();
    expect(writer.closed).toBe(true);

    await expect(reader.read(buf(4))).resolves.toBe(1);
    await expect(reader.read(buf(4))).resolves.toBe(0);
  });

  it("writes fail with EPIPE once the reader is closed", async () => {
    const { reader, writer } = createMemoryPipe();
    reader.close();
    expect(reader.closed).toBe(true);
    await expect(writer.write(Buffer.from("x"))).rejects.toMatchObject({ code: "EPIPE" });
  });

  it("closed ends refuse non-blocking setup", async () => {
    const { reader, writer } = createMemoryPipe();
    await expect(reader.setNonBlocking()).resolves.toBeUndefined();
    reader.close();
    writer.close();
    await expect(reader.setNonBlocking()).rejects.toMatchObject({ code: "EBADF" });
    await expect(writer.setNonBlocking()).rejects.toMatchObject({ code: "EBADF" });
  });

  it("each end refuses the other direction", async () => {
    const { reader, writer } = createMemoryPipe();
    await expect(reader.write(Buffer.from("x"))).rejects.toMatchObject({ code: "EBADF" });
    await expect(writer.read(buf(1))).rejects.toMatchObject({ code: "EBADF" });
  });
});

describe("systemError", () => {
  it("builds an errno-style error", () => {
    const err = systemError("EAGAIN", "read");
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe("EAGAIN");
    expect(err.syscall).toBe("read");
    expect(err.message).toBe("EAGAIN: read failed");
  });
});
