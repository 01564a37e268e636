import { describe, expect, it } from "vitest";
import {
  LinewireError,
  ConfigurationError,
  NotConnectedError,
  TransportClosedError,
  ReadError,
  WriteError,
  errnoOf,
  isLinewireError,
  isErrorCode,
  isResourceTemporarilyUnavailable,
  systemError,
  toError,
} from "../../sdk/errors.js";

describe("error hierarchy", () => {
  it("ConfigurationError captures the system error code", () => {
    const cause = systemError("EBADF", "fcntl");
    const err = new ConfigurationError("stdin", cause);
    expect(err.code).toBe("CONFIGURATION");
    expect(err.name).toBe("ConfigurationError");
    expect(err.label).toBe("stdin");
    expect(err.errno).toBe("EBADF");
    expect(err.unsupported).toBe(false);
    expect(err.message).toBe("stdin: failed to set non-blocking mode (EBADF)");
    expect(err.cause).toBe(cause);
    expect(err).toBeInstanceOf(LinewireError);
    expect(err).toBeInstanceOf(Error);
  });

  it("ConfigurationError flags unsupported platforms", () => {
    const err = new ConfigurationError("stdout", systemError("ENOTSUP", "fcntl"));
    expect(err.unsupported).toBe(true);
    expect(err.message).toBe("stdout: non-blocking mode is not supported on this platform");
  });

  it("ConfigurationError falls back to the cause message without a code", () => {
    const err = new ConfigurationError("stdin", new Error("boom"));
    expect(err.errno).toBeUndefined();
    expect(err.message).toBe("stdin: failed to set non-blocking mode (boom)");
  });

  it("NotConnectedError has a fixed message", () => {
    const err = new NotConnectedError();
    expect(err.code).toBe("NOT_CONNECTED");
    expect(err.message).toBe("Transport is not connected");
    expect(err.cause).toBeUndefined();
  });

  it("TransportClosedError has a fixed message", () => {
    const err = new TransportClosedError();
    expect(err.code).toBe("TRANSPORT_CLOSED");
    expect(err.message).toBe("Transport is closed; create a new one to reconnect");
  });

  it("ReadError wraps its cause", () => {
    const cause = systemError("EIO", "read");
    const err = new ReadError(cause);
    expect(err.code).toBe("READ_FAILED");
    expect(err.name).toBe("ReadError");
    expect(err.errno).toBe("EIO");
    expect(err.cause).toBe(cause);
    expect(err.message).toBe("Read failed: EIO");
  });

  it("WriteError records progress", () => {
    const err = new WriteError(systemError("EPIPE", "write"), 12);
    expect(err.code).toBe("WRITE_FAILED");
    expect(err.errno).toBe("EPIPE");
    expect(err.bytesWritten).toBe(12);
    expect(err.message).toBe("Write failed: EPIPE");
  });
});

describe("type predicates", () => {
  it("isLinewireError returns true for subclasses, false for plain Error", () => {
    expect(isLinewireError(new NotConnectedError())).toBe(true);
    expect(isLinewireError(new ReadError(new Error("x")))).toBe(true);
    expect(isLinewireError(new Error("plain"))).toBe(false);
    expect(isLinewireError("string")).toBe(false);
  });

  it("isErrorCode narrows correctly", () => {
    const err = new WriteError(new Error("x"), 0);
    expect(isErrorCode(err, "WRITE_FAILED")).toBe(true);
    expect(isErrorCode(err, "READ_FAILED")).toBe(false);
    expect(isErrorCode(new Error(), "WRITE_FAILED")).toBe(false);
  });
});

describe("system error classification", () => {
  it("errnoOf reads string codes only", () => {
    expect(errnoOf(systemError("EAGAIN", "read"))).toBe("EAGAIN");
    expect(errnoOf({ code: 11 })).toBeUndefined();
    expect(errnoOf(null)).toBeUndefined();
    expect(errnoOf("EAGAIN")).toBeUndefined();
  });

  it("treats EAGAIN, EWOULDBLOCK and EINTR as transient", () => {
    expect(isResourceTemporarilyUnavailable(systemError("EAGAIN", "read"))).toBe(true);
    expect(isResourceTemporarilyUnavailable(systemError("EWOULDBLOCK", "write"))).toBe(true);
    expect(isResourceTemporarilyUnavailable(systemError("EINTR", "read"))).toBe(true);
    expect(isResourceTemporarilyUnavailable(systemError("EIO", "read"))).toBe(false);
    expect(isResourceTemporarilyUnavailable(new Error("no code"))).toBe(false);
  });

  it("toError keeps errors and wraps everything else", () => {
    const err = new Error("same");
    expect(toError(err)).toBe(err);
    expect(toError("text").message).toBe("text");
  });
});
