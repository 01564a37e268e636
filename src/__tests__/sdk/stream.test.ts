import { describe, it, expect } from "vitest";
import { MessageStream } from "../../sdk/stream.js";
import { collectText } from "../helpers/scripted-descriptor.js";

const msg = (text: string) => Buffer.from(text);

describe("MessageStream", () => {
  it("iterates pushed messages in order", async () => {
    const stream = new MessageStream();
    queueMicrotask(() => {
      stream.push(msg("one"));
      stream.push(msg("two"));
      stream.push(msg("three"));
      stream.finish();
    });
    await expect(collectText(stream)).resolves.toEqual(["one", "two", "three"]);
  });

  it("delivers messages buffered before finish()", async () => {
    const stream = new MessageStream();
    stream.push(msg("a"));
    stream.push(msg("b"));
    stream.finish();
    expect(stream.pending).toBe(2);
    await expect(collectText(stream)).resolves.toEqual(["a", "b"]);
    expect(stream.pending).toBe(0);
  });

  it("ignores pushes after finish()", async () => {
    const stream = new MessageStream();
    stream.push(msg("kept"));
    stream.finish();
    stream.push(msg("too late"));
    await expect(collectText(stream)).resolves.toEqual(["kept"]);
  });

  it("only the first finish() counts", async () => {
    const stream = new MessageStream();
    stream.finish();
    stream.finish(new Error("ignored"));
    await expect(collectText(stream)).resolves.toEqual([]);
  });

  it("throws the terminal error after the buffered messages", async () => {
    const stream = new MessageStream();
    stream.push(msg("before"));
    stream.finish(new Error("fail"));

    const seen: string[] = [];
    await expect(
      (async () => {
        for await (const m of stream) seen.push(Buffer.from(m).toString());
      })(),
    ).rejects.toThrow("fail");
    expect(seen).toEqual(["before"]);
  });

  it("is not restartable and throws the terminal error only once", async () => {
    const stream = new MessageStream();
    stream.push(msg("x"));
    stream.finish(new Error("fail"));

    await expect(collectText(stream)).rejects.toThrow("fail");
    await expect(collectText(stream)).resolves.toEqual([]);
  });

  it("a second iteration after completion yields nothing", async () => {
    const stream = new MessageStream();
    stream.push(msg("x"));
    stream.finish();
    await expect(collectText(stream)).resolves.toEqual(["x"]);
    await expect(collectText(stream)).resolves.toEqual([]);
  });

  it("waits for messages that arrive later", async () => {
    const stream = new MessageStream();
    const result = collectText(stream);
    setTimeout(() => {
      stream.push(msg("late"));
      stream.finish();
    }, 5);
    await expect(result).resolves.toEqual(["late"]);
  });

  it("reports finished", () => {
    const stream = new MessageStream();
    expect(stream.finished).toBe(false);
    stream.finish();
    expect(stream.finished).toBe(true);
  });

  it("text() decodes UTF-8", async () => {
    const stream = new MessageStream();
    stream.push(msg('{"greeting":"héllo"}'));
    stream.finish();
    const out: string[] = [];
    for await (const line of stream.text()) out.push(line);
    expect(out).toEqual(['{"greeting":"héllo"}']);
  });

  it("toReadableStream() yields messages and closes", async () => {
    const stream = new MessageStream();
    stream.push(msg("a"));
    stream.push(msg("b"));
    stream.finish();

    const reader = stream.toReadableStream().getReader();
    const first = await reader.read();
    const second = await reader.read();
    const end = await reader.read();

    expect(Buffer.from(first.value ?? []).toString()).toBe("a");
    expect(Buffer.from(second.value ?? []).toString()).toBe("b");
    expect(end.done).toBe(true);
  });

  it("toReadableStream() errors with the terminal error", async () => {
    const stream = new MessageStream();
    stream.finish(new Error("broken"));
    const reader = stream.toReadableStream().getReader();
    await expect(reader.read()).rejects.toThrow("broken");
  });
});
