import { describe, expect, it, vi } from "vitest";
import { LineReader, ReadTimeoutError } from "../../src/serial/lineReader.js";

describe("LineReader", () => {
  it("returns buffered lines and bytes in order", async () => {
    const reader = new LineReader();
    reader.feed("\n1 ml\r\n:");

    await expect(reader.readLine(10)).resolves.toBe("");
    await expect(reader.readLine(10)).resolves.toBe("1 ml\r");
    expect(reader.pending()).toBe(1);
    await expect(reader.readByte(10)).resolves.toBe(":");
    expect(reader.pending()).toBe(0);
  });

  it("waits for a line split across chunks", async () => {
    const reader = new LineReader();
    const line = reader.readLine(1000);
    reader.feed("5 ul");
    reader.feed(Buffer.from("/min\n", "ascii"));

    await expect(line).resolves.toBe("5 ul/min");
  });

  it("times out when nothing arrives", async () => {
    vi.useFakeTimers();
    try {
      const reader = new LineReader();
      const byte = reader.readByte(1000);
      const assertion = expect(byte).rejects.toBeInstanceOf(ReadTimeoutError);
      await vi.advanceTimersByTimeAsync(1000);
      await assertion;

      // Late data stays buffered for the next read.
      reader.feed(":");
      expect(reader.pending()).toBe(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it("waits indefinitely with a null timeout", async () => {
    vi.useFakeTimers();
    try {
      const reader = new LineReader();
      const line = reader.readLine(null);
      await vi.advanceTimersByTimeAsync(60_000);
      reader.feed("T*\n");
      await expect(line).resolves.toBe("T*");
    } finally {
      vi.useRealTimers();
    }
  });

  it("refuses overlapping reads", async () => {
    const reader = new LineReader();
    const first = reader.readLine(1000);

    await expect(reader.readByte(1000)).rejects.toThrow("another read is outstanding");
    reader.feed("ok\n");
    await expect(first).resolves.toBe("ok");
  });

  it("rejects pending and later reads after fail", async () => {
    const reader = new LineReader();
    const pending = reader.readLine(null);
    const failure = new Error("port closed");

    reader.fail(failure);

    await expect(pending).rejects.toBe(failure);
    await expect(reader.readByte(10)).rejects.toBe(failure);
  });
});
