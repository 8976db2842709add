import { describe, expect, it } from "vitest";
import { InvariantViolationError, ProtocolViolationError } from "../../src/pump/errors.js";
import { createDriverLog } from "../../src/pump/log.js";
import { RunState } from "../../src/pump/runState.js";
import { PumpTransport } from "../../src/pump/transport.js";
import { ScriptedLink } from "../fixtures/scriptedLink.js";

function createTransport(...replies: string[]) {
  const link = new ScriptedLink(...replies);
  const runState = new RunState();
  const transport = new PumpTransport(link, runState, createDriverLog("test", false, false));
  return { link, runState, transport };
}

describe("PumpTransport.exchange", () => {
  it("frames the command and returns trimmed lines with the prompt", async () => {
    const { link, transport } = createTransport("\n  5 ul/min \r\n:");

    const result = await transport.exchange("wrate", 1);

    expect(link.writes).toEqual(["wrate\r"]);
    expect(result).toEqual({ lines: ["5 ul/min"], prompt: "idle" });
    expect(link.pending()).toBe(0);
  });

  it("reads multi-line responses", async () => {
    const { transport } = createTransport("\nline one\r\nline two\r\nline three\r\n>");

    const result = await transport.exchange("version", 3);

    expect(result.lines).toEqual(["line one", "line two", "line three"]);
    expect(result.prompt).toBe("infusing");
  });

  it("fails when fewer lines arrive than declared", async () => {
    const { transport } = createTransport("\n5 ul/min\r\n:");

    await expect(transport.exchange("wrate", 2)).rejects.toBeInstanceOf(ProtocolViolationError);
  });

  it("fails when more lines arrive than declared", async () => {
    const { transport } = createTransport("\n5 ul/min\r\n:");

    await expect(transport.exchange("wrate", 0)).rejects.toThrow(ProtocolViolationError);
  });

  it("fails on an unknown prompt byte", async () => {
    const { transport } = createTransport("\n?");

    await expect(transport.exchange("stop", 0)).rejects.toThrow('unexpected prompt = "?"');
  });

  it("rejects trailing bytes when no run is in progress", async () => {
    const { transport } = createTransport("\n:Command error\r\n");

    await expect(transport.exchange("stop", 0)).rejects.toThrow("unexpected response = Command error");
  });

  it("rejects stale bytes received before a command while idle", async () => {
    const { link, transport } = createTransport("\n:");
    link.inject("\nT*");

    await expect(transport.exchange("stop", 0)).rejects.toThrow("stale data before command");
    expect(link.writes).toEqual([]);
  });

  it("drains a completion notice trailing the response while running", async () => {
    const { link, runState, transport } = createTransport("\nbdp 1 ml\r\n>\nT*");
    runState.begin();

    const result = await transport.exchange("syrm", 1);

    expect(result).toEqual({ lines: ["bdp 1 ml"], prompt: "infusing" });
    expect(runState.running).toBe(false);
    expect(runState.completedRuns).toBe(1);
    expect(link.pending()).toBe(0);
  });

  it("drains a completion notice that arrived before the command", async () => {
    const { link, runState, transport } = createTransport("\nbdp 1 ml\r\n:");
    runState.begin();
    link.inject("\nT*");

    const result = await transport.exchange("syrm", 1);

    expect(result).toEqual({ lines: ["bdp 1 ml"], prompt: "idle" });
    expect(runState.running).toBe(false);
    expect(runState.completedRuns).toBe(1);
  });

  it("fails when trailing data during a run is not a completion notice", async () => {
    const { runState, transport } = createTransport("\nbdp 1 ml\r\n>\n*");
    runState.begin();

    await expect(transport.exchange("syrm", 1)).rejects.toThrow("expected target reached, got stalled");
    expect(runState.running).toBe(true);
  });

  it("refuses a second exchange while one is in flight", async () => {
    const { link, transport } = createTransport();
    link.timeoutMs = null;

    const first = transport.exchange("run", 0);
    await expect(transport.exchange("stop", 0)).rejects.toBeInstanceOf(InvariantViolationError);

    link.inject("\n>");
    await expect(first).resolves.toEqual({ lines: [], prompt: "infusing" });
  });

  it("refuses to exchange after close and closes the link once", async () => {
    const { link, transport } = createTransport();

    await transport.close();
    await transport.close();

    expect(link.closeCount).toBe(1);
    await expect(transport.exchange("stop", 0)).rejects.toThrow("link is closed");
  });
});

describe("PumpTransport.awaitCompletion", () => {
  it("consumes the completion notice", async () => {
    const { link, runState, transport } = createTransport();
    runState.begin();
    link.inject("\nT*");

    await transport.awaitCompletion();

    expect(runState.running).toBe(false);
    expect(link.pending()).toBe(0);
  });

  it("fails if more data follows the notice", async () => {
    const { link, runState, transport } = createTransport();
    runState.begin();
    link.inject("\nT*\n:");

    await expect(transport.awaitCompletion()).rejects.toThrow("unexpected data after target reached");
    expect(runState.running).toBe(true);
    expect(runState.completedRuns).toBe(0);
  });

  it("does not report the run finished when data follows the notice", async () => {
    const link = new ScriptedLink();
    const finished: string[] = [];
    const runState = new RunState(() => finished.push("target reached"));
    const transport = new PumpTransport(link, runState, createDriverLog("test", false, false));
    runState.begin();
    link.inject("\nT*Command error\r\n");

    await expect(transport.awaitCompletion()).rejects.toThrow("unexpected data after target reached = Command error");
    expect(finished).toEqual([]);
    expect(runState.running).toBe(true);
  });
});
