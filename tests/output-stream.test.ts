import { describe, expect, it } from "vitest";

import { formatSseEvent, streamJobOutput, type OutputStreamEvent } from "../src/jobs/output-stream.js";
import { JobRegistry } from "../src/jobs/registry.js";

async function collect(events: AsyncIterable<OutputStreamEvent>): Promise<OutputStreamEvent[]> {
  const collected: OutputStreamEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("streamJobOutput", () => {
  it("follows output until the terminal marker", async () => {
    const registry = new JobRegistry();
    const id = registry.create({ command: "cmd", cwd: "/" });
    registry.appendOutput(id, "a\n");

    const subscriber = collect(streamJobOutput(registry, id, { pollIntervalMs: 1_000 }));
    await delay(10);
    registry.appendOutput(id, "b\n");
    await delay(10);
    registry.appendOutput(id, "c");
    registry.complete(id, "finished", { stdout: "a\nb\nc", returncode: 0 });

    expect(await subscriber).toEqual([
      { type: "line", line: "a\n" },
      { type: "line", line: "b\n" },
      { type: "line", line: "c" },
      { type: "done", status: "finished" }
    ]);
  });

  it("gives independent subscribers the full output from the first line", async () => {
    const registry = new JobRegistry();
    const id = registry.create({ command: "cmd", cwd: "/" });
    registry.appendOutput(id, "one\n");
    const early = collect(streamJobOutput(registry, id, { pollIntervalMs: 20 }));
    await delay(15);
    registry.appendOutput(id, "two\n");
    const late = collect(streamJobOutput(registry, id, { pollIntervalMs: 20 }));
    await delay(15);
    registry.appendOutput(id, "three\n");
    registry.complete(id, "timeout", { stdout: "one\ntwo\nthree\n", returncode: -1 });

    const expected: OutputStreamEvent[] = [
      { type: "line", line: "one\n" },
      { type: "line", line: "two\n" },
      { type: "line", line: "three\n" },
      { type: "done", status: "timeout" }
    ];
    expect(await early).toEqual(expected);
    expect(await late).toEqual(expected);
  });

  it("replays a finished job and closes immediately", async () => {
    const registry = new JobRegistry();
    const id = registry.create({ command: "cmd", cwd: "/" });
    registry.appendOutput(id, "done\n");
    registry.complete(id, "cancelled", { stdout: "done\n", returncode: null });
    expect(await collect(streamJobOutput(registry, id, { pollIntervalMs: 60_000 }))).toEqual([
      { type: "line", line: "done\n" },
      { type: "done", status: "cancelled" }
    ]);
  });

  it("ends without a marker when the job disappears", async () => {
    const registry = new JobRegistry();
    const id = registry.create({ command: "cmd", cwd: "/" });
    registry.appendOutput(id, "before\n");
    const subscriber = collect(streamJobOutput(registry, id, { pollIntervalMs: 60_000 }));
    await delay(10);
    registry.remove(id);
    expect(await subscriber).toEqual([{ type: "line", line: "before\n" }]);
  });

  it("ends immediately for unknown jobs", async () => {
    const registry = new JobRegistry();
    expect(await collect(streamJobOutput(registry, "missing", { pollIntervalMs: 10 }))).toEqual([]);
  });
});

describe("formatSseEvent", () => {
  it("frames lines as data events without their terminator", () => {
    expect(formatSseEvent({ type: "line", line: "hello\n" })).toBe("data: hello\n\n");
    expect(formatSseEvent({ type: "line", line: "crlf\r\n" })).toBe("data: crlf\n\n");
    expect(formatSseEvent({ type: "line", line: "tail" })).toBe("data: tail\n\n");
  });

  it("splits carriage-return progress updates into separate data fields", () => {
    expect(formatSseEvent({ type: "line", line: "10%\r50%\r100%\n" })).toBe("data: 10%\ndata: 50%\ndata: 100%\n\n");
  });

  it("frames the terminal marker as a done event", () => {
    expect(formatSseEvent({ type: "done", status: "finished" })).toBe("event: done\ndata: finished\n\n");
  });
});
