import type { JobRegistry } from "./registry.js";
import { isTerminalStatus, type TerminalJobStatus } from "./types.js";

export type OutputStreamEvent =
  | { type: "line"; line: string }
  | { type: "done"; status: TerminalJobStatus };

export interface OutputStreamOptions {
  /** Upper bound on how long a subscriber waits between registry checks. */
  pollIntervalMs: number;
}

/**
 * Follows a job's output for one subscriber. Every subscriber keeps its own
 * cursor and starts from the first line, so late joiners still see the full
 * output. Ends with a `done` event once the job is terminal, or silently if
 * the job is removed while being followed.
 */
export async function* streamJobOutput(
  registry: JobRegistry,
  jobId: string,
  options: OutputStreamOptions
): AsyncGenerator<OutputStreamEvent> {
  let cursor = 0;
  while (true) {
    const slice = registry.readOutput(jobId, cursor);
    if (!slice) {
      return;
    }
    cursor += slice.lines.length;
    for (const line of slice.lines) {
      yield { type: "line", line };
    }
    if (isTerminalStatus(slice.status)) {
      yield { type: "done", status: slice.status };
      return;
    }
    await registry.waitForChange(jobId, options.pollIntervalMs);
  }
}

/**
 * Server-sent events framing: one event per output line, then a `done` event.
 * Bare carriage returns (progress bars) would end an SSE field, so each
 * segment becomes its own `data:` field of the same event.
 */
export function formatSseEvent(event: OutputStreamEvent): string {
  if (event.type === "done") {
    return `event: done\ndata: ${event.status}\n\n`;
  }
  const segments = event.line.replace(/\r?\n$/, "").split("\r");
  return `${segments.map((segment) => `data: ${segment}`).join("\n")}\n\n`;
}
