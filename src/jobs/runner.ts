import { constants } from "node:os";

import type { LaunchedProcess, ProcessExit, ProcessLauncher } from "../exec/types.js";
import type { JobRegistry } from "./registry.js";
import { TIMEOUT_RETURN_CODE, type JobResult, type TerminalJobStatus } from "./types.js";

export interface ProcessRunnerOptions {
  registry: JobRegistry;
  launcher: ProcessLauncher;
}

export interface RunJobArgs {
  jobId: string;
  command: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
  signal: AbortSignal;
}

type Settlement =
  | { kind: "exited"; exit: ProcessExit }
  | { kind: "failed"; error: unknown }
  | { kind: "timeout" }
  | { kind: "cancelled" };

/**
 * Drives one job from spawn to its terminal status. The read loop, the
 * deadline and the job's cancellation signal race; whichever settles first
 * decides the status, and any kill is followed by a reap before the job is
 * frozen. After a kill the read loop is abandoned rather than drained: lines
 * it still delivers are refused once the job is terminal. Nothing here throws
 * to the caller: failures become job state.
 */
export class ProcessRunner {
  constructor(private readonly options: ProcessRunnerOptions) {}

  async run(args: RunJobArgs): Promise<TerminalJobStatus> {
    const { status, result } = await this.execute(args);
    this.options.registry.complete(args.jobId, status, result);
    return status;
  }

  private async execute(args: RunJobArgs): Promise<{ status: TerminalJobStatus; result: JobResult }> {
    let proc: LaunchedProcess;
    try {
      proc = this.options.launcher.launch(args.command, { cwd: args.cwd, env: args.env });
      await proc.spawned;
    } catch (error) {
      return { status: "error", result: this.result(args.jobId, null, describeError(error)) };
    }

    if (args.signal.aborted) {
      await this.reap(proc);
      return { status: "cancelled", result: this.result(args.jobId, null) };
    }

    const reading = this.pump(args.jobId, proc);
    const settlement = await raceSettlement(
      reading.then(
        async (readError): Promise<Settlement> =>
          readError === undefined
            ? { kind: "exited", exit: await proc.exited }
            : { kind: "failed", error: readError }
      ),
      args.timeoutMs,
      args.signal
    );

    switch (settlement.kind) {
      case "exited":
        return {
          status: "finished",
          result: this.result(args.jobId, exitCode(settlement.exit))
        };
      case "failed":
        await this.reap(proc);
        return {
          status: "error",
          result: this.result(args.jobId, null, describeError(settlement.error))
        };
      case "timeout":
        await this.reap(proc);
        return { status: "timeout", result: this.result(args.jobId, TIMEOUT_RETURN_CODE) };
      case "cancelled":
        await this.reap(proc);
        return { status: "cancelled", result: this.result(args.jobId, null) };
    }
  }

  /** Copies output into the registry until end of stream; resolves with the read error, if any. */
  private async pump(jobId: string, proc: LaunchedProcess): Promise<unknown> {
    try {
      for await (const line of proc.output) {
        this.options.registry.appendOutput(jobId, line);
      }
      return undefined;
    } catch (error) {
      return error ?? new Error("output stream failed");
    }
  }

  private async reap(proc: LaunchedProcess): Promise<void> {
    try {
      await proc.terminate();
    } catch (error) {
      console.warn("[remote-exec] failed to terminate process:", describeError(error));
    }
  }

  private result(jobId: string, returncode: number | null, error?: string): JobResult {
    const output = this.options.registry.readOutput(jobId, 0);
    return {
      stdout: output ? output.lines.join("") : "",
      returncode,
      ...(error !== undefined ? { error } : {})
    };
  }
}

/** Largest delay a single Node.js timer accepts; longer ones fire after 1 ms. */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Calls `onExpire` after `delayMs`, re-arming as often as the timer limit needs. Returns a canceller. */
export function startDeadline(delayMs: number, onExpire: () => void): () => void {
  let timer: NodeJS.Timeout | undefined;
  const arm = (remaining: number): void => {
    const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
    timer = setTimeout(() => {
      if (remaining > step) {
        arm(remaining - step);
      } else {
        onExpire();
      }
    }, step);
  };
  arm(delayMs);
  return () => clearTimeout(timer);
}

function raceSettlement(
  completion: Promise<Settlement>,
  timeoutMs: number,
  signal: AbortSignal
): Promise<Settlement> {
  return new Promise<Settlement>((resolve) => {
    const cancelDeadline = startDeadline(timeoutMs, () => settle({ kind: "timeout" }));
    const onAbort = (): void => settle({ kind: "cancelled" });
    signal.addEventListener("abort", onAbort, { once: true });
    const settle = (settlement: Settlement): void => {
      cancelDeadline();
      signal.removeEventListener("abort", onAbort);
      resolve(settlement);
    };
    void completion.then(settle, (error: unknown) => settle({ kind: "failed", error }));
  });
}

/** Signal deaths map to 128 + signal number, keeping negative codes for sentinels. */
export function exitCode(exit: ProcessExit): number | null {
  if (exit.code !== null) {
    return exit.code;
  }
  const signalNumber = Object.entries(constants.signals).find(([name]) => name === exit.signal)?.[1];
  return signalNumber !== undefined ? 128 + signalNumber : null;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
