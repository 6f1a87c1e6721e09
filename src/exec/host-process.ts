import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

import type { LaunchedProcess, ProcessExit, ProcessLauncher, ProcessLaunchOptions } from "./types.js";

export interface HostProcessLauncherOptions {
  /** POSIX shell used as `<shell> -c <command>`. */
  shell: string;
}

/**
 * Runs commands on the host through a shell. No OS-level sandbox: anything the
 * service user may do, a submitted command may do.
 *
 * stderr is redirected into stdout inside the shell so readers get one stream
 * in the order the process wrote it. Each child leads its own process group;
 * termination signals the whole group so pipelines and background children
 * cannot keep the output pipe open after a kill. Termination resolves once the
 * shell is reaped and drops the pipe, so descendants that escaped the group
 * cannot hold a job open either.
 */
export class HostProcessLauncher implements ProcessLauncher {
  constructor(private readonly options: HostProcessLauncherOptions) {}

  launch(command: string, options: ProcessLaunchOptions): LaunchedProcess {
    const child = spawn(this.options.shell, ["-c", `exec 2>&1\n${command}`], {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "ignore"],
      detached: true,
      windowsHide: true
    });

    const spawned = new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.on("error", reject);
    });
    // "close" waits for every holder of the pipe; "exit" only for the shell.
    let closed = false;
    child.once("close", () => {
      closed = true;
    });
    const exited = new Promise<ProcessExit>((resolve) => {
      child.once("exit", (code, signal) => resolve({ code, signal }));
    });

    const terminate = async (): Promise<ProcessExit> => {
      const pid = child.pid;
      if (pid === undefined) {
        return { code: null, signal: null };
      }
      if (!closed) {
        killGroup(pid);
      }
      // A process that left the group (setsid) may still hold the pipe.
      child.stdout.destroy();
      return exited;
    };

    return {
      spawned,
      output: readLines(child.stdout),
      exited,
      terminate
    };
  }
}

function killGroup(pid: number): void {
  try {
    process.kill(-pid, "SIGKILL");
  } catch (error) {
    // Already exited and reaped between the check and the kill.
    if ((error as NodeJS.ErrnoException).code !== "ESRCH") {
      throw error;
    }
  }
}

/** Splits a byte stream into UTF-8 lines, keeping each `\n`; invalid bytes become U+FFFD. */
export async function* readLines(stream: Readable): AsyncGenerator<string> {
  stream.setEncoding("utf8");
  let pending = "";
  for await (const chunk of stream) {
    pending += String(chunk);
    let index = pending.indexOf("\n");
    while (index !== -1) {
      yield pending.slice(0, index + 1);
      pending = pending.slice(index + 1);
      index = pending.indexOf("\n");
    }
  }
  if (pending !== "") {
    yield pending;
  }
}
