/**
 * Abstraction over spawned commands. The default implementation runs on the
 * host via child_process (see HostProcessLauncher); tests substitute fakes.
 */
export interface ProcessLaunchOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface LaunchedProcess {
  /** Resolves once the OS has started the process; rejects if it could not. */
  readonly spawned: Promise<void>;
  /** Combined stdout/stderr, one decoded line per item, terminators kept. */
  readonly output: AsyncIterable<string>;
  /** Resolves once the process itself is reaped, even if descendants still hold its output. */
  readonly exited: Promise<ProcessExit>;
  /**
   * Kills the process group, ends `output`, then waits for the reap. Safe to
   * call after the process is already gone.
   */
  terminate(): Promise<ProcessExit>;
}

export interface ProcessLauncher {
  launch(command: string, options: ProcessLaunchOptions): LaunchedProcess;
}
