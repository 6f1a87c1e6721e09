export type JobStatus = "running" | "finished" | "error" | "cancelled" | "timeout";

export type TerminalJobStatus = Exclude<JobStatus, "running">;

/** Return code recorded when a job is killed for exceeding its timeout. */
export const TIMEOUT_RETURN_CODE = -1;

export interface JobSubmission {
  command: string;
  cwd: string;
}

export interface JobResult {
  stdout: string;
  /** Exit code, TIMEOUT_RETURN_CODE on timeout, null when cancelled or failed. */
  returncode: number | null;
  error?: string;
}

export interface JobSnapshot {
  id: string;
  status: JobStatus;
  command: string;
  cwd: string;
  /** Epoch milliseconds. */
  createdAt: number;
  /** Monotonic milliseconds; only meaningful relative to the registry's clock. */
  finishedAt?: number;
  output: readonly string[];
  result?: JobResult;
}

export interface JobSummary {
  id: string;
  status: JobStatus;
  command: string;
  createdAt: number;
  finishedAt?: number;
}

export interface OutputSlice {
  lines: readonly string[];
  status: JobStatus;
}

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return status !== "running";
}
