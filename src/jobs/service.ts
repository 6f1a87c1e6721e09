import { resolve } from "node:path";

import type { ExecConfig, JobsConfig } from "../config.js";
import { checkCommand } from "../security/command-gate.js";
import { CommandRejectedError, JobNotFoundError } from "./errors.js";
import { streamJobOutput, type OutputStreamEvent } from "./output-stream.js";
import type { JobRegistry } from "./registry.js";
import { describeError, type ProcessRunner } from "./runner.js";
import type { RetentionSweeper } from "./sweeper.js";
import type { JobSnapshot, JobStatus, JobSummary } from "./types.js";

export interface SubmitRequest {
  command: string;
  cwd?: string;
  /** Seconds. */
  timeout?: number;
  env?: Record<string, string>;
}

export interface JobStatusView {
  id: string;
  status: JobStatus;
  command: string;
}

export interface JobResultView {
  id: string;
  status: JobStatus;
  stdout: string;
  returncode: number | null;
  error: string | null;
}

export interface CancelOutcome {
  cancelled: boolean;
  status: JobStatus;
  message: string;
}

export interface JobServiceOptions {
  registry: JobRegistry;
  runner: ProcessRunner;
  sweeper: RetentionSweeper;
  exec: Pick<ExecConfig, "baseDir" | "defaultTimeoutSec">;
  jobs: Pick<JobsConfig, "streamPollMs">;
  /** Base environment for every job; defaults to the service's own. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Operations exposed to the gateway. Submission returns as soon as the job is
 * registered and its runner task started; the task reports back only through
 * the registry.
 */
export class JobService {
  private readonly tasks = new Set<Promise<void>>();

  constructor(private readonly options: JobServiceOptions) {}

  submit(request: SubmitRequest): string {
    this.options.sweeper.purge();
    const rejection = checkCommand(request.command);
    if (rejection !== undefined) {
      throw new CommandRejectedError(rejection);
    }
    const cwd = request.cwd ? resolve(request.cwd) : this.options.exec.baseDir;
    const { registry } = this.options;
    const jobId = registry.create({ command: request.command, cwd });
    const signal = registry.cancellationSignal(jobId);
    if (!signal) {
      throw new JobNotFoundError(jobId);
    }
    const timeoutSec = request.timeout ?? this.options.exec.defaultTimeoutSec;
    const task: Promise<void> = this.options.runner
      .run({
        jobId,
        command: request.command,
        cwd,
        env: { ...(this.options.env ?? process.env), ...request.env },
        timeoutMs: timeoutSec * 1000,
        signal
      })
      .then(
        (status) => {
          this.tasks.delete(task);
          if (status === "error") {
            console.warn("[remote-exec] job failed:", jobId, registry.get(jobId)?.result?.error ?? "unknown error");
          }
        },
        (error: unknown) => {
          this.tasks.delete(task);
          console.error("[remote-exec] runner crashed:", jobId, describeError(error));
        }
      );
    this.tasks.add(task);
    return jobId;
  }

  getStatus(jobId: string): JobStatusView {
    const job = this.require(jobId);
    return { id: job.id, status: job.status, command: job.command };
  }

  getResult(jobId: string): JobResultView {
    const job = this.require(jobId);
    return {
      id: job.id,
      status: job.status,
      stdout: job.result?.stdout ?? "",
      returncode: job.result?.returncode ?? null,
      error: job.result?.error ?? null
    };
  }

  stream(jobId: string): AsyncIterable<OutputStreamEvent> {
    this.require(jobId);
    return streamJobOutput(this.options.registry, jobId, {
      pollIntervalMs: this.options.jobs.streamPollMs
    });
  }

  /**
   * Signals a running job and waits until its runner has killed, reaped and
   * frozen it. Jobs that are already terminal, or already being cancelled,
   * are left alone and reported with their current status.
   */
  async cancel(jobId: string): Promise<CancelOutcome> {
    const { registry } = this.options;
    const job = this.require(jobId);
    const alreadySignalled = registry.cancellationSignal(jobId)?.aborted ?? false;
    const requested = job.status === "running" && !alreadySignalled && registry.requestCancel(jobId);
    await registry.whenSettled(jobId);
    const status = registry.get(jobId)?.status ?? job.status;
    if (requested && status === "cancelled") {
      return { cancelled: true, status, message: "Job cancelled" };
    }
    return { cancelled: false, status, message: `Job is already ${status}` };
  }

  list(): JobSummary[] {
    this.options.sweeper.purge();
    return this.options.registry.list();
  }

  get jobCount(): number {
    return this.options.registry.size;
  }

  /** Cancels every running job and waits for all runner tasks to finish. */
  async shutdown(): Promise<void> {
    for (const job of this.options.registry.list()) {
      if (job.status === "running") {
        this.options.registry.requestCancel(job.id);
      }
    }
    await Promise.allSettled([...this.tasks]);
  }

  private require(jobId: string): JobSnapshot {
    const job = this.options.registry.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }
}
