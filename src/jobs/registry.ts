import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";

import {
  isTerminalStatus,
  type JobResult,
  type JobSnapshot,
  type JobStatus,
  type JobSubmission,
  type JobSummary,
  type OutputSlice,
  type TerminalJobStatus
} from "./types.js";

interface JobEntry {
  id: string;
  command: string;
  cwd: string;
  createdAt: number;
  status: JobStatus;
  output: string[];
  finishedAt?: number;
  result?: JobResult;
  cancellation: AbortController;
  settled: Promise<void>;
  markSettled: () => void;
  watchers: Set<() => void>;
}

export interface JobRegistryOptions {
  /** Wall clock for `createdAt`. */
  now?: () => number;
  /** Monotonic clock for `finishedAt`; retention ages are measured against it. */
  monotonicNow?: () => number;
  idFactory?: () => string;
}

/**
 * In-memory store of every retained job. Each job has one writer (its runner)
 * for output and status; everything handed out is a copy, so readers never
 * observe a half-applied update.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly now: () => number;
  private readonly monotonicNow: () => number;
  private readonly idFactory: () => string;

  constructor(options: JobRegistryOptions = {}) {
    this.now = options.now ?? Date.now;
    this.monotonicNow = options.monotonicNow ?? (() => performance.now());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get size(): number {
    return this.jobs.size;
  }

  create(submission: JobSubmission): string {
    const id = this.idFactory();
    if (this.jobs.has(id)) {
      throw new Error(`duplicate job id: ${id}`);
    }
    let markSettled: () => void = () => undefined;
    const settled = new Promise<void>((resolve) => {
      markSettled = resolve;
    });
    this.jobs.set(id, {
      id,
      command: submission.command,
      cwd: submission.cwd,
      createdAt: this.now(),
      status: "running",
      output: [],
      cancellation: new AbortController(),
      settled,
      markSettled,
      watchers: new Set()
    });
    return id;
  }

  get(id: string): JobSnapshot | undefined {
    const entry = this.jobs.get(id);
    if (!entry) {
      return undefined;
    }
    return {
      id: entry.id,
      status: entry.status,
      command: entry.command,
      cwd: entry.cwd,
      createdAt: entry.createdAt,
      ...(entry.finishedAt !== undefined ? { finishedAt: entry.finishedAt } : {}),
      output: [...entry.output],
      ...(entry.result !== undefined ? { result: { ...entry.result } } : {})
    };
  }

  list(): JobSummary[] {
    return [...this.jobs.values()].map((entry) => ({
      id: entry.id,
      status: entry.status,
      command: entry.command,
      createdAt: entry.createdAt,
      ...(entry.finishedAt !== undefined ? { finishedAt: entry.finishedAt } : {})
    }));
  }

  /** Lines from `cursor` onward, captured together with the status they belong to. */
  readOutput(id: string, cursor: number): OutputSlice | undefined {
    const entry = this.jobs.get(id);
    if (!entry) {
      return undefined;
    }
    return {
      lines: entry.output.slice(cursor),
      status: entry.status
    };
  }

  /** Returns false when the job is gone or its output is already frozen. */
  appendOutput(id: string, line: string): boolean {
    const entry = this.jobs.get(id);
    if (!entry || entry.status !== "running") {
      return false;
    }
    entry.output.push(line);
    this.notify(entry);
    return true;
  }

  /**
   * Applies the one terminal transition of a job. Later calls are refused so a
   * terminal status, its result and finishedAt never change once written.
   */
  complete(id: string, status: TerminalJobStatus, result: JobResult): boolean {
    const entry = this.jobs.get(id);
    if (!entry || isTerminalStatus(entry.status)) {
      return false;
    }
    entry.status = status;
    entry.finishedAt = this.monotonicNow();
    entry.result = { ...result };
    entry.markSettled();
    this.notify(entry);
    return true;
  }

  cancellationSignal(id: string): AbortSignal | undefined {
    return this.jobs.get(id)?.cancellation.signal;
  }

  /** Signals the job's runner. The runner applies the transition itself. */
  requestCancel(id: string): boolean {
    const entry = this.jobs.get(id);
    if (!entry || entry.status !== "running") {
      return false;
    }
    entry.cancellation.abort();
    return true;
  }

  whenSettled(id: string): Promise<void> | undefined {
    return this.jobs.get(id)?.settled;
  }

  /**
   * Resolves on the next append, terminal transition or removal of the job,
   * or after `timeoutMs`, whichever comes first.
   */
  waitForChange(id: string, timeoutMs: number): Promise<void> {
    const entry = this.jobs.get(id);
    if (!entry || entry.status !== "running") {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        entry.watchers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, timeoutMs);
      entry.watchers.add(wake);
    });
  }

  remove(id: string): boolean {
    const entry = this.jobs.get(id);
    if (!entry) {
      return false;
    }
    this.jobs.delete(id);
    this.notify(entry);
    return true;
  }

  private notify(entry: JobEntry): void {
    for (const wake of [...entry.watchers]) {
      wake();
    }
  }
}
