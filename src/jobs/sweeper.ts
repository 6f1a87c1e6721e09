import { performance } from "node:perf_hooks";

import type { JobRegistry } from "./registry.js";
import { isTerminalStatus } from "./types.js";

export const DEFAULT_JOB_TTL_MS = 60 * 60_000;

/**
 * Evicts terminal jobs once they are older than the retention window. Called
 * lazily from request paths rather than on a timer, so memory held by
 * finished jobs is only reclaimed when the service sees traffic. `clock` must
 * be the same monotonic clock the registry stamps `finishedAt` with.
 */
export class RetentionSweeper {
  constructor(
    private readonly registry: JobRegistry,
    private readonly ttlMs: number = DEFAULT_JOB_TTL_MS,
    private readonly clock: () => number = () => performance.now()
  ) {}

  /** Returns the ids that were removed. */
  purge(now = this.clock()): string[] {
    const expired = this.registry
      .list()
      .filter(
        (job) =>
          isTerminalStatus(job.status) &&
          job.finishedAt !== undefined &&
          now - job.finishedAt > this.ttlMs
      )
      .map((job) => job.id);
    for (const id of expired) {
      this.registry.remove(id);
    }
    return expired;
  }
}
