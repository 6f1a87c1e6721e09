import { describe, expect, it } from "vitest";

import { JobRegistry } from "../src/jobs/registry.js";
import { DEFAULT_JOB_TTL_MS, RetentionSweeper } from "../src/jobs/sweeper.js";

describe("RetentionSweeper", () => {
  it("evicts terminal jobs older than the retention window", () => {
    let clock = 0;
    const registry = new JobRegistry({ monotonicNow: () => clock });
    const sweeper = new RetentionSweeper(registry, 1_000);

    const old = registry.create({ command: "old", cwd: "/" });
    const recent = registry.create({ command: "recent", cwd: "/" });
    const running = registry.create({ command: "running", cwd: "/" });

    registry.complete(old, "finished", { stdout: "", returncode: 0 });
    clock = 500;
    registry.complete(recent, "error", { stdout: "", returncode: null, error: "boom" });

    expect(sweeper.purge(1_000)).toEqual([]);
    expect(sweeper.purge(1_001)).toEqual([old]);
    expect(registry.list().map((job) => job.id)).toEqual([recent, running]);

    expect(sweeper.purge(10_000)).toEqual([recent]);
    expect(registry.list().map((job) => job.id)).toEqual([running]);
  });

  it("never evicts running jobs", () => {
    const registry = new JobRegistry({ monotonicNow: () => 0 });
    const sweeper = new RetentionSweeper(registry, 0);
    const id = registry.create({ command: "sleep", cwd: "/" });
    expect(sweeper.purge(Number.MAX_SAFE_INTEGER)).toEqual([]);
    expect(registry.get(id)?.status).toBe("running");
  });

  it("defaults to a one hour window", () => {
    expect(DEFAULT_JOB_TTL_MS).toBe(3_600_000);
    const registry = new JobRegistry({ monotonicNow: () => 0 });
    const sweeper = new RetentionSweeper(registry);
    const id = registry.create({ command: "x", cwd: "/" });
    registry.complete(id, "cancelled", { stdout: "", returncode: null });
    expect(sweeper.purge(3_600_000)).toEqual([]);
    expect(sweeper.purge(3_600_001)).toEqual([id]);
  });
});
