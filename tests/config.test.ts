import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { DEFAULT_CONFIG, loadConfig, loadConfigFromDisk, MAX_TIMEOUT_SEC, resolveConfigPath } from "../src/config.js";

const cleanupPaths: string[] = [];

afterEach(async () => {
  while (cleanupPaths.length > 0) {
    const path = cleanupPaths.pop();
    if (path) {
      await rm(path, { recursive: true, force: true });
    }
  }
});

describe("config", () => {
  it("uses defaults when nothing is overridden", () => {
    const config = loadConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.exec.defaultTimeoutSec).toBe(1200);
    expect(config.jobs.ttlMs).toBe(3_600_000);
  });

  it("deep merges partial overrides", () => {
    const config = loadConfig({ exec: { baseDir: "/srv" }, jobs: { streamPollMs: 50 } });
    expect(config.exec).toEqual({ shell: "/bin/sh", baseDir: "/srv", defaultTimeoutSec: 1200 });
    expect(config.jobs).toEqual({ ttlMs: 3_600_000, streamPollMs: 50 });
    expect(config.gateway).toEqual(DEFAULT_CONFIG.gateway);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ jobs: { streamPollMs: 0 } })).toThrow(/invalid config: \/jobs\/streamPollMs/);
    expect(() => loadConfig({ exec: { defaultTimeoutSec: -1 } })).toThrow(/invalid config/);
    expect(() => loadConfig({ exec: { defaultTimeoutSec: MAX_TIMEOUT_SEC + 1 } })).toThrow(
      /invalid config: \/exec\/defaultTimeoutSec/
    );
    expect(loadConfig({ exec: { defaultTimeoutSec: MAX_TIMEOUT_SEC } }).exec.defaultTimeoutSec).toBe(MAX_TIMEOUT_SEC);
  });

  it("resolves the config path from options, env, then cwd", () => {
    expect(resolveConfigPath({ configPath: "/etc/custom.json" })).toBe("/etc/custom.json");
    expect(resolveConfigPath({ env: { REMOTE_EXEC_CONFIG_PATH: "/opt/re.json" } })).toBe("/opt/re.json");
    expect(resolveConfigPath({ env: {}, cwd: "/srv/app" })).toBe(join("/srv/app", "remote-exec.json"));
  });

  it("loads overrides from disk and applies PORT", async () => {
    const dir = await mkdtemp(join(tmpdir(), "remote-exec-config-"));
    cleanupPaths.push(dir);
    await writeFile(join(dir, "remote-exec.json"), JSON.stringify({ gateway: { bind: "0.0.0.0" } }), "utf8");
    const config = loadConfigFromDisk({ cwd: dir, env: { PORT: "9100" } });
    expect(config.gateway.bind).toBe("0.0.0.0");
    expect(config.gateway.port).toBe(9100);
  });

  it("falls back to defaults when the file is absent", async () => {
    const dir = await mkdtemp(join(tmpdir(), "remote-exec-config-missing-"));
    cleanupPaths.push(dir);
    expect(loadConfigFromDisk({ cwd: dir, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it("rejects a malformed PORT", () => {
    expect(() => loadConfigFromDisk({ configPath: "/nonexistent/remote-exec.json", env: { PORT: "http" } })).toThrow(
      "invalid PORT: http"
    );
  });
});
