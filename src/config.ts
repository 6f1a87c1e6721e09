import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { Ajv } from "ajv";

export interface GatewayConfig {
  bind: "loopback" | "0.0.0.0";
  port: number;
  bodyLimitBytes: number;
  /** Applies to raw uploads only; JSON bodies use bodyLimitBytes. */
  uploadLimitBytes: number;
}

export interface ExecConfig {
  shell: string;
  /** Working directory for jobs submitted without one. */
  baseDir: string;
  defaultTimeoutSec: number;
}

export interface JobsConfig {
  /** How long terminal jobs are retained before the sweeper may evict them. */
  ttlMs: number;
  streamPollMs: number;
}

export interface FilesConfig {
  browseRoot: string;
  outputDir: string;
  diskPath: string;
}

export interface RemoteExecConfig {
  gateway: GatewayConfig;
  exec: ExecConfig;
  jobs: JobsConfig;
  files: FilesConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export const DEFAULT_CONFIG: RemoteExecConfig = {
  gateway: {
    bind: "loopback",
    port: 8787,
    bodyLimitBytes: 64 * 1024,
    uploadLimitBytes: 1024 * 1024 * 1024
  },
  exec: {
    shell: "/bin/sh",
    baseDir: "/",
    defaultTimeoutSec: 1200
  },
  jobs: {
    ttlMs: 60 * 60_000,
    streamPollMs: 300
  },
  files: {
    browseRoot: "/workspace",
    outputDir: "/workspace/output",
    diskPath: "/workspace"
  }
};

/** Upper bound for job timeouts, in seconds (30 days). */
export const MAX_TIMEOUT_SEC = 30 * 24 * 60 * 60;

const positiveInteger = { type: "integer", minimum: 1 } as const;
const nonEmptyString = { type: "string", minLength: 1 } as const;

const CONFIG_SCHEMA = {
  type: "object",
  required: ["gateway", "exec", "jobs", "files"],
  properties: {
    gateway: {
      type: "object",
      required: ["bind", "port", "bodyLimitBytes", "uploadLimitBytes"],
      properties: {
        bind: { enum: ["loopback", "0.0.0.0"] },
        port: { type: "integer", minimum: 0, maximum: 65_535 },
        bodyLimitBytes: positiveInteger,
        uploadLimitBytes: positiveInteger
      }
    },
    exec: {
      type: "object",
      required: ["shell", "baseDir", "defaultTimeoutSec"],
      properties: {
        shell: nonEmptyString,
        baseDir: nonEmptyString,
        defaultTimeoutSec: { type: "number", exclusiveMinimum: 0, maximum: MAX_TIMEOUT_SEC }
      }
    },
    jobs: {
      type: "object",
      required: ["ttlMs", "streamPollMs"],
      properties: {
        ttlMs: { type: "integer", minimum: 0 },
        streamPollMs: positiveInteger
      }
    },
    files: {
      type: "object",
      required: ["browseRoot", "outputDir", "diskPath"],
      properties: {
        browseRoot: nonEmptyString,
        outputDir: nonEmptyString,
        diskPath: nonEmptyString
      }
    }
  }
};

const validateConfig = new Ajv({ allErrors: true, strict: false }).compile(CONFIG_SCHEMA);

function merge<T extends object>(base: T, override?: DeepPartial<T>): T {
  if (!override) {
    return base;
  }
  const out: Record<string, unknown> = { ...(base as Record<string, unknown>) };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const current = out[key];
    if (value && typeof value === "object" && !Array.isArray(value) && current && typeof current === "object") {
      out[key] = merge(current as object, value as DeepPartial<object>);
      continue;
    }
    out[key] = value;
  }
  return out as T;
}

export function loadConfig(raw?: DeepPartial<RemoteExecConfig>): RemoteExecConfig {
  const config = merge(DEFAULT_CONFIG, raw);
  if (!validateConfig(config)) {
    const detail = (validateConfig.errors ?? [])
      .map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`)
      .join("; ");
    throw new Error(`invalid config: ${detail}`);
  }
  return config;
}

export interface LoadConfigFromDiskOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function resolveConfigPath(options: LoadConfigFromDiskOptions = {}): string {
  if (options.configPath) {
    return options.configPath;
  }
  const env = options.env ?? process.env;
  if (env.REMOTE_EXEC_CONFIG_PATH) {
    return env.REMOTE_EXEC_CONFIG_PATH;
  }
  return join(options.cwd ?? process.cwd(), "remote-exec.json");
}

export function loadConfigFromDisk(options: LoadConfigFromDiskOptions = {}): RemoteExecConfig {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options);
  const parsed = existsSync(configPath)
    ? (JSON.parse(readFileSync(configPath, "utf8")) as DeepPartial<RemoteExecConfig>)
    : {};
  const port = parsePort(env.PORT);
  return loadConfig(port === undefined ? parsed : { ...parsed, gateway: { ...parsed.gateway, port } });
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new Error(`invalid PORT: ${value}`);
  }
  return port;
}
