import { createReadStream } from "node:fs";
import { basename } from "node:path";
import { Readable } from "node:stream";

import { Ajv } from "ajv";
import Fastify, { type FastifyInstance } from "fastify";

import { MAX_TIMEOUT_SEC, type RemoteExecConfig } from "./config.js";
import {
  browseDirectory,
  diskUsage,
  FileAccessError,
  listOutputFiles,
  resolveOutputFile,
  storeUpload
} from "./files.js";
import { CommandRejectedError, JobNotFoundError } from "./jobs/errors.js";
import { formatSseEvent, type OutputStreamEvent } from "./jobs/output-stream.js";
import type { JobService, SubmitRequest } from "./jobs/service.js";

class GatewayError extends Error {
  constructor(
    readonly statusCode: number,
    readonly errorCode: string,
    readonly clientMessage: string
  ) {
    super(clientMessage);
  }
}

export interface GatewayDependencies {
  config: RemoteExecConfig;
  jobs: JobService;
}

export interface ErrorResponse {
  ok: false;
  error: {
    code: string;
    message: string;
  };
}

interface JobParams {
  jobId: string;
}

interface SubmitBody {
  command: string;
  cwd?: string | null;
  timeout?: number;
  env?: Record<string, string> | null;
}

const ajv = new Ajv({ allErrors: true, strict: false });

const validateSubmitBody = ajv.compile<SubmitBody>({
  type: "object",
  properties: {
    command: { type: "string", minLength: 1 },
    cwd: { type: ["string", "null"] },
    timeout: { type: "number", exclusiveMinimum: 0, maximum: MAX_TIMEOUT_SEC },
    env: {
      type: ["object", "null"],
      additionalProperties: { type: "string" }
    }
  },
  required: ["command"],
  additionalProperties: false
});

export function buildGateway(deps: GatewayDependencies): FastifyInstance {
  const { config, jobs } = deps;
  const app = Fastify({
    logger: false,
    bodyLimit: config.gateway.bodyLimitBytes
  });

  app.addContentTypeParser(
    "application/octet-stream",
    { parseAs: "buffer", bodyLimit: config.gateway.uploadLimitBytes },
    (_request, body, done) => {
      done(null, body);
    }
  );

  app.setErrorHandler(async (error, _request, reply) => {
    const mapped = mapGatewayError(error);
    return reply.code(mapped.statusCode).send(errorResponse(mapped.errorCode, mapped.clientMessage));
  });

  app.setNotFoundHandler(async (request, reply) => {
    return reply.code(404).send(errorResponse("NOT_FOUND", `route not found: ${request.method} ${request.url}`));
  });

  app.get("/health", async () => {
    return {
      status: "ok",
      uptime: process.uptime(),
      jobs_count: jobs.jobCount
    };
  });

  app.post("/exec", async (request) => {
    const jobId = jobs.submit(parseSubmitRequest(request.body));
    return { job_id: jobId };
  });

  app.get<{ Params: JobParams }>("/exec/stream/:jobId", async (request, reply) => {
    const events = jobs.stream(request.params.jobId);
    return reply
      .header("cache-control", "no-cache")
      .type("text/event-stream")
      .send(Readable.from(toServerSentEvents(events)));
  });

  app.get<{ Params: JobParams }>("/status/:jobId", async (request) => {
    const view = jobs.getStatus(request.params.jobId);
    return {
      job_id: view.id,
      status: view.status,
      command: view.command
    };
  });

  app.get<{ Params: JobParams }>("/result/:jobId", async (request) => {
    const view = jobs.getResult(request.params.jobId);
    return {
      job_id: view.id,
      status: view.status,
      stdout: view.stdout,
      stderr: "",
      returncode: view.returncode,
      error: view.error
    };
  });

  app.post<{ Params: JobParams }>("/cancel/:jobId", async (request) => {
    const outcome = await jobs.cancel(request.params.jobId);
    return { message: outcome.message, status: outcome.status };
  });

  app.get("/jobs", async () => {
    return {
      jobs: jobs.list().map((job) => ({
        job_id: job.id,
        status: job.status,
        command: job.command,
        created_at: new Date(job.createdAt).toISOString()
      }))
    };
  });

  app.get<{ Querystring: { path?: string } }>("/browse", async (request) => {
    return browseDirectory(request.query.path ?? config.files.browseRoot);
  });

  app.post<{ Querystring: { dest_dir?: string; filename?: string } }>("/upload", async (request) => {
    const { filename } = request.query;
    if (!filename) {
      throw new GatewayError(400, "BAD_REQUEST", "filename query parameter is required");
    }
    if (!Buffer.isBuffer(request.body)) {
      throw new GatewayError(415, "UNSUPPORTED_MEDIA_TYPE", "upload body must be application/octet-stream");
    }
    const stored = await storeUpload(request.query.dest_dir ?? config.files.browseRoot, filename, request.body);
    return {
      message: "File uploaded",
      path: stored.path,
      size: stored.size
    };
  });

  app.get("/files", async () => {
    return { files: await listOutputFiles(config.files.outputDir) };
  });

  app.get<{ Params: { filename: string } }>("/files/:filename", async (request, reply) => {
    const filePath = await resolveOutputFile(config.files.outputDir, request.params.filename);
    return reply
      .header("content-disposition", `attachment; filename="${basename(filePath)}"`)
      .type("application/octet-stream")
      .send(createReadStream(filePath));
  });

  app.get("/disk", async () => {
    return diskUsage(config.files.diskPath);
  });

  return app;
}

export function parseSubmitRequest(body: unknown): SubmitRequest {
  if (!validateSubmitBody(body)) {
    throw new GatewayError(400, "BAD_REQUEST", `invalid request body: ${ajv.errorsText(validateSubmitBody.errors)}`);
  }
  return {
    command: body.command,
    ...(body.cwd ? { cwd: body.cwd } : {}),
    ...(body.timeout !== undefined ? { timeout: body.timeout } : {}),
    ...(body.env ? { env: body.env } : {})
  };
}

async function* toServerSentEvents(events: AsyncIterable<OutputStreamEvent>): AsyncGenerator<string> {
  for await (const event of events) {
    yield formatSseEvent(event);
  }
}

function errorResponse(code: string, message: string): ErrorResponse {
  return {
    ok: false,
    error: {
      code,
      message
    }
  };
}

const CLIENT_ERROR_CODES: Record<number, string> = {
  413: "PAYLOAD_TOO_LARGE",
  415: "UNSUPPORTED_MEDIA_TYPE"
};

function mapGatewayError(error: unknown): {
  statusCode: number;
  errorCode: string;
  clientMessage: string;
} {
  if (error instanceof GatewayError) {
    return {
      statusCode: error.statusCode,
      errorCode: error.errorCode,
      clientMessage: error.clientMessage
    };
  }
  if (error instanceof CommandRejectedError) {
    return { statusCode: 400, errorCode: "COMMAND_REJECTED", clientMessage: error.reason };
  }
  if (error instanceof JobNotFoundError) {
    return { statusCode: 404, errorCode: "NOT_FOUND", clientMessage: "Job not found" };
  }
  if (error instanceof FileAccessError) {
    switch (error.reason) {
      case "not-found":
        return { statusCode: 404, errorCode: "NOT_FOUND", clientMessage: error.message };
      case "forbidden":
        return { statusCode: 403, errorCode: "FORBIDDEN", clientMessage: error.message };
      case "not-a-directory":
      case "invalid":
        return { statusCode: 400, errorCode: "BAD_REQUEST", clientMessage: error.message };
    }
  }
  if (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return {
      statusCode: error.statusCode,
      errorCode: CLIENT_ERROR_CODES[error.statusCode] ?? "BAD_REQUEST",
      clientMessage: error.message
    };
  }
  console.error("[remote-exec] request failed:", error instanceof Error ? error.message : String(error));
  return {
    statusCode: 500,
    errorCode: "INTERNAL",
    clientMessage: "Internal server error"
  };
}
