export class CommandRejectedError extends Error {
  constructor(readonly reason: string) {
    super(reason);
    this.name = "CommandRejectedError";
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = "JobNotFoundError";
  }
}
