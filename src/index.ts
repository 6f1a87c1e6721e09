import { loadConfigFromDisk } from "./config.js";
import { HostProcessLauncher } from "./exec/host-process.js";
import { buildGateway } from "./gateway.js";
import { JobRegistry } from "./jobs/registry.js";
import { ProcessRunner } from "./jobs/runner.js";
import { JobService } from "./jobs/service.js";
import { RetentionSweeper } from "./jobs/sweeper.js";

async function main(): Promise<void> {
  const config = loadConfigFromDisk();

  const registry = new JobRegistry();
  const jobs = new JobService({
    registry,
    runner: new ProcessRunner({
      registry,
      launcher: new HostProcessLauncher({ shell: config.exec.shell })
    }),
    sweeper: new RetentionSweeper(registry, config.jobs.ttlMs),
    exec: config.exec,
    jobs: config.jobs
  });
  const gateway = buildGateway({ config, jobs });

  const host = config.gateway.bind === "loopback" ? "127.0.0.1" : "0.0.0.0";
  const address = await gateway.listen({ host, port: config.gateway.port });
  console.log(`[remote-exec] listening on ${address}`);

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log("[remote-exec] shutting down; cancelling running jobs");
    await jobs.shutdown();
    await gateway.close();
    process.exit(0);
  };
  process.once("SIGINT", () => {
    void shutdown();
  });
  process.once("SIGTERM", () => {
    void shutdown();
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
