import "dotenv/config";
import { Server } from "@grpc/grpc-js";
import { loadConfig } from "./config";
import { createCoordinator } from "./coordinator";
import { createGrpcServer, startGrpcServer } from "./grpc/server";
import { runJob } from "./job-runner";
import { Poller } from "./services";

const TAG = "[leadforge]";

const config = loadConfig();
const coordinator = createCoordinator(config);

// Components
let grpcServer: Server | null = null;
let poller: Poller | null = null;

async function main() {
  console.log(
    `${TAG} starting coordinator... (worker: ${config.workerId}, role: ${config.role}, posture: ${config.posture})`,
  );

  // Health check: fails fast in production, falls back to memory otherwise
  const session = await coordinator.store.getSession();
  console.log(`${TAG} store ready (${session.kind})`);
  if (session.kind === "memory") {
    console.warn(
      `${TAG} WARNING: running on the in-memory store. Nothing is shared with other processes.`,
    );
  }

  if (config.role !== "worker") {
    grpcServer = createGrpcServer(coordinator, { apiToken: config.apiToken });
    await startGrpcServer(grpcServer, config.port);
  }

  if (config.role !== "api") {
    poller = new Poller(coordinator.queue, {
      workerId: config.workerId,
      batchSize: config.pollBatchSize,
      onJobReceived: (job) => runJob(coordinator.orchestrator, job),
    });
    poller.start();
  }

  console.log(`${TAG} coordinator ready`);
}

function stopGrpc(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.tryShutdown((err) => {
      if (err) {
        console.error(`${TAG} graceful grpc shutdown failed, forcing:`, err);
        server.forceShutdown();
      }
      resolve();
    });
  });
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  if (poller) await poller.stop();
  if (grpcServer) await stopGrpc(grpcServer);

  await coordinator.store.close();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
