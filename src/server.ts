// src/server.ts
// Purpose: Process bootstrap, HTTP listener and graceful shutdown.

import http from "http";
import { createApp } from "./app";
import { buildContainer } from "./container";
import { getConfig } from "@/lib/config";
import { log, setLogLevel } from "@/lib/observability/logger";

const config = getConfig();
setLogLevel(config.logLevel);
const container = buildContainer(config);

const server = http.createServer(
  createApp({
    config,
    pipeline: container.pipeline,
    subjects: container.subjects,
  }),
);

server.listen(config.port, () => {
  log("INFO", "SERVER_STARTED", {
    port: config.port,
    mode: config.mode,
    distributedLock: Boolean(config.redisUrl),
  });
});

////////////////////////////////////////////////////////////////
// GRACEFUL SHUTDOWN
////////////////////////////////////////////////////////////////

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  log("INFO", "SERVER_STOPPING", { signal });

  await new Promise<void>((resolve) => server.close(() => resolve()));
  await container.close();

  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log("ERROR", "SERVER_SHUTDOWN_FAILED", {
        message: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  });
}
