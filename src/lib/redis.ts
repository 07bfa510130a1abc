// src/lib/redis.ts
// Purpose: Shared Redis client for distributed report locks

import Redis from "ioredis";
import { log } from "@/lib/observability/logger";

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, { maxRetriesPerRequest: 3 });

  client.on("error", (error: Error) => {
    log("ERROR", "REDIS_ERROR", { message: error.message });
  });

  return client;
}
