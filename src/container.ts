// src/container.ts
// Composition root: picks store + lock implementations from config.

import type { AppConfig } from "@/lib/config";
import { systemClock, type Clock } from "@/lib/clock";
import { createDatabase } from "@/lib/db";
import { log } from "@/lib/observability/logger";
import { createRedisClient } from "@/lib/redis";
import { DrizzleLabStore } from "@/lib/store/drizzleLabStore";
import type { LabStore } from "@/lib/store/labStore";
import { MemoryLabStore } from "@/lib/store/memoryLabStore";
import {
  InProcessReportLock,
  ioredisLockClient,
  RedisReportLock,
  type ReportLock,
} from "@/modules/pipeline/reportLock";
import { ReportPipeline } from "@/modules/pipeline/reportPipeline.service";
import { SubjectService } from "@/modules/subjects/subjects.service";

export type Container = {
  pipeline: ReportPipeline;
  subjects: SubjectService;
  close(): Promise<void>;
};

export function buildContainer(
  config: AppConfig,
  clock: Clock = systemClock,
): Container {
  const closers: Array<() => Promise<void>> = [];

  let store: LabStore;
  if (config.mode === "MOCK" || !config.databaseUrl) {
    log("WARN", "STORE_IN_MEMORY", { mode: config.mode });
    store = new MemoryLabStore();
  } else {
    const database = createDatabase(config.databaseUrl);
    closers.push(database.close);
    store = new DrizzleLabStore(database.db);
  }

  let lock: ReportLock;
  if (config.redisUrl) {
    const redis = createRedisClient(config.redisUrl);
    closers.push(async () => {
      await redis.quit();
    });
    lock = new RedisReportLock(ioredisLockClient(redis), {
      ttlMs: config.reportLockTtlMs,
    });
  } else {
    lock = new InProcessReportLock();
  }

  return {
    pipeline: new ReportPipeline({
      store,
      lock,
      clock,
      allowedMediaTypes: config.allowedMediaTypes,
    }),
    subjects: new SubjectService(store, clock),
    async close() {
      for (const close of closers.reverse()) await close();
    },
  };
}
