// src/modules/pipeline/reportLock.ts
// Purpose: Keyed mutual exclusion so one report never has two pipeline runs in flight.

import { setTimeout as sleep } from "node:timers/promises";
import type Redis from "ioredis";
import { DomainError } from "@/lib/errors/domain-error";
import { log } from "@/lib/observability/logger";
import { newId } from "@/utils/uuid";

export interface ReportLock {
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

export class ReportBusyError extends DomainError {
  constructor(public readonly key: string) {
    super(`Resource is busy: ${key}`, 409, "report_busy", { key });
    this.name = "ReportBusyError";
  }
}

////////////////////////////////////////////////////////////////
// In-process (single node, tests, MOCK mode)
////////////////////////////////////////////////////////////////

export class InProcessReportLock implements ReportLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Keys with a holder or waiters. */
  get activeKeys(): number {
    return this.tails.size;
  }
}

////////////////////////////////////////////////////////////////
// Redis (multi-node)
////////////////////////////////////////////////////////////////

export interface RedisLockClient {
  tryAcquire(key: string, token: string, ttlMs: number): Promise<boolean>;
  /** Resets the TTL; false once the key is gone or held by another token. */
  extend(key: string, token: string, ttlMs: number): Promise<boolean>;
  release(key: string, token: string): Promise<void>;
}

// delete only if we still own it
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

const EXTEND_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("pexpire", KEYS[1], ARGV[2])
end
return 0
`;

export function ioredisLockClient(redis: Redis): RedisLockClient {
  return {
    async tryAcquire(key, token, ttlMs) {
      const reply = await redis.set(key, token, "PX", ttlMs, "NX");
      return reply === "OK";
    },
    async extend(key, token, ttlMs) {
      const reply = await redis.eval(EXTEND_SCRIPT, 1, key, token, ttlMs);
      return reply === 1;
    },
    async release(key, token) {
      await redis.eval(RELEASE_SCRIPT, 1, key, token);
    },
  };
}

export type RedisReportLockOptions = {
  ttlMs: number;
  /** How long to wait for a held lock before giving up. Defaults to ttlMs. */
  waitTimeoutMs?: number;
  retryDelayMs?: number;
  keyPrefix?: string;
};

export class RedisReportLock implements ReportLock {
  private readonly waitTimeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly keyPrefix: string;

  constructor(
    private readonly client: RedisLockClient,
    private readonly options: RedisReportLockOptions,
  ) {
    this.waitTimeoutMs = options.waitTimeoutMs ?? options.ttlMs;
    this.retryDelayMs = options.retryDelayMs ?? 50;
    this.keyPrefix = options.keyPrefix ?? "labreport:lock:";
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const redisKey = `${this.keyPrefix}${key}`;
    const token = newId();
    const deadline = Date.now() + this.waitTimeoutMs;

    while (!(await this.client.tryAcquire(redisKey, token, this.options.ttlMs))) {
      if (Date.now() >= deadline) {
        log("WARN", "REPORT_LOCK_TIMEOUT", { key });
        throw new ReportBusyError(key);
      }
      await sleep(this.retryDelayMs);
    }

    // renew at half the TTL so a long run keeps the key
    const ttlMs = this.options.ttlMs;
    const renewal = setInterval(() => {
      void this.client.extend(redisKey, token, ttlMs).then(
        (held) => {
          if (!held) log("WARN", "REPORT_LOCK_LOST", { key });
        },
        (error: unknown) => {
          log("WARN", "REPORT_LOCK_RENEW_FAILED", {
            key,
            message: error instanceof Error ? error.message : String(error),
          });
        },
      );
    }, Math.max(1, Math.floor(ttlMs / 2)));
    renewal.unref();

    try {
      return await fn();
    } finally {
      clearInterval(renewal);
      await this.release(redisKey, token, key);
    }
  }

  // release failures are logged only; the key still expires on its TTL
  private async release(redisKey: string, token: string, key: string) {
    try {
      await this.client.release(redisKey, token);
    } catch (error) {
      log("ERROR", "REPORT_LOCK_RELEASE_FAILED", {
        key,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
