// src/modules/pipeline/_test_/reportLock.test.ts

import { setTimeout as sleep } from "node:timers/promises";
import { describe, it, expect } from "vitest";
import {
  InProcessReportLock,
  RedisReportLock,
  ReportBusyError,
  type RedisLockClient,
} from "../reportLock";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// SET NX / compare-and-delete over a Map
class FakeRedisLockClient implements RedisLockClient {
  readonly keys = new Map<string, string>();
  releases: Array<[string, string]> = [];
  extensions: string[] = [];

  async tryAcquire(key: string, token: string) {
    if (this.keys.has(key)) return false;
    this.keys.set(key, token);
    return true;
  }

  async extend(key: string, token: string) {
    this.extensions.push(key);
    return this.keys.get(key) === token;
  }

  async release(key: string, token: string) {
    this.releases.push([key, token]);
    if (this.keys.get(key) === token) this.keys.delete(key);
  }
}

describe("InProcessReportLock", () => {
  it("runs holders of the same key one after another", async () => {
    const lock = new InProcessReportLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.withLock("report:a", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = lock.withLock("report:a", async () => {
      order.push("second");
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not serialize different keys", async () => {
    const lock = new InProcessReportLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.withLock("report:a", async () => {
      await gate.promise;
      order.push("a");
    });
    await lock.withLock("report:b", async () => {
      order.push("b");
    });

    expect(order).toEqual(["b"]);
    gate.resolve();
    await blocked;
    expect(order).toEqual(["b", "a"]);
  });

  it("releases the key after a failure and forgets idle keys", async () => {
    const lock = new InProcessReportLock();

    await expect(
      lock.withLock("report:a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await lock.withLock("report:a", async () => "next")).toBe("next");
    expect(lock.activeKeys).toBe(0);
  });
});

describe("RedisReportLock", () => {
  it("acquires under the prefixed key and releases with its own token", async () => {
    const client = new FakeRedisLockClient();
    const lock = new RedisReportLock(client, { ttlMs: 1000 });

    const seen = await lock.withLock("report:a", async () => [...client.keys.keys()]);

    expect(seen).toEqual(["labreport:lock:report:a"]);
    expect(client.keys.size).toBe(0);
    expect(client.releases).toHaveLength(1);
    expect(client.releases[0][0]).toBe("labreport:lock:report:a");
  });

  it("gives up with ReportBusyError when the key stays held", async () => {
    const client = new FakeRedisLockClient();
    client.keys.set("test:report:a", "other-holder");
    const lock = new RedisReportLock(client, {
      ttlMs: 1000,
      waitTimeoutMs: 20,
      retryDelayMs: 5,
      keyPrefix: "test:",
    });

    const attempt = lock.withLock("report:a", async () => "never");

    await expect(attempt).rejects.toBeInstanceOf(ReportBusyError);
    await expect(attempt).rejects.toMatchObject({
      status: 409,
      code: "report_busy",
      details: { key: "report:a" },
    });
    expect(client.keys.get("test:report:a")).toBe("other-holder");
    expect(client.releases).toEqual([]);
  });

  it("releases even when the holder throws", async () => {
    const client = new FakeRedisLockClient();
    const lock = new RedisReportLock(client, { ttlMs: 1000 });

    await expect(
      lock.withLock("report:a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(client.keys.size).toBe(0);
  });

  it("renews the key while the holder runs and stops afterwards", async () => {
    const client = new FakeRedisLockClient();
    const lock = new RedisReportLock(client, { ttlMs: 20 });

    await lock.withLock("report:a", () => sleep(70));

    expect(client.extensions.length).toBeGreaterThan(0);
    expect(new Set(client.extensions)).toEqual(new Set(["labreport:lock:report:a"]));

    const renewals = client.extensions.length;
    await sleep(50);
    expect(client.extensions).toHaveLength(renewals);
  });

  it("keeps the holder's result when releasing the key fails", async () => {
    class FailingReleaseClient extends FakeRedisLockClient {
      override async release(): Promise<void> {
        throw new Error("connection reset");
      }
    }
    const lock = new RedisReportLock(new FailingReleaseClient(), { ttlMs: 1000 });

    await expect(lock.withLock("report:a", async () => "done")).resolves.toBe("done");
    await expect(
      lock.withLock("report:b", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });
});
