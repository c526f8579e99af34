import assert from "node:assert/strict";
import test from "node:test";

import { PollMetricsCollector } from "../../src/infrastructure/metrics/poll-metrics.js";
import type { AppRedisClient } from "../../src/infrastructure/redis/client.js";
import type { WarningsPollSummary } from "../../src/modules/warnings/service.js";

class FakeRedisClient {
  readonly hashes = new Map<string, Record<string, string>>();
  readonly expiries = new Map<string, number>();

  async hSet(key: string, values: Record<string, string>): Promise<number> {
    this.hashes.set(key, { ...this.hashes.get(key), ...values });
    return Object.keys(values).length;
  }

  async hGetAll(key: string): Promise<Record<string, string>> {
    return { ...this.hashes.get(key) };
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    this.expiries.set(key, seconds);
    return true;
  }
}

function summary(partial: Partial<WarningsPollSummary> = {}): WarningsPollSummary {
  return {
    status: "updated",
    fetched: 3,
    normalized: 2,
    defects: 1,
    groups: 2,
    ...partial
  };
}

test("accumulates poll counters", async () => {
  const fake = new FakeRedisClient();
  const collector = new PollMetricsCollector(fake as unknown as AppRedisClient);

  await collector.recordPoll("home", summary(), 100);
  await collector.recordPoll(
    "home",
    summary({
      status: "fetch_failed",
      fetched: 0,
      normalized: 0,
      defects: 0,
      groups: 0,
      fetch_error: { kind: "timeout", message: "Warnings feed request timed out after 30000ms" }
    }),
    300
  );

  const metrics = await collector.getMetrics("home");
  assert.ok(metrics);
  assert.equal(metrics.configEntry, "home");
  assert.equal(metrics.totalPolls, 2);
  assert.equal(metrics.successfulPolls, 1);
  assert.equal(metrics.failedPolls, 1);
  assert.equal(metrics.warningsFetched, 3);
  assert.equal(metrics.recordDefects, 1);
  assert.equal(metrics.averageLatencyMs, 200);
  assert.equal(metrics.lastFailure, "timeout");
  assert.ok(metrics.lastSuccessTime);
  assert.equal(fake.expiries.get("metrics:warnings:home"), 30 * 24 * 60 * 60);
});

test("records the poll status when a failure has no fetch error", async () => {
  const collector = new PollMetricsCollector(new FakeRedisClient() as unknown as AppRedisClient);

  await collector.recordPoll("home", summary({ status: "publish_failed" }), 50);

  const metrics = await collector.getMetrics("home");
  assert.equal(metrics?.lastFailure, "publish_failed");
  assert.equal(metrics?.lastSuccessTime, undefined);
});

test("is healthy only while the last success is recent", async () => {
  const fake = new FakeRedisClient();
  const collector = new PollMetricsCollector(fake as unknown as AppRedisClient);

  assert.equal(await collector.isHealthy("home", 60), false);

  await fake.hSet("metrics:warnings:home", {
    lastSuccessTime: "2026-03-01T12:00:00.000Z",
    totalPolls: "1"
  });

  assert.equal(
    await collector.isHealthy("home", 60, new Date("2026-03-01T12:01:00.000Z")),
    true
  );
  assert.equal(
    await collector.isHealthy("home", 60, new Date("2026-03-01T12:01:00.001Z")),
    false
  );
});
