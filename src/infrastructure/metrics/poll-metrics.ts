import type { AppRedisClient } from "../redis/client.js";
import type { WarningsPollSummary } from "../../modules/warnings/service.js";

export interface PollMetrics {
  configEntry: string;
  lastPollTime: string;
  lastSuccessTime: string | undefined;
  lastFailure: string | undefined;
  totalPolls: number;
  successfulPolls: number;
  failedPolls: number;
  warningsFetched: number;
  recordDefects: number;
  averageLatencyMs: number;
}

const METRICS_TTL_SECONDS = 30 * 24 * 60 * 60;

function toCount(value: string | undefined): number {
  const parsed = Number.parseInt(value ?? "0", 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Poll counters per config entry, kept in a Redis hash.
 *
 * Key pattern: metrics:warnings:{configEntry}
 */
export class PollMetricsCollector {
  constructor(private readonly redis: AppRedisClient) {}

  async recordPoll(
    configEntry: string,
    summary: WarningsPollSummary,
    latencyMs: number
  ): Promise<void> {
    const key = this.getMetricsKey(configEntry);
    const now = new Date().toISOString();
    const current = await this.getMetrics(configEntry);

    const isSuccess = summary.status === "updated";
    const totalPolls = (current?.totalPolls ?? 0) + 1;
    const successfulPolls = (current?.successfulPolls ?? 0) + (isSuccess ? 1 : 0);
    const failedPolls = (current?.failedPolls ?? 0) + (isSuccess ? 0 : 1);

    const prevLatencySum = (current?.averageLatencyMs ?? 0) * (totalPolls - 1);
    const averageLatencyMs = Math.round((prevLatencySum + latencyMs) / totalPolls);

    await this.redis.hSet(key, {
      configEntry,
      lastPollTime: now,
      ...(isSuccess
        ? { lastSuccessTime: now }
        : { lastFailure: summary.fetch_error?.kind ?? summary.status }),
      totalPolls: String(totalPolls),
      successfulPolls: String(successfulPolls),
      failedPolls: String(failedPolls),
      warningsFetched: String((current?.warningsFetched ?? 0) + summary.fetched),
      recordDefects: String((current?.recordDefects ?? 0) + summary.defects),
      averageLatencyMs: String(averageLatencyMs)
    });

    await this.redis.expire(key, METRICS_TTL_SECONDS);
  }

  async getMetrics(configEntry: string): Promise<PollMetrics | undefined> {
    const data = await this.redis.hGetAll(this.getMetricsKey(configEntry));
    if (!data || Object.keys(data).length === 0) {
      return undefined;
    }

    return {
      configEntry: data.configEntry || configEntry,
      lastPollTime: data.lastPollTime || new Date(0).toISOString(),
      lastSuccessTime: data.lastSuccessTime || undefined,
      lastFailure: data.lastFailure || undefined,
      totalPolls: toCount(data.totalPolls),
      successfulPolls: toCount(data.successfulPolls),
      failedPolls: toCount(data.failedPolls),
      warningsFetched: toCount(data.warningsFetched),
      recordDefects: toCount(data.recordDefects),
      averageLatencyMs: toCount(data.averageLatencyMs)
    };
  }

  /**
   * Healthy when the last successful poll is recent enough. Failed polls in
   * between do not count against it until the success itself goes stale.
   */
  async isHealthy(configEntry: string, maxAgeSeconds: number, now = new Date()): Promise<boolean> {
    const metrics = await this.getMetrics(configEntry);
    if (!metrics?.lastSuccessTime) {
      return false;
    }
    const age = now.getTime() - new Date(metrics.lastSuccessTime).getTime();
    return age <= maxAgeSeconds * 1000;
  }

  private getMetricsKey(configEntry: string): string {
    if (!configEntry || configEntry.trim() === "") {
      throw new Error("Config entry name must be non-empty");
    }
    return `metrics:warnings:${configEntry}`;
  }
}
