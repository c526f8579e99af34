import { loadConfig } from "../config/env.js";
import { MetEireannWarningsClient } from "../connectors/met-eireann/index.js";
import { createLogger } from "../infrastructure/logging/logger.js";
import { PollMetricsCollector } from "../infrastructure/metrics/poll-metrics.js";
import { closeRedisClient, createConnectedRedisClient } from "../infrastructure/redis/client.js";
import { RedisPollLeaseManager } from "../infrastructure/redis/poll-lease-manager.js";
import { RedisSensorStateStore } from "../infrastructure/redis/sensor-state-store.js";
import { WarningsSensorService } from "../modules/warnings/service.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/** Waits in short slices so a shutdown signal is noticed promptly. */
async function waitUntilNextPoll(delayMs: number, isRunning: () => boolean): Promise<void> {
  let remaining = delayMs;
  while (remaining > 0 && isRunning()) {
    const slice = Math.min(remaining, 500);
    await sleep(slice);
    remaining -= slice;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Polls the warnings feed for one config entry and publishes sensor state
 * to Redis.
 *
 * Environment:
 *   REDIS_URL                       Redis connection string
 *   WARNINGS_AREAS                  e.g. "ireland;county:cork;region:munster"
 *   WARNINGS_POLL_INTERVAL_MINUTES  10..120, default 30
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("warnings-poller");

  const redis = await createConnectedRedisClient({
    url: config.redisUrl,
    clientName: `ireland-warnings-poller-${config.warningsConfigEntry}`,
    logger
  });

  const leaseManager = new RedisPollLeaseManager(redis);
  const metricsCollector = new PollMetricsCollector(redis);
  const service = new WarningsSensorService({
    feedProvider: new MetEireannWarningsClient({
      feedUrl: config.warningsFeedUrl,
      requestTimeoutMs: config.warningsRequestTimeoutMs
    }),
    areaGroups: config.areaGroups,
    stateStore: new RedisSensorStateStore(redis),
    configEntry: config.warningsConfigEntry,
    logger
  });

  let running = true;
  const handleSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, initiating graceful shutdown`);
    running = false;
    service.stop();
  };
  process.on("SIGINT", () => {
    handleSignal("SIGINT");
  });
  process.on("SIGTERM", () => {
    handleSignal("SIGTERM");
  });

  try {
    const restored = await service.restore();
    logger.info("Starting warnings poller", {
      config_entry: config.warningsConfigEntry,
      areas: config.areaGroups.map((group) => group.name),
      poll_interval_minutes: config.warningsPollIntervalMinutes,
      restored_from: restored?.updated_at ?? null
    });
  } catch (error) {
    logger.warn("could not restore last published state", { error: errorMessage(error) });
  }

  const pollIntervalMs = config.warningsPollIntervalMinutes * 60_000;

  while (running) {
    const startedAt = Date.now();

    try {
      const lease = await leaseManager.tryAcquire(
        config.warningsConfigEntry,
        config.pollLeaseTtlSeconds
      );

      if (!lease) {
        logger.warn("Failed to acquire lease, another instance may be polling");
      } else {
        try {
          const summary = await service.runOnce();
          try {
            await metricsCollector.recordPoll(
              config.warningsConfigEntry,
              summary,
              Date.now() - startedAt
            );
          } catch (metricsError) {
            logger.warn("failed to record poll metrics", { error: errorMessage(metricsError) });
          }
          logger.info("Poll summary", { ...summary });
        } finally {
          const released = await lease.release();
          if (!released) {
            logger.warn("Poll lease lapsed before release, consider a longer POLL_LEASE_TTL_SECONDS", {
              config_entry: config.warningsConfigEntry,
              ttl_seconds: config.pollLeaseTtlSeconds
            });
          }
        }
      }
    } catch (error) {
      logger.error("Poll cycle failed", { error: errorMessage(error) });
    }

    const elapsedMs = Date.now() - startedAt;
    await waitUntilNextPoll(Math.max(0, pollIntervalMs - elapsedMs), () => running);
  }

  logger.info("Shutting down");
  await closeRedisClient(redis, logger);
  logger.info("Warnings poller stopped");
}

main().catch((error) => {
  console.error("Fatal error in warnings poller:", error);
  process.exitCode = 1;
});
