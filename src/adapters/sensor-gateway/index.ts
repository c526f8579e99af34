import { loadConfig } from "../../config/env.js";
import { createLogger } from "../../infrastructure/logging/logger.js";
import { PollMetricsCollector } from "../../infrastructure/metrics/poll-metrics.js";
import { closeRedisClient, createConnectedRedisClient } from "../../infrastructure/redis/client.js";
import { RedisSensorStateStore } from "../../infrastructure/redis/sensor-state-store.js";
import { loadSensorGatewayConfig } from "./config.js";
import { createSensorGatewayServer } from "./server.js";
import { SensorGatewayService } from "./service.js";

async function main(): Promise<void> {
  const appConfig = loadConfig();
  const gatewayConfig = loadSensorGatewayConfig();
  const logger = createLogger("sensor-gateway");
  const redis = await createConnectedRedisClient({
    url: appConfig.redisUrl,
    clientName: "ireland-warnings-sensor-gateway",
    logger
  });

  const service = new SensorGatewayService({
    stateStore: new RedisSensorStateStore(redis),
    configEntry: appConfig.warningsConfigEntry,
    healthSource: new PollMetricsCollector(redis),
    healthMaxAgeSeconds: gatewayConfig.healthMaxAgeSeconds
  });
  const server = createSensorGatewayServer(gatewayConfig, service, logger);

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info("received shutdown signal", { signal });
    try {
      await server.stop();
      await closeRedisClient(redis, logger);
      process.exitCode = 0;
    } catch (error) {
      logger.error("shutdown failed", {
        error: error instanceof Error ? error.message : String(error)
      });
      process.exitCode = 1;
    }
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  await server.start();
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
