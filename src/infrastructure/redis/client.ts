import { createClient } from "redis";

import type { Logger } from "../../modules/warnings/types.js";
import { createNoopLogger } from "../logging/logger.js";

export interface RedisClientOptions {
  url: string;
  clientName?: string;
  connectTimeoutMs?: number;
  logger?: Logger;
}

export type AppRedisClient = ReturnType<typeof createClient>;

const MAX_RECONNECT_DELAY_MS = 5_000;

/** Doubles from 100ms per attempt, capped so a long outage retries every few seconds. */
export function reconnectDelayMs(retries: number): number {
  const exponent = Math.min(Math.max(retries, 0), 16);
  return Math.min(100 * 2 ** exponent, MAX_RECONNECT_DELAY_MS);
}

/**
 * Connects and pings before handing the client out. Socket errors after
 * startup are logged; the client keeps reconnecting on its own.
 */
export async function createConnectedRedisClient(
  options: RedisClientOptions
): Promise<AppRedisClient> {
  const logger = options.logger ?? createNoopLogger();
  const client = createClient({
    url: options.url,
    ...(options.clientName ? { name: options.clientName } : {}),
    socket: {
      connectTimeout: options.connectTimeoutMs ?? 10_000,
      reconnectStrategy: reconnectDelayMs
    }
  });

  client.on("error", (error: unknown) => {
    logger.error("redis client error", {
      client: options.clientName ?? null,
      error: error instanceof Error ? error.message : String(error)
    });
  });
  client.on("reconnecting", () => {
    logger.warn("redis client reconnecting", { client: options.clientName ?? null });
  });

  await client.connect();
  const pong = await client.ping();
  if (pong !== "PONG") {
    await client.quit();
    throw new Error(`Redis at ${new URL(options.url).host} did not answer PING`);
  }
  return client;
}

/** Quits the client, falling back to a hard disconnect if quit fails. */
export async function closeRedisClient(
  client: AppRedisClient,
  logger: Logger = createNoopLogger()
): Promise<void> {
  try {
    await client.quit();
  } catch (error) {
    logger.warn("redis quit failed, forcing disconnect", {
      error: error instanceof Error ? error.message : String(error)
    });
    await client.disconnect();
  }
}
