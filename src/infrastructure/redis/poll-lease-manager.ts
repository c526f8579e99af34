import { hostname } from "node:os";

import type { AppRedisClient } from "./client.js";
import type { PollLease, PollLeaseManager } from "../../modules/warnings/types.js";

// Deletes the lease only while this instance still owns it. Runs as one
// script so a lease that lapsed and was re-acquired elsewhere is left alone.
const RELEASE_IF_OWNER_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

/**
 * One poller per config entry across processes.
 *
 * Key pattern: lease:warnings:{configEntry}
 * Value: owning instance id (hostname:pid:startedAt)
 * TTL: lets the lease lapse if the owner dies mid-cycle
 */
export class RedisPollLeaseManager implements PollLeaseManager {
  private readonly instanceId: string;

  constructor(
    private readonly redis: AppRedisClient,
    instanceId?: string
  ) {
    this.instanceId = instanceId || `${hostname()}:${process.pid}:${Date.now()}`;
  }

  async tryAcquire(configEntry: string, ttlSeconds: number): Promise<PollLease | undefined> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error("ttlSeconds must be a positive integer");
    }
    const key = leaseKey(configEntry);

    const acquired = await this.redis.set(key, this.instanceId, { NX: true, EX: ttlSeconds });
    if (acquired !== "OK") {
      return undefined;
    }

    return {
      release: () => this.releaseIfOwner(key)
    };
  }

  /** Resolves false when the lease had already lapsed or changed hands. */
  private async releaseIfOwner(key: string): Promise<boolean> {
    const deleted = await this.redis.eval(RELEASE_IF_OWNER_SCRIPT, {
      keys: [key],
      arguments: [this.instanceId]
    });
    return deleted === 1;
  }
}

function leaseKey(configEntry: string): string {
  if (configEntry.trim() === "") {
    throw new Error("Config entry name must be non-empty");
  }
  return `lease:warnings:${configEntry}`;
}
