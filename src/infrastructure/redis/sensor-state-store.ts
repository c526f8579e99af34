import type { AppRedisClient } from "./client.js";
import type {
  PublishedSensorSnapshot,
  SensorStateStore
} from "../../modules/warnings/service.js";

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isPublishedSnapshot(value: unknown): value is PublishedSensorSnapshot {
  return (
    isObjectRecord(value) &&
    typeof value.config_entry === "string" &&
    typeof value.updated_at === "string" &&
    Array.isArray(value.groups)
  );
}

/**
 * Redis-backed SensorStateStore. Holds the last published snapshot per
 * config entry so a restarted process serves last-known warnings.
 *
 * Key pattern: sensors:state:{configEntry}
 * Hash fields:
 *   - latest: snapshot JSON
 *   - timestamp: ISO timestamp of last save
 *   - version: snapshot schema version
 */
export class RedisSensorStateStore implements SensorStateStore {
  constructor(private readonly redis: AppRedisClient) {}

  async load(configEntry: string): Promise<PublishedSensorSnapshot | undefined> {
    const key = this.getStateKey(configEntry);
    const snapshotJson = await this.redis.hGet(key, "latest");

    if (!snapshotJson) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(snapshotJson);
    } catch (error) {
      throw new Error(
        `Failed to parse saved sensor state for ${configEntry}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    if (!isPublishedSnapshot(parsed)) {
      throw new Error(`Saved sensor state for ${configEntry} has an unexpected shape`);
    }
    return parsed;
  }

  async save(configEntry: string, snapshot: PublishedSensorSnapshot): Promise<void> {
    const key = this.getStateKey(configEntry);
    await this.redis.hSet(key, {
      latest: JSON.stringify(snapshot),
      timestamp: new Date().toISOString(),
      version: "1"
    });
  }

  async delete(configEntry: string): Promise<void> {
    await this.redis.del(this.getStateKey(configEntry));
  }

  private getStateKey(configEntry: string): string {
    if (!configEntry || configEntry.trim() === "") {
      throw new Error("Config entry name must be non-empty");
    }
    return `sensors:state:${configEntry}`;
  }
}
