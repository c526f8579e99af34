import type {
  PublishedSensorSnapshot,
  SensorStateStore
} from "../../modules/warnings/service.js";

export class InMemorySensorStateStore implements SensorStateStore {
  private readonly snapshots = new Map<string, PublishedSensorSnapshot>();

  async load(configEntry: string): Promise<PublishedSensorSnapshot | undefined> {
    return this.snapshots.get(configEntry);
  }

  async save(configEntry: string, snapshot: PublishedSensorSnapshot): Promise<void> {
    this.snapshots.set(configEntry, snapshot);
  }
}
