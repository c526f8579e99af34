import type {
  PublishedAreaGroupState,
  PublishedSensorSnapshot,
  SensorStateStore
} from "../../modules/warnings/service.js";

export interface PollHealthSource {
  isHealthy(configEntry: string, maxAgeSeconds: number): Promise<boolean>;
}

export interface SensorGatewayServiceOptions {
  stateStore: SensorStateStore;
  configEntry: string;
  healthSource?: PollHealthSource;
  healthMaxAgeSeconds: number;
}

export interface SensorGatewayHealth {
  status: "ok" | "stale" | "empty";
  config_entry: string;
  updated_at: string | null;
}

/** Read side of the published sensor state for one config entry. */
export class SensorGatewayService {
  private readonly stateStore: SensorStateStore;
  private readonly configEntry: string;
  private readonly healthSource: PollHealthSource | undefined;
  private readonly healthMaxAgeSeconds: number;

  constructor(options: SensorGatewayServiceOptions) {
    this.stateStore = options.stateStore;
    this.configEntry = options.configEntry;
    this.healthSource = options.healthSource;
    this.healthMaxAgeSeconds = options.healthMaxAgeSeconds;
  }

  async getSnapshot(): Promise<PublishedSensorSnapshot | undefined> {
    return this.stateStore.load(this.configEntry);
  }

  async getGroup(groupId: string): Promise<PublishedAreaGroupState | undefined> {
    const snapshot = await this.getSnapshot();
    return snapshot?.groups.find((group) => group.group_id === groupId);
  }

  async getHealth(now = new Date()): Promise<SensorGatewayHealth> {
    const snapshot = await this.getSnapshot();
    if (!snapshot) {
      return { status: "empty", config_entry: this.configEntry, updated_at: null };
    }

    const healthy = this.healthSource
      ? await this.healthSource.isHealthy(this.configEntry, this.healthMaxAgeSeconds)
      : now.getTime() - Date.parse(snapshot.updated_at) <= this.healthMaxAgeSeconds * 1000;

    return {
      status: healthy ? "ok" : "stale",
      config_entry: this.configEntry,
      updated_at: snapshot.updated_at
    };
  }
}
