import type { FetchError, WarningsFeedProvider } from "../../connectors/met-eireann/types.js";
import { createNoopLogger } from "../../infrastructure/logging/logger.js";
import { normalizeWarnings } from "./normalize.js";
import { buildSensorEntities, deriveAreaStates, type SensorEntity } from "./sensor-state.js";
import type { AreaGroup, HighestWarningLevel, Logger } from "./types.js";

export interface PublishedAreaGroupState {
  group_id: string;
  group_name: string;
  active_count: number;
  highest_level: HighestWarningLevel;
  entities: SensorEntity[];
}

/** Everything published for one config entry by a single poll cycle. */
export interface PublishedSensorSnapshot {
  config_entry: string;
  updated_at: string;
  groups: PublishedAreaGroupState[];
}

export interface SensorStateStore {
  load(configEntry: string): Promise<PublishedSensorSnapshot | undefined>;
  save(configEntry: string, snapshot: PublishedSensorSnapshot): Promise<void>;
}

export type WarningsPollStatus = "updated" | "fetch_failed" | "publish_failed" | "cancelled";

export interface WarningsPollSummary {
  status: WarningsPollStatus;
  fetched: number;
  normalized: number;
  defects: number;
  groups: number;
  fetch_error?: FetchError;
}

export interface WarningsSensorServiceOptions {
  feedProvider: WarningsFeedProvider;
  areaGroups: readonly AreaGroup[];
  stateStore: SensorStateStore;
  configEntry?: string;
  clock?: () => Date;
  logger?: Logger;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Runs poll cycles for one config entry: fetch, normalize, derive every
 * group's sensors from the same snapshot, then publish them together. A
 * failed or cancelled cycle leaves the last published snapshot untouched.
 */
export class WarningsSensorService {
  private readonly feedProvider: WarningsFeedProvider;
  private readonly areaGroups: readonly AreaGroup[];
  private readonly stateStore: SensorStateStore;
  private readonly configEntry: string;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  private inFlight: Promise<WarningsPollSummary> | undefined;
  private abortController: AbortController | undefined;
  private latest: PublishedSensorSnapshot | undefined;

  constructor(options: WarningsSensorServiceOptions) {
    if (options.areaGroups.length === 0) {
      throw new Error("WarningsSensorService requires at least one area group");
    }
    const groupIds = new Set(options.areaGroups.map((group) => group.id));
    if (groupIds.size !== options.areaGroups.length) {
      throw new Error("WarningsSensorService area group ids must be unique");
    }

    this.feedProvider = options.feedProvider;
    this.areaGroups = options.areaGroups;
    this.stateStore = options.stateStore;
    this.configEntry = options.configEntry ?? "default";
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createNoopLogger();
  }

  /** Most recent snapshot this instance published, if any. */
  getLatestSnapshot(): PublishedSensorSnapshot | undefined {
    return this.latest;
  }

  /** Picks up whatever an earlier process last published for this entry. */
  async restore(): Promise<PublishedSensorSnapshot | undefined> {
    const snapshot = await this.stateStore.load(this.configEntry);
    if (snapshot && !this.latest) {
      this.latest = snapshot;
    }
    return this.latest;
  }

  /**
   * Starts a poll cycle. While one is outstanding, callers share it rather
   * than issuing a second request upstream.
   */
  runOnce(): Promise<WarningsPollSummary> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const controller = new AbortController();
    this.abortController = controller;
    const cycle = this.runCycle(controller.signal).finally(() => {
      this.inFlight = undefined;
      this.abortController = undefined;
    });
    this.inFlight = cycle;
    return cycle;
  }

  /** Aborts the in-flight cycle, if any. Nothing from it is published. */
  stop(): void {
    this.abortController?.abort();
  }

  private async runCycle(signal: AbortSignal): Promise<WarningsPollSummary> {
    const summary: WarningsPollSummary = {
      status: "updated",
      fetched: 0,
      normalized: 0,
      defects: 0,
      groups: 0
    };

    const result = await this.feedProvider.fetchWarnings(signal);
    if (signal.aborted) {
      summary.status = "cancelled";
      return summary;
    }
    if (!result.ok) {
      summary.status = result.error.kind === "aborted" ? "cancelled" : "fetch_failed";
      summary.fetch_error = result.error;
      if (summary.status === "fetch_failed") {
        this.logger.error("warnings feed fetch failed, keeping last published state", {
          config_entry: this.configEntry,
          kind: result.error.kind,
          status: result.error.status,
          error: result.error.message
        });
      }
      return summary;
    }

    summary.fetched = result.warnings.length;
    const { warnings, defects } = normalizeWarnings(result.warnings);
    summary.normalized = warnings.length;
    summary.defects = defects.length;
    for (const defect of defects) {
      this.logger.warn("warning record defect", {
        config_entry: this.configEntry,
        index: defect.index,
        reason: defect.reason,
        warning_id: defect.warningId,
        detail: defect.detail
      });
    }

    const now = this.clock();
    const snapshot: PublishedSensorSnapshot = {
      config_entry: this.configEntry,
      updated_at: now.toISOString(),
      groups: deriveAreaStates(warnings, this.areaGroups, now).map(({ group, state }) => ({
        group_id: group.id,
        group_name: group.name,
        active_count: state.activeCount,
        highest_level: state.highestLevel,
        entities: buildSensorEntities(group, state, now)
      }))
    };

    if (signal.aborted) {
      summary.status = "cancelled";
      return summary;
    }

    try {
      await this.stateStore.save(this.configEntry, snapshot);
    } catch (error) {
      summary.status = "publish_failed";
      this.logger.error("failed to publish sensor state", {
        config_entry: this.configEntry,
        error: errorMessage(error)
      });
      return summary;
    }

    this.latest = snapshot;
    summary.groups = snapshot.groups.length;
    return summary;
  }
}
