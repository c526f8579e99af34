import assert from "node:assert/strict";
import test from "node:test";

import type {
  FetchWarningsResult,
  WarningsFeedProvider
} from "../../src/connectors/met-eireann/types.js";
import { InMemorySensorStateStore } from "../../src/infrastructure/state/in-memory-sensor-state-store.js";
import {
  createCountyAreaGroup,
  createNationwideAreaGroup
} from "../../src/modules/warnings/area-filter.js";
import {
  WarningsSensorService,
  type PublishedSensorSnapshot,
  type SensorStateStore
} from "../../src/modules/warnings/service.js";
import { createRecordingLogger } from "../support/fixtures.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

const FEED = [
  {
    id: "W1",
    level: "Orange",
    type: "Wind",
    regions: ["EI07"],
    issued: "2026-03-01T09:00:00Z",
    expiry: "2026-03-01T21:00:00Z"
  },
  {
    id: "W2",
    level: "Red",
    type: "Rain",
    regions: [],
    issued: "2026-03-01T18:00:00Z",
    expiry: "2026-03-02T06:00:00Z"
  }
];

class StubFeedProvider implements WarningsFeedProvider {
  calls = 0;
  signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly respond: () => Promise<FetchWarningsResult>) {}

  fetchWarnings(signal?: AbortSignal): Promise<FetchWarningsResult> {
    this.calls += 1;
    this.signals.push(signal);
    return this.respond();
  }
}

function deferred<TValue>() {
  let resolve: (value: TValue | PromiseLike<TValue>) => void = () => {};
  const promise = new Promise<TValue>((innerResolve) => {
    resolve = innerResolve;
  });
  return { promise, resolve };
}

function createService(
  provider: WarningsFeedProvider,
  stateStore: SensorStateStore = new InMemorySensorStateStore()
) {
  const logger = createRecordingLogger();
  const service = new WarningsSensorService({
    feedProvider: provider,
    areaGroups: [createNationwideAreaGroup(), createCountyAreaGroup(["Dublin"])],
    stateStore,
    configEntry: "home",
    clock: () => NOW,
    logger
  });
  return { service, logger, stateStore };
}

test("publishes every area group from one feed snapshot", async () => {
  const provider = new StubFeedProvider(async () => ({ ok: true, warnings: FEED }));
  const store = new InMemorySensorStateStore();
  const { service } = createService(provider, store);

  const summary = await service.runOnce();

  assert.deepEqual(summary, {
    status: "updated",
    fetched: 2,
    normalized: 2,
    defects: 0,
    groups: 2
  });

  const snapshot = service.getLatestSnapshot();
  assert.ok(snapshot);
  assert.equal(snapshot.config_entry, "home");
  assert.equal(snapshot.updated_at, "2026-03-01T12:00:00.000Z");
  assert.deepEqual(
    snapshot.groups.map((group) => [
      group.group_id,
      group.group_name,
      group.active_count,
      group.highest_level
    ]),
    [
      ["ireland", "Ireland", 1, "orange"],
      ["dublin", "Dublin", 1, "orange"]
    ]
  );
  assert.equal(snapshot.groups[1]?.entities.length, 3);
  assert.deepEqual(await store.load("home"), snapshot);
});

test("keeps the last published state when the feed fails", async () => {
  let fail = false;
  const provider = new StubFeedProvider(async () =>
    fail
      ? {
          ok: false,
          error: { kind: "bad-status", status: 503, message: "Warnings feed request failed (503)" }
        }
      : { ok: true, warnings: FEED }
  );
  const { service, logger, stateStore } = createService(provider);

  await service.runOnce();
  const published = service.getLatestSnapshot();
  fail = true;

  const summary = await service.runOnce();

  assert.equal(summary.status, "fetch_failed");
  assert.deepEqual(summary.fetch_error, {
    kind: "bad-status",
    status: 503,
    message: "Warnings feed request failed (503)"
  });
  assert.equal(service.getLatestSnapshot(), published);
  assert.deepEqual(await stateStore.load("home"), published);
  assert.deepEqual(
    logger.entries.filter((entry) => entry.level === "error").map((entry) => entry.message),
    ["warnings feed fetch failed, keeping last published state"]
  );
});

test("shares an outstanding cycle instead of fetching twice", async () => {
  const pending = deferred<FetchWarningsResult>();
  const provider = new StubFeedProvider(() => pending.promise);
  const { service } = createService(provider);

  const first = service.runOnce();
  const second = service.runOnce();
  assert.equal(first, second);

  pending.resolve({ ok: true, warnings: [] });
  const [firstSummary, secondSummary] = await Promise.all([first, second]);

  assert.equal(provider.calls, 1);
  assert.equal(firstSummary, secondSummary);
  assert.equal(firstSummary.status, "updated");

  await service.runOnce();
  assert.equal(provider.calls, 2);
});

test("stop cancels the outstanding cycle without publishing", async () => {
  const pending = deferred<FetchWarningsResult>();
  const provider = new StubFeedProvider(() => pending.promise);
  const saved: PublishedSensorSnapshot[] = [];
  const store: SensorStateStore = {
    load: async () => undefined,
    save: async (_entry, snapshot) => {
      saved.push(snapshot);
    }
  };
  const { service } = createService(provider, store);

  const cycle = service.runOnce();
  service.stop();
  assert.equal(provider.signals[0]?.aborted, true);

  pending.resolve({ ok: true, warnings: FEED });
  const summary = await cycle;

  assert.equal(summary.status, "cancelled");
  assert.equal(saved.length, 0);
  assert.equal(service.getLatestSnapshot(), undefined);
});

test("logs record defects and still publishes the rest", async () => {
  const provider = new StubFeedProvider(async () => ({
    ok: true,
    warnings: [{ headline: "no id" }, ...FEED, { id: "W1", level: "Red" }]
  }));
  const { service, logger } = createService(provider);

  const summary = await service.runOnce();

  assert.equal(summary.status, "updated");
  assert.equal(summary.fetched, 4);
  assert.equal(summary.normalized, 2);
  assert.equal(summary.defects, 2);
  assert.deepEqual(
    logger.entries.filter((entry) => entry.level === "warn"),
    [
      {
        level: "warn",
        message: "warning record defect",
        context: {
          config_entry: "home",
          index: 0,
          reason: "MISSING_ID",
          warning_id: undefined,
          detail: "warning record has no id"
        }
      },
      {
        level: "warn",
        message: "warning record defect",
        context: {
          config_entry: "home",
          index: 3,
          reason: "DUPLICATE_ID",
          warning_id: "W1",
          detail: "warning W1 appears more than once in the feed"
        }
      }
    ]
  );
});

test("reports a store failure as publish_failed and keeps the previous snapshot", async () => {
  const provider = new StubFeedProvider(async () => ({ ok: true, warnings: FEED }));
  const store: SensorStateStore = {
    load: async () => undefined,
    save: async () => {
      throw new Error("redis unavailable");
    }
  };
  const { service, logger } = createService(provider, store);

  const summary = await service.runOnce();

  assert.equal(summary.status, "publish_failed");
  assert.equal(service.getLatestSnapshot(), undefined);
  assert.deepEqual(logger.entries.at(-1), {
    level: "error",
    message: "failed to publish sensor state",
    context: { config_entry: "home", error: "redis unavailable" }
  });
});

test("restore picks up the previously stored snapshot", async () => {
  const store = new InMemorySensorStateStore();
  const stored: PublishedSensorSnapshot = {
    config_entry: "home",
    updated_at: "2026-02-28T12:00:00.000Z",
    groups: []
  };
  await store.save("home", stored);

  const provider = new StubFeedProvider(async () => ({ ok: true, warnings: [] }));
  const { service } = createService(provider, store);

  assert.deepEqual(await service.restore(), stored);
  assert.deepEqual(service.getLatestSnapshot(), stored);
});

test("rejects an empty or ambiguous set of area groups", () => {
  const provider = new StubFeedProvider(async () => ({ ok: true, warnings: [] }));
  const stateStore = new InMemorySensorStateStore();

  assert.throws(
    () => new WarningsSensorService({ feedProvider: provider, areaGroups: [], stateStore }),
    /requires at least one area group/
  );
  assert.throws(
    () =>
      new WarningsSensorService({
        feedProvider: provider,
        areaGroups: [createCountyAreaGroup(["Cork"]), createCountyAreaGroup(["cork"])],
        stateStore
      }),
    /area group ids must be unique/
  );
});
