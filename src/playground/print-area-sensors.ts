import { parseAreaGroups } from "../config/env.js";
import { DEFAULT_WARNINGS_FEED_URL, MetEireannWarningsClient } from "../connectors/met-eireann/index.js";
import { createLogger } from "../infrastructure/logging/logger.js";
import { InMemorySensorStateStore } from "../infrastructure/state/in-memory-sensor-state-store.js";
import { WarningsSensorService } from "../modules/warnings/service.js";

// One poll against the live feed, printed instead of published. No Redis needed.
async function main(): Promise<void> {
  const areaGroups = parseAreaGroups(process.argv[2] ?? process.env.WARNINGS_AREAS);
  const service = new WarningsSensorService({
    feedProvider: new MetEireannWarningsClient({
      feedUrl: process.env.WARNINGS_FEED_URL ?? DEFAULT_WARNINGS_FEED_URL,
      requestTimeoutMs: 30_000
    }),
    areaGroups,
    stateStore: new InMemorySensorStateStore(),
    logger: createLogger("print-area-sensors")
  });

  const summary = await service.runOnce();
  console.log("Poll summary:", summary);

  const snapshot = service.getLatestSnapshot();
  if (!snapshot) {
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(snapshot, null, 2));
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
