import type { Logger, Warning } from "../../src/modules/warnings/types.js";

export function makeWarning(overrides: Partial<Warning> = {}): Warning {
  return {
    id: "W-test",
    level: "yellow",
    headline: "Weather Warning",
    description: "No description available",
    warningType: "Weather",
    regions: [],
    issuedAt: { state: "absent" },
    expiresAt: { state: "absent" },
    updatedAt: { state: "absent" },
    onsetAt: { state: "absent" },
    capId: undefined,
    severity: undefined,
    certainty: undefined,
    urgency: undefined,
    status: undefined,
    instruction: undefined,
    ...overrides
  };
}

export function at(iso: string): { state: "present"; at: Date } {
  return { state: "present", at: new Date(iso) };
}

export interface LogEntry {
  level: "info" | "warn" | "error";
  message: string;
  context: Record<string, unknown> | undefined;
}

export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    info(message, context) {
      entries.push({ level: "info", message, context });
    },
    warn(message, context) {
      entries.push({ level: "warn", message, context });
    },
    error(message, context) {
      entries.push({ level: "error", message, context });
    }
  };
}
