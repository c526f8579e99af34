import { DEFAULT_WARNINGS_FEED_URL } from "../connectors/met-eireann/types.js";
import {
  createCountyAreaGroup,
  createNationwideAreaGroup,
  createProvinceAreaGroup
} from "../modules/warnings/area-filter.js";
import type { AreaGroup } from "../modules/warnings/types.js";

export interface AppConfig {
  redisUrl: string;
  warningsFeedUrl: string;
  warningsRequestTimeoutMs: number;
  warningsPollIntervalMinutes: number;
  warningsConfigEntry: string;
  areaGroups: AreaGroup[];
  pollLeaseTtlSeconds: number;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

export const MIN_POLL_INTERVAL_MINUTES = 10;
export const MAX_POLL_INTERVAL_MINUTES = 120;

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${variableName} must be a positive integer`);
  }
  return parsed;
}

function parseIntInRange(
  value: string | undefined,
  fallback: number,
  min: number,
  max: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new Error(`${variableName} must be an integer between ${min} and ${max}`);
  }
  return parsed;
}

function parseOptionalString(value: string | undefined): string | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function parseAreaEntry(entry: string): AreaGroup {
  const separator = entry.indexOf(":");
  const kind = (separator === -1 ? entry : entry.slice(0, separator)).trim().toLowerCase();
  const values = separator === -1 ? [] : splitList(entry.slice(separator + 1));

  switch (kind) {
    case "ireland":
    case "all":
      return createNationwideAreaGroup();
    case "county":
    case "counties":
      return createCountyAreaGroup(values);
    case "region":
    case "regions":
    case "province":
    case "provinces":
      return createProvinceAreaGroup(values);
    default:
      throw new Error(`unknown area selection "${entry}"`);
  }
}

/**
 * Parses WARNINGS_AREAS: ";"-separated selections, each "ireland",
 * "county:<name>[,<name>...]" or "region:<province>[,<province>...]".
 */
export function parseAreaGroups(value: string | undefined): AreaGroup[] {
  const text = parseOptionalString(value) ?? "ireland";
  const entries = text
    .split(";")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");

  const groups: AreaGroup[] = [];
  for (const entry of entries) {
    let group: AreaGroup;
    try {
      group = parseAreaEntry(entry);
    } catch (error) {
      throw new Error(
        `WARNINGS_AREAS is invalid: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (groups.some((existing) => existing.id === group.id)) {
      throw new Error(`WARNINGS_AREAS selects "${group.name}" more than once`);
    }
    groups.push(group);
  }

  if (groups.length === 0) {
    throw new Error("WARNINGS_AREAS must select at least one area");
  }
  return groups;
}

function parseFeedUrl(value: string | undefined): string {
  const text = parseOptionalString(value) ?? DEFAULT_WARNINGS_FEED_URL;
  let url: URL;
  try {
    url = new URL(text);
  } catch {
    throw new Error("WARNINGS_FEED_URL must be an absolute http(s) URL");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error("WARNINGS_FEED_URL must be an absolute http(s) URL");
  }
  return url.toString();
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const redisUrl = env.REDIS_URL;
  if (!redisUrl || redisUrl.trim() === "") {
    throw new Error("REDIS_URL is required");
  }

  return {
    redisUrl,
    warningsFeedUrl: parseFeedUrl(env.WARNINGS_FEED_URL),
    warningsRequestTimeoutMs: parsePositiveInt(
      env.WARNINGS_REQUEST_TIMEOUT_MS,
      30_000,
      "WARNINGS_REQUEST_TIMEOUT_MS"
    ),
    warningsPollIntervalMinutes: parseIntInRange(
      env.WARNINGS_POLL_INTERVAL_MINUTES,
      30,
      MIN_POLL_INTERVAL_MINUTES,
      MAX_POLL_INTERVAL_MINUTES,
      "WARNINGS_POLL_INTERVAL_MINUTES"
    ),
    warningsConfigEntry: parseOptionalString(env.WARNINGS_CONFIG_ENTRY) ?? "default",
    areaGroups: parseAreaGroups(env.WARNINGS_AREAS),
    pollLeaseTtlSeconds: parsePositiveInt(
      env.POLL_LEASE_TTL_SECONDS,
      60,
      "POLL_LEASE_TTL_SECONDS"
    )
  };
}
