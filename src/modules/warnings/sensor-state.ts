import {
  NATIONWIDE_REGION_NAME,
  resolveRegionName
} from "../../connectors/shared/ireland-geo.js";
import { selectActiveWarnings } from "./activity.js";
import { filterWarningsForArea } from "./area-filter.js";
import { formatWarningTimestamp } from "./normalize.js";
import { NO_WARNING_ICON, highestLevel, styleForLevel } from "./severity.js";
import type {
  AreaGroup,
  AreaSensorState,
  DerivedSensorState,
  HighestWarningLevel,
  Warning
} from "./types.js";

export const SENSOR_ID_PREFIX = "ireland_weather_warnings";
export const SENSOR_NAME_PREFIX = "Ireland Weather Warnings";

export const SensorKinds = {
  ACTIVE_WARNINGS_COUNT: "active_warnings_count",
  ACTIVE_WARNINGS: "active_warnings",
  HIGHEST_WARNING_LEVEL: "highest_warning_level"
} as const;

export type SensorKind = (typeof SensorKinds)[keyof typeof SensorKinds];

export interface WarningAttributes {
  id: string;
  cap_id: string | null;
  type: string;
  level: string;
  severity: string | null;
  certainty: string | null;
  urgency: string | null;
  status: string | null;
  headline: string;
  description: string;
  instruction: string | null;
  issued: string | null;
  updated: string | null;
  onset: string | null;
  expires: string | null;
  regions: string[];
  region_codes: string[];
}

export type SensorStateValue = string | number;

export interface SensorEntity {
  kind: SensorKind;
  unique_id: string;
  name: string;
  icon: string;
  state: SensorStateValue;
  attributes: Record<string, unknown>;
}

/** Expects warnings already narrowed to one group's active set. */
export function buildSensorState(areaWarnings: readonly Warning[]): DerivedSensorState {
  return {
    activeCount: areaWarnings.length,
    activeWarnings: [...areaWarnings],
    highestLevel: highestLevel(areaWarnings)
  };
}

export function deriveAreaState(
  warnings: readonly Warning[],
  group: AreaGroup,
  now: Date
): DerivedSensorState {
  const inArea = filterWarningsForArea(warnings, group);
  return buildSensorState(selectActiveWarnings(inArea, now));
}

export function deriveAreaStates(
  warnings: readonly Warning[],
  groups: readonly AreaGroup[],
  now: Date
): AreaSensorState[] {
  return groups.map((group) => ({
    group,
    state: deriveAreaState(warnings, group, now)
  }));
}

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function formatLevel(level: HighestWarningLevel): string {
  return titleCase(level);
}

export function describeActiveCount(count: number): string {
  if (count === 0) {
    return "No active warnings";
  }
  if (count === 1) {
    return "1 active warning";
  }
  return `${count} active warnings`;
}

function displayRegions(warning: Warning): string[] {
  if (warning.regions.length === 0) {
    return [NATIONWIDE_REGION_NAME];
  }
  return warning.regions.map(resolveRegionName);
}

export function toWarningAttributes(warning: Warning): WarningAttributes {
  return {
    id: warning.id,
    cap_id: warning.capId ?? null,
    type: warning.warningType,
    level: warning.level,
    severity: warning.severity ?? null,
    certainty: warning.certainty ?? null,
    urgency: warning.urgency ?? null,
    status: warning.status ?? null,
    headline: warning.headline,
    description: warning.description,
    instruction: warning.instruction ?? null,
    issued: formatWarningTimestamp(warning.issuedAt) ?? null,
    updated: formatWarningTimestamp(warning.updatedAt) ?? null,
    onset: formatWarningTimestamp(warning.onsetAt) ?? null,
    expires: formatWarningTimestamp(warning.expiresAt) ?? null,
    regions: displayRegions(warning),
    region_codes: [...warning.regions]
  };
}

function distinct(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}

function buildSharedAttributes(
  group: AreaGroup,
  state: DerivedSensorState,
  updatedAt: Date
): Record<string, unknown> {
  return {
    warning_types: distinct(state.activeWarnings.map((warning) => warning.warningType)),
    regions_affected: distinct(state.activeWarnings.flatMap(displayRegions)),
    last_updated: updatedAt.toISOString(),
    area: group.name
  };
}

function sensorIdentity(group: AreaGroup, kind: SensorKind, label: string) {
  return {
    kind,
    unique_id: `${SENSOR_ID_PREFIX}_${kind}_${group.id}`,
    name: `${SENSOR_NAME_PREFIX} ${label} (${group.name})`
  };
}

/**
 * The three entities a host platform publishes for one area group. Naming
 * is presentation only; the group id is interpolated as given.
 */
export function buildSensorEntities(
  group: AreaGroup,
  state: DerivedSensorState,
  updatedAt: Date
): SensorEntity[] {
  const shared = buildSharedAttributes(group, state, updatedAt);
  const style = styleForLevel(state.highestLevel);

  return [
    {
      ...sensorIdentity(group, SensorKinds.ACTIVE_WARNINGS_COUNT, "Active Warnings Count"),
      icon: "mdi:weather-cloudy-alert",
      state: state.activeCount,
      attributes: { ...shared }
    },
    {
      ...sensorIdentity(group, SensorKinds.ACTIVE_WARNINGS, "Active Warnings"),
      icon: "mdi:format-list-bulleted",
      state: describeActiveCount(state.activeCount),
      attributes: {
        active_warnings_count: state.activeCount,
        warnings: state.activeWarnings.map(toWarningAttributes),
        ...shared
      }
    },
    {
      ...sensorIdentity(group, SensorKinds.HIGHEST_WARNING_LEVEL, "Highest Warning Level"),
      icon: style?.icon ?? NO_WARNING_ICON,
      state: formatLevel(state.highestLevel),
      attributes: {
        active_warnings_count: state.activeCount,
        ...(style ? { color: style.color, priority: style.priority } : {}),
        last_updated: shared.last_updated,
        area: group.name
      }
    }
  ];
}
