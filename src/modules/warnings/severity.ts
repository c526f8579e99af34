import type { HighestWarningLevel, Warning } from "./types.js";

const LEVEL_RANK: Readonly<Record<HighestWarningLevel, number>> = Object.freeze({
  none: 0,
  unknown: 1,
  yellow: 2,
  orange: 3,
  red: 4
});

export interface WarningLevelStyle {
  color: string;
  priority: number;
  icon: string;
}

export const WARNING_LEVEL_STYLES = Object.freeze({
  red: { color: "#d32f2f", priority: 3, icon: "mdi:alert-octagon" },
  orange: { color: "#f57c00", priority: 2, icon: "mdi:alert" },
  yellow: { color: "#fbc02d", priority: 1, icon: "mdi:alert-outline" }
} satisfies Record<string, WarningLevelStyle>);

export const NO_WARNING_ICON = "mdi:weather-sunny";

export function compareLevels(left: HighestWarningLevel, right: HighestWarningLevel): number {
  return LEVEL_RANK[left] - LEVEL_RANK[right];
}

export function highestLevel(warnings: readonly Warning[]): HighestWarningLevel {
  let highest: HighestWarningLevel = "none";
  for (const warning of warnings) {
    if (compareLevels(warning.level, highest) > 0) {
      highest = warning.level;
    }
  }
  return highest;
}

export function styleForLevel(level: HighestWarningLevel): WarningLevelStyle | undefined {
  switch (level) {
    case "red":
    case "orange":
    case "yellow":
      return WARNING_LEVEL_STYLES[level];
    default:
      return undefined;
  }
}
