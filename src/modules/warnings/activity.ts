import type { Warning, WarningTimestamp } from "./types.js";

function instantOf(timestamp: WarningTimestamp): number | undefined {
  return timestamp.state === "present" ? timestamp.at.getTime() : undefined;
}

/**
 * A warning is active once issued and until it expires. Missing or
 * unparseable bounds never make a warning inactive. Expiry is exclusive.
 */
export function isWarningActive(warning: Warning, now: Date): boolean {
  const nowMs = now.getTime();
  const issued = instantOf(warning.issuedAt);
  const expires = instantOf(warning.expiresAt);

  if (issued !== undefined && issued > nowMs) {
    return false;
  }
  if (expires !== undefined && expires <= nowMs) {
    return false;
  }
  return true;
}

export function selectActiveWarnings(warnings: readonly Warning[], now: Date): Warning[] {
  return warnings.filter((warning) => isWarningActive(warning, now));
}
