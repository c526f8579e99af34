import {
  WarningLevels,
  type NormalizationResult,
  type RawWarning,
  type RecordDefect,
  type Warning,
  type WarningLevel,
  type WarningTimestamp
} from "./types.js";

export const DEFAULT_HEADLINE = "Weather Warning";
export const DEFAULT_DESCRIPTION = "No description available";
export const DEFAULT_WARNING_TYPE = "Weather";

function isNamedLevel(value: string): value is WarningLevel {
  return (
    value === WarningLevels.YELLOW ||
    value === WarningLevels.ORANGE ||
    value === WarningLevels.RED
  );
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function asNonEmptyString(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const output: string[] = [];
  for (const item of value) {
    const normalized = asNonEmptyString(item);
    if (normalized) {
      output.push(normalized);
    }
  }
  return output;
}

/**
 * Resolves the three entities the feed escapes. Order is fixed so that
 * "&amp;lt;" becomes "&lt;" rather than "<".
 */
export function decodeWarningText(text: string): string {
  return text.replace(/&gt;/g, ">").replace(/&lt;/g, "<").replace(/&amp;/g, "&");
}

/** Inverse of decodeWarningText; "&" is escaped first. */
export function encodeWarningText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function normalizeLevel(value: unknown): WarningLevel {
  const text = asNonEmptyString(value)?.toLowerCase();
  if (text && isNamedLevel(text)) {
    return text;
  }
  return WarningLevels.UNKNOWN;
}

export function parseWarningTimestamp(value: unknown): WarningTimestamp {
  if (value instanceof Date) {
    return Number.isFinite(value.getTime())
      ? { state: "present", at: new Date(value.getTime()) }
      : { state: "unparseable", raw: String(value) };
  }
  const text = asNonEmptyString(value);
  if (!text) {
    return { state: "absent" };
  }
  const parsed = Date.parse(text);
  if (!Number.isFinite(parsed)) {
    return { state: "unparseable", raw: text };
  }
  return { state: "present", at: new Date(parsed) };
}

/** ISO form for presentation; unparseable values are shown as received. */
export function formatWarningTimestamp(timestamp: WarningTimestamp): string | undefined {
  switch (timestamp.state) {
    case "present":
      return timestamp.at.toISOString();
    case "unparseable":
      return timestamp.raw;
    case "absent":
      return undefined;
  }
}

function decodedOrDefault(value: unknown, fallback: string): string {
  const text = asNonEmptyString(value);
  return text ? decodeWarningText(text) : fallback;
}

function normalizeRecord(record: Record<string, unknown>, id: string): Warning {
  const status = asNonEmptyString(record.status);
  return {
    id,
    level: normalizeLevel(record.level),
    headline: decodedOrDefault(record.headline, DEFAULT_HEADLINE),
    description: decodedOrDefault(record.description, DEFAULT_DESCRIPTION),
    warningType: asNonEmptyString(record.type) ?? DEFAULT_WARNING_TYPE,
    regions: asStringArray(record.regions),
    issuedAt: parseWarningTimestamp(record.issued),
    // The feed names this "expiry"; "expires" is what the published attributes use.
    expiresAt: parseWarningTimestamp(record.expiry ?? record.expires),
    updatedAt: parseWarningTimestamp(record.updated),
    onsetAt: parseWarningTimestamp(record.onset),
    capId: asNonEmptyString(record.capId ?? record.cap_id),
    severity: asNonEmptyString(record.severity),
    certainty: asNonEmptyString(record.certainty),
    urgency: asNonEmptyString(record.urgency),
    status: status?.toLowerCase(),
    instruction: asNonEmptyString(record.instruction)
  };
}

function timestampDefects(index: number, warning: Warning): RecordDefect[] {
  const fields: Array<[string, WarningTimestamp]> = [
    ["issued", warning.issuedAt],
    ["expires", warning.expiresAt],
    ["updated", warning.updatedAt],
    ["onset", warning.onsetAt]
  ];

  const defects: RecordDefect[] = [];
  for (const [field, timestamp] of fields) {
    if (timestamp.state === "unparseable") {
      defects.push({
        index,
        reason: "UNPARSEABLE_TIMESTAMP",
        warningId: warning.id,
        detail: `${field} "${timestamp.raw}" is not a valid timestamp`
      });
    }
  }
  return defects;
}

/**
 * Turns a feed snapshot into canonical warnings. Never throws: records
 * without an id (or repeating one already seen) are dropped and reported as
 * defects, and bad timestamps are kept as unparseable.
 */
export function normalizeWarnings(raw: readonly unknown[]): NormalizationResult {
  const warnings: Warning[] = [];
  const defects: RecordDefect[] = [];
  const seenIds = new Set<string>();

  raw.forEach((item, index) => {
    if (!isObjectRecord(item)) {
      defects.push({
        index,
        reason: "NOT_AN_OBJECT",
        warningId: undefined,
        detail: "warning record must be an object"
      });
      return;
    }

    const id = asNonEmptyString(item.id);
    if (!id) {
      defects.push({
        index,
        reason: "MISSING_ID",
        warningId: undefined,
        detail: "warning record has no id"
      });
      return;
    }

    if (seenIds.has(id)) {
      defects.push({
        index,
        reason: "DUPLICATE_ID",
        warningId: id,
        detail: `warning ${id} appears more than once in the feed`
      });
      return;
    }
    seenIds.add(id);

    const warning = normalizeRecord(item, id);
    defects.push(...timestampDefects(index, warning));
    warnings.push(warning);
  });

  return { warnings, defects };
}

/**
 * Presents a normalized warning back in feed form, with text re-escaped the
 * way the feed sends it. Feeding the result to normalizeWarnings yields the
 * same canonical values.
 */
export function toRawWarning(warning: Warning): RawWarning {
  return {
    id: warning.id,
    capId: warning.capId,
    type: warning.warningType,
    level: warning.level,
    severity: warning.severity,
    certainty: warning.certainty,
    urgency: warning.urgency,
    status: warning.status,
    issued: formatWarningTimestamp(warning.issuedAt),
    updated: formatWarningTimestamp(warning.updatedAt),
    onset: formatWarningTimestamp(warning.onsetAt),
    expiry: formatWarningTimestamp(warning.expiresAt),
    headline: encodeWarningText(warning.headline),
    description: encodeWarningText(warning.description),
    instruction: warning.instruction,
    regions: [...warning.regions]
  };
}
