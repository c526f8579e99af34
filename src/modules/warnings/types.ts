export const WarningLevels = {
  RED: "red",
  ORANGE: "orange",
  YELLOW: "yellow",
  UNKNOWN: "unknown"
} as const;

export type WarningLevel = (typeof WarningLevels)[keyof typeof WarningLevels];

/** Reduced level for a group; "none" when nothing is active. */
export type HighestWarningLevel = WarningLevel | "none";

/**
 * A timestamp as read from the feed. A value that was sent but could not be
 * parsed is kept apart from one that was never sent.
 */
export type WarningTimestamp =
  | { state: "absent" }
  | { state: "unparseable"; raw: string }
  | { state: "present"; at: Date };

/** A warning record as published upstream. Every field is optional. */
export interface RawWarning {
  id?: unknown;
  capId?: unknown;
  type?: unknown;
  level?: unknown;
  severity?: unknown;
  certainty?: unknown;
  urgency?: unknown;
  status?: unknown;
  issued?: unknown;
  updated?: unknown;
  onset?: unknown;
  expiry?: unknown;
  expires?: unknown;
  headline?: unknown;
  description?: unknown;
  instruction?: unknown;
  regions?: unknown;
  [key: string]: unknown;
}

export interface Warning {
  id: string;
  level: WarningLevel;
  headline: string;
  description: string;
  warningType: string;
  regions: string[];
  issuedAt: WarningTimestamp;
  expiresAt: WarningTimestamp;
  updatedAt: WarningTimestamp;
  onsetAt: WarningTimestamp;
  capId: string | undefined;
  severity: string | undefined;
  certainty: string | undefined;
  urgency: string | undefined;
  status: string | undefined;
  instruction: string | undefined;
}

export type RecordDefectReason =
  | "NOT_AN_OBJECT"
  | "MISSING_ID"
  | "DUPLICATE_ID"
  | "UNPARSEABLE_TIMESTAMP";

export interface RecordDefect {
  index: number;
  reason: RecordDefectReason;
  warningId: string | undefined;
  detail: string;
}

export interface NormalizationResult {
  warnings: Warning[];
  defects: RecordDefect[];
}

export type AreaMatcher =
  | { kind: "all" }
  | { kind: "regions"; names: readonly string[] };

export interface AreaGroup {
  /** Slug used in entity ids. */
  readonly id: string;
  /** Display suffix used in entity names. */
  readonly name: string;
  readonly matcher: AreaMatcher;
}

export interface DerivedSensorState {
  activeCount: number;
  activeWarnings: Warning[];
  highestLevel: HighestWarningLevel;
}

export interface AreaSensorState {
  group: AreaGroup;
  state: DerivedSensorState;
}

export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface PollLease {
  /** Resolves false when the lease had lapsed before release. */
  release(): Promise<boolean>;
}

/** Keeps a config entry from being polled by more than one process at once. */
export interface PollLeaseManager {
  tryAcquire(configEntry: string, ttlSeconds: number): Promise<PollLease | undefined>;
}
