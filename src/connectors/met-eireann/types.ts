export const DEFAULT_WARNINGS_FEED_URL = "https://www.met.ie/Open_Data/json/warning_IRELAND.json";

export type FetchErrorKind = "timeout" | "connection" | "bad-status" | "parse" | "aborted";

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  /** HTTP status for "bad-status" failures. */
  status?: number;
}

/** Feed entries are untrusted; the normalizer decides what is a warning. */
export type FetchWarningsResult =
  | { ok: true; warnings: unknown[] }
  | { ok: false; error: FetchError };

export interface WarningsFeedProvider {
  fetchWarnings(signal?: AbortSignal): Promise<FetchWarningsResult>;
}

export interface MetEireannWarningsClientOptions {
  feedUrl?: string;
  userAgent?: string;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
}
