import { parseWarningsBody } from "./schema.js";
import {
  DEFAULT_WARNINGS_FEED_URL,
  type FetchError,
  type FetchWarningsResult,
  type MetEireannWarningsClientOptions,
  type WarningsFeedProvider
} from "./types.js";

function assertPositiveInt(value: number, fieldName: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${fieldName} must be a positive integer`);
  }
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function failure(error: FetchError): FetchWarningsResult {
  return { ok: false, error };
}

/**
 * Fetches the national warnings feed. Every call is a live request; failures
 * come back as a FetchError instead of being thrown.
 */
export class MetEireannWarningsClient implements WarningsFeedProvider {
  private readonly feedUrl: URL;
  private readonly userAgent: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: MetEireannWarningsClientOptions) {
    const feedUrl = options.feedUrl?.trim() || DEFAULT_WARNINGS_FEED_URL;
    assertPositiveInt(options.requestTimeoutMs, "requestTimeoutMs");

    this.feedUrl = new URL(feedUrl);
    this.userAgent = options.userAgent?.trim() || "ireland-weather-warnings/0.1";
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchWarnings(signal?: AbortSignal): Promise<FetchWarningsResult> {
    if (signal?.aborted) {
      return failure({ kind: "aborted", message: "Warnings request was cancelled" });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const onAbort = () => {
      controller.abort();
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchImpl(this.feedUrl, {
        method: "GET",
        headers: {
          accept: "application/json",
          "user-agent": this.userAgent
        },
        signal: controller.signal
      });

      if (!response.ok) {
        const body = (await response.text()).trim().slice(0, 200);
        return failure({
          kind: "bad-status",
          status: response.status,
          message: `Warnings feed request failed (${response.status})${body ? `: ${body}` : ""}`
        });
      }

      const body = await response.text();
      try {
        return { ok: true, warnings: parseWarningsBody(body) };
      } catch (error) {
        return failure({ kind: "parse", message: errorMessage(error) });
      }
    } catch (error) {
      if (timedOut) {
        return failure({
          kind: "timeout",
          message: `Warnings feed request timed out after ${this.requestTimeoutMs}ms`
        });
      }
      if (controller.signal.aborted) {
        return failure({ kind: "aborted", message: "Warnings request was cancelled" });
      }
      return failure({
        kind: "connection",
        message: `Warnings feed request failed: ${errorMessage(error)}`
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
