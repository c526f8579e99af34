export { MetEireannWarningsClient } from "./client.js";
export { parseWarningsBody, parseWarningsPayload } from "./schema.js";
export { DEFAULT_WARNINGS_FEED_URL } from "./types.js";
export type {
  FetchError,
  FetchErrorKind,
  FetchWarningsResult,
  MetEireannWarningsClientOptions,
  WarningsFeedProvider
} from "./types.js";
