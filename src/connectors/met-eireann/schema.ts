/**
 * Met Éireann publishes a bare JSON array, or null when nothing is in force.
 * Entries are passed through as-is; non-object entries stay in place so the
 * normalizer can report them.
 */
export function parseWarningsPayload(payload: unknown): unknown[] {
  if (payload === null) {
    return [];
  }
  if (!Array.isArray(payload)) {
    throw new Error("Warnings payload must be a JSON array");
  }
  return payload;
}

/** Parses the response body text, failing on malformed JSON or a non-array root. */
export function parseWarningsBody(text: string): unknown[] {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new Error(
      `Warnings payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseWarningsPayload(payload);
}
