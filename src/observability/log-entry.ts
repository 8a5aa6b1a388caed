/**
 * Log entry construction and encoding.
 */

import { formatError } from "../errors";
import type { SwarmLogEntry, SwarmOutcome } from "../types";

/**
 * Build the sink record for the task launched at `index` (0-based).
 * `task` is 1-based. An undefined payload is recorded as null so the
 * `response` key is always present.
 */
export function buildLogEntry<T, E>(index: number, outcome: SwarmOutcome<T, E>): SwarmLogEntry {
  if (outcome.status === "success") {
    return {
      task: index + 1,
      status: "success",
      response: outcome.data === undefined ? null : outcome.data,
    };
  }
  return {
    task: index + 1,
    status: "error",
    error: formatError(outcome.error),
  };
}

/**
 * Encode an entry as one JSON line (no trailing newline).
 * Throws if the response payload has no JSON form (functions, symbols,
 * BigInt, cycles), so a success line never loses its `response` key.
 */
export function encodeLogEntry(entry: SwarmLogEntry): string {
  if (entry.status === "success") {
    const response: string | undefined = JSON.stringify(entry.response);
    if (response === undefined) {
      throw new TypeError(`Response of type ${typeof entry.response} has no JSON representation`);
    }
  }
  return JSON.stringify(entry);
}
