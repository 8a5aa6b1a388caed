/**
 * Error Types
 *
 * SwarmError: the run itself could not complete (sink or task infrastructure).
 * ProviderError: a provider callable failed; travels inside an error outcome.
 */

import type { ProviderType } from "./types";

// =============================================================================
// SWARM ERROR
// =============================================================================

export type SwarmErrorCode =
  | "INVALID_WIDTH"
  | "SINK_OPEN"
  | "SINK_WRITE"
  | "SINK_CLOSE"
  | "ENTRY_ENCODE"
  | "TASK_FAILED";

export class SwarmError extends Error {
  readonly code: SwarmErrorCode;

  constructor(code: SwarmErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SwarmError";
    this.code = code;
  }
}

export function isSwarmError(error: unknown): error is SwarmError {
  return error instanceof SwarmError;
}

// =============================================================================
// PROVIDER ERROR
// =============================================================================

/**
 * - config: credential or setting missing
 * - network: request never produced a response
 * - http: non-2xx response
 * - parse: response body did not match the expected shape
 */
export type ProviderErrorKind = "config" | "network" | "http" | "parse";

export class ProviderError extends Error {
  readonly provider: ProviderType;
  readonly kind: ProviderErrorKind;
  /** HTTP status, for kind "http" */
  readonly status?: number;

  constructor(
    provider: ProviderType,
    kind: ProviderErrorKind,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "ProviderError";
    this.provider = provider;
    this.kind = kind;
    this.status = options?.status;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** Coerce a thrown value into an Error */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : formatError(value));
}

/**
 * Render any error value as a single string for the sink.
 *
 * Errors become "Name: message", strings pass through, everything
 * else is JSON (falling back to String()).
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  if (typeof error === "string") {
    return error;
  }
  return tryStringify(error) ?? String(error);
}

/** JSON.stringify that yields undefined for circular or BigInt values */
function tryStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
