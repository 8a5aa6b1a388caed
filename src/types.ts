/**
 * Core Types
 *
 * Outcome, callable and log-entry types shared by the swarm executor,
 * the sink and the provider callables.
 */

// =============================================================================
// OUTCOMES
// =============================================================================

export interface SuccessOutcome<T> {
  status: "success";
  data: T;
}

export interface FailureOutcome<E> {
  status: "error";
  error: E;
}

/** Result of one task: a success payload or the callable's own error */
export type SwarmOutcome<T, E = Error> = SuccessOutcome<T> | FailureOutcome<E>;

export type OutcomeStatus = SwarmOutcome<unknown, unknown>["status"];

export function success<T>(data: T): SuccessOutcome<T> {
  return { status: "success", data };
}

export function failure<E>(error: E): FailureOutcome<E> {
  return { status: "error", error };
}

export function isSuccess<T, E>(outcome: SwarmOutcome<T, E>): outcome is SuccessOutcome<T> {
  return outcome.status === "success";
}

export function isFailure<T, E>(outcome: SwarmOutcome<T, E>): outcome is FailureOutcome<E> {
  return outcome.status === "error";
}

// =============================================================================
// CALLABLES
// =============================================================================

/** Async function of the shared resource */
export type SwarmFn<R, T, E> = (resource: R) => Promise<SwarmOutcome<T, E>>;

/** Object form of a callable, for stateful or configured invokers */
export interface Invocable<R, T, E> {
  invoke(resource: R): Promise<SwarmOutcome<T, E>>;
}

/**
 * Anything the swarm can run.
 *
 * Must be safe to call concurrently: the only state shared between
 * invocations is the resource itself. A callable reports failure by
 * resolving to an error outcome; rejecting fails the whole run.
 */
export type SwarmCallable<R, T, E> = SwarmFn<R, T, E> | Invocable<R, T, E>;

// =============================================================================
// LOG ENTRIES
// =============================================================================

export interface SuccessLogEntry {
  /** 1-based launch index */
  task: number;
  status: "success";
  response: unknown;
}

export interface ErrorLogEntry {
  task: number;
  status: "error";
  error: string;
}

/** One line of the sink */
export type SwarmLogEntry = SuccessLogEntry | ErrorLogEntry;

// =============================================================================
// LOGGER
// =============================================================================

/** Console-compatible diagnostics target */
export interface SwarmLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// =============================================================================
// PROVIDERS
// =============================================================================

export type ProviderType = "openai" | "anthropic";
