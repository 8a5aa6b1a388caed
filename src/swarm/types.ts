/**
 * Swarm - Type Definitions
 */

import type { SinkOpener } from "../observability/file-sink";
import type { OutcomeStatus, SwarmLogger } from "../types";

// Re-export for convenience
export type {
  SwarmOutcome,
  SuccessOutcome,
  FailureOutcome,
  SwarmCallable,
  SwarmFn,
  Invocable,
  SwarmLogEntry,
  SwarmLogger,
} from "../types";
export type { LineSink, SinkOpener } from "../observability/file-sink";

// =============================================================================
// CONFIGURATION
// =============================================================================

/** Callback after a task's log entry is written, before its result is delivered */
export type OnTaskCompleteCallback = (task: number, status: OutcomeStatus) => void;

export interface SwarmConfig {
  /** Diagnostics target (default: console) */
  logger?: SwarmLogger;
  /** How a sink identifier is opened (default: truncating FileSink) */
  openSink?: SinkOpener;
  /** Called once per task with its 1-based index */
  onTaskComplete?: OnTaskCompleteCallback;
}
