/**
 * Swarm Executor
 *
 * Runs one async callable N times concurrently against a shared resource,
 * writes one JSONL entry per outcome, and hands outcomes back as they
 * complete.
 *
 * @example
 * ```typescript
 * const swarm = new Swarm();
 * const client = new HttpClient();
 *
 * const results = await swarm.run(
 *   createOpenAICall({ model: "gpt-4o-mini", systemPrompt, userTask }),
 *   4,
 *   client,
 *   "responses.json"
 * );
 * // results.length === 4, in completion order
 * // responses.json holds 4 lines: {"task":2,"status":"success","response":"..."}
 * ```
 *
 * Ordering: results arrive in completion order, which varies between runs.
 * The `task` field of each log line always names the task that wrote it.
 * Each entry is written before its outcome is delivered.
 *
 * Failures: an error outcome is ordinary data. Only infrastructure problems
 * (sink open/write/close, a response JSON cannot represent, a callable that
 * rejects) fail the run, and then no partial results are returned.
 */

import { SwarmError, formatError } from "../errors";
import { openFileSink, type LineSink, type SinkOpener } from "../observability/file-sink";
import { buildLogEntry, encodeLogEntry } from "../observability/log-entry";
import type { SwarmCallable, SwarmLogger, SwarmOutcome } from "../types";
import { invoke } from "./callable";
import { createChannel, type Sender } from "./channel";
import type { OnTaskCompleteCallback, SwarmConfig } from "./types";

export * from "./types";
export { Semaphore } from "./semaphore";
export { createChannel, type Sender, type Receiver } from "./channel";
export { attempt, invoke } from "./callable";

/** How one task ended, from the executor's side */
type TaskJoin = { ok: true } | { ok: false; error: SwarmError };

// =============================================================================
// SWARM CLASS
// =============================================================================

export class Swarm {
  private readonly logger: SwarmLogger;
  private readonly openSink: SinkOpener;
  private readonly onTaskComplete?: OnTaskCompleteCallback;

  constructor(config: SwarmConfig = {}) {
    this.logger = config.logger ?? console;
    this.openSink = config.openSink ?? openFileSink;
    this.onTaskComplete = config.onTaskComplete;
  }

  // ===========================================================================
  // PUBLIC API
  // ===========================================================================

  /**
   * Run `callable` `n` times and collect every outcome.
   *
   * @param sink - sink identifier (a file path by default), truncated first
   * @returns exactly `n` outcomes in completion order
   * @throws SwarmError on infrastructure failure
   */
  async run<R, T, E>(
    callable: SwarmCallable<R, T, E>,
    n: number,
    resource: R,
    sink: string
  ): Promise<SwarmOutcome<T, E>[]> {
    const results: SwarmOutcome<T, E>[] = [];
    for await (const outcome of this.stream(callable, n, resource, sink)) {
      results.push(outcome);
    }
    return results;
  }

  /**
   * Same as run(), yielding each outcome as it arrives.
   *
   * Nothing starts until the first value is requested. Stopping early
   * drops the remaining outcomes (their log entries are still written);
   * the generator still waits for every task and closes the sink, and a
   * fatal error raised meanwhile is thrown from the consumer's `break`.
   */
  async *stream<R, T, E>(
    callable: SwarmCallable<R, T, E>,
    n: number,
    resource: R,
    sink: string
  ): AsyncGenerator<SwarmOutcome<T, E>, void, undefined> {
    assertWidth(n);
    const handle = this.open(sink);

    const [tx, rx] = createChannel<SwarmOutcome<T, E>>(Math.max(n, 1));
    const joins: Promise<TaskJoin>[] = [];
    let drained = false;
    let fatal: SwarmError | undefined;

    this.logger.debug(`[Swarm] Launching ${n} task(s), sink: ${sink}`);

    try {
      for (let index = 0; index < n; index++) {
        joins.push(settle(this.runTask(index, callable, resource, handle, sink, tx.clone())));
      }
      // No more producers; tasks keep their own senders
      tx.close();

      for await (const outcome of rx) {
        yield outcome;
      }
      drained = true;
    } finally {
      tx.close();
      if (!drained) rx.close();

      const settled = await Promise.all(joins);
      fatal = firstFailure(settled);
      const closeError = this.close(handle, sink);
      fatal = fatal ?? closeError;

      if (fatal && !drained) {
        this.logger.error(`[Swarm] Run stopped early and failed: ${fatal.message}`);
        // Surfaces from the consumer's break or return()
        throw fatal;
      }
    }

    if (fatal) throw fatal;
    this.logger.debug(`[Swarm] All ${n} task(s) completed`);
  }

  // ===========================================================================
  // INTERNAL: TASK LIFECYCLE
  // ===========================================================================

  private async runTask<R, T, E>(
    index: number,
    callable: SwarmCallable<R, T, E>,
    resource: R,
    handle: LineSink,
    sink: string,
    tx: Sender<SwarmOutcome<T, E>>
  ): Promise<void> {
    const task = index + 1;
    try {
      let outcome: SwarmOutcome<T, E>;
      try {
        outcome = await invoke(callable, resource);
      } catch (error) {
        throw new SwarmError(
          "TASK_FAILED",
          `Task ${task} rejected instead of returning an outcome: ${formatError(error)}`,
          { cause: error }
        );
      }

      let line: string;
      try {
        line = encodeLogEntry(buildLogEntry(index, outcome));
      } catch (error) {
        throw new SwarmError(
          "ENTRY_ENCODE",
          `Task ${task}: cannot encode log entry: ${formatError(error)}`,
          { cause: error }
        );
      }

      try {
        await handle.append(line);
      } catch (error) {
        throw new SwarmError(
          "SINK_WRITE",
          `Task ${task}: cannot write log entry to ${sink}: ${formatError(error)}`,
          { cause: error }
        );
      }

      this.logger.debug(`[Swarm] Task ${task} finished: ${outcome.status}`);
      this.onTaskComplete?.(task, outcome.status);

      if (!(await tx.send(outcome))) {
        this.logger.warn(`[Swarm] Task ${task}: receiver closed, result dropped`);
      }
    } finally {
      tx.close();
    }
  }

  // ===========================================================================
  // INTERNAL: SINK LIFECYCLE
  // ===========================================================================

  private open(sink: string): LineSink {
    try {
      return this.openSink(sink, this.logger);
    } catch (error) {
      throw new SwarmError("SINK_OPEN", `Cannot open sink ${sink}: ${formatError(error)}`, {
        cause: error,
      });
    }
  }

  private close(handle: LineSink, sink: string): SwarmError | undefined {
    try {
      handle.close();
      return undefined;
    } catch (error) {
      return new SwarmError("SINK_CLOSE", `Cannot close sink ${sink}: ${formatError(error)}`, {
        cause: error,
      });
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Run a callable `n` times with a default-configured Swarm.
 */
export function runSwarm<R, T, E>(
  callable: SwarmCallable<R, T, E>,
  n: number,
  resource: R,
  sink: string,
  config?: SwarmConfig
): Promise<SwarmOutcome<T, E>[]> {
  return new Swarm(config).run(callable, n, resource, sink);
}

function assertWidth(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new SwarmError("INVALID_WIDTH", `Swarm width must be a non-negative integer, got ${n}`);
  }
}

/** Observe a task's settlement immediately so a rejection is never unhandled */
function settle(task: Promise<void>): Promise<TaskJoin> {
  return task.then(
    (): TaskJoin => ({ ok: true }),
    (error: unknown): TaskJoin => ({
      ok: false,
      error:
        error instanceof SwarmError
          ? error
          : new SwarmError("TASK_FAILED", `Task failed: ${formatError(error)}`, { cause: error }),
    })
  );
}

function firstFailure(joins: TaskJoin[]): SwarmError | undefined {
  for (const join of joins) {
    if (!join.ok) return join.error;
  }
  return undefined;
}
