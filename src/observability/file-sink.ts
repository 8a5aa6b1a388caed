/**
 * File Sink
 *
 * Append-only JSONL destination for swarm log entries.
 *
 * Architecture:
 * - Opened once in truncate mode, before any task runs
 * - One-permit semaphore serializes appends across tasks
 * - Each append is a synchronous write of one whole line; nothing is
 *   awaited while the permit is held
 */

import { closeSync, openSync, writeSync } from "fs";
import { Semaphore } from "../swarm/semaphore";
import type { SwarmLogger } from "../types";

// =============================================================================
// TYPES
// =============================================================================

/** Destination for whole lines; shared by every task of a run */
export interface LineSink {
  /** Append `line` followed by a newline. Rejects if the write fails. */
  append(line: string): Promise<void>;
  close(): void;
}

/** Opens (and truncates) the sink named by `target` */
export type SinkOpener = (target: string, logger: SwarmLogger) => LineSink;

// =============================================================================
// FILE SINK
// =============================================================================

export class FileSink implements LineSink {
  private readonly lock = new Semaphore(1);
  private fd: number | null;

  private constructor(
    readonly path: string,
    fd: number,
    private readonly logger?: SwarmLogger
  ) {
    this.fd = fd;
  }

  /**
   * Create or truncate the file at `path`. Throws the underlying fs error
   * (ENOENT, EACCES, EISDIR, ...) when it cannot be opened.
   */
  static open(path: string, logger?: SwarmLogger): FileSink {
    const fd = openSync(path, "w");
    logger?.debug(`[FileSink] Opened ${path} (truncated)`);
    return new FileSink(path, fd, logger);
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  async append(line: string): Promise<void> {
    if (line.includes("\n")) {
      throw new Error("Sink lines must not contain newlines");
    }
    await this.lock.use(() => this.writeLine(line));
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
    this.logger?.debug(`[FileSink] Closed ${this.path}`);
  }

  private writeLine(line: string): void {
    if (this.fd === null) {
      throw new Error(`Sink ${this.path} is closed`);
    }
    const bytes = Buffer.from(line + "\n", "utf-8");
    let offset = 0;
    while (offset < bytes.length) {
      offset += writeSync(this.fd, bytes, offset, bytes.length - offset);
    }
  }
}

/** Default opener: a truncating FileSink at the given path */
export const openFileSink: SinkOpener = (target, logger) => FileSink.open(target, logger);
