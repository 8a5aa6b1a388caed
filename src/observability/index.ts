/**
 * Observability Module
 *
 * Durable JSONL record of every swarm outcome.
 */

export { FileSink, openFileSink, type LineSink, type SinkOpener } from "./file-sink";
export { buildLogEntry, encodeLogEntry } from "./log-entry";
