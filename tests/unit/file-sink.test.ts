#!/usr/bin/env tsx
/**
 * Unit Test: File Sink & Log Entries
 *
 * Tests:
 *   1. FileSink.open truncates existing content
 *   2. Concurrent appends produce whole, separate lines
 *   3. Invalid input and closed sinks are rejected
 *   4. buildLogEntry / encodeLogEntry produce the documented line format
 *
 * Usage:
 *   npx tsx tests/unit/file-sink.test.ts
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { FileSink } from "../../src/observability/file-sink";
import { buildLogEntry, encodeLogEntry } from "../../src/observability/log-entry";
import { ProviderError } from "../../src/errors";
import { failure, success } from "../../src/types";

// =============================================================================
// TEST HELPERS
// =============================================================================

let passed = 0;
let failed = 0;

function assert(condition: boolean, message: string): void {
  if (condition) {
    passed++;
    console.log(`  ✓ ${message}`);
  } else {
    failed++;
    console.log(`  ✗ ${message}`);
  }
}

async function assertRejects(fn: () => Promise<unknown>, message: string): Promise<void> {
  try {
    await fn();
    failed++;
    console.log(`  ✗ ${message} (did not reject)`);
  } catch {
    passed++;
    console.log(`  ✓ ${message}`);
  }
}

const tempDir = mkdtempSync(join(tmpdir(), "file-sink-test-"));

function readLines(path: string): string[] {
  return readFileSync(path, "utf-8").split("\n").filter((line) => line.length > 0);
}

// =============================================================================
// TESTS
// =============================================================================

async function testTruncateOnOpen(): Promise<void> {
  console.log("\n[1] Open Truncates");

  const path = join(tempDir, "truncate.jsonl");
  writeFileSync(path, '{"task":1,"status":"success","response":"stale"}\n');

  const sink = FileSink.open(path);
  assert(sink.isOpen, "Sink is open");
  assert(readFileSync(path, "utf-8") === "", "Existing content removed on open");

  await sink.append('{"task":1}');
  sink.close();
  assert(readFileSync(path, "utf-8") === '{"task":1}\n', "New content written with trailing newline");
}

async function testConcurrentAppends(): Promise<void> {
  console.log("\n[2] Concurrent Appends Are Whole Lines");

  const path = join(tempDir, "concurrent.jsonl");
  const sink = FileSink.open(path);
  const payload = "x".repeat(4096);

  await Promise.all(
    Array.from({ length: 25 }, (_, i) => sink.append(JSON.stringify({ task: i + 1, payload })))
  );
  sink.close();

  const lines = readLines(path);
  assert(lines.length === 25, `25 lines written (was ${lines.length})`);

  const tasks = new Set<number>();
  let intact = true;
  for (const line of lines) {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed === "object" && parsed !== null && "task" in parsed && "payload" in parsed) {
      if (typeof parsed.task === "number") tasks.add(parsed.task);
      if (parsed.payload !== payload) intact = false;
    } else {
      intact = false;
    }
  }
  assert(intact, "Every line parses with its full payload");
  assert(tasks.size === 25, `All 25 task ids present (was ${tasks.size})`);
}

async function testRejections(): Promise<void> {
  console.log("\n[3] Rejected Appends");

  const path = join(tempDir, "reject.jsonl");
  const sink = FileSink.open(path);

  await assertRejects(() => sink.append("two\nlines"), "Embedded newline rejected");

  sink.close();
  sink.close();
  assert(!sink.isOpen, "close() is idempotent");
  await assertRejects(() => sink.append("late"), "Append after close rejected");
  assert(readFileSync(path, "utf-8") === "", "Nothing written by rejected appends");

  let openError = "";
  try {
    FileSink.open(join(tempDir, "missing-dir", "sink.jsonl"));
  } catch (e) {
    openError = e instanceof Error && "code" in e ? String(e.code) : "";
  }
  assert(openError === "ENOENT", `Open in missing folder fails with ENOENT (was ${openError})`);
}

async function testLogEntryFormat(): Promise<void> {
  console.log("\n[4] Log Entry Format");

  const ok = encodeLogEntry(buildLogEntry(0, success({ answer: 42 })));
  assert(ok === '{"task":1,"status":"success","response":{"answer":42}}', `Success line: ${ok}`);

  const err = encodeLogEntry(buildLogEntry(2, failure(new Error("boom"))));
  assert(err === '{"task":3,"status":"error","error":"Error: boom"}', `Error line: ${err}`);

  const provider = encodeLogEntry(
    buildLogEntry(1, failure(new ProviderError("openai", "http", "OpenAI API returned 500: oops", { status: 500 })))
  );
  assert(
    provider === '{"task":2,"status":"error","error":"ProviderError: OpenAI API returned 500: oops"}',
    `Provider error line: ${provider}`
  );

  const text = encodeLogEntry(buildLogEntry(4, failure("timeout")));
  assert(text === '{"task":5,"status":"error","error":"timeout"}', `String error line: ${text}`);

  const empty = encodeLogEntry(buildLogEntry(0, success(undefined)));
  assert(empty === '{"task":1,"status":"success","response":null}', `Undefined payload line: ${empty}`);

  const object = encodeLogEntry(buildLogEntry(0, failure({ code: 7 })));
  assert(object === '{"task":1,"status":"error","error":"{\\"code\\":7}"}', `Object error line: ${object}`);
}

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<void> {
  console.log("=".repeat(60));
  console.log("File Sink Unit Tests");
  console.log("=".repeat(60));

  try {
    await testTruncateOnOpen();
    await testConcurrentAppends();
    await testRejections();
    await testLogEntryFormat();
  } finally {
    rmSync(tempDir, { recursive: true, force: true });
  }

  console.log("\n" + "=".repeat(60));
  console.log(`Results: ${passed} passed, ${failed} failed`);
  console.log("=".repeat(60));

  if (failed > 0) {
    process.exit(1);
  }
}

main().catch((e) => {
  console.error("Test runner error:", e);
  process.exit(1);
});
