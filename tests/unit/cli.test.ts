#!/usr/bin/env tsx
/**
 * Unit Test: CLI
 *
 * Drives `concurrent-swarm run` through buildProgram() with a fake fetch:
 *   1. Writes one line per request into a nested output folder
 *   2. Unknown provider is rejected before anything runs
 *   3. Defaults come from the environment
 *
 * Usage:
 *   npx tsx tests/unit/cli.test.ts
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { buildProgram, createCliLogger } from "../../src/cli";
import type { FetchFn } from "../../src/providers";

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

const tempDir = mkdtempSync(join(tmpdir(), "cli-test-"));

function fakeFetch(urls: string[]): FetchFn {
  return async (url) => {
    urls.push(url);
    return new Response(`{"choices":[{"message":{"content":"answer ${urls.length}"}}]}`, { status: 200 });
  };
}

function argv(...args: string[]): string[] {
  return ["node", "concurrent-swarm", ...args];
}

// =============================================================================
// TESTS
// =============================================================================

async function testRunWritesSink(): Promise<void> {
  console.log("\n[1] run Writes One Line Per Request");

  const out = join(tempDir, "nested", "responses.json");
  const urls: string[] = [];
  await buildProgram({}, { fetch: fakeFetch(urls) }).parseAsync(
    argv("run", "--task", "Who won the world series in 2020?", "-n", "3", "-o", out)
  );

  assert(urls.length === 3, `Three requests sent (was ${urls.length})`);
  assert(urls.every((u) => u === "https://api.openai.com/v1/chat/completions"), "OpenAI by default");
  assert(existsSync(out), "Output folder created");

  const lines = readFileSync(out, "utf-8").trim().split("\n");
  assert(lines.length === 3, "Three sink lines");
  assert(lines.every((l) => l.includes('"status":"success"')), "All successes");
}

async function testUnknownProvider(): Promise<void> {
  console.log("\n[2] Unknown Provider");

  const out = join(tempDir, "never.json");
  const urls: string[] = [];
  let message = "";
  try {
    await buildProgram({}, { fetch: fakeFetch(urls) }).parseAsync(
      argv("run", "--task", "x", "--provider", "gemini", "-o", out)
    );
  } catch (e) {
    message = e instanceof Error ? e.message : String(e);
  }

  assert(message === "Unknown provider 'gemini'. Use openai or anthropic.", `Message: ${message}`);
  assert(urls.length === 0 && !existsSync(out), "Nothing ran, no sink created");
}

async function testEnvDefaults(): Promise<void> {
  console.log("\n[3] Width And Output From Environment");

  const out = join(tempDir, "from-env.jsonl");
  const urls: string[] = [];
  await buildProgram({ SWARM_WIDTH: 2, SWARM_OUTPUT_FILE: out }, { fetch: fakeFetch(urls) }).parseAsync(
    argv("run", "--task", "x")
  );

  assert(urls.length === 2, `SWARM_WIDTH used (${urls.length} requests)`);
  assert(readFileSync(out, "utf-8").trim().split("\n").length === 2, "SWARM_OUTPUT_FILE used");
}

function testLogger(): void {
  console.log("\n[4] CLI Logger Verbosity");

  const logged: string[] = [];
  const original = console.debug;
  console.debug = (...args: unknown[]) => {
    logged.push(args.map(String).join(" "));
  };
  try {
    createCliLogger(false).debug("[Swarm] hidden");
    createCliLogger(true).debug("[Swarm] shown");
  } finally {
    console.debug = original;
  }

  assert(logged.length === 1 && logged[0].includes("[Swarm] shown"), "debug only printed with --verbose");
}

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<void> {
  console.log("=".repeat(60));
  console.log("CLI Unit Tests");
  console.log("=".repeat(60));

  process.env.OPENAI_API_KEY = "test-key";
  try {
    await testRunWritesSink();
    await testUnknownProvider();
    await testEnvDefaults();
    testLogger();
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
