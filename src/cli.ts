#!/usr/bin/env node
/**
 * concurrent-swarm CLI
 *
 * Sends the same prompt N times in parallel and records every response.
 *
 * Setup:
 *   export OPENAI_API_KEY=...      (or ANTHROPIC_API_KEY with --provider anthropic)
 *
 * Run:
 *   concurrent-swarm run --task "Who won the world series in 2020?" -n 4 -o out/responses.json
 */
import "dotenv/config";
import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import * as path from "path";

import { DEFAULT_OUTPUT_FILE, DEFAULT_SYSTEM_PROMPT, DEFAULT_WIDTH } from "./constants";
import { SwarmError, formatError } from "./errors";
import { HttpClient, createProviderCall, type FetchFn } from "./providers";
import { PROVIDER_TYPES, isProviderType } from "./registry";
import { runSwarm } from "./swarm";
import type { SwarmLogger } from "./types";
import { ensureFolder, readEnv, type SwarmEnv } from "./utils";

interface RunOptions {
  provider: string;
  model?: string;
  system: string;
  task: string;
  width: number;
  out: string;
  verbose?: boolean;
}

export interface CliDeps {
  /** fetch used by the shared HTTP client (default: global fetch) */
  fetch?: FetchFn;
}

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

function parseWidth(value: string): number {
  const width = Number(value);
  if (!Number.isInteger(width) || width < 0) {
    throw new InvalidArgumentError("must be a non-negative integer");
  }
  return width;
}

/** Warnings and errors always; debug and info with --verbose */
export function createCliLogger(verbose: boolean): SwarmLogger {
  return {
    debug: (message, ...args) => {
      if (verbose) console.debug(chalk.dim(message), ...args);
    },
    info: (message, ...args) => {
      if (verbose) console.info(chalk.dim(message), ...args);
    },
    warn: (message, ...args) => console.warn(chalk.yellow(message), ...args),
    error: (message, ...args) => console.error(chalk.red(message), ...args),
  };
}

// ─────────────────────────────────────────────────────────────
// Program
// ─────────────────────────────────────────────────────────────

export function buildProgram(env: SwarmEnv, deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name("concurrent-swarm")
    .description("Run the same chat-completion request N times concurrently and log every outcome.")
    .version("0.1.0");

  program
    .command("run")
    .description("Send one prompt N times in parallel; write one JSON line per response.")
    .requiredOption("-t, --task <text>", "User message sent by every request")
    .option("-p, --provider <provider>", `Provider: ${PROVIDER_TYPES.join("|")}`, "openai")
    .option("-m, --model <model>", "Model name (default: provider default)")
    .option("-s, --system <prompt>", "System prompt", DEFAULT_SYSTEM_PROMPT)
    .option("-n, --width <count>", "Number of concurrent requests", parseWidth, env.SWARM_WIDTH ?? DEFAULT_WIDTH)
    .option("-o, --out <path>", "Output JSONL path (truncated on start)", env.SWARM_OUTPUT_FILE ?? DEFAULT_OUTPUT_FILE)
    .option("-v, --verbose", "Show debug output")
    .action(async (opts: RunOptions) => {
      if (!isProviderType(opts.provider)) {
        throw new InvalidArgumentError(`Unknown provider '${opts.provider}'. Use ${PROVIDER_TYPES.join(" or ")}.`);
      }
      const logger = createCliLogger(Boolean(opts.verbose));

      const folder = path.dirname(opts.out);
      if (folder !== ".") {
        await ensureFolder(folder, logger);
      }

      console.log(chalk.cyan(`Starting ${opts.width} concurrent ${opts.provider} requests`));

      const call = createProviderCall(opts.provider, {
        model: opts.model,
        systemPrompt: opts.system,
        userTask: opts.task,
        logger,
      });
      const results = await runSwarm(call, opts.width, new HttpClient({ fetch: deps.fetch }), opts.out, {
        logger,
      });

      // Collection order is completion order, not launch order
      results.forEach((result, i) => {
        if (result.status === "success") {
          console.log(`${chalk.green(`Request ${i + 1}: Success`)} - ${result.data}`);
        } else {
          console.error(`${chalk.red(`Request ${i + 1}: Failed`)} - ${formatError(result.error)}`);
        }
      });

      console.log(chalk.green(`All tasks completed. Log: ${opts.out}`));
    });

  return program;
}

// ─────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  await buildProgram(readEnv()).parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    const message = err instanceof SwarmError ? `${err.code}: ${err.message}` : formatError(err);
    console.error(chalk.red(message));
    process.exitCode = 1;
  });
}
