/**
 * Anthropic Messages API callable.
 */

import { z } from "zod";
import { DEFAULT_ANTHROPIC_VERSION, ENV_ANTHROPIC_VERSION } from "../constants";
import { ProviderError } from "../errors";
import { failure, success } from "../types";
import type { SwarmFn } from "../types";
import { readEnvVar } from "../utils/config";
import type { HttpClient } from "./http";
import { resolveForCall, sendRequest, type ProviderCallOptions } from "./request";

// =============================================================================
// REQUEST
// =============================================================================

export interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | Record<string, unknown>[];
}

/** Request body; optional fields are omitted from the JSON when unset */
export interface AnthropicRequest {
  model: string;
  max_tokens: number;
  messages: AnthropicMessage[];
  system?: string;
  stop_sequences?: string[];
  temperature?: number;
  top_k?: number;
  top_p?: number;
  metadata?: Record<string, string>;
  tools?: Record<string, unknown>[];
  tool_choice?: Record<string, unknown>;
}

// =============================================================================
// RESPONSE
// =============================================================================

const ContentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const AnthropicResponseSchema = z.object({
  id: z.string(),
  type: z.string(),
  role: z.string(),
  model: z.string(),
  content: z.array(ContentBlockSchema),
  stop_reason: z.string().nullable(),
  stop_sequence: z.string().nullable(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .passthrough(),
});

export type AnthropicResponse = z.infer<typeof AnthropicResponseSchema>;

/** Concatenated text of all text blocks */
export function getResponseText(response: AnthropicResponse): string {
  return response.content
    .filter((block) => block.type === "text")
    .map((block) => block.text ?? "")
    .join("");
}

// =============================================================================
// CALLABLE
// =============================================================================

export interface AnthropicCallOptions extends ProviderCallOptions {
  /** anthropic-version header (default: ANTHROPIC_VERSION env, then 2023-06-01) */
  apiVersion?: string;
}

/**
 * Build a swarm callable that sends `request` once per invocation and
 * resolves to the validated response.
 */
export function createAnthropicCall(
  request: AnthropicRequest,
  options: AnthropicCallOptions = {}
): SwarmFn<HttpClient, AnthropicResponse, ProviderError> {
  const logger = options.logger ?? console;

  return async (client) => {
    const config = resolveForCall("anthropic", options);
    if (config.status === "error") return config;

    const apiVersion =
      options.apiVersion ?? readEnvVar(ENV_ANTHROPIC_VERSION, options.env) ?? DEFAULT_ANTHROPIC_VERSION;
    logger.debug(`[Anthropic] Request body: ${JSON.stringify(request)}`);

    const res = await sendRequest(
      client,
      config.data,
      { "x-api-key": config.data.apiKey, "anthropic-version": apiVersion },
      request,
      logger
    );
    if (res.status === "error") return res;

    logger.debug(`[Anthropic] Response body: ${res.data.text}`);

    let body: unknown;
    try {
      body = JSON.parse(res.data.text);
    } catch (error) {
      logger.error(`[Anthropic] Failed to parse API response: ${String(error)}`);
      return failure(new ProviderError("anthropic", "parse", "Response body is not JSON", { cause: error }));
    }

    const parsed = AnthropicResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error(`[Anthropic] Failed to parse API response: ${parsed.error.message}`);
      return failure(
        new ProviderError("anthropic", "parse", `Unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
          cause: parsed.error,
        })
      );
    }

    logger.debug(`[Anthropic] Input Tokens Used: ${parsed.data.usage.input_tokens}`);
    logger.debug(`[Anthropic] Output Tokens Generated: ${parsed.data.usage.output_tokens}`);
    return success(parsed.data);
  };
}
