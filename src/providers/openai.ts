/**
 * OpenAI chat completions callable.
 */

import type { ProviderError } from "../errors";
import { getProviderConfig } from "../registry";
import { success } from "../types";
import type { SwarmFn } from "../types";
import type { HttpClient } from "./http";
import { resolveForCall, sendRequest, type ProviderCallOptions } from "./request";

export interface OpenAICallOptions extends ProviderCallOptions {
  systemPrompt: string;
  userTask: string;
}

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
}

/**
 * Build a swarm callable that sends one chat completion per invocation and
 * resolves to the raw response body.
 *
 * @example
 * ```typescript
 * const call = createOpenAICall({
 *   model: "gpt-4o-mini",
 *   systemPrompt: "You are a helpful assistant.",
 *   userTask: "Who won the world series in 2020?",
 * });
 * const results = await runSwarm(call, 4, new HttpClient(), "responses.json");
 * ```
 */
export function createOpenAICall(options: OpenAICallOptions): SwarmFn<HttpClient, string, ProviderError> {
  const logger = options.logger ?? console;
  const request: ChatCompletionRequest = {
    model: options.model ?? getProviderConfig("openai").defaultModel,
    messages: [
      { role: "system", content: options.systemPrompt },
      { role: "user", content: options.userTask },
    ],
  };

  return async (client) => {
    const config = resolveForCall("openai", options);
    if (config.status === "error") return config;

    const res = await sendRequest(
      client,
      config.data,
      { Authorization: `Bearer ${config.data.apiKey}` },
      request,
      logger
    );
    if (res.status === "error") return res;

    return success(res.data.text);
  };
}
