/**
 * Providers Module
 *
 * Ready-made swarm callables for chat-completion APIs.
 */

import { DEFAULT_ANTHROPIC_MAX_TOKENS } from "../constants";
import type { ProviderError } from "../errors";
import { getProviderConfig } from "../registry";
import { success } from "../types";
import type { ProviderType, SwarmFn } from "../types";
import { createAnthropicCall, getResponseText } from "./anthropic";
import type { HttpClient } from "./http";
import { createOpenAICall } from "./openai";
import type { ProviderCallOptions } from "./request";

export { HttpClient, type HttpClientOptions, type HttpResponse, type FetchFn } from "./http";
export { createOpenAICall, type OpenAICallOptions } from "./openai";
export {
  createAnthropicCall,
  getResponseText,
  AnthropicResponseSchema,
  type AnthropicCallOptions,
  type AnthropicMessage,
  type AnthropicRequest,
  type AnthropicResponse,
} from "./anthropic";
export type { ProviderCallOptions } from "./request";

export interface PromptCallOptions extends ProviderCallOptions {
  systemPrompt: string;
  userTask: string;
}

/**
 * Same prompt, any provider: resolves to the response text.
 * OpenAI yields the raw body, Anthropic the joined text blocks.
 */
export function createProviderCall(
  provider: ProviderType,
  options: PromptCallOptions
): SwarmFn<HttpClient, string, ProviderError> {
  if (provider === "openai") {
    return createOpenAICall(options);
  }

  const call = createAnthropicCall(
    {
      model: options.model ?? getProviderConfig("anthropic").defaultModel,
      max_tokens: DEFAULT_ANTHROPIC_MAX_TOKENS,
      system: options.systemPrompt,
      messages: [{ role: "user", content: options.userTask }],
    },
    options
  );

  return async (client) => {
    const outcome = await call(client);
    return outcome.status === "success" ? success(getResponseText(outcome.data)) : outcome;
  };
}
