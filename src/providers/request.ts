/**
 * Request plumbing shared by provider callables.
 */

import { ProviderError, formatError } from "../errors";
import { failure, success } from "../types";
import type { ProviderType, SwarmLogger, SwarmOutcome } from "../types";
import {
  resolveProviderConfig,
  type ProviderOverrides,
  type ResolvedProviderConfig,
} from "../utils/config";
import type { HttpClient, HttpResponse } from "./http";

/** Characters of a failed response body kept in the error message */
const ERROR_BODY_LIMIT = 500;

export interface ProviderCallOptions extends ProviderOverrides {
  /** Model name (default: registry default for the provider) */
  model?: string;
  /** Diagnostics target (default: console) */
  logger?: SwarmLogger;
  /** Environment to resolve credentials from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve credentials at call time. A missing key is a per-task error,
 * not a thrown one.
 */
export function resolveForCall(
  provider: ProviderType,
  options: ProviderCallOptions
): SwarmOutcome<ResolvedProviderConfig, ProviderError> {
  try {
    return success(resolveProviderConfig(provider, options, options.env));
  } catch (error) {
    const providerError =
      error instanceof ProviderError
        ? error
        : new ProviderError(provider, "config", formatError(error), { cause: error });
    (options.logger ?? console).error(`[${label(provider)}] ${providerError.message}`);
    return failure(providerError);
  }
}

/**
 * POST to the provider. Network failures and non-2xx responses become
 * error outcomes.
 */
export async function sendRequest(
  client: HttpClient,
  config: ResolvedProviderConfig,
  headers: Record<string, string>,
  body: unknown,
  logger: SwarmLogger
): Promise<SwarmOutcome<HttpResponse, ProviderError>> {
  const name = label(config.provider);

  let res: HttpResponse;
  try {
    res = await client.postJson(config.url, headers, body);
  } catch (error) {
    logger.error(`[${name}] API call failed: ${formatError(error)}`);
    return failure(
      new ProviderError(config.provider, "network", `Request to ${config.url} failed: ${formatError(error)}`, {
        cause: error,
      })
    );
  }

  if (!res.ok) {
    logger.error(`[${name}] API call returned status ${res.status}`);
    return failure(
      new ProviderError(config.provider, "http", `${name} API returned ${res.status}: ${truncate(res.text)}`, {
        status: res.status,
      })
    );
  }

  logger.info(`[${name}] API call successful, status: ${res.status}`);
  return success(res);
}

function label(provider: ProviderType): string {
  return provider === "openai" ? "OpenAI" : "Anthropic";
}

function truncate(text: string): string {
  return text.length > ERROR_BODY_LIMIT ? `${text.slice(0, ERROR_BODY_LIMIT)}...` : text;
}
