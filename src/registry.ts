/**
 * Provider Registry
 *
 * Single source of truth for provider-specific settings.
 * Differences between providers are data, not code.
 */

import type { ProviderType } from "./types";

// =============================================================================
// REGISTRY TYPES
// =============================================================================

export interface ProviderRegistryEntry {
  /** Environment variable name for API key */
  apiKeyEnv: string;
  /** Environment variable name for base URL */
  baseUrlEnv: string;
  /** Base URL when neither config nor env sets one */
  defaultBaseUrl: string;
  /** Request path appended to the base URL */
  path: string;
  /** Model used when none is given */
  defaultModel: string;
}

// =============================================================================
// REGISTRY
// =============================================================================

export const PROVIDER_REGISTRY: Record<ProviderType, ProviderRegistryEntry> = {
  openai: {
    apiKeyEnv: "OPENAI_API_KEY",
    baseUrlEnv: "OPENAI_BASE_URL",
    defaultBaseUrl: "https://api.openai.com",
    path: "/v1/chat/completions",
    defaultModel: "gpt-4o-mini",
  },
  anthropic: {
    apiKeyEnv: "ANTHROPIC_API_KEY",
    baseUrlEnv: "ANTHROPIC_BASE_URL",
    defaultBaseUrl: "https://api.anthropic.com",
    path: "/v1/messages",
    defaultModel: "claude-3-5-sonnet-20240620",
  },
};

export const PROVIDER_TYPES: readonly ProviderType[] = ["openai", "anthropic"];

export function getProviderConfig(provider: ProviderType): ProviderRegistryEntry {
  return PROVIDER_REGISTRY[provider];
}

export function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some((provider) => provider === value);
}
