/**
 * Configuration Utilities
 *
 * Environment parsing and provider credential resolution.
 */

import { z } from "zod";
import { ENV_ANTHROPIC_VERSION, ENV_OUTPUT_FILE, ENV_WIDTH } from "../constants";
import { ProviderError } from "../errors";
import { getProviderConfig } from "../registry";
import type { ProviderType } from "../types";

// =============================================================================
// ENVIRONMENT
// =============================================================================

/** Treat empty strings as unset, like most shells do for `FOO= cmd` */
function unsetIfEmpty<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema.optional());
}

const EnvSchema = z.object({
  OPENAI_API_KEY: unsetIfEmpty(z.string()),
  OPENAI_BASE_URL: unsetIfEmpty(z.string().url()),
  ANTHROPIC_API_KEY: unsetIfEmpty(z.string()),
  ANTHROPIC_BASE_URL: unsetIfEmpty(z.string().url()),
  [ENV_ANTHROPIC_VERSION]: unsetIfEmpty(z.string()),
  [ENV_OUTPUT_FILE]: unsetIfEmpty(z.string()),
  [ENV_WIDTH]: unsetIfEmpty(z.coerce.number().int().min(0)),
});

export type SwarmEnv = z.infer<typeof EnvSchema>;

/**
 * Parse and validate the variables this package reads.
 * Unknown variables are ignored.
 */
export function readEnv(env: NodeJS.ProcessEnv = process.env): SwarmEnv {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

// =============================================================================
// PROVIDERS
// =============================================================================

export interface ProviderOverrides {
  apiKey?: string;
  baseUrl?: string;
}

export interface ResolvedProviderConfig {
  provider: ProviderType;
  apiKey: string;
  /** Full endpoint URL (base URL + provider path) */
  url: string;
}

/**
 * Resolve credentials and endpoint for a provider.
 *
 * Priority: explicit override → environment → registry default.
 *
 * @throws ProviderError (kind "config") when no API key is available or
 *   one of the provider's own variables is malformed
 */
export function resolveProviderConfig(
  provider: ProviderType,
  overrides: ProviderOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedProviderConfig {
  const registry = getProviderConfig(provider);
  const vars = readProviderEnv(provider, env);

  const apiKey = overrides.apiKey ?? vars.apiKey;
  if (!apiKey) {
    throw new ProviderError(
      provider,
      "config",
      `API key not found in environment variable ${registry.apiKeyEnv}.`
    );
  }

  const baseUrl = overrides.baseUrl ?? vars.baseUrl ?? registry.defaultBaseUrl;
  return {
    provider,
    apiKey,
    url: joinUrl(baseUrl, registry.path),
  };
}

const ProviderEnvSchema = z.object({
  apiKey: unsetIfEmpty(z.string()),
  baseUrl: unsetIfEmpty(z.string().url()),
});

/** Validate only the variables named by the provider's registry entry */
function readProviderEnv(
  provider: ProviderType,
  env: NodeJS.ProcessEnv
): z.infer<typeof ProviderEnvSchema> {
  const registry = getProviderConfig(provider);
  const parsed = ProviderEnvSchema.safeParse({
    apiKey: env[registry.apiKeyEnv],
    baseUrl: env[registry.baseUrlEnv],
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => {
        const name = issue.path[0] === "apiKey" ? registry.apiKeyEnv : registry.baseUrlEnv;
        return `${name}: ${issue.message}`;
      })
      .join("; ");
    throw new ProviderError(provider, "config", `Invalid environment: ${issues}`);
  }
  return parsed.data;
}

/** A single variable, with an empty value treated as unset */
export function readEnvVar(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

function joinUrl(base: string, path: string): string {
  return base.replace(/\/+$/, "") + path;
}
