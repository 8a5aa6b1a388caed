/**
 * Constants
 */

// =============================================================================
// SWARM DEFAULTS
// =============================================================================

/** Default sink file (JSONL content; name kept for compatibility with existing tooling) */
export const DEFAULT_OUTPUT_FILE = "responses.json";

/** Default number of concurrent tasks for the CLI */
export const DEFAULT_WIDTH = 4;

// =============================================================================
// PROVIDER DEFAULTS
// =============================================================================

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";

/** Anthropic Messages API version header */
export const DEFAULT_ANTHROPIC_VERSION = "2023-06-01";

export const DEFAULT_ANTHROPIC_MAX_TOKENS = 1024;

// =============================================================================
// ENVIRONMENT VARIABLES
// =============================================================================

export const ENV_OUTPUT_FILE = "SWARM_OUTPUT_FILE";
export const ENV_WIDTH = "SWARM_WIDTH";
export const ENV_ANTHROPIC_VERSION = "ANTHROPIC_VERSION";
