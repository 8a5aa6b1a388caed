// =============================================================================
// MAIN EXPORTS
// =============================================================================

// Swarm executor (N concurrent calls, JSONL record, completion-order results)
export {
  Swarm,
  runSwarm,
  Semaphore,
  createChannel,
  attempt,
  invoke,
  type Sender,
  type Receiver,
  type SwarmConfig,
  type OnTaskCompleteCallback,
  type LineSink,
  type SinkOpener,
} from "./swarm";

// Sink
export { FileSink, openFileSink, buildLogEntry, encodeLogEntry } from "./observability";

// Provider callables
export {
  HttpClient,
  createOpenAICall,
  createAnthropicCall,
  createProviderCall,
  getResponseText,
  AnthropicResponseSchema,
  type HttpClientOptions,
  type HttpResponse,
  type FetchFn,
  type OpenAICallOptions,
  type AnthropicCallOptions,
  type AnthropicMessage,
  type AnthropicRequest,
  type AnthropicResponse,
  type ProviderCallOptions,
  type PromptCallOptions,
} from "./providers";

// Registry
export { PROVIDER_REGISTRY, PROVIDER_TYPES, getProviderConfig, isProviderType } from "./registry";
export type { ProviderRegistryEntry } from "./registry";

// Utilities
export * from "./utils";

// Errors
export {
  SwarmError,
  ProviderError,
  isSwarmError,
  formatError,
  toError,
  type SwarmErrorCode,
  type ProviderErrorKind,
} from "./errors";

// Types
export {
  success,
  failure,
  isSuccess,
  isFailure,
  type SwarmOutcome,
  type SuccessOutcome,
  type FailureOutcome,
  type OutcomeStatus,
  type SwarmCallable,
  type SwarmFn,
  type Invocable,
  type SwarmLogEntry,
  type SuccessLogEntry,
  type ErrorLogEntry,
  type SwarmLogger,
  type ProviderType,
} from "./types";
