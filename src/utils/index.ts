/**
 * Utilities
 *
 * Re-exports all utility functions.
 */

export { ensureFolder, writeFile, writeFiles, type WriteFilesResult, type FileWriteFailure } from "./files";
export {
  readEnv,
  readEnvVar,
  resolveProviderConfig,
  type SwarmEnv,
  type ProviderOverrides,
  type ResolvedProviderConfig,
} from "./config";
